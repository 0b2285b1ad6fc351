import type { SessionRecord, SessionStore, Turn } from "./types.js";

interface StoredSession {
  record: SessionRecord;
  turns: Turn[];
  expiresAtMs: number;
}

export interface InMemorySessionStoreOptions {
  now?: () => number;
}

/** Process-local store for local mode and tests; expiry is checked on read. */
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, StoredSession>();
  private readonly now: () => number;

  constructor(options: InMemorySessionStoreOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  private live(sessionId: string): StoredSession | null {
    const stored = this.sessions.get(sessionId);
    if (!stored) {
      return null;
    }
    if (stored.expiresAtMs <= this.now()) {
      this.sessions.delete(sessionId);
      return null;
    }
    return stored;
  }

  async create(record: SessionRecord, ttlSeconds: number): Promise<void> {
    this.sessions.set(record.id, {
      record: { ...record },
      turns: [],
      expiresAtMs: this.now() + ttlSeconds * 1000
    });
  }

  async get(sessionId: string): Promise<SessionRecord | null> {
    const stored = this.live(sessionId);
    return stored ? { ...stored.record } : null;
  }

  async getTurns(sessionId: string, limit?: number): Promise<Turn[]> {
    const stored = this.live(sessionId);
    if (!stored || (limit !== undefined && limit <= 0)) {
      return [];
    }
    const turns = limit === undefined ? stored.turns : stored.turns.slice(-limit);
    return turns.map((turn) => ({ ...turn }));
  }

  async countTurns(sessionId: string): Promise<number> {
    return this.live(sessionId)?.turns.length ?? 0;
  }

  async appendTurn(record: SessionRecord, turn: Turn, ttlSeconds: number): Promise<boolean> {
    const stored = this.live(record.id);
    if (!stored) {
      return false;
    }
    stored.record = { ...record };
    stored.turns.push({ ...turn });
    stored.expiresAtMs = this.now() + ttlSeconds * 1000;
    return true;
  }

  async delete(sessionId: string): Promise<boolean> {
    const existed = this.live(sessionId) !== null;
    this.sessions.delete(sessionId);
    return existed;
  }

  async listIds(): Promise<string[]> {
    return [...this.sessions.keys()].filter((id) => this.live(id) !== null).sort();
  }
}
