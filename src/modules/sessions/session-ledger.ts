import { randomUUID } from "node:crypto";
import { logInfo } from "../../observability/logger.js";
import { KeyedMutex } from "../concurrency/keyed-mutex.js";
import { SessionNotFound } from "../errors.js";
import type { Session, SessionMetadata, SessionRecord, SessionStore, SessionSummary, Turn } from "./types.js";

export interface SessionLedgerDependencies {
  store: SessionStore;
  ttlSeconds: number;
  now?: () => number;
  createId?: () => string;
  mutex?: KeyedMutex;
  logInfo?: typeof logInfo;
}

export interface ResolvedSession {
  session: SessionRecord;
  created: boolean;
}

/**
 * Conversation history per session id. Reads treat expired sessions as missing;
 * every append slides the expiry forward by the TTL.
 */
export class SessionLedger {
  private readonly store: SessionStore;
  private readonly ttlSeconds: number;
  private readonly now: () => number;
  private readonly createId: () => string;
  private readonly mutex: KeyedMutex;
  private readonly log: typeof logInfo;

  constructor(dependencies: SessionLedgerDependencies) {
    this.store = dependencies.store;
    this.ttlSeconds = dependencies.ttlSeconds;
    this.now = dependencies.now ?? Date.now;
    this.createId = dependencies.createId ?? randomUUID;
    this.mutex = dependencies.mutex ?? new KeyedMutex();
    this.log = dependencies.logInfo ?? logInfo;
  }

  private expiryFrom(nowMs: number): string {
    return new Date(nowMs + this.ttlSeconds * 1000).toISOString();
  }

  async createSession(metadata: Partial<SessionMetadata> = {}, sessionId?: string): Promise<SessionRecord> {
    const nowMs = this.now();
    const record: SessionRecord = {
      id: sessionId ?? this.createId(),
      createdAt: new Date(nowMs).toISOString(),
      updatedAt: new Date(nowMs).toISOString(),
      expiresAt: this.expiryFrom(nowMs),
      metadata: { country: metadata.country ?? null }
    };
    await this.store.create(record, this.ttlSeconds);
    this.log("sessions.created", { sessionId: record.id, country: record.metadata.country }, {
      ttl_seconds: this.ttlSeconds
    });
    return record;
  }

  /**
   * Creates a session while holding its lock. A live session under the same id
   * is returned as it stands, turns included.
   */
  async openSession(metadata: Partial<SessionMetadata> = {}, sessionId?: string): Promise<Session> {
    const id = sessionId ?? this.createId();
    return this.runExclusive(id, async () => {
      const existing = await this.getSession(id);
      if (existing) {
        this.log("sessions.reused", { sessionId: id, country: existing.metadata.country }, {
          turn_count: existing.turns.length
        });
        return existing;
      }
      const record = await this.createSession(metadata, id);
      return { ...record, turns: [] };
    });
  }

  async getSession(sessionId: string): Promise<Session | null> {
    const record = await this.store.get(sessionId);
    if (!record) {
      return null;
    }
    const turns = await this.store.getTurns(sessionId);
    return { ...record, turns };
  }

  async requireSession(sessionId: string): Promise<SessionRecord> {
    const record = await this.store.get(sessionId);
    if (!record) {
      throw new SessionNotFound(sessionId);
    }
    return record;
  }

  /** Returns the live session, or creates one (keeping the caller's id when given). */
  async resolveSession(sessionId: string | undefined, metadata: Partial<SessionMetadata> = {}): Promise<ResolvedSession> {
    if (sessionId) {
      try {
        return { session: await this.requireSession(sessionId), created: false };
      } catch (error) {
        if (!(error instanceof SessionNotFound)) {
          throw error;
        }
        this.log("sessions.recreated", { sessionId }, { reason: "missing_or_expired" });
      }
    }
    return { session: await this.createSession(metadata, sessionId), created: true };
  }

  async appendTurn(sessionId: string, turn: Turn): Promise<SessionRecord> {
    const current = await this.requireSession(sessionId);
    const nowMs = this.now();
    const updated: SessionRecord = {
      ...current,
      updatedAt: new Date(nowMs).toISOString(),
      expiresAt: this.expiryFrom(nowMs)
    };
    const appended = await this.store.appendTurn(updated, turn, this.ttlSeconds);
    if (!appended) {
      throw new SessionNotFound(sessionId);
    }
    return updated;
  }

  async recentTurns(sessionId: string, count: number): Promise<Turn[]> {
    return this.store.getTurns(sessionId, count);
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    const deleted = await this.store.delete(sessionId);
    if (deleted) {
      this.log("sessions.deleted", { sessionId });
    }
    return deleted;
  }

  async listSessions(): Promise<SessionSummary[]> {
    const ids = await this.store.listIds();
    const summaries: SessionSummary[] = [];
    for (const id of ids) {
      const record = await this.store.get(id);
      if (record) {
        summaries.push({ ...record, turnCount: await this.store.countTurns(id) });
      }
    }
    return summaries;
  }

  /** Serializes work on one session id; different ids proceed in parallel. */
  runExclusive<T>(sessionId: string, operation: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(sessionId, operation);
  }
}
