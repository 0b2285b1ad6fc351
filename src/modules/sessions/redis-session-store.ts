import { logWarn } from "../../observability/logger.js";
import { type SessionRecord, type SessionStore, type Turn, sessionRecordSchema, turnSchema } from "./types.js";

type TransactionResult = Array<[Error | null, unknown]> | null;

/** The ioredis commands the session store needs. */
export interface RedisSessionClient {
  get(key: string): Promise<string | null>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  llen(key: string): Promise<number>;
  del(...keys: string[]): Promise<number>;
  scan(cursor: string, matchToken: "MATCH", pattern: string, countToken: "COUNT", count: number): Promise<[string, string[]]>;
  multi(commands: Array<Array<string | number>>): { exec(): Promise<TransactionResult> };
}

export interface RedisSessionStoreOptions {
  client: RedisSessionClient;
  keyPrefix?: string;
  scanCount?: number;
}

const parseJson = (raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
};

const assertTransaction = (result: TransactionResult, operation: string): void => {
  if (!result) {
    throw new Error(`Redis transaction for ${operation} was aborted`);
  }
  const failure = result.find(([error]) => error !== null);
  if (failure?.[0]) {
    throw failure[0];
  }
};

/**
 * Sessions in Redis: a JSON header at `session:{id}` and the turns as a list at
 * `session:{id}:turns`. Both keys share the TTL, refreshed on every append.
 */
export class RedisSessionStore implements SessionStore {
  private readonly client: RedisSessionClient;
  private readonly keyPrefix: string;
  private readonly scanCount: number;

  constructor(options: RedisSessionStoreOptions) {
    this.client = options.client;
    this.keyPrefix = options.keyPrefix ?? "session:";
    this.scanCount = options.scanCount ?? 100;
  }

  private headerKey(sessionId: string): string {
    return `${this.keyPrefix}${sessionId}`;
  }

  private turnsKey(sessionId: string): string {
    return `${this.keyPrefix}${sessionId}:turns`;
  }

  async create(record: SessionRecord, ttlSeconds: number): Promise<void> {
    const result = await this.client
      .multi([
        ["set", this.headerKey(record.id), JSON.stringify(record), "EX", ttlSeconds],
        ["del", this.turnsKey(record.id)]
      ])
      .exec();
    assertTransaction(result, "create");
  }

  async get(sessionId: string): Promise<SessionRecord | null> {
    const raw = await this.client.get(this.headerKey(sessionId));
    if (raw === null) {
      return null;
    }
    const parsed = sessionRecordSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      logWarn("sessions.redis.invalid_header", { sessionId });
      return null;
    }
    return parsed.data;
  }

  async getTurns(sessionId: string, limit?: number): Promise<Turn[]> {
    if (limit !== undefined && limit <= 0) {
      return [];
    }
    const start = limit === undefined ? 0 : -limit;
    const rawTurns = await this.client.lrange(this.turnsKey(sessionId), start, -1);
    const turns: Turn[] = [];
    for (const raw of rawTurns) {
      const parsed = turnSchema.safeParse(parseJson(raw));
      if (parsed.success) {
        turns.push(parsed.data);
      } else {
        logWarn("sessions.redis.invalid_turn", { sessionId });
      }
    }
    return turns;
  }

  async countTurns(sessionId: string): Promise<number> {
    return this.client.llen(this.turnsKey(sessionId));
  }

  async appendTurn(record: SessionRecord, turn: Turn, ttlSeconds: number): Promise<boolean> {
    const existing = await this.client.get(this.headerKey(record.id));
    if (existing === null) {
      return false;
    }
    const result = await this.client
      .multi([
        ["set", this.headerKey(record.id), JSON.stringify(record), "EX", ttlSeconds],
        ["rpush", this.turnsKey(record.id), JSON.stringify(turn)],
        ["expire", this.turnsKey(record.id), ttlSeconds]
      ])
      .exec();
    assertTransaction(result, "appendTurn");
    return true;
  }

  async delete(sessionId: string): Promise<boolean> {
    const removed = await this.client.del(this.headerKey(sessionId), this.turnsKey(sessionId));
    return removed > 0;
  }

  async listIds(): Promise<string[]> {
    const ids = new Set<string>();
    let cursor = "0";
    do {
      const [nextCursor, keys] = await this.client.scan(cursor, "MATCH", `${this.keyPrefix}*`, "COUNT", this.scanCount);
      for (const key of keys) {
        if (!key.endsWith(":turns")) {
          ids.add(key.slice(this.keyPrefix.length));
        }
      }
      cursor = nextCursor;
    } while (cursor !== "0");
    return [...ids].sort();
  }
}
