import { z } from "zod";
import { SUPPORTED_COUNTRIES } from "../../constants/laws.js";

export const turnCitationSchema = z.object({
  lawName: z.string(),
  articleNumber: z.number().int().nullable()
});

export const turnSchema = z.object({
  question: z.string(),
  rewrittenQuestion: z.string().nullable().default(null),
  answer: z.string(),
  citedChunkIds: z.array(z.string()).default([]),
  citations: z.array(turnCitationSchema).default([]),
  timestamp: z.string(),
  failed: z.boolean().default(false),
  error: z.string().nullable().default(null)
});

export const sessionMetadataSchema = z.object({
  country: z.enum(SUPPORTED_COUNTRIES).nullable().default(null)
});

export const sessionRecordSchema = z.object({
  id: z.string().min(1),
  createdAt: z.string(),
  updatedAt: z.string(),
  expiresAt: z.string(),
  metadata: sessionMetadataSchema.default({ country: null })
});

export type TurnCitation = z.infer<typeof turnCitationSchema>;
export type Turn = z.infer<typeof turnSchema>;
export type SessionMetadata = z.infer<typeof sessionMetadataSchema>;
/** Session header as stored; turns are kept alongside it. */
export type SessionRecord = z.infer<typeof sessionRecordSchema>;

export type Session = SessionRecord & {
  turns: Turn[];
};

export type SessionSummary = SessionRecord & {
  turnCount: number;
};

export interface SessionStore {
  create(record: SessionRecord, ttlSeconds: number): Promise<void>;
  /** `null` when missing or expired. */
  get(sessionId: string): Promise<SessionRecord | null>;
  /** The last `limit` turns in append order; all turns when `limit` is omitted. */
  getTurns(sessionId: string, limit?: number): Promise<Turn[]>;
  countTurns(sessionId: string): Promise<number>;
  /** Appends atomically and replaces the header; `false` when the session is gone. */
  appendTurn(record: SessionRecord, turn: Turn, ttlSeconds: number): Promise<boolean>;
  delete(sessionId: string): Promise<boolean>;
  listIds(): Promise<string[]>;
}
