import {
  COUNTRY_DISPLAY_NAMES,
  type Country,
  LAW_TYPE_DISPLAY_NAMES,
  type LawType,
  SUPPORTED_COUNTRIES,
  collectionNameFor
} from "../../constants/laws.js";
import { logInfo } from "../../observability/logger.js";
import type { CountryGate } from "../concurrency/country-gate.js";
import type { LawDocumentEntry, LawRegistryPort } from "../documents/types.js";
import { IngestionFailed, SessionNotFound, describeError } from "../errors.js";
import type { IngestOptions, IngestResult, IngestionPipeline } from "../ingestion/ingestion-pipeline.js";
import type { QueryOptions, QueryPipeline, QueryResult } from "../query/query-pipeline.js";
import type { SessionLedger } from "../sessions/session-ledger.js";
import type { Session, SessionRecord, SessionSummary, Turn } from "../sessions/types.js";
import type { VectorIndex } from "../vector-index/types.js";
import {
  countrySchema,
  createSessionRequestSchema,
  ingestRequestSchema,
  parseRequest,
  queryRequestSchema,
  sessionIdSchema,
  type CreateSessionRequest,
  type IngestRequest,
  type QueryRequest
} from "./schemas.js";

export interface IngestResponse {
  success: boolean;
  message: string;
  collection: string;
  law_name: string;
  articles_found: number;
  chunks_created: number;
  duplicates_skipped: number;
  pages_processed: number;
  processing_time_ms: number;
  document_id: string | null;
  batch_id: string | null;
  anomalies: Array<{ previous_article: number; current_article: number; offset: number }>;
  errors: string[];
}

export interface CountryOperationResponse {
  success: boolean;
  country: Country;
  collection: string;
  collection_existed: boolean;
  documents_removed: number;
}

export interface LawListing {
  document_id: string;
  law_name: string;
  law_type: LawType;
  law_type_name: string;
  source_file: string;
  law_number: string | null;
  law_year: number | null;
  articles_found: number;
  chunks_created: number;
  pages_processed: number;
  ingested_at: string;
}

export interface CountryStatsResponse {
  country: Country;
  country_name: string;
  collection: string;
  collection_exists: boolean;
  points_count: number;
  documents: number;
  articles: number;
  chunks: number;
  law_types: Partial<Record<LawType, number>>;
}

export interface SessionTurnView {
  question: string;
  rewritten_question: string | null;
  answer: string;
  cited_chunk_ids: string[];
  citations: Array<{ law_name: string; article_number: number | null }>;
  timestamp: string;
  failed: boolean;
  error: string | null;
}

export interface SessionView {
  session_id: string;
  country: Country | null;
  created_at: string;
  updated_at: string;
  expires_at: string;
  turn_count: number;
  turns?: SessionTurnView[];
}

export interface LawRagServiceDependencies {
  ingestion: IngestionPipeline;
  queries: QueryPipeline;
  sessions: SessionLedger;
  vectorIndex: VectorIndex;
  registry: LawRegistryPort;
  countryGate: CountryGate;
  collectionPrefix: string;
  now?: () => number;
}

const toTurnView = (turn: Turn): SessionTurnView => ({
  question: turn.question,
  rewritten_question: turn.rewrittenQuestion,
  answer: turn.answer,
  cited_chunk_ids: [...turn.citedChunkIds],
  citations: turn.citations.map((citation) => ({
    law_name: citation.lawName,
    article_number: citation.articleNumber
  })),
  timestamp: turn.timestamp,
  failed: turn.failed,
  error: turn.error
});

const toSessionView = (record: SessionRecord, turnCount: number, turns?: Turn[]): SessionView => ({
  session_id: record.id,
  country: record.metadata.country,
  created_at: record.createdAt,
  updated_at: record.updatedAt,
  expires_at: record.expiresAt,
  turn_count: turnCount,
  ...(turns ? { turns: turns.map(toTurnView) } : {})
});

const toLawListing = (entry: LawDocumentEntry): LawListing => ({
  document_id: entry.documentId,
  law_name: entry.lawName,
  law_type: entry.lawType,
  law_type_name: LAW_TYPE_DISPLAY_NAMES[entry.lawType],
  source_file: entry.sourceFile,
  law_number: entry.lawNumber,
  law_year: entry.lawYear,
  articles_found: entry.articlesFound,
  chunks_created: entry.chunksCreated,
  pages_processed: entry.pagesProcessed,
  ingested_at: entry.ingestedAt.toISOString()
});

/**
 * Typed entry point over both pipelines, the law catalogue and the session
 * ledger. Every input is validated before any work starts.
 */
export class LawRagService {
  private readonly deps: LawRagServiceDependencies;
  private readonly now: () => number;

  constructor(dependencies: LawRagServiceDependencies) {
    this.deps = dependencies;
    this.now = dependencies.now ?? Date.now;
  }

  private collectionFor(country: Country): string {
    return collectionNameFor(this.deps.collectionPrefix, country);
  }

  supportedCountries(): Array<{ code: Country; name: string; collection: string }> {
    return SUPPORTED_COUNTRIES.map((code) => ({
      code,
      name: COUNTRY_DISPLAY_NAMES[code],
      collection: this.collectionFor(code)
    }));
  }

  async ingest(request: IngestRequest, options: IngestOptions = {}): Promise<IngestResponse> {
    const parsed = parseRequest(ingestRequestSchema, request);
    const result = await this.deps.ingestion.ingest(
      {
        bytes: parsed.pdf_bytes,
        country: parsed.country,
        lawName: parsed.law_name,
        lawType: parsed.law_type,
        sourceFile: parsed.source_file ?? `${parsed.law_name}.pdf`,
        lawNumber: parsed.law_number ?? null,
        lawYear: parsed.law_year ?? null
      },
      options
    );
    return this.toIngestResponse(result);
  }

  /**
   * Runs every document on the ingestion pool. Invalid or failed documents come
   * back as `success: false` entries in input order.
   */
  async ingestMany(requests: readonly IngestRequest[], options: IngestOptions = {}): Promise<IngestResponse[]> {
    const startedAt = this.now();
    const responses = await Promise.all(
      requests.map(async (request): Promise<IngestResponse> => {
        try {
          return await this.ingest(request, options);
        } catch (error) {
          return this.toFailedIngestResponse(request, error, startedAt);
        }
      })
    );
    logInfo("service.ingest_many.complete", { requestId: options.requestId ?? null }, {
      documents: responses.length,
      failed: responses.filter((response) => !response.success).length
    });
    return responses;
  }

  async query(request: QueryRequest, options: QueryOptions = {}): Promise<QueryResult> {
    const parsed = parseRequest(queryRequestSchema, request);
    return this.deps.queries.query(
      {
        question: parsed.question,
        country: parsed.country,
        sessionId: parsed.session_id,
        topK: parsed.top_k,
        lawTypes: parsed.law_types
      },
      options
    );
  }

  /** Empties the country's collection and catalogue; other countries keep running. */
  async resetCountry(country: string): Promise<CountryOperationResponse> {
    const code = parseRequest(countrySchema, country);
    return this.deps.countryGate.runExclusive(code, async () => {
      const before = await this.deps.vectorIndex.collectionStats(code);
      await this.deps.vectorIndex.resetCollection(code);
      const documentsRemoved = await this.deps.registry.deleteByCountry(code);
      logInfo("service.country.reset", { country: code }, { documents_removed: documentsRemoved });
      return {
        success: true,
        country: code,
        collection: this.collectionFor(code),
        collection_existed: before.exists,
        documents_removed: documentsRemoved
      };
    });
  }

  async deleteCountry(country: string): Promise<CountryOperationResponse> {
    const code = parseRequest(countrySchema, country);
    return this.deps.countryGate.runExclusive(code, async () => {
      const existed = await this.deps.vectorIndex.deleteCollection(code);
      const documentsRemoved = await this.deps.registry.deleteByCountry(code);
      logInfo("service.country.deleted", { country: code }, {
        collection_existed: existed,
        documents_removed: documentsRemoved
      });
      return {
        success: true,
        country: code,
        collection: this.collectionFor(code),
        collection_existed: existed,
        documents_removed: documentsRemoved
      };
    });
  }

  async listLaws(country: string): Promise<{ country: Country; laws: LawListing[] }> {
    const code = parseRequest(countrySchema, country);
    const entries = await this.deps.registry.listByCountry(code);
    return { country: code, laws: entries.map(toLawListing) };
  }

  async countryStats(country: string): Promise<CountryStatsResponse> {
    const code = parseRequest(countrySchema, country);
    const [collection, registry] = await Promise.all([
      this.deps.vectorIndex.collectionStats(code),
      this.deps.registry.countryStats(code)
    ]);
    return {
      country: code,
      country_name: COUNTRY_DISPLAY_NAMES[code],
      collection: collection.collection,
      collection_exists: collection.exists,
      points_count: collection.pointsCount,
      documents: registry.documents,
      articles: registry.articles,
      chunks: registry.chunks,
      law_types: registry.lawTypes
    };
  }

  async createSession(request: CreateSessionRequest = {}): Promise<SessionView> {
    const parsed = parseRequest(createSessionRequestSchema, request);
    const session = await this.deps.sessions.openSession({ country: parsed.country ?? null }, parsed.session_id);
    return toSessionView(session, session.turns.length, session.turns);
  }

  async getSession(sessionId: string): Promise<SessionView> {
    const id = parseRequest(sessionIdSchema, sessionId);
    const session: Session | null = await this.deps.sessions.getSession(id);
    if (!session) {
      throw new SessionNotFound(id);
    }
    return toSessionView(session, session.turns.length, session.turns);
  }

  async listSessions(): Promise<SessionView[]> {
    const summaries: SessionSummary[] = await this.deps.sessions.listSessions();
    return summaries.map((summary) => toSessionView(summary, summary.turnCount));
  }

  async deleteSession(sessionId: string): Promise<{ session_id: string; deleted: boolean }> {
    const id = parseRequest(sessionIdSchema, sessionId);
    const { sessions } = this.deps;
    const deleted = await sessions.runExclusive(id, () => sessions.deleteSession(id));
    return { session_id: id, deleted };
  }

  private toIngestResponse(result: IngestResult): IngestResponse {
    return {
      success: true,
      message: `Ingested ${result.articlesFound} articles from ${result.lawName}`,
      collection: this.collectionFor(result.country),
      law_name: result.lawName,
      articles_found: result.articlesFound,
      chunks_created: result.chunksCreated,
      duplicates_skipped: result.duplicatesSkipped,
      pages_processed: result.pagesProcessed,
      processing_time_ms: result.durationMs,
      document_id: result.documentId,
      batch_id: result.batchId,
      anomalies: result.anomalies.map((anomaly) => ({
        previous_article: anomaly.previousArticle,
        current_article: anomaly.currentArticle,
        offset: anomaly.offset
      })),
      errors: []
    };
  }

  private toFailedIngestResponse(request: IngestRequest, error: unknown, startedAt: number): IngestResponse {
    const country = countrySchema.safeParse(request.country);
    const message = describeError(error);
    return {
      success: false,
      message,
      collection: country.success ? this.collectionFor(country.data) : "",
      law_name: typeof request.law_name === "string" ? request.law_name.trim() : "",
      articles_found: 0,
      chunks_created: 0,
      duplicates_skipped: 0,
      pages_processed: 0,
      processing_time_ms: this.now() - startedAt,
      document_id: error instanceof IngestionFailed ? error.documentId : null,
      batch_id: null,
      anomalies: [],
      errors: [message]
    };
  }
}
