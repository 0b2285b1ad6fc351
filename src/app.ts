import { config } from "./config/index.js";
import { getQdrantClient, isQdrantConfigured } from "./clients/qdrant.js";
import { getRedisClient, isRedisConfigured } from "./clients/redis.js";
import { isPostgresConfigured } from "./clients/postgres.js";
import { assertMigrationsCurrent } from "./migrations/check-migrations.js";
import { logInfo } from "./observability/logger.js";
import { Bm25SparseEncoder } from "./modules/capabilities/bm25-sparse-encoder.js";
import { OpenAIEmbedder } from "./modules/capabilities/openai-embedder.js";
import { OpenAIGenerator } from "./modules/capabilities/openai-generator.js";
import { OpenAIRerankerModel } from "./modules/capabilities/openai-reranker-model.js";
import { FormFeedTextExtractor } from "./modules/capabilities/text-page-extractor.js";
import type {
  Embedder,
  Generator,
  PageTextExtractor,
  RerankerModel,
  SparseEncoder
} from "./modules/capabilities/types.js";
import { CountryGate } from "./modules/concurrency/country-gate.js";
import { InMemoryLawRegistry } from "./modules/documents/in-memory-law-registry.js";
import { LawRegistryRepository } from "./modules/documents/law-registry-repository.js";
import type { LawRegistryPort } from "./modules/documents/types.js";
import { IngestionPipeline } from "./modules/ingestion/ingestion-pipeline.js";
import { QueryPipeline } from "./modules/query/query-pipeline.js";
import { HybridRetriever } from "./modules/rag/hybrid-retriever.js";
import { LawRagService } from "./modules/service/law-rag-service.js";
import { InMemorySessionStore } from "./modules/sessions/in-memory-session-store.js";
import { RedisSessionStore } from "./modules/sessions/redis-session-store.js";
import { SessionLedger } from "./modules/sessions/session-ledger.js";
import type { SessionStore } from "./modules/sessions/types.js";
import { LocalVectorIndex } from "./modules/vector-index/local-vector-index.js";
import { QdrantVectorIndex } from "./modules/vector-index/qdrant-vector-index.js";
import type { VectorIndex } from "./modules/vector-index/types.js";

export interface BuildServiceOptions {
  extractor?: PageTextExtractor;
  embedder?: Embedder;
  sparseEncoder?: SparseEncoder;
  rerankerModel?: RerankerModel;
  generator?: Generator;
  vectorIndex?: VectorIndex;
  sessionStore?: SessionStore;
  registry?: LawRegistryPort;
  countryGate?: CountryGate;
  checkMigrations?: boolean;
  now?: () => number;
}

async function resolveVectorIndex(): Promise<VectorIndex> {
  if (isQdrantConfigured()) {
    const { client } = await getQdrantClient();
    return new QdrantVectorIndex({
      client,
      collectionPrefix: config.QDRANT_COLLECTION_PREFIX,
      dimension: config.EMBEDDING_DIMENSION
    });
  }
  return new LocalVectorIndex({
    collectionPrefix: config.QDRANT_COLLECTION_PREFIX,
    filePath: config.LOCAL_VECTOR_STORE_FILE
  });
}

async function resolveSessionStore(now: (() => number) | undefined): Promise<SessionStore> {
  if (isRedisConfigured()) {
    const { client } = await getRedisClient();
    return new RedisSessionStore({ client });
  }
  return new InMemorySessionStore({ now });
}

/**
 * Wires the service from configuration: Qdrant, Redis and Postgres when their
 * URLs are set, in-process stand-ins otherwise. Any adapter can be overridden.
 */
export async function buildLawRagService(options: BuildServiceOptions = {}): Promise<LawRagService> {
  const vectorIndex = options.vectorIndex ?? (await resolveVectorIndex());
  const sessionStore = options.sessionStore ?? (await resolveSessionStore(options.now));

  let registry = options.registry;
  if (!registry) {
    if (isPostgresConfigured()) {
      if (options.checkMigrations ?? true) {
        await assertMigrationsCurrent();
      }
      registry = new LawRegistryRepository();
    } else {
      registry = new InMemoryLawRegistry();
    }
  }

  const embedder = options.embedder ?? new OpenAIEmbedder();
  const sparseEncoder = options.sparseEncoder ?? new Bm25SparseEncoder();
  const rerankerModel = options.rerankerModel ?? new OpenAIRerankerModel();
  const generator = options.generator ?? new OpenAIGenerator();
  const countryGate = options.countryGate ?? new CountryGate();
  const sessions = new SessionLedger({
    store: sessionStore,
    ttlSeconds: config.SESSION_TTL_SECONDS,
    now: options.now
  });

  const ingestion = new IngestionPipeline({
    extractor: options.extractor ?? new FormFeedTextExtractor(),
    embedder,
    sparseEncoder,
    vectorIndex,
    registry,
    countryGate,
    capabilityTimeoutMs: config.CAPABILITY_TIMEOUT_MS,
    maxChunkChars: config.MAX_CHUNK_CHARS,
    concurrency: config.INGESTION_CONCURRENCY,
    now: options.now
  });

  const queries = new QueryPipeline({
    embedder,
    sparseEncoder,
    retriever: new HybridRetriever({
      vectorIndex,
      capabilityTimeoutMs: config.CAPABILITY_TIMEOUT_MS,
      kRrf: config.RRF_K,
      now: options.now
    }),
    rerankerModel,
    generator,
    sessions,
    countryGate,
    capabilityTimeoutMs: config.CAPABILITY_TIMEOUT_MS,
    prefetchN: config.HYBRID_PREFETCH,
    rerankTopK: config.RERANK_TOP_K,
    historyTurns: config.HISTORY_TURNS,
    now: options.now
  });

  logInfo("service.ready", {}, {
    app_mode: config.APP_MODE,
    vector_index: vectorIndex.kind,
    session_store: sessionStore instanceof RedisSessionStore ? "redis" : "memory",
    registry: registry instanceof LawRegistryRepository ? "postgres" : "memory",
    embedding_model: embedder.model,
    reranker_model: rerankerModel.model,
    llm_model: generator.model
  });

  return new LawRagService({
    ingestion,
    queries,
    sessions,
    vectorIndex,
    registry,
    countryGate,
    collectionPrefix: config.QDRANT_COLLECTION_PREFIX,
    now: options.now
  });
}
