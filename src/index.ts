export { buildLawRagService, type BuildServiceOptions } from "./app.js";
export { startClientLifecycle, shutdownAllClients } from "./clients/lifecycle.js";
export { config, type Config } from "./config/index.js";
export {
  COUNTRY_DISPLAY_NAMES,
  LAW_TYPES,
  LAW_TYPE_DISPLAY_NAMES,
  SUPPORTED_COUNTRIES,
  type Country,
  type LawType
} from "./constants/laws.js";
export * from "./modules/errors.js";
export type {
  Embedder,
  Generator,
  PageTextExtractor,
  RerankerModel,
  SparseEncoder
} from "./modules/capabilities/types.js";
export { Bm25SparseEncoder } from "./modules/capabilities/bm25-sparse-encoder.js";
export { FormFeedTextExtractor } from "./modules/capabilities/text-page-extractor.js";
export { segmentArticles, countArticleMarkers, type ArticleSpan } from "./modules/ingestion/article-segmenter.js";
export { enrichSpan, enrichSpans } from "./modules/ingestion/metadata-enricher.js";
export { IngestionPipeline, type IngestInput, type IngestResult } from "./modules/ingestion/ingestion-pipeline.js";
export { QueryPipeline, type QueryInput, type QueryResult } from "./modules/query/query-pipeline.js";
export { rewriteQuestionWithHistory } from "./modules/query/question-rewriter.js";
export { HybridRetriever, fuseByReciprocalRank } from "./modules/rag/hybrid-retriever.js";
export { rerankCandidates } from "./modules/rag/reranker.js";
export type { Candidate, Chunk, SourceReference } from "./modules/rag/types.js";
export { LawRagService } from "./modules/service/law-rag-service.js";
export type { CreateSessionRequest, IngestRequest, QueryRequest } from "./modules/service/schemas.js";
export { SessionLedger } from "./modules/sessions/session-ledger.js";
export { normalizeText, normalizePages } from "./modules/text/text-normalizer.js";
export { getMetricsSnapshot } from "./observability/metrics.js";
