import { randomUUID } from "node:crypto";
import type { Country, LawType } from "../../constants/laws.js";
import { type CorrelationContext, logError, logInfo, logTrace, logWarn } from "../../observability/logger.js";
import { recordErrorRate, recordGenerationLatency, recordQueryLatency } from "../../observability/metrics.js";
import { GENERATION_FAILED_ANSWER, INSUFFICIENT_CONTEXT_ANSWER } from "../../prompts/index.js";
import type { Embedder, Generator, RerankerModel, SparseEncoder } from "../capabilities/types.js";
import { withCapabilityTimeout } from "../concurrency/capability-timeout.js";
import type { CountryGate } from "../concurrency/country-gate.js";
import {
  CapabilityTimeout,
  QueryFailed,
  type QueryStage,
  RequestCancelled,
  RerankUnavailable,
  describeError,
  serializeError,
  throwIfAborted
} from "../errors.js";
import { buildSources, selectCitedCandidates } from "../rag/citation-builder.js";
import type { HybridRetriever } from "../rag/hybrid-retriever.js";
import { fusedTopK, rerankCandidates } from "../rag/reranker.js";
import type { Candidate, SourceReference, SparseVector } from "../rag/types.js";
import type { SessionLedger } from "../sessions/session-ledger.js";
import type { Turn } from "../sessions/types.js";
import { normalizeText } from "../text/text-normalizer.js";
import { rewriteQuestionWithHistory } from "./question-rewriter.js";

export interface QueryInput {
  question: string;
  country: Country;
  sessionId?: string;
  topK?: number;
  lawTypes?: LawType[];
}

export interface QueryOptions {
  signal?: AbortSignal;
  requestId?: string;
}

export interface QueryMetadata {
  session_id: string;
  query_time_ms: number;
  chunks_retrieved: number;
  chunks_after_rerank: number;
  rerank_fallback: boolean;
  rewritten_question: string;
  embedding_model: string;
  reranker_model: string;
  llm_model: string;
}

export interface QueryResult {
  success: boolean;
  answer: string;
  sources: SourceReference[];
  metadata: QueryMetadata;
  errors: string[];
}

export interface QueryPipelineDependencies {
  embedder: Embedder;
  sparseEncoder: SparseEncoder;
  retriever: HybridRetriever;
  rerankerModel: RerankerModel;
  generator: Generator;
  sessions: SessionLedger;
  countryGate: CountryGate;
  capabilityTimeoutMs: number;
  prefetchN: number;
  rerankTopK: number;
  historyTurns: number;
  createSessionId?: () => string;
  now?: () => number;
}

interface EncodedQuestion {
  denseVector: number[];
  sparseVector: SparseVector;
}

/**
 * Answers one question: Preprocess → Encode → Retrieve → Rerank → Generate →
 * Format. Requests on the same session run one at a time.
 */
export class QueryPipeline {
  private readonly dependencies: QueryPipelineDependencies;
  private readonly createSessionId: () => string;
  private readonly now: () => number;

  constructor(dependencies: QueryPipelineDependencies) {
    this.dependencies = dependencies;
    this.createSessionId = dependencies.createSessionId ?? randomUUID;
    this.now = dependencies.now ?? Date.now;
  }

  query(input: QueryInput, options: QueryOptions = {}): Promise<QueryResult> {
    const sessionId = input.sessionId ?? this.createSessionId();
    return this.dependencies.sessions.runExclusive(sessionId, () => this.run(sessionId, input, options));
  }

  private async run(sessionId: string, input: QueryInput, options: QueryOptions): Promise<QueryResult> {
    const deps = this.dependencies;
    const startedAt = this.now();
    const signal = options.signal;
    const correlation: CorrelationContext = {
      requestId: options.requestId ?? null,
      sessionId,
      country: input.country
    };
    const topK = Math.max(1, input.topK ?? deps.rerankTopK);
    let stage: QueryStage = "preprocess";

    const runStage = async <T>(nextStage: QueryStage, operation: () => Promise<T>): Promise<T> => {
      throwIfAborted(signal, `Query was cancelled before ${nextStage}`);
      stage = nextStage;
      logTrace("query.pipeline.stage", correlation, { stage: nextStage });
      return operation();
    };

    const fatal = async <T>(nextStage: QueryStage, operation: () => Promise<T>): Promise<T> => {
      try {
        return await runStage(nextStage, operation);
      } catch (error) {
        if (error instanceof RequestCancelled || error instanceof QueryFailed) {
          throw error;
        }
        throw new QueryFailed(nextStage, error);
      }
    };

    try {
      const prepared = await fatal("preprocess", async () => {
        await deps.sessions.resolveSession(sessionId, { country: input.country });
        const history = await deps.sessions.recentTurns(sessionId, deps.historyTurns);
        const rewrittenQuestion = rewriteQuestionWithHistory(input.question, history);
        const searchQuestion = normalizeText(rewrittenQuestion, "search");
        if (searchQuestion.length === 0) {
          throw new Error("Question is empty after normalization");
        }
        return { history, rewrittenQuestion, searchQuestion };
      });

      const encodedQuestion = await fatal("encode", () => this.encodeQuestion(prepared.searchQuestion, signal));

      const retrieval = await fatal("retrieve", () =>
        deps.countryGate.runShared(input.country, () =>
          deps.retriever.retrieve({
            denseVector: encodedQuestion.denseVector,
            sparseVector: encodedQuestion.sparseVector,
            filters: { country: input.country, lawTypes: input.lawTypes },
            prefetchN: deps.prefetchN,
            signal,
            correlation
          })
        )
      );

      let rerankFallback = false;
      const supplied = await runStage("rerank", async () => {
        try {
          return await rerankCandidates(
            { question: prepared.rewrittenQuestion, candidates: retrieval.candidates, topK, signal, correlation },
            { model: deps.rerankerModel, timeoutMs: deps.capabilityTimeoutMs, now: this.now }
          );
        } catch (error) {
          if (!(error instanceof RerankUnavailable || error instanceof CapabilityTimeout)) {
            throw error;
          }
          rerankFallback = true;
          recordErrorRate("rerank_fallback");
          logWarn("rag.rerank.fallback", correlation, {
            candidate_count: retrieval.candidates.length,
            top_k: topK,
            ...serializeError(error)
          });
          return fusedTopK(retrieval.candidates, topK);
        }
      });

      const errors: string[] = [];
      const generation = await runStage("generate", () =>
        this.generateAnswer(input.question, supplied, prepared.history, signal, correlation)
      );
      if (generation.error) {
        errors.push(generation.error);
      }

      return await runStage("format", async () => {
        const cited = generation.failed ? [] : selectCitedCandidates(generation.answer, supplied);
        const turn: Turn = {
          question: input.question,
          rewrittenQuestion: prepared.rewrittenQuestion === input.question.trim() ? null : prepared.rewrittenQuestion,
          answer: generation.answer,
          citedChunkIds: cited.map((candidate) => candidate.chunk.id),
          citations: cited.map((candidate) => ({
            lawName: candidate.chunk.lawName,
            articleNumber: candidate.chunk.articleNumber
          })),
          timestamp: new Date(this.now()).toISOString(),
          failed: generation.failed,
          error: generation.error
        };

        try {
          await deps.sessions.appendTurn(sessionId, turn);
        } catch (error) {
          recordErrorRate("session_append_failed");
          logError("query.session.append_failed", correlation, serializeError(error));
          errors.push(`Session history was not updated: ${describeError(error)}`);
        }

        const queryTimeMs = this.now() - startedAt;
        recordQueryLatency(queryTimeMs);
        logInfo("query.complete", correlation, {
          latency_ms: queryTimeMs,
          chunks_retrieved: retrieval.candidates.length,
          chunks_after_rerank: supplied.length,
          sources: cited.length,
          rerank_fallback: rerankFallback,
          generation_failed: generation.failed
        });

        return {
          success: !generation.failed,
          answer: generation.answer,
          sources: buildSources(generation.failed ? supplied : cited),
          metadata: {
            session_id: sessionId,
            query_time_ms: queryTimeMs,
            chunks_retrieved: retrieval.candidates.length,
            chunks_after_rerank: supplied.length,
            rerank_fallback: rerankFallback,
            rewritten_question: prepared.rewrittenQuestion,
            embedding_model: deps.embedder.model,
            reranker_model: deps.rerankerModel.model,
            llm_model: deps.generator.model
          },
          errors
        };
      });
    } catch (error) {
      recordErrorRate(error instanceof RequestCancelled ? "query_cancelled" : "query_failed");
      logError("query.pipeline.error", correlation, {
        failed_stage: stage,
        error: describeError(error),
        ...serializeError(error)
      });
      throw error;
    }
  }

  private async encodeQuestion(searchQuestion: string, signal: AbortSignal | undefined): Promise<EncodedQuestion> {
    const { embedder, sparseEncoder, capabilityTimeoutMs } = this.dependencies;
    const [dense, sparseVector] = await Promise.all([
      withCapabilityTimeout({ capability: "embedder", timeoutMs: capabilityTimeoutMs, signal }, (callSignal) =>
        embedder.embed([searchQuestion], { signal: callSignal })
      ),
      withCapabilityTimeout({ capability: "sparse_encoder", timeoutMs: capabilityTimeoutMs, signal }, (callSignal) =>
        sparseEncoder.encode(searchQuestion, { signal: callSignal })
      )
    ]);
    const denseVector = dense[0];
    if (!denseVector || denseVector.length === 0) {
      throw new Error("Embedder returned no vector for the question");
    }
    return { denseVector, sparseVector };
  }

  private async generateAnswer(
    question: string,
    supplied: readonly Candidate[],
    history: readonly Turn[],
    signal: AbortSignal | undefined,
    correlation: CorrelationContext
  ): Promise<{ answer: string; failed: boolean; error: string | null }> {
    if (supplied.length === 0) {
      logInfo("query.generate.skipped", correlation, { reason: "no_candidates" });
      return { answer: INSUFFICIENT_CONTEXT_ANSWER, failed: false, error: null };
    }

    const { generator, capabilityTimeoutMs } = this.dependencies;
    const startedAt = this.now();
    try {
      const answer = await withCapabilityTimeout(
        { capability: "generator", timeoutMs: capabilityTimeoutMs, signal },
        (callSignal) =>
          generator.generate(
            {
              question,
              contextChunks: supplied.map((candidate) => candidate.chunk),
              history: history
                .filter((turn) => !turn.failed)
                .map((turn) => ({ question: turn.question, answer: turn.answer }))
            },
            { signal: callSignal }
          )
      );
      recordGenerationLatency(this.now() - startedAt);
      return { answer, failed: false, error: null };
    } catch (error) {
      if (error instanceof RequestCancelled) {
        throw error;
      }
      recordErrorRate("generation_failed");
      logError("query.generate.failed", correlation, serializeError(error));
      return { answer: GENERATION_FAILED_ANSWER, failed: true, error: `Generation failed: ${describeError(error)}` };
    }
  }
}
