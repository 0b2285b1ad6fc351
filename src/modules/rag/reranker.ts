import { logInfo, type CorrelationContext } from "../../observability/logger.js";
import { recordRerankLatency } from "../../observability/metrics.js";
import type { RerankerModel } from "../capabilities/types.js";
import { withCapabilityTimeout } from "../concurrency/capability-timeout.js";
import { CapabilityTimeout, RequestCancelled, RerankUnavailable } from "../errors.js";
import type { Candidate } from "./types.js";

export interface RerankInput {
  question: string;
  candidates: Candidate[];
  topK: number;
  signal?: AbortSignal;
  correlation?: CorrelationContext;
}

export interface RerankDependencies {
  model: RerankerModel;
  timeoutMs: number;
  now?: () => number;
  logInfo?: typeof logInfo;
}

const compareIds = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/** The degraded ordering: the first `topK` candidates in fused order. */
export const fusedTopK = (candidates: readonly Candidate[], topK: number): Candidate[] =>
  candidates.slice(0, Math.max(1, topK));

/**
 * Scores every candidate in one call to the reranker model and keeps the best
 * `topK` by rerank score alone. Any model failure surfaces as
 * `RerankUnavailable`, except deadline and cancellation errors.
 */
export async function rerankCandidates(input: RerankInput, dependencies: RerankDependencies): Promise<Candidate[]> {
  const now = dependencies.now ?? Date.now;
  const log = dependencies.logInfo ?? logInfo;
  const topK = Math.max(1, input.topK);
  if (input.candidates.length === 0) {
    return [];
  }

  const startedAt = now();
  let scores: number[];
  try {
    scores = await withCapabilityTimeout(
      { capability: "reranker", timeoutMs: dependencies.timeoutMs, signal: input.signal },
      (signal) =>
        dependencies.model.score(
          input.question,
          input.candidates.map((candidate) => candidate.chunk.displayText),
          { signal }
        )
    );
  } catch (error) {
    if (error instanceof CapabilityTimeout || error instanceof RequestCancelled || error instanceof RerankUnavailable) {
      throw error;
    }
    const message = error instanceof Error ? error.message : "unknown reranker error";
    throw new RerankUnavailable(`Reranker unavailable: ${message}`, { cause: error });
  }

  if (scores.length !== input.candidates.length || scores.some((score) => !Number.isFinite(score))) {
    throw new RerankUnavailable(
      `Reranker returned ${scores.length} scores for ${input.candidates.length} candidates`
    );
  }

  const reranked = input.candidates
    .map((candidate, index) => ({ ...candidate, rerankScore: scores[index] }))
    .sort((a, b) => {
      const scoreA = a.rerankScore ?? 0;
      const scoreB = b.rerankScore ?? 0;
      return scoreB !== scoreA ? scoreB - scoreA : compareIds(a.chunk.id, b.chunk.id);
    })
    .slice(0, topK);

  const latencyMs = now() - startedAt;
  recordRerankLatency(latencyMs);
  log("rag.rerank.complete", input.correlation ?? {}, {
    candidate_count: input.candidates.length,
    selected_count: reranked.length,
    latency_ms: latencyMs,
    model: dependencies.model.model,
    fallback_used: false
  });

  return reranked;
}
