import { logInfo } from "../../observability/logger.js";
import type { CorrelationContext } from "../../observability/logger.js";
import { recordRetrievalLatency } from "../../observability/metrics.js";
import { withCapabilityTimeout } from "../concurrency/capability-timeout.js";
import type { VectorIndex } from "../vector-index/types.js";
import type { Candidate, RankedChunk, RetrievalFilters, SparseVector } from "./types.js";

export const DEFAULT_RRF_K = 60;

export interface FusionOptions {
  kRrf?: number;
  limit: number;
}

const compareIds = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Reciprocal Rank Fusion over 1-based ranks: `sum(1 / (k + rank))`. A chunk
 * missing from one list gets nothing from it. Ordered by fused score, then by
 * chunk id, and cut to `limit`.
 */
export function fuseByReciprocalRank(
  dense: readonly RankedChunk[],
  sparse: readonly RankedChunk[],
  options: FusionOptions
): Candidate[] {
  const kRrf = options.kRrf ?? DEFAULT_RRF_K;
  const byId = new Map<string, Candidate>();

  const accumulate = (list: readonly RankedChunk[], source: "dense" | "sparse"): void => {
    const seen = new Set<string>();
    list.forEach((item, position) => {
      const id = item.chunk.id;
      if (seen.has(id)) {
        return;
      }
      seen.add(id);
      const rank = item.rank > 0 ? item.rank : position + 1;
      const existing = byId.get(id) ?? {
        chunk: item.chunk,
        denseRank: null,
        sparseRank: null,
        fusedScore: 0,
        rerankScore: null
      };
      existing.fusedScore += 1 / (kRrf + rank);
      if (source === "dense") {
        existing.denseRank = rank;
      } else {
        existing.sparseRank = rank;
      }
      byId.set(id, existing);
    });
  };

  accumulate(dense, "dense");
  accumulate(sparse, "sparse");

  return [...byId.values()]
    .sort((a, b) => (b.fusedScore !== a.fusedScore ? b.fusedScore - a.fusedScore : compareIds(a.chunk.id, b.chunk.id)))
    .slice(0, Math.max(0, options.limit));
}

export interface HybridRetrievalInput {
  denseVector: number[];
  sparseVector: SparseVector;
  filters: RetrievalFilters;
  prefetchN: number;
  signal?: AbortSignal;
  correlation?: CorrelationContext;
}

export interface HybridRetrievalResult {
  candidates: Candidate[];
  denseHits: number;
  sparseHits: number;
  latencyMs: number;
}

export interface HybridRetrieverDependencies {
  vectorIndex: VectorIndex;
  capabilityTimeoutMs: number;
  kRrf?: number;
  now?: () => number;
  recordRetrievalLatency?: typeof recordRetrievalLatency;
  logInfo?: typeof logInfo;
}

export class HybridRetriever {
  private readonly vectorIndex: VectorIndex;
  private readonly capabilityTimeoutMs: number;
  private readonly kRrf: number;
  private readonly now: () => number;
  private readonly recordLatency: typeof recordRetrievalLatency;
  private readonly log: typeof logInfo;

  constructor(dependencies: HybridRetrieverDependencies) {
    this.vectorIndex = dependencies.vectorIndex;
    this.capabilityTimeoutMs = dependencies.capabilityTimeoutMs;
    this.kRrf = dependencies.kRrf ?? DEFAULT_RRF_K;
    this.now = dependencies.now ?? Date.now;
    this.recordLatency = dependencies.recordRetrievalLatency ?? recordRetrievalLatency;
    this.log = dependencies.logInfo ?? logInfo;
  }

  /** Runs the dense and sparse queries in parallel, each under its own deadline, then fuses them. */
  async retrieve(input: HybridRetrievalInput): Promise<HybridRetrievalResult> {
    const startedAt = this.now();
    const prefetchN = Math.max(1, input.prefetchN);

    const [dense, sparse] = await Promise.all([
      withCapabilityTimeout(
        { capability: "vector_index.dense", timeoutMs: this.capabilityTimeoutMs, signal: input.signal },
        (signal) => this.vectorIndex.queryDense(input.filters, input.denseVector, prefetchN, { signal })
      ),
      withCapabilityTimeout(
        { capability: "vector_index.sparse", timeoutMs: this.capabilityTimeoutMs, signal: input.signal },
        (signal) => this.vectorIndex.querySparse(input.filters, input.sparseVector, prefetchN, { signal })
      )
    ]);

    const candidates = fuseByReciprocalRank(dense, sparse, { kRrf: this.kRrf, limit: prefetchN });
    const latencyMs = this.now() - startedAt;
    this.recordLatency(latencyMs);
    this.log("rag.retrieve.complete", input.correlation ?? { country: input.filters.country }, {
      latency_ms: latencyMs,
      dense_hits: dense.length,
      sparse_hits: sparse.length,
      candidate_count: candidates.length,
      prefetch_n: prefetchN,
      k_rrf: this.kRrf
    });

    return { candidates, denseHits: dense.length, sparseHits: sparse.length, latencyMs };
  }
}
