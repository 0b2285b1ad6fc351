import type { Country } from "../../constants/laws.js";
import type { CapabilityCall } from "../capabilities/types.js";
import type { EncodedChunk, RankedChunk, RetrievalFilters, SparseVector } from "../rag/types.js";

export interface CollectionStats {
  country: Country;
  collection: string;
  exists: boolean;
  pointsCount: number;
}

export interface VectorIndex {
  readonly kind: "qdrant" | "local";
  ensureCollection(country: Country): Promise<void>;
  /** Idempotent by chunk id; every point is tagged with `batchId`. */
  upsert(country: Country, chunks: EncodedChunk[], batchId: string): Promise<void>;
  deleteByBatchId(country: Country, batchId: string): Promise<void>;
  /** Removes points of `documentId` written by any batch other than `keepBatchId`. */
  deleteStaleBatches(country: Country, documentId: string, keepBatchId: string): Promise<void>;
  queryDense(filters: RetrievalFilters, vector: number[], limit: number, call?: CapabilityCall): Promise<RankedChunk[]>;
  querySparse(filters: RetrievalFilters, vector: SparseVector, limit: number, call?: CapabilityCall): Promise<RankedChunk[]>;
  resetCollection(country: Country): Promise<void>;
  /** Resolves `false` when the collection did not exist. */
  deleteCollection(country: Country): Promise<boolean>;
  collectionStats(country: Country): Promise<CollectionStats>;
}
