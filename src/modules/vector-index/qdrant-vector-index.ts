import type { QdrantClient, Schemas } from "@qdrant/js-client-rest";
import { collectionNameFor, type Country } from "../../constants/laws.js";
import { logInfo, logWarn } from "../../observability/logger.js";
import type { CapabilityCall } from "../capabilities/types.js";
import { throwIfAborted } from "../errors.js";
import type { EncodedChunk, RankedChunk, RetrievalFilters, SparseVector } from "../rag/types.js";
import { fromChunkPayload, toChunkPayload } from "./payload.js";
import type { CollectionStats, VectorIndex } from "./types.js";

export const DENSE_VECTOR_NAME = "dense";
export const SPARSE_VECTOR_NAME = "sparse";

const INDEXED_KEYWORD_FIELDS = ["country", "law_type", "law_name", "document_id", "batch_id"] as const;

export type QdrantIndexClient = Pick<
  QdrantClient,
  | "collectionExists"
  | "createCollection"
  | "createPayloadIndex"
  | "upsert"
  | "delete"
  | "query"
  | "deleteCollection"
  | "getCollection"
>;

export interface QdrantVectorIndexOptions {
  client: QdrantIndexClient;
  collectionPrefix: string;
  dimension: number;
}

type QueryPoint = {
  id: string | number;
  score: number;
  payload?: Record<string, unknown> | null;
};

export const buildCountryFilter = (filters: RetrievalFilters): Schemas["Filter"] => {
  const must: Schemas["FieldCondition"][] = [{ key: "country", match: { value: filters.country } }];
  if (filters.lawTypes && filters.lawTypes.length > 0) {
    must.push({ key: "law_type", match: { any: [...filters.lawTypes] } });
  }
  return { must };
};

/** One collection per country with named dense (cosine) and sparse (IDF) vectors. */
export class QdrantVectorIndex implements VectorIndex {
  readonly kind = "qdrant";
  private readonly client: QdrantIndexClient;
  private readonly collectionPrefix: string;
  private readonly dimension: number;
  private readonly ensured = new Set<string>();

  constructor(options: QdrantVectorIndexOptions) {
    this.client = options.client;
    this.collectionPrefix = options.collectionPrefix;
    this.dimension = options.dimension;
  }

  collectionName(country: Country): string {
    return collectionNameFor(this.collectionPrefix, country);
  }

  async ensureCollection(country: Country): Promise<void> {
    const collection = this.collectionName(country);
    if (this.ensured.has(collection)) {
      return;
    }

    const { exists } = await this.client.collectionExists(collection);
    if (!exists) {
      await this.createCollection(collection);
    }
    this.ensured.add(collection);
  }

  async upsert(country: Country, chunks: EncodedChunk[], batchId: string): Promise<void> {
    if (chunks.length === 0) {
      return;
    }
    await this.ensureCollection(country);
    await this.client.upsert(this.collectionName(country), {
      wait: true,
      points: chunks.map((chunk) => ({
        id: chunk.id,
        vector: {
          [DENSE_VECTOR_NAME]: chunk.denseVector,
          [SPARSE_VECTOR_NAME]: {
            indices: chunk.sparseVector.indices,
            values: chunk.sparseVector.values
          }
        },
        payload: toChunkPayload(chunk, batchId)
      }))
    });
  }

  async deleteByBatchId(country: Country, batchId: string): Promise<void> {
    await this.deleteByFilter(country, {
      must: [{ key: "batch_id", match: { value: batchId } }]
    });
  }

  async deleteStaleBatches(country: Country, documentId: string, keepBatchId: string): Promise<void> {
    await this.deleteByFilter(country, {
      must: [{ key: "document_id", match: { value: documentId } }],
      must_not: [{ key: "batch_id", match: { value: keepBatchId } }]
    });
  }

  async queryDense(
    filters: RetrievalFilters,
    vector: number[],
    limit: number,
    call?: CapabilityCall
  ): Promise<RankedChunk[]> {
    return this.runQuery(filters, vector, DENSE_VECTOR_NAME, limit, call);
  }

  async querySparse(
    filters: RetrievalFilters,
    vector: SparseVector,
    limit: number,
    call?: CapabilityCall
  ): Promise<RankedChunk[]> {
    if (vector.indices.length === 0) {
      return [];
    }
    return this.runQuery(filters, { indices: vector.indices, values: vector.values }, SPARSE_VECTOR_NAME, limit, call);
  }

  async resetCollection(country: Country): Promise<void> {
    const collection = this.collectionName(country);
    const { exists } = await this.client.collectionExists(collection);
    if (exists) {
      await this.client.deleteCollection(collection);
    }
    this.ensured.delete(collection);
    await this.createCollection(collection);
    this.ensured.add(collection);
    logInfo("vector_index.collection.reset", { country }, { collection });
  }

  async deleteCollection(country: Country): Promise<boolean> {
    const collection = this.collectionName(country);
    this.ensured.delete(collection);
    const { exists } = await this.client.collectionExists(collection);
    if (!exists) {
      return false;
    }
    await this.client.deleteCollection(collection);
    logInfo("vector_index.collection.deleted", { country }, { collection });
    return true;
  }

  async collectionStats(country: Country): Promise<CollectionStats> {
    const collection = this.collectionName(country);
    const { exists } = await this.client.collectionExists(collection);
    if (!exists) {
      return { country, collection, exists: false, pointsCount: 0 };
    }
    const info = await this.client.getCollection(collection);
    return { country, collection, exists: true, pointsCount: info.points_count ?? 0 };
  }

  private async createCollection(collection: string): Promise<void> {
    await this.client.createCollection(collection, {
      vectors: {
        [DENSE_VECTOR_NAME]: { size: this.dimension, distance: "Cosine" }
      },
      sparse_vectors: {
        [SPARSE_VECTOR_NAME]: { modifier: "idf" }
      }
    });
    for (const field of INDEXED_KEYWORD_FIELDS) {
      await this.client.createPayloadIndex(collection, {
        field_name: field,
        field_schema: "keyword",
        wait: true
      });
    }
    logInfo("vector_index.collection.created", {}, { collection, dimension: this.dimension });
  }

  private async deleteByFilter(country: Country, filter: Schemas["Filter"]): Promise<void> {
    const collection = this.collectionName(country);
    const { exists } = await this.client.collectionExists(collection);
    if (!exists) {
      return;
    }
    await this.client.delete(collection, { wait: true, filter });
  }

  private async runQuery(
    filters: RetrievalFilters,
    query: number[] | SparseVector,
    using: string,
    limit: number,
    call?: CapabilityCall
  ): Promise<RankedChunk[]> {
    const collection = this.collectionName(filters.country);
    const { exists } = await this.client.collectionExists(collection);
    if (!exists) {
      return [];
    }
    throwIfAborted(call?.signal);

    const response = await this.client.query(collection, {
      query,
      using,
      limit,
      filter: buildCountryFilter(filters),
      with_payload: true,
      with_vector: false
    });

    return this.toRanked(response.points, collection);
  }

  private toRanked(points: QueryPoint[], collection: string): RankedChunk[] {
    const ranked: RankedChunk[] = [];
    let dropped = 0;
    for (const point of points) {
      const chunk = fromChunkPayload(point.payload ?? {});
      if (!chunk) {
        dropped += 1;
        continue;
      }
      ranked.push({ chunk, rank: ranked.length + 1, score: point.score });
    }
    if (dropped > 0) {
      logWarn("vector_index.query.dropped_points", {}, { collection, dropped });
    }
    return ranked;
  }
}
