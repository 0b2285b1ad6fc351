import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { collectionNameFor, type Country } from "../../constants/laws.js";
import { logInfo } from "../../observability/logger.js";
import type { CapabilityCall } from "../capabilities/types.js";
import { throwIfAborted } from "../errors.js";
import type { EncodedChunk, RankedChunk, RetrievalFilters, SparseVector } from "../rag/types.js";
import { type ChunkPayload, chunkPayloadSchema, fromChunkPayload, toChunkPayload } from "./payload.js";
import type { CollectionStats, VectorIndex } from "./types.js";

const storedPointSchema = z.object({
  id: z.string(),
  dense: z.array(z.number()),
  sparse: z.object({ indices: z.array(z.number()), values: z.array(z.number()) }),
  payload: chunkPayloadSchema
});

const storeSchema = z.object({
  collections: z.record(z.array(storedPointSchema)).default({})
});

type StoredPoint = z.infer<typeof storedPointSchema>;

export interface LocalVectorIndexOptions {
  collectionPrefix: string;
  /** JSON file backing the index; omitted means memory only. */
  filePath?: string;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

const matchesFilter = (payload: ChunkPayload, filters: RetrievalFilters): boolean => {
  if (payload.country !== filters.country) {
    return false;
  }
  if (filters.lawTypes && filters.lawTypes.length > 0) {
    return filters.lawTypes.includes(payload.law_type);
  }
  return true;
};

const byScoreThenId = (a: { score: number; id: string }, b: { score: number; id: string }): number => {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
};

/**
 * In-process stand-in for the vector database, optionally persisted to a JSON
 * file. Sparse scoring applies the same BM25 inverse document frequency the
 * server-side `idf` modifier uses.
 */
export class LocalVectorIndex implements VectorIndex {
  readonly kind = "local";
  private readonly collectionPrefix: string;
  private readonly filePath: string | null;
  private collections = new Map<string, Map<string, StoredPoint>>();
  private loadPromise: Promise<void> | null = null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(options: LocalVectorIndexOptions) {
    this.collectionPrefix = options.collectionPrefix;
    this.filePath = options.filePath
      ? path.isAbsolute(options.filePath)
        ? options.filePath
        : path.resolve(process.cwd(), options.filePath)
      : null;
  }

  async ensureCollection(country: Country): Promise<void> {
    await this.load();
    const collection = collectionNameFor(this.collectionPrefix, country);
    if (!this.collections.has(collection)) {
      this.collections.set(collection, new Map());
      await this.persist();
    }
  }

  async upsert(country: Country, chunks: EncodedChunk[], batchId: string): Promise<void> {
    if (chunks.length === 0) {
      return;
    }
    await this.ensureCollection(country);
    const points = this.pointsFor(country);
    for (const chunk of chunks) {
      points.set(chunk.id, {
        id: chunk.id,
        dense: chunk.denseVector,
        sparse: chunk.sparseVector,
        payload: toChunkPayload(chunk, batchId)
      });
    }
    await this.persist();
  }

  async deleteByBatchId(country: Country, batchId: string): Promise<void> {
    await this.deleteWhere(country, (point) => point.payload.batch_id === batchId);
  }

  async deleteStaleBatches(country: Country, documentId: string, keepBatchId: string): Promise<void> {
    await this.deleteWhere(
      country,
      (point) => point.payload.document_id === documentId && point.payload.batch_id !== keepBatchId
    );
  }

  async queryDense(
    filters: RetrievalFilters,
    vector: number[],
    limit: number,
    call?: CapabilityCall
  ): Promise<RankedChunk[]> {
    await this.load();
    throwIfAborted(call?.signal);
    const scored = [...this.pointsFor(filters.country).values()]
      .filter((point) => matchesFilter(point.payload, filters))
      .map((point) => ({ id: point.id, point, score: cosineSimilarity(point.dense, vector) }));
    return this.rank(scored, limit);
  }

  async querySparse(
    filters: RetrievalFilters,
    vector: SparseVector,
    limit: number,
    call?: CapabilityCall
  ): Promise<RankedChunk[]> {
    await this.load();
    throwIfAborted(call?.signal);
    const points = [...this.pointsFor(filters.country).values()];
    const idf = this.inverseDocumentFrequency(points, vector.indices);
    const scored = points
      .filter((point) => matchesFilter(point.payload, filters))
      .map((point) => {
        const weights = new Map(
          point.sparse.indices.map((index, position): [number, number] => [index, point.sparse.values[position] ?? 0])
        );
        let score = 0;
        let overlap = false;
        vector.indices.forEach((index, position) => {
          const weight = weights.get(index);
          if (weight === undefined) {
            return;
          }
          overlap = true;
          score += (vector.values[position] ?? 0) * weight * (idf.get(index) ?? 0);
        });
        return { id: point.id, point, score, overlap };
      })
      .filter((entry) => entry.overlap);
    return this.rank(scored, limit);
  }

  async resetCollection(country: Country): Promise<void> {
    await this.load();
    const collection = collectionNameFor(this.collectionPrefix, country);
    this.collections.set(collection, new Map());
    await this.persist();
    logInfo("vector_index.collection.reset", { country }, { collection });
  }

  async deleteCollection(country: Country): Promise<boolean> {
    await this.load();
    const collection = collectionNameFor(this.collectionPrefix, country);
    const existed = this.collections.delete(collection);
    if (existed) {
      await this.persist();
    }
    return existed;
  }

  async collectionStats(country: Country): Promise<CollectionStats> {
    await this.load();
    const collection = collectionNameFor(this.collectionPrefix, country);
    const points = this.collections.get(collection);
    return { country, collection, exists: points !== undefined, pointsCount: points?.size ?? 0 };
  }

  private pointsFor(country: Country): Map<string, StoredPoint> {
    return this.collections.get(collectionNameFor(this.collectionPrefix, country)) ?? new Map();
  }

  private async deleteWhere(country: Country, predicate: (point: StoredPoint) => boolean): Promise<void> {
    await this.load();
    const points = this.pointsFor(country);
    let removed = 0;
    for (const [id, point] of points) {
      if (predicate(point)) {
        points.delete(id);
        removed += 1;
      }
    }
    if (removed > 0) {
      await this.persist();
    }
  }

  private inverseDocumentFrequency(points: StoredPoint[], indices: number[]): Map<number, number> {
    const total = points.length;
    const idf = new Map<number, number>();
    for (const index of indices) {
      const containing = points.filter((point) => point.sparse.indices.includes(index)).length;
      idf.set(index, Math.log(1 + (total - containing + 0.5) / (containing + 0.5)));
    }
    return idf;
  }

  private rank(scored: Array<{ id: string; point: StoredPoint; score: number }>, limit: number): RankedChunk[] {
    const ranked: RankedChunk[] = [];
    for (const entry of [...scored].sort(byScoreThenId)) {
      if (ranked.length >= Math.max(1, limit)) {
        break;
      }
      const chunk = fromChunkPayload(entry.point.payload);
      if (chunk) {
        ranked.push({ chunk, rank: ranked.length + 1, score: entry.score });
      }
    }
    return ranked;
  }

  private load(): Promise<void> {
    if (!this.loadPromise) {
      this.loadPromise = this.readFromDisk().catch((error: unknown) => {
        this.loadPromise = null;
        throw error;
      });
    }
    return this.loadPromise;
  }

  private async readFromDisk(): Promise<void> {
    if (!this.filePath) {
      return;
    }

    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return;
      }
      throw error;
    }

    const parsed = storeSchema.parse(JSON.parse(raw));
    this.collections = new Map(
      Object.entries(parsed.collections).map(([name, points]): [string, Map<string, StoredPoint>] => [
        name,
        new Map(points.map((point): [string, StoredPoint] => [point.id, point]))
      ])
    );
  }

  private async persist(): Promise<void> {
    const filePath = this.filePath;
    if (!filePath) {
      return;
    }
    const snapshot = {
      collections: Object.fromEntries(
        [...this.collections.entries()].map(([name, points]) => [name, [...points.values()]])
      )
    };
    const write = async (): Promise<void> => {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, JSON.stringify(snapshot), "utf8");
    };
    this.writeChain = this.writeChain.then(write, write);
    await this.writeChain;
  }
}
