import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { Chunk, EncodedChunk } from "../../src/modules/rag/types.js";
import { LocalVectorIndex, cosineSimilarity } from "../../src/modules/vector-index/local-vector-index.js";
import { fromChunkPayload, toChunkPayload } from "../../src/modules/vector-index/payload.js";
import {
  QdrantVectorIndex,
  buildCountryFilter,
  type QdrantIndexClient
} from "../../src/modules/vector-index/qdrant-vector-index.js";
import { makeChunk } from "../helpers/fakes.js";

const encoded = (
  chunk: Partial<Chunk> & { id: string },
  denseVector: number[],
  sparse: { indices: number[]; values: number[] } = { indices: [], values: [] }
): EncodedChunk => ({ ...makeChunk(chunk), denseVector, sparseVector: sparse });

type QueriedPoint = { id: string; version: number; score: number; payload: Record<string, unknown> };

const makeQdrantClient = (exists: boolean) => {
  const noPoints: QueriedPoint[] = [];
  const client = {
    collectionExists: vi.fn(async () => ({ exists })),
    createCollection: vi.fn(async () => true),
    createPayloadIndex: vi.fn(async () => ({ operation_id: 1, status: "completed" as const })),
    upsert: vi.fn(async () => ({ operation_id: 2, status: "completed" as const })),
    delete: vi.fn(async () => ({ operation_id: 3, status: "completed" as const })),
    query: vi.fn(async () => ({ points: noPoints })),
    deleteCollection: vi.fn(async () => true),
    getCollection: vi.fn(async (): Promise<never> => {
      throw new Error("not used");
    })
  } satisfies QdrantIndexClient;
  return client;
};

describe("modules/vector-index/payload", () => {
  it("converts a chunk to a payload and back", () => {
    const chunk = makeChunk({ id: "a", lawNumber: "58", lawYear: 1937, chapter: "الباب الأول" });

    const payload = toChunkPayload(chunk, "batch-1");

    expect(payload).toMatchObject({ chunk_id: "a", batch_id: "batch-1", content: "نص a", law_year: 1937 });
    expect(fromChunkPayload(payload)).toEqual(chunk);
    expect(fromChunkPayload({ chunk_id: "a" })).toBeNull();
  });
});

describe("modules/vector-index/qdrant-vector-index", () => {
  it("creates the country collection once with dense and sparse vectors", async () => {
    const client = makeQdrantClient(false);
    const index = new QdrantVectorIndex({ client, collectionPrefix: "laws", dimension: 8 });

    await index.ensureCollection("egypt");
    await index.ensureCollection("egypt");

    expect(client.collectionExists).toHaveBeenCalledTimes(1);
    expect(client.createCollection).toHaveBeenCalledWith("laws_egypt", {
      vectors: { dense: { size: 8, distance: "Cosine" } },
      sparse_vectors: { sparse: { modifier: "idf" } }
    });
    expect(client.createPayloadIndex).toHaveBeenCalledTimes(5);
    expect(client.createPayloadIndex).toHaveBeenCalledWith("laws_egypt", {
      field_name: "batch_id",
      field_schema: "keyword",
      wait: true
    });
  });

  it("upserts named vectors with the batch id in the payload", async () => {
    const client = makeQdrantClient(true);
    const index = new QdrantVectorIndex({ client, collectionPrefix: "laws", dimension: 2 });

    await index.upsert("egypt", [encoded({ id: "a" }, [0.1, 0.2], { indices: [7], values: [1.5] })], "batch-1");

    expect(client.createCollection).not.toHaveBeenCalled();
    expect(client.upsert).toHaveBeenCalledWith("laws_egypt", {
      wait: true,
      points: [
        {
          id: "a",
          vector: { dense: [0.1, 0.2], sparse: { indices: [7], values: [1.5] } },
          payload: expect.objectContaining({ chunk_id: "a", batch_id: "batch-1", country: "egypt" })
        }
      ]
    });
  });

  it("deletes older batches of a document only", async () => {
    const client = makeQdrantClient(true);
    const index = new QdrantVectorIndex({ client, collectionPrefix: "laws", dimension: 2 });

    await index.deleteStaleBatches("jordan", "doc-1", "doc-1:new");

    expect(client.delete).toHaveBeenCalledWith("laws_jordan", {
      wait: true,
      filter: {
        must: [{ key: "document_id", match: { value: "doc-1" } }],
        must_not: [{ key: "batch_id", match: { value: "doc-1:new" } }]
      }
    });
  });

  it("ranks query results and drops points without a chunk payload", async () => {
    const client = makeQdrantClient(true);
    client.query.mockResolvedValueOnce({
      points: [
        { id: "x", version: 1, score: 0.9, payload: { unrelated: true } },
        { id: "a", version: 1, score: 0.8, payload: toChunkPayload(makeChunk({ id: "a" }), "b1") },
        { id: "b", version: 1, score: 0.7, payload: toChunkPayload(makeChunk({ id: "b" }), "b1") }
      ]
    });
    const index = new QdrantVectorIndex({ client, collectionPrefix: "laws", dimension: 2 });

    const ranked = await index.queryDense({ country: "egypt", lawTypes: ["criminal", "civil"] }, [1, 0], 10);

    expect(client.query).toHaveBeenCalledWith("laws_egypt", {
      query: [1, 0],
      using: "dense",
      limit: 10,
      filter: {
        must: [
          { key: "country", match: { value: "egypt" } },
          { key: "law_type", match: { any: ["criminal", "civil"] } }
        ]
      },
      with_payload: true,
      with_vector: false
    });
    expect(ranked.map((item) => [item.chunk.id, item.rank, item.score])).toEqual([
      ["a", 1, 0.8],
      ["b", 2, 0.7]
    ]);
  });

  it("returns nothing for an empty sparse query or a missing collection", async () => {
    const present = makeQdrantClient(true);
    const missing = makeQdrantClient(false);

    await expect(
      new QdrantVectorIndex({ client: present, collectionPrefix: "laws", dimension: 2 }).querySparse(
        { country: "egypt" },
        { indices: [], values: [] },
        5
      )
    ).resolves.toEqual([]);
    await expect(
      new QdrantVectorIndex({ client: missing, collectionPrefix: "laws", dimension: 2 }).queryDense(
        { country: "egypt" },
        [1, 0],
        5
      )
    ).resolves.toEqual([]);
    expect(present.query).not.toHaveBeenCalled();
    expect(missing.query).not.toHaveBeenCalled();
  });

  it("reports whether a deleted collection existed", async () => {
    const missing = makeQdrantClient(false);

    await expect(
      new QdrantVectorIndex({ client: missing, collectionPrefix: "laws", dimension: 2 }).deleteCollection("kuwait")
    ).resolves.toBe(false);
    expect(missing.deleteCollection).not.toHaveBeenCalled();
  });

  it("builds a country-only filter without law types", () => {
    expect(buildCountryFilter({ country: "uae" })).toEqual({ must: [{ key: "country", match: { value: "uae" } }] });
  });
});

describe("modules/vector-index/local-vector-index", () => {
  const tempDirs: string[] = [];

  afterEach(async () => {
    await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
  });

  it("ranks dense matches by cosine similarity within the country and law types", async () => {
    const index = new LocalVectorIndex({ collectionPrefix: "laws" });
    await index.upsert(
      "egypt",
      [
        encoded({ id: "a" }, [1, 0]),
        encoded({ id: "b" }, [0.6, 0.8]),
        encoded({ id: "c", lawType: "civil" }, [1, 0])
      ],
      "batch-1"
    );
    await index.upsert("jordan", [encoded({ id: "j", country: "jordan" }, [1, 0])], "batch-2");

    const ranked = await index.queryDense({ country: "egypt", lawTypes: ["criminal"] }, [1, 0], 5);

    expect(ranked.map((item) => [item.chunk.id, item.rank])).toEqual([
      ["a", 1],
      ["b", 2]
    ]);
    expect(ranked[1].score).toBeCloseTo(0.6, 10);
  });

  it("returns only points sharing a sparse term", async () => {
    const index = new LocalVectorIndex({ collectionPrefix: "laws" });
    await index.upsert(
      "egypt",
      [
        encoded({ id: "a" }, [1], { indices: [1, 2], values: [1, 1] }),
        encoded({ id: "b" }, [1], { indices: [3], values: [2] })
      ],
      "batch-1"
    );

    const ranked = await index.querySparse({ country: "egypt" }, { indices: [3], values: [1] }, 5);

    expect(ranked.map((item) => item.chunk.id)).toEqual(["b"]);
    expect(ranked[0].score).toBeCloseTo(2 * Math.log(1 + 1.5 / 1.5), 10);
  });

  it("deletes by batch and removes stale batches of a document", async () => {
    const index = new LocalVectorIndex({ collectionPrefix: "laws" });
    await index.upsert("egypt", [encoded({ id: "old", documentId: "doc-1" }, [1])], "doc-1:old");
    await index.upsert("egypt", [encoded({ id: "new", documentId: "doc-1" }, [1])], "doc-1:new");
    await index.upsert("egypt", [encoded({ id: "other", documentId: "doc-2" }, [1])], "doc-2:x");

    await index.deleteStaleBatches("egypt", "doc-1", "doc-1:new");
    expect((await index.queryDense({ country: "egypt" }, [1], 10)).map((item) => item.chunk.id)).toEqual([
      "new",
      "other"
    ]);

    await index.deleteByBatchId("egypt", "doc-2:x");
    expect(await index.collectionStats("egypt")).toEqual({
      country: "egypt",
      collection: "laws_egypt",
      exists: true,
      pointsCount: 1
    });
  });

  it("resets and deletes collections", async () => {
    const index = new LocalVectorIndex({ collectionPrefix: "laws" });
    await index.upsert("egypt", [encoded({ id: "a" }, [1])], "b1");

    await index.resetCollection("egypt");
    expect((await index.collectionStats("egypt")).pointsCount).toBe(0);

    await expect(index.deleteCollection("egypt")).resolves.toBe(true);
    await expect(index.deleteCollection("egypt")).resolves.toBe(false);
    expect((await index.collectionStats("egypt")).exists).toBe(false);
  });

  it("persists points to its file", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "local-index-"));
    tempDirs.push(dir);
    const filePath = path.join(dir, "nested", "index.json");
    await new LocalVectorIndex({ collectionPrefix: "laws", filePath }).upsert(
      "saudi",
      [encoded({ id: "s", country: "saudi" }, [0, 1])],
      "b1"
    );

    const reopened = new LocalVectorIndex({ collectionPrefix: "laws", filePath });
    const ranked = await reopened.queryDense({ country: "saudi" }, [0, 1], 1);

    expect(ranked.map((item) => item.chunk.id)).toEqual(["s"]);
  });

  it("scores mismatched vectors as unrelated", () => {
    expect(cosineSimilarity([1, 0], [1])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });
});
