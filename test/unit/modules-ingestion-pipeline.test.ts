import { beforeEach, describe, expect, it, vi } from "vitest";
import { Bm25SparseEncoder } from "../../src/modules/capabilities/bm25-sparse-encoder.js";
import { FormFeedTextExtractor } from "../../src/modules/capabilities/text-page-extractor.js";
import type { SparseEncoder } from "../../src/modules/capabilities/types.js";
import { CountryGate } from "../../src/modules/concurrency/country-gate.js";
import { InMemoryLawRegistry } from "../../src/modules/documents/in-memory-law-registry.js";
import type { LawRegistryPort } from "../../src/modules/documents/types.js";
import {
  EncodingFailed,
  ExtractionFailed,
  IngestionFailed,
  PersistenceFailed,
  RequestCancelled
} from "../../src/modules/errors.js";
import {
  IngestionPipeline,
  computeDocumentId,
  type IngestionPipelineDependencies
} from "../../src/modules/ingestion/ingestion-pipeline.js";
import { getMetricsSnapshot, resetMetrics } from "../../src/observability/metrics.js";
import { LocalVectorIndex } from "../../src/modules/vector-index/local-vector-index.js";
import { HashingEmbedder, documentInput } from "../helpers/fakes.js";

const PENAL_CODE = "قانون العقوبات\fمادة 1\nيعاقب بالحبس كل من سرق\fمادة 2\nيعاقب بالغرامة";

const makeDeps = (overrides: Partial<IngestionPipelineDependencies> = {}) => {
  let batch = 0;
  const vectorIndex = new LocalVectorIndex({ collectionPrefix: "laws" });
  const registry = new InMemoryLawRegistry();
  const deps: IngestionPipelineDependencies = {
    extractor: new FormFeedTextExtractor(),
    embedder: new HashingEmbedder(),
    sparseEncoder: new Bm25SparseEncoder(),
    vectorIndex,
    registry,
    countryGate: new CountryGate(),
    capabilityTimeoutMs: 1000,
    maxChunkChars: 1500,
    concurrency: 2,
    createBatchSuffix: () => `b${(batch += 1)}`,
    ...overrides
  };
  return { deps, vectorIndex, registry };
};

const allChunks = async (index: LocalVectorIndex) =>
  index.queryDense({ country: "egypt" }, new HashingEmbedder().vectorFor("يعاقب"), 100);

describe("modules/ingestion/ingestion-pipeline", () => {
  beforeEach(() => {
    resetMetrics();
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("stores every article with its page and records the law", async () => {
    const { deps, vectorIndex, registry } = makeDeps();
    const pipeline = new IngestionPipeline(deps);
    const input = documentInput(PENAL_CODE);

    const result = await pipeline.ingest(input);

    const documentId = computeDocumentId(input);
    expect(result).toMatchObject({
      documentId,
      batchId: `${documentId}:b1`,
      country: "egypt",
      lawName: "قانون العقوبات",
      articlesFound: 2,
      chunksCreated: 3,
      duplicatesSkipped: 0,
      pagesProcessed: 3,
      anomalies: []
    });
    const stored = await allChunks(vectorIndex);
    expect(
      stored
        .map((item) => [item.chunk.articleNumber, item.chunk.pageNumber])
        .sort((a, b) => (a[1] ?? 0) - (b[1] ?? 0))
    ).toEqual([
      [null, 1],
      [1, 2],
      [2, 3]
    ]);
    const laws = await registry.listByCountry("egypt");
    expect(laws.map((law) => [law.documentId, law.batchId, law.chunksCreated])).toEqual([
      [documentId, `${documentId}:b1`, 3]
    ]);
    expect(getMetricsSnapshot().counters).toEqual({ ingestion_documents: 1, ingestion_chunks: 3 });
  });

  it("re-ingesting the same document keeps one copy of each chunk", async () => {
    const { deps, vectorIndex, registry } = makeDeps();
    const pipeline = new IngestionPipeline(deps);

    const first = await pipeline.ingest(documentInput(PENAL_CODE));
    const second = await pipeline.ingest(documentInput(PENAL_CODE));

    expect(second.documentId).toBe(first.documentId);
    expect(second.batchId).toBe(`${first.documentId}:b2`);
    expect((await vectorIndex.collectionStats("egypt")).pointsCount).toBe(3);
    expect((await registry.listByCountry("egypt")).map((law) => law.batchId)).toEqual([second.batchId]);
  });

  it("sweeps chunks an earlier version of the document left behind", async () => {
    const { deps, vectorIndex } = makeDeps();
    const pipeline = new IngestionPipeline(deps);
    await pipeline.ingest(documentInput(PENAL_CODE));

    await pipeline.ingest(documentInput(PENAL_CODE.replace("بالغرامة", "بالسجن")));

    const texts = (await allChunks(vectorIndex)).map((item) => item.chunk.displayText).sort();
    expect(texts).toHaveLength(3);
    expect(texts).toContain("مادة 2\nيعاقب بالسجن");
    expect(texts).not.toContain("مادة 2\nيعاقب بالغرامة");
  });

  it("reports decreasing article numbers and skips duplicate chunks", async () => {
    const { deps } = makeDeps();
    const pipeline = new IngestionPipeline(deps);

    const reordered = await pipeline.ingest(documentInput("مادة 2 أ\nمادة 1 ب", { sourceFile: "a.txt" }));
    const repeated = await pipeline.ingest(documentInput("مادة 1 نص\nمادة 1 نص", { sourceFile: "b.txt" }));

    expect(reordered.anomalies).toEqual([{ previousArticle: 2, currentArticle: 1, offset: 9 }]);
    expect(repeated).toMatchObject({ articlesFound: 2, chunksCreated: 1, duplicatesSkipped: 1 });
  });

  it("fails the document when any chunk cannot be encoded and stores nothing", async () => {
    const bm25 = new Bm25SparseEncoder();
    const sparseEncoder: SparseEncoder = {
      model: "flaky",
      encode: async (text) => {
        if (text.includes("غرامه")) {
          throw new Error("sparse offline");
        }
        return bm25.encodeSync(text);
      }
    };
    const { deps, vectorIndex, registry } = makeDeps({ sparseEncoder });
    const input = documentInput(PENAL_CODE);

    const error = await new IngestionPipeline(deps).ingest(input).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(IngestionFailed);
    expect(error).toMatchObject({
      documentId: computeDocumentId(input),
      failingStep: "encode",
      message: `Ingestion of ${computeDocumentId(input)} failed at encode: 1 of 3 chunks could not be encoded: sparse offline`
    });
    const cause = error instanceof Error ? error.cause : undefined;
    expect(cause).toBeInstanceOf(EncodingFailed);
    expect(cause instanceof EncodingFailed ? cause.chunkIds : []).toHaveLength(1);
    expect((await vectorIndex.collectionStats("egypt")).exists).toBe(false);
    await expect(registry.listByCountry("egypt")).resolves.toEqual([]);
    expect(getMetricsSnapshot().error_rates).toEqual({ ingestion_failed: 1 });
  });

  it("fails the document when the embedder returns vectors of the wrong size", async () => {
    const short = new HashingEmbedder({ dimension: 8 });
    const { deps } = makeDeps({
      embedder: { model: short.model, dimension: 16, batchSize: 4, embed: (texts) => short.embed(texts) }
    });

    await expect(new IngestionPipeline(deps).ingest(documentInput(PENAL_CODE))).rejects.toMatchObject({
      failingStep: "encode",
      cause: expect.objectContaining({ message: "3 of 3 chunks could not be encoded" })
    });
  });

  it("removes a partially written batch when persisting fails", async () => {
    const registry: LawRegistryPort = {
      upsert: vi.fn(async () => {
        throw new Error("registry offline");
      }),
      listByCountry: vi.fn(async () => []),
      countryStats: vi.fn(async () => ({ country: "egypt" as const, documents: 0, articles: 0, chunks: 0, lawTypes: {} })),
      deleteByCountry: vi.fn(async () => 0),
      deleteDocument: vi.fn(async () => false)
    };
    const { deps, vectorIndex } = makeDeps({ registry });

    const error = await new IngestionPipeline(deps).ingest(documentInput(PENAL_CODE)).catch((caught: unknown) => caught);

    expect(error).toMatchObject({ name: "IngestionFailed", failingStep: "persist" });
    const cause = error instanceof Error ? error.cause : undefined;
    expect(cause).toBeInstanceOf(PersistenceFailed);
    expect(cause).toMatchObject({ compensated: true });
    expect(await vectorIndex.collectionStats("egypt")).toMatchObject({ exists: true, pointsCount: 0 });
  });

  it("removes every version of a document when a re-ingestion fails to persist", async () => {
    const { deps, vectorIndex, registry } = makeDeps();
    const pipeline = new IngestionPipeline(deps);
    const first = await pipeline.ingest(documentInput(PENAL_CODE));
    vi.spyOn(registry, "upsert").mockRejectedValueOnce(new Error("registry offline"));

    const error = await pipeline
      .ingest(documentInput(PENAL_CODE.replace("بالغرامة", "بالسجن")))
      .catch((caught: unknown) => caught);

    expect(error).toMatchObject({ name: "IngestionFailed", documentId: first.documentId, failingStep: "persist" });
    const cause = error instanceof Error ? error.cause : undefined;
    expect(cause).toMatchObject({ batchId: `${first.documentId}:b2`, compensated: true });
    expect(await vectorIndex.collectionStats("egypt")).toMatchObject({ exists: true, pointsCount: 0 });
    await expect(registry.listByCountry("egypt")).resolves.toEqual([]);
  });

  it("keeps the new batch when sweeping older batches fails", async () => {
    const { deps, vectorIndex } = makeDeps();
    vi.spyOn(vectorIndex, "deleteStaleBatches").mockRejectedValue(new Error("sweep failed"));

    const result = await new IngestionPipeline(deps).ingest(documentInput(PENAL_CODE));

    expect(result.chunksCreated).toBe(3);
    expect((await vectorIndex.collectionStats("egypt")).pointsCount).toBe(3);
    expect(getMetricsSnapshot().error_rates).toEqual({ ingestion_stale_sweep_failed: 1 });
  });

  it("does not start a cancelled document", async () => {
    const extract = vi.fn();
    const { deps } = makeDeps({ extractor: { extract } });
    const controller = new AbortController();
    controller.abort();

    await expect(
      new IngestionPipeline(deps).ingest(documentInput(PENAL_CODE), { signal: controller.signal })
    ).rejects.toBeInstanceOf(RequestCancelled);
    expect(extract).not.toHaveBeenCalled();
    expect(getMetricsSnapshot().error_rates).toEqual({ ingestion_cancelled: 1 });
  });

  it("settles every document of a batch independently", async () => {
    const { deps } = makeDeps({ concurrency: 1 });
    const pipeline = new IngestionPipeline(deps);
    const broken = { ...documentInput(""), bytes: new Uint8Array([0xff]), sourceFile: "broken.pdf" };

    const outcomes = await pipeline.ingestMany([documentInput(PENAL_CODE), broken]);

    expect(outcomes.map((outcome) => outcome.status)).toEqual(["fulfilled", "rejected"]);
    const failure = outcomes[1];
    expect(failure.input).toBe(broken);
    if (failure.status === "rejected") {
      expect(failure.error).toMatchObject({ failingStep: "extract" });
      expect(failure.error.cause).toBeInstanceOf(ExtractionFailed);
    }
    expect(pipeline.pendingCount).toBe(0);
  });
});
