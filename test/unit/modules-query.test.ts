import { beforeEach, describe, expect, it, vi } from "vitest";
import { getMetricsSnapshot, resetMetrics } from "../../src/observability/metrics.js";
import { GENERATION_FAILED_ANSWER, INSUFFICIENT_CONTEXT_ANSWER } from "../../src/prompts/index.js";
import { Bm25SparseEncoder } from "../../src/modules/capabilities/bm25-sparse-encoder.js";
import type { Embedder, Generator, RerankerModel } from "../../src/modules/capabilities/types.js";
import { CountryGate } from "../../src/modules/concurrency/country-gate.js";
import { QueryFailed, RequestCancelled } from "../../src/modules/errors.js";
import { QueryPipeline, type QueryPipelineDependencies } from "../../src/modules/query/query-pipeline.js";
import { rewriteQuestionWithHistory, usesReferringExpression } from "../../src/modules/query/question-rewriter.js";
import { HybridRetriever } from "../../src/modules/rag/hybrid-retriever.js";
import type { RankedChunk } from "../../src/modules/rag/types.js";
import { InMemorySessionStore } from "../../src/modules/sessions/in-memory-session-store.js";
import { SessionLedger } from "../../src/modules/sessions/session-ledger.js";
import type { Turn } from "../../src/modules/sessions/types.js";
import type { VectorIndex } from "../../src/modules/vector-index/types.js";
import {
  FailingReranker,
  FixedScoreReranker,
  HashingEmbedder,
  ScriptedGenerator,
  makeChunk,
  makeVectorIndexStub
} from "../helpers/fakes.js";

const NOW = 1_000;
const now = () => NOW;

const theft = makeChunk({ id: "a", articleNumber: 3, articleMarker: "مادة 3", pageNumber: 2, displayText: "مادة 3 يعاقب بالحبس" });
const fraud = makeChunk({ id: "b", articleNumber: 7, articleMarker: "مادة 7", pageNumber: 5, displayText: "مادة 7 يعاقب بالغرامة" });

const dense: RankedChunk[] = [
  { chunk: theft, rank: 1, score: 0.9 },
  { chunk: fraud, rank: 2, score: 0.5 }
];
const sparse: RankedChunk[] = [{ chunk: fraud, rank: 1, score: 3 }];

const turn = (overrides: Partial<Turn> = {}): Turn => ({
  question: "سؤال",
  rewrittenQuestion: null,
  answer: "جواب",
  citedChunkIds: [],
  citations: [],
  timestamp: "1970-01-01T00:00:01.000Z",
  failed: false,
  error: null,
  ...overrides
});

const makePipeline = (
  overrides: {
    vectorIndex?: VectorIndex;
    rerankerModel?: RerankerModel;
    generator?: Generator;
    embedder?: Embedder;
  } = {}
) => {
  const store = new InMemorySessionStore({ now });
  const sessions = new SessionLedger({ store, ttlSeconds: 3600, now, logInfo: vi.fn() });
  const deps: QueryPipelineDependencies = {
    embedder: overrides.embedder ?? new HashingEmbedder(),
    sparseEncoder: new Bm25SparseEncoder(),
    retriever: new HybridRetriever({
      vectorIndex:
        overrides.vectorIndex ??
        makeVectorIndexStub({ queryDense: vi.fn(async () => dense), querySparse: vi.fn(async () => sparse) }),
      capabilityTimeoutMs: 1000,
      logInfo: vi.fn()
    }),
    rerankerModel:
      overrides.rerankerModel ?? new FixedScoreReranker((passage) => (passage.includes("مادة 3") ? 0.9 : 0.1)),
    generator: overrides.generator ?? new ScriptedGenerator(() => "العقوبة هي الحبس [1]."),
    sessions,
    countryGate: new CountryGate(),
    capabilityTimeoutMs: 1000,
    prefetchN: 10,
    rerankTopK: 2,
    historyTurns: 5,
    createSessionId: () => "s-new",
    now
  };
  return { pipeline: new QueryPipeline(deps), sessions, store };
};

describe("modules/query/question-rewriter", () => {
  const cited = turn({
    citations: [
      { lawName: "قانون العقوبات", articleNumber: 3 },
      { lawName: "قانون العقوبات", articleNumber: 3 },
      { lawName: "قانون العمل", articleNumber: null }
    ]
  });

  it("detects referring expressions regardless of diacritics and case", () => {
    expect(usesReferringExpression("ما عقوبة هذه المادةُ؟")).toBe(true);
    expect(usesReferringExpression("What does This Article say?")).toBe(true);
    expect(usesReferringExpression("ما عقوبة السرقة؟")).toBe(false);
  });

  it("appends the citations of the latest turn that cited something", () => {
    expect(rewriteQuestionWithHistory("  ما عقوبة هذه المادة؟ ", [cited, turn()])).toBe(
      "ما عقوبة هذه المادة؟ (قانون العقوبات - مادة 3، قانون العمل - تمهيد)"
    );
  });

  it("leaves the question alone without a reference or a cited turn", () => {
    expect(rewriteQuestionWithHistory("ما عقوبة السرقة؟", [cited])).toBe("ما عقوبة السرقة؟");
    expect(rewriteQuestionWithHistory("ما عقوبة هذه المادة؟", [turn()])).toBe("ما عقوبة هذه المادة؟");
  });
});

describe("modules/query/query-pipeline", () => {
  beforeEach(() => {
    resetMetrics();
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("answers with the reranked context and records the turn", async () => {
    const generator = new ScriptedGenerator(() => "العقوبة هي الحبس [1].");
    const { pipeline, sessions } = makePipeline({ generator });

    const result = await pipeline.query({ question: "ما عقوبة السرقة؟", country: "egypt" });

    expect(result.success).toBe(true);
    expect(result.answer).toBe("العقوبة هي الحبس [1].");
    expect(result.errors).toEqual([]);
    expect(result.sources).toHaveLength(1);
    expect(result.sources[0]).toMatchObject({
      chunk_id: "a",
      article_label: "مادة 3",
      relevance_score: 0.9,
      citation: "قانون العقوبات - مادة 3 (صفحة 2)"
    });
    expect(result.metadata).toEqual({
      session_id: "s-new",
      query_time_ms: 0,
      chunks_retrieved: 2,
      chunks_after_rerank: 2,
      rerank_fallback: false,
      rewritten_question: "ما عقوبة السرقة؟",
      embedding_model: "hashing-test-embedder",
      reranker_model: "fixed-test-reranker",
      llm_model: "scripted-test-generator"
    });
    expect(generator.requests[0]?.contextChunks.map((chunk) => chunk.id)).toEqual(["a", "b"]);

    const session = await sessions.getSession("s-new");
    expect(session?.metadata).toEqual({ country: "egypt" });
    expect(session?.turns).toEqual([
      turn({
        question: "ما عقوبة السرقة؟",
        answer: "العقوبة هي الحبس [1].",
        citedChunkIds: ["a"],
        citations: [{ lawName: "قانون العقوبات", articleNumber: 3 }]
      })
    ]);
  });

  it("falls back to fused order when the reranker is unavailable", async () => {
    const { pipeline } = makePipeline({
      rerankerModel: new FailingReranker(),
      generator: new ScriptedGenerator(() => "لا توجد إشارة")
    });

    const result = await pipeline.query({ question: "ما عقوبة السرقة؟", country: "egypt", topK: 1 });

    expect(result.metadata.rerank_fallback).toBe(true);
    expect(result.metadata.chunks_after_rerank).toBe(1);
    expect(result.sources.map((source) => source.chunk_id)).toEqual(["b"]);
    expect(result.sources[0]?.relevance_score).toBeCloseTo(1 / 62 + 1 / 61, 10);
    expect(getMetricsSnapshot().error_rates).toEqual({ rerank_fallback: 1 });
  });

  it("does not call the generator when nothing was retrieved", async () => {
    const generator = new ScriptedGenerator(() => "غير متوقع");
    const { pipeline, sessions } = makePipeline({
      generator,
      vectorIndex: makeVectorIndexStub()
    });

    const result = await pipeline.query({ question: "ما عقوبة السرقة؟", country: "egypt" });

    expect(result).toMatchObject({ success: true, answer: INSUFFICIENT_CONTEXT_ANSWER, sources: [], errors: [] });
    expect(generator.requests).toEqual([]);
    expect((await sessions.getSession("s-new"))?.turns.map((entry) => entry.citedChunkIds)).toEqual([[]]);
  });

  it("returns the supplied context and keeps failed turns out of later history", async () => {
    let calls = 0;
    const generator = new ScriptedGenerator(() => {
      calls += 1;
      return calls === 1 ? new Error("model overloaded") : "الحبس [2]";
    });
    const { pipeline, sessions } = makePipeline({ generator });

    const failed = await pipeline.query({ question: "ما عقوبة السرقة؟", country: "egypt" });
    const retried = await pipeline.query({ question: "ما عقوبة السرقة؟", country: "egypt", sessionId: "s-new" });

    expect(failed).toMatchObject({
      success: false,
      answer: GENERATION_FAILED_ANSWER,
      errors: ["Generation failed: model overloaded"]
    });
    expect(failed.sources.map((source) => source.chunk_id)).toEqual(["a", "b"]);
    expect(generator.requests[1]?.history).toEqual([]);
    expect(retried.sources.map((source) => source.chunk_id)).toEqual(["b"]);
    const turns = (await sessions.getSession("s-new"))?.turns ?? [];
    expect(turns.map((entry) => [entry.failed, entry.error])).toEqual([
      [true, "Generation failed: model overloaded"],
      [false, null]
    ]);
    expect(getMetricsSnapshot().error_rates).toEqual({ generation_failed: 1 });
  });

  it("rewrites a follow-up question with the previous citations", async () => {
    const generator = new ScriptedGenerator(() => "العقوبة هي الحبس [1].");
    const { pipeline } = makePipeline({ generator });
    await pipeline.query({ question: "ما عقوبة السرقة؟", country: "egypt" });

    const followUp = await pipeline.query({
      question: "هل تشدد عقوبة هذه المادة؟",
      country: "egypt",
      sessionId: "s-new"
    });

    expect(followUp.metadata.rewritten_question).toBe("هل تشدد عقوبة هذه المادة؟ (قانون العقوبات - مادة 3)");
    expect(generator.requests[1]).toMatchObject({
      question: "هل تشدد عقوبة هذه المادة؟",
      history: [{ question: "ما عقوبة السرقة؟", answer: "العقوبة هي الحبس [1]." }]
    });
  });

  it("runs requests on one session one at a time", async () => {
    const historySizes: number[] = [];
    const generator: Generator = {
      model: "slow-generator",
      generate: async (request) => {
        historySizes.push(request.history.length);
        await new Promise((resolve) => setTimeout(resolve, 5));
        return "جواب [1]";
      }
    };
    const { pipeline } = makePipeline({ generator });

    await Promise.all([
      pipeline.query({ question: "السؤال الأول", country: "egypt", sessionId: "shared" }),
      pipeline.query({ question: "السؤال الثاني", country: "egypt", sessionId: "shared" })
    ]);

    expect(historySizes).toEqual([0, 1]);
  });

  it("fails the request when the question cannot be encoded", async () => {
    const embedder: Embedder = {
      model: "broken",
      dimension: 16,
      batchSize: 1,
      embed: async () => {
        throw new Error("embedding offline");
      }
    };
    const { pipeline } = makePipeline({ embedder });

    const error = await pipeline.query({ question: "ما عقوبة السرقة؟", country: "egypt" }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(QueryFailed);
    expect(error).toMatchObject({ stage: "encode", message: "Query failed at encode: embedding offline" });
    expect(getMetricsSnapshot().error_rates).toEqual({ query_failed: 1 });
  });

  it("fails the request when the index cannot be searched", async () => {
    const { pipeline } = makePipeline({
      vectorIndex: makeVectorIndexStub({ querySparse: vi.fn(async () => {
          throw new Error("index down");
        }) })
    });

    await expect(pipeline.query({ question: "ما عقوبة السرقة؟", country: "egypt" })).rejects.toMatchObject({
      name: "QueryFailed",
      stage: "retrieve"
    });
  });

  it("reports a lost session update without failing the answer", async () => {
    const { pipeline, store } = makePipeline();
    vi.spyOn(store, "appendTurn").mockResolvedValue(false);

    const result = await pipeline.query({ question: "ما عقوبة السرقة؟", country: "egypt" });

    expect(result.success).toBe(true);
    expect(result.errors).toEqual(["Session history was not updated: Session s-new was not found or has expired"]);
  });

  it("stops before any work when the request is already cancelled", async () => {
    const embedder = new HashingEmbedder();
    const { pipeline } = makePipeline({ embedder });
    const controller = new AbortController();
    controller.abort();

    await expect(
      pipeline.query({ question: "ما عقوبة السرقة؟", country: "egypt" }, { signal: controller.signal })
    ).rejects.toBeInstanceOf(RequestCancelled);
    expect(embedder.calls).toEqual([]);
    expect(getMetricsSnapshot().error_rates).toEqual({ query_cancelled: 1 });
  });
});
