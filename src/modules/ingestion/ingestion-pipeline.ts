import { randomUUID } from "node:crypto";
import pLimit from "p-limit";
import type { Country, LawType } from "../../constants/laws.js";
import { type CorrelationContext, logError, logInfo, logTrace, logWarn } from "../../observability/logger.js";
import { incrementCounter, recordErrorRate, recordIngestionLatency } from "../../observability/metrics.js";
import type { Embedder, PageTextExtractor, SparseEncoder } from "../capabilities/types.js";
import { withCapabilityTimeout } from "../concurrency/capability-timeout.js";
import type { CountryGate } from "../concurrency/country-gate.js";
import type { LawRegistryPort } from "../documents/types.js";
import {
  EncodingFailed,
  IngestionFailed,
  type IngestionStep,
  PersistenceFailed,
  RequestCancelled,
  type SegmentationAnomaly,
  describeError,
  serializeError,
  throwIfAborted
} from "../errors.js";
import type { Chunk, EncodedChunk } from "../rag/types.js";
import { normalizePages } from "../text/text-normalizer.js";
import type { VectorIndex } from "../vector-index/types.js";
import { segmentArticles } from "./article-segmenter.js";
import { dedupeChunks, enrichSpans, sha256Hex, toUuid } from "./metadata-enricher.js";

export const UPSERT_BATCH_SIZE = 100;

export interface IngestInput {
  bytes: Uint8Array;
  country: Country;
  lawName: string;
  lawType: LawType;
  sourceFile: string;
  lawNumber?: string | null;
  lawYear?: number | null;
}

export interface IngestOptions {
  signal?: AbortSignal;
  requestId?: string;
}

export interface IngestAnomaly {
  previousArticle: number;
  currentArticle: number;
  offset: number;
}

export interface IngestResult {
  documentId: string;
  batchId: string;
  country: Country;
  lawName: string;
  articlesFound: number;
  chunksCreated: number;
  duplicatesSkipped: number;
  pagesProcessed: number;
  anomalies: IngestAnomaly[];
  durationMs: number;
}

export type IngestOutcome =
  | { status: "fulfilled"; input: IngestInput; result: IngestResult }
  | { status: "rejected"; input: IngestInput; error: Error };

export interface IngestionPipelineDependencies {
  extractor: PageTextExtractor;
  embedder: Embedder;
  sparseEncoder: SparseEncoder;
  vectorIndex: VectorIndex;
  registry: LawRegistryPort;
  countryGate: CountryGate;
  capabilityTimeoutMs: number;
  maxChunkChars: number;
  concurrency: number;
  upsertBatchSize?: number;
  now?: () => number;
  createBatchSuffix?: () => string;
}

/** Stable per (country, law name, law type, source file). */
export const computeDocumentId = (input: Pick<IngestInput, "country" | "lawName" | "lawType" | "sourceFile">): string =>
  toUuid(sha256Hex(JSON.stringify(["document", input.country, input.lawName.trim(), input.lawType, input.sourceFile])));

const toError = (value: unknown): Error => (value instanceof Error ? value : new Error(describeError(value)));

/**
 * Turns one statute into stored chunks through
 * extract → normalize → segment → enrich → encode → persist.
 * A document either lands completely under a fresh batch id or leaves nothing behind.
 */
export class IngestionPipeline {
  private readonly dependencies: IngestionPipelineDependencies;
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly now: () => number;
  private readonly createBatchSuffix: () => string;
  private readonly upsertBatchSize: number;

  constructor(dependencies: IngestionPipelineDependencies) {
    this.dependencies = dependencies;
    this.limit = pLimit(Math.max(1, Math.floor(dependencies.concurrency)));
    this.now = dependencies.now ?? Date.now;
    this.createBatchSuffix = dependencies.createBatchSuffix ?? randomUUID;
    this.upsertBatchSize = Math.max(1, dependencies.upsertBatchSize ?? UPSERT_BATCH_SIZE);
  }

  /** Queued on the worker pool; resolves once the document is stored. */
  ingest(input: IngestInput, options: IngestOptions = {}): Promise<IngestResult> {
    return this.limit(() => this.runDocument(input, options));
  }

  /** Every document settles independently; one failure does not stop the others. */
  async ingestMany(inputs: readonly IngestInput[], options: IngestOptions = {}): Promise<IngestOutcome[]> {
    const settled = await Promise.allSettled(inputs.map((input) => this.ingest(input, options)));
    return settled.map((outcome, index): IngestOutcome => {
      const input = inputs[index];
      return outcome.status === "fulfilled"
        ? { status: "fulfilled", input, result: outcome.value }
        : { status: "rejected", input, error: toError(outcome.reason) };
    });
  }

  get pendingCount(): number {
    return this.limit.pendingCount;
  }

  private async runDocument(input: IngestInput, options: IngestOptions): Promise<IngestResult> {
    const startedAt = this.now();
    const documentId = computeDocumentId(input);
    const batchId = `${documentId}:${this.createBatchSuffix()}`;
    const correlation: CorrelationContext = {
      requestId: options.requestId ?? null,
      documentId,
      country: input.country
    };
    const signal = options.signal;
    let step: IngestionStep = "extract";

    const runStep = async <T>(nextStep: IngestionStep, operation: () => Promise<T> | T): Promise<T> => {
      throwIfAborted(signal, `Ingestion of ${documentId} was cancelled before ${nextStep}`);
      step = nextStep;
      logTrace("ingestion.pipeline.stage", correlation, { step: nextStep });
      try {
        return await operation();
      } catch (error) {
        if (error instanceof RequestCancelled) {
          throw error;
        }
        throw new IngestionFailed(documentId, nextStep, error);
      }
    };

    try {
      const extracted = await runStep("extract", () =>
        withCapabilityTimeout(
          { capability: "page_text_extractor", timeoutMs: this.dependencies.capabilityTimeoutMs, signal },
          (callSignal) => this.dependencies.extractor.extract(input.bytes, { signal: callSignal })
        )
      );

      const normalized = await runStep("normalize", () =>
        normalizePages(extracted.fullText, extracted.pageBreakOffsets)
      );

      const anomalies: IngestAnomaly[] = [];
      const spans = await runStep("segment", () => {
        const onAnomaly = (anomaly: SegmentationAnomaly): void => {
          anomalies.push({
            previousArticle: anomaly.previousArticle,
            currentArticle: anomaly.currentArticle,
            offset: anomaly.offset
          });
          logWarn("ingestion.segment.anomaly", correlation, {
            previous_article: anomaly.previousArticle,
            current_article: anomaly.currentArticle,
            offset: anomaly.offset
          });
        };
        return [...segmentArticles(normalized.text, { onAnomaly, correlation })];
      });

      const enriched = await runStep("enrich", () => {
        const document = enrichSpans(
          spans,
          {
            documentId,
            country: input.country,
            lawName: input.lawName,
            lawType: input.lawType,
            sourceFile: input.sourceFile,
            lawNumber: input.lawNumber ?? null,
            lawYear: input.lawYear ?? null,
            pageBreakOffsets: normalized.pageBreakOffsets
          },
          { maxChunkChars: this.dependencies.maxChunkChars }
        );
        const deduped = dedupeChunks(document.chunks);
        return { ...deduped, articlesFound: document.articlesFound };
      });

      const encoded = await runStep("encode", () => this.encodeChunks(enriched.chunks, signal, correlation));

      const articlesFound = enriched.articlesFound;
      await runStep("persist", () =>
        this.dependencies.countryGate.runShared(input.country, () =>
          this.persist({
            input,
            documentId,
            batchId,
            chunks: encoded,
            articlesFound,
            pagesProcessed: normalized.pageCount,
            correlation
          })
        )
      );

      const durationMs = this.now() - startedAt;
      recordIngestionLatency(durationMs);
      incrementCounter("ingestion_documents");
      incrementCounter("ingestion_chunks", encoded.length);
      logInfo("ingestion.complete", correlation, {
        batch_id: batchId,
        articles_found: articlesFound,
        chunks_created: encoded.length,
        duplicates_skipped: enriched.duplicatesSkipped,
        pages_processed: normalized.pageCount,
        anomalies: anomalies.length,
        duration_ms: durationMs
      });

      return {
        documentId,
        batchId,
        country: input.country,
        lawName: input.lawName.trim(),
        articlesFound,
        chunksCreated: encoded.length,
        duplicatesSkipped: enriched.duplicatesSkipped,
        pagesProcessed: normalized.pageCount,
        anomalies,
        durationMs
      };
    } catch (error) {
      recordErrorRate(error instanceof RequestCancelled ? "ingestion_cancelled" : "ingestion_failed");
      logError("ingestion.step.failed", correlation, {
        failed_step: step,
        source_file: input.sourceFile,
        ...serializeError(error)
      });
      throw error;
    }
  }

  /**
   * Dense embeddings go out per embedder batch, sparse vectors per chunk; both
   * run side by side. A chunk missing either representation fails the document.
   */
  private async encodeChunks(
    chunks: readonly Chunk[],
    signal: AbortSignal | undefined,
    correlation: CorrelationContext
  ): Promise<EncodedChunk[]> {
    const { embedder, sparseEncoder, capabilityTimeoutMs } = this.dependencies;
    const batchSize = Math.max(1, embedder.batchSize);
    const encoded: EncodedChunk[] = [];
    const failedIds: string[] = [];
    let firstCause: unknown;

    for (let start = 0; start < chunks.length; start += batchSize) {
      throwIfAborted(signal);
      const batch = chunks.slice(start, start + batchSize);

      const [denseOutcomes, sparseOutcomes] = await Promise.all([
        Promise.allSettled([
          withCapabilityTimeout({ capability: "embedder", timeoutMs: capabilityTimeoutMs, signal }, (callSignal) =>
            embedder.embed(
              batch.map((chunk) => chunk.searchText),
              { signal: callSignal }
            )
          )
        ]),
        Promise.allSettled(
          batch.map((chunk) =>
            withCapabilityTimeout(
              { capability: "sparse_encoder", timeoutMs: capabilityTimeoutMs, signal },
              (callSignal) => sparseEncoder.encode(chunk.searchText, { signal: callSignal })
            )
          )
        )
      ]);
      throwIfAborted(signal);

      const denseOutcome = denseOutcomes[0];
      if (denseOutcome.status === "rejected") {
        firstCause ??= denseOutcome.reason;
      }

      batch.forEach((chunk, index) => {
        const denseVector =
          denseOutcome.status === "fulfilled" ? denseOutcome.value[index] : undefined;
        const sparseOutcome = sparseOutcomes[index];
        if (sparseOutcome.status === "rejected") {
          firstCause ??= sparseOutcome.reason;
        }
        if (!denseVector || denseVector.length !== embedder.dimension || sparseOutcome.status !== "fulfilled") {
          failedIds.push(chunk.id);
          return;
        }
        encoded.push({ ...chunk, denseVector, sparseVector: sparseOutcome.value });
      });

      logTrace("ingestion.encode.batch", correlation, {
        batch_start: start,
        batch_size: batch.length,
        failed_so_far: failedIds.length
      });
    }

    if (failedIds.length > 0) {
      throw new EncodingFailed(
        `${failedIds.length} of ${chunks.length} chunks could not be encoded${
          firstCause === undefined ? "" : `: ${describeError(firstCause)}`
        }`,
        failedIds,
        { cause: firstCause }
      );
    }

    return encoded;
  }

  /**
   * Writes the document under `batchId`. A failure removes the document
   * entirely (the new batch, any earlier batch and its registry row), so a
   * failed re-ingestion never leaves a mix of versions behind; success sweeps points left by earlier batches of the
   * same document and records it in the registry.
   */
  private async persist(args: {
    input: IngestInput;
    documentId: string;
    batchId: string;
    chunks: EncodedChunk[];
    articlesFound: number;
    pagesProcessed: number;
    correlation: CorrelationContext;
  }): Promise<void> {
    const { vectorIndex, registry, capabilityTimeoutMs } = this.dependencies;
    const { input, documentId, batchId, chunks, correlation } = args;
    const country = input.country;

    try {
      await withCapabilityTimeout({ capability: "vector_index.ensure", timeoutMs: capabilityTimeoutMs }, () =>
        vectorIndex.ensureCollection(country)
      );
      for (let start = 0; start < chunks.length; start += this.upsertBatchSize) {
        const slice = chunks.slice(start, start + this.upsertBatchSize);
        await withCapabilityTimeout({ capability: "vector_index.upsert", timeoutMs: capabilityTimeoutMs }, () =>
          vectorIndex.upsert(country, slice, batchId)
        );
      }
      await registry.upsert({
        documentId,
        country,
        lawName: input.lawName.trim(),
        lawType: input.lawType,
        sourceFile: input.sourceFile,
        lawNumber: input.lawNumber ?? null,
        lawYear: input.lawYear ?? null,
        batchId,
        articlesFound: args.articlesFound,
        chunksCreated: chunks.length,
        pagesProcessed: args.pagesProcessed
      });
    } catch (error) {
      const compensated = await this.compensate(country, documentId, batchId, correlation);
      throw new PersistenceFailed(`Persisting batch ${batchId} failed: ${describeError(error)}`, batchId, compensated, {
        cause: error
      });
    }

    try {
      await withCapabilityTimeout({ capability: "vector_index.sweep", timeoutMs: capabilityTimeoutMs }, () =>
        vectorIndex.deleteStaleBatches(country, documentId, batchId)
      );
    } catch (error) {
      recordErrorRate("ingestion_stale_sweep_failed");
      logWarn("ingestion.persist.stale_sweep_failed", correlation, {
        batch_id: batchId,
        ...serializeError(error)
      });
    }
  }

  private async compensate(
    country: Country,
    documentId: string,
    batchId: string,
    correlation: CorrelationContext
  ): Promise<boolean> {
    const { vectorIndex, registry } = this.dependencies;
    try {
      await vectorIndex.deleteByBatchId(country, batchId);
      await vectorIndex.deleteStaleBatches(country, documentId, batchId);
      await registry.deleteDocument(documentId);
      logInfo("ingestion.persist.compensated", correlation, { batch_id: batchId, document_id: documentId });
      return true;
    } catch (error) {
      logError("ingestion.persist.compensation_failed", correlation, {
        batch_id: batchId,
        document_id: documentId,
        ...serializeError(error)
      });
      return false;
    }
  }
}
