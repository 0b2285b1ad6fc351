/**
 * Failure taxonomy shared by both pipelines.
 *
 * `classification` tells the caller what a failure means for the unit of work:
 * - `abort-document`: the current document is dropped, nothing is persisted for it.
 * - `abort-request`: the current query fails.
 * - `degrade-and-continue`: the pipeline falls back and keeps going.
 * - `non-fatal`: reported only.
 */
export type FailureClassification = "abort-document" | "abort-request" | "degrade-and-continue" | "non-fatal";

export type IngestionStep = "extract" | "normalize" | "segment" | "enrich" | "encode" | "persist";

export type QueryStage = "preprocess" | "encode" | "retrieve" | "rerank" | "generate" | "format";

export class LawRagError extends Error {
  readonly classification: FailureClassification;

  constructor(message: string, classification: FailureClassification, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LawRagError";
    this.classification = classification;
  }
}

export class ExtractionFailed extends LawRagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "abort-document", options);
    this.name = "ExtractionFailed";
  }
}

export class SegmentationAnomaly extends LawRagError {
  readonly previousArticle: number;
  readonly currentArticle: number;
  readonly offset: number;

  constructor(previousArticle: number, currentArticle: number, offset: number) {
    super(
      `Article number decreased from ${previousArticle} to ${currentArticle} at offset ${offset}`,
      "non-fatal"
    );
    this.name = "SegmentationAnomaly";
    this.previousArticle = previousArticle;
    this.currentArticle = currentArticle;
    this.offset = offset;
  }
}

export class MetadataError extends LawRagError {
  constructor(message: string) {
    super(message, "abort-document");
    this.name = "MetadataError";
  }
}

export class EncodingFailed extends LawRagError {
  readonly chunkIds: string[];

  constructor(message: string, chunkIds: string[] = [], options?: { cause?: unknown }) {
    super(message, "abort-document", options);
    this.name = "EncodingFailed";
    this.chunkIds = chunkIds;
  }
}

export class PersistenceFailed extends LawRagError {
  readonly batchId: string;
  readonly compensated: boolean;

  constructor(message: string, batchId: string, compensated: boolean, options?: { cause?: unknown }) {
    super(message, "abort-document", options);
    this.name = "PersistenceFailed";
    this.batchId = batchId;
    this.compensated = compensated;
  }
}

export class CapabilityTimeout extends LawRagError {
  readonly capability: string;
  readonly timeoutMs: number;

  constructor(capability: string, timeoutMs: number) {
    super(`${capability} did not respond within ${timeoutMs}ms`, "abort-request");
    this.name = "CapabilityTimeout";
    this.capability = capability;
    this.timeoutMs = timeoutMs;
  }
}

export class RerankUnavailable extends LawRagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "degrade-and-continue", options);
    this.name = "RerankUnavailable";
  }
}

export class SessionNotFound extends LawRagError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session ${sessionId} was not found or has expired`, "degrade-and-continue");
    this.name = "SessionNotFound";
    this.sessionId = sessionId;
  }
}

export class RequestCancelled extends LawRagError {
  constructor(message = "Request was cancelled") {
    super(message, "abort-request");
    this.name = "RequestCancelled";
  }
}

export class InvalidRequest extends LawRagError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid request:\n${issues.map((issue) => `- ${issue}`).join("\n")}`, "abort-request");
    this.name = "InvalidRequest";
    this.issues = issues;
  }
}

export class IngestionFailed extends LawRagError {
  readonly documentId: string;
  readonly failingStep: IngestionStep;

  constructor(documentId: string, failingStep: IngestionStep, cause: unknown) {
    super(
      `Ingestion of ${documentId} failed at ${failingStep}: ${describeError(cause)}`,
      "abort-document",
      { cause }
    );
    this.name = "IngestionFailed";
    this.documentId = documentId;
    this.failingStep = failingStep;
  }
}

export class QueryFailed extends LawRagError {
  readonly stage: QueryStage;

  constructor(stage: QueryStage, cause: unknown) {
    super(`Query failed at ${stage}: ${describeError(cause)}`, "abort-request", { cause });
    this.name = "QueryFailed";
    this.stage = stage;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  return String(error ?? "unknown error");
}

export function serializeError(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { error_raw: String(error) };
  }

  const details: Record<string, unknown> = {
    error_name: error.name,
    error_message: error.message
  };

  if (error instanceof LawRagError) {
    details.error_classification = error.classification;
  }

  if (error.stack) {
    details.error_stack = error.stack;
  }

  const cause: unknown = error.cause;
  if (cause instanceof Error) {
    details.error_cause = {
      name: cause.name,
      message: cause.message,
      stack: cause.stack
    };
  } else if (cause !== undefined) {
    details.error_cause = cause;
  }

  return details;
}

export function throwIfAborted(signal: AbortSignal | undefined, message?: string): void {
  if (signal?.aborted) {
    throw new RequestCancelled(message);
  }
}
