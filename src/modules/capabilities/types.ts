import type { Chunk, SparseVector } from "../rag/types.js";

export interface CapabilityCall {
  signal?: AbortSignal;
}

export interface ExtractedText {
  fullText: string;
  /** Offsets in `fullText` where pages 2..n start; `null` when unknown. */
  pageBreakOffsets: number[] | null;
}

export interface PageTextExtractor {
  extract(bytes: Uint8Array, call?: CapabilityCall): Promise<ExtractedText>;
}

export interface Embedder {
  readonly model: string;
  readonly dimension: number;
  readonly batchSize: number;
  embed(texts: string[], call?: CapabilityCall): Promise<number[][]>;
}

export interface SparseEncoder {
  readonly model: string;
  encode(text: string, call?: CapabilityCall): Promise<SparseVector>;
}

export interface RerankerModel {
  readonly model: string;
  score(query: string, passages: string[], call?: CapabilityCall): Promise<number[]>;
}

export interface HistoryTurn {
  question: string;
  answer: string;
}

export interface GenerationRequest {
  question: string;
  contextChunks: Chunk[];
  history: HistoryTurn[];
}

export interface Generator {
  readonly model: string;
  generate(request: GenerationRequest, call?: CapabilityCall): Promise<string>;
}
