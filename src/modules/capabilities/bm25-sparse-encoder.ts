import { createHash } from "node:crypto";
import type { SparseVector } from "../rag/types.js";
import { normalizeText } from "../text/text-normalizer.js";
import type { SparseEncoder } from "./types.js";

// Search-normalized forms, so they match tokens after normalization.
const STOPWORDS = new Set([
  "في", "من", "علي", "الي", "عن", "ان", "او", "ما", "لا", "هذا", "هذه", "ذلك", "تلك",
  "التي", "الذي", "الذين", "كل", "قد", "كان", "مع", "عند", "بين", "اي", "ثم", "حتي",
  "وفي", "ومن", "هو", "هي", "به", "بها", "له", "لها", "فيه", "فيها", "the", "of", "and", "or"
]);

const ARTICLE_PREFIX = /^(?:وال|بال|كال|فال|لل|ال)/u;
const TOKEN_SEPARATOR = /[^\p{L}\p{N}]+/u;

export interface Bm25Options {
  k1?: number;
  b?: number;
  averageDocumentLength?: number;
}

export const tokenize = (text: string): string[] =>
  normalizeText(text, "search")
    .toLowerCase()
    .split(TOKEN_SEPARATOR)
    .filter((token) => token.length > 0 && !STOPWORDS.has(token))
    .map((token) => (token.length > 4 ? token.replace(ARTICLE_PREFIX, "") : token))
    .filter((token) => token.length > 1 || /\p{N}/u.test(token));

export const hashToken = (token: string): number =>
  createHash("sha256").update(token, "utf8").digest().readUInt32BE(0);

/**
 * Hashed-vocabulary BM25 term weights. Inverse document frequency is applied by
 * the vector index at query time, so only the saturated term frequency is sent.
 */
export class Bm25SparseEncoder implements SparseEncoder {
  readonly model = "bm25-hashed";
  private readonly k1: number;
  private readonly b: number;
  private readonly averageDocumentLength: number;

  constructor(options: Bm25Options = {}) {
    this.k1 = options.k1 ?? 1.2;
    this.b = options.b ?? 0.75;
    this.averageDocumentLength = options.averageDocumentLength ?? 120;
  }

  encodeSync(text: string): SparseVector {
    const tokens = tokenize(text);
    if (tokens.length === 0) {
      return { indices: [], values: [] };
    }

    const termFrequencies = new Map<string, number>();
    for (const token of tokens) {
      termFrequencies.set(token, (termFrequencies.get(token) ?? 0) + 1);
    }

    const lengthNorm = 1 - this.b + this.b * (tokens.length / this.averageDocumentLength);
    const weights = new Map<number, number>();
    for (const [token, tf] of termFrequencies) {
      const weight = (tf * (this.k1 + 1)) / (tf + this.k1 * lengthNorm);
      const index = hashToken(token);
      weights.set(index, (weights.get(index) ?? 0) + weight);
    }

    const indices = [...weights.keys()].sort((a, b) => a - b);
    return {
      indices,
      values: indices.map((index) => weights.get(index) ?? 0)
    };
  }

  async encode(text: string): Promise<SparseVector> {
    return this.encodeSync(text);
  }
}
