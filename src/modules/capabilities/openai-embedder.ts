import { getOpenAIClient } from "../../clients/openai.js";
import { config } from "../../config/index.js";
import { recordOpenAIUsage } from "../../observability/metrics.js";
import { EncodingFailed } from "../errors.js";
import type { CapabilityCall, Embedder } from "./types.js";

export interface OpenAIEmbedderOptions {
  model?: string;
  dimension?: number;
  batchSize?: number;
  getOpenAIClient?: typeof getOpenAIClient;
}

/** Dense text embeddings through the OpenAI embeddings endpoint. */
export class OpenAIEmbedder implements Embedder {
  readonly model: string;
  readonly dimension: number;
  readonly batchSize: number;
  private readonly getClient: typeof getOpenAIClient;

  constructor(options: OpenAIEmbedderOptions = {}) {
    this.model = options.model ?? config.OPENAI_EMBEDDING_MODEL;
    this.dimension = options.dimension ?? config.EMBEDDING_DIMENSION;
    this.batchSize = Math.max(1, options.batchSize ?? config.EMBEDDING_BATCH_SIZE);
    this.getClient = options.getOpenAIClient ?? getOpenAIClient;
  }

  async embed(texts: string[], call?: CapabilityCall): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const { client } = await this.getClient();
    const vectors: number[][] = [];

    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      const response = await client.embeddings.create(
        { model: this.model, input: batch },
        { signal: call?.signal }
      );
      if (response.usage) {
        recordOpenAIUsage({
          promptTokens: response.usage.prompt_tokens,
          totalTokens: response.usage.total_tokens
        });
      }

      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      if (ordered.length !== batch.length) {
        throw new EncodingFailed(
          `Embedding response returned ${ordered.length} vectors for ${batch.length} inputs`
        );
      }
      for (const item of ordered) {
        if (item.embedding.length !== this.dimension) {
          throw new EncodingFailed(
            `Embedding dimension ${item.embedding.length} does not match expected ${this.dimension}`
          );
        }
        vectors.push(item.embedding);
      }
    }

    return vectors;
  }
}
