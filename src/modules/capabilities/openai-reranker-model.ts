import { z } from "zod";
import { getOpenAIClient } from "../../clients/openai.js";
import { config } from "../../config/index.js";
import { recordOpenAIUsage } from "../../observability/metrics.js";
import {
  RERANKER_SYSTEM_PROMPT,
  buildRerankerUserPrompt,
  type RerankerPromptCandidate
} from "../../prompts/index.js";
import { RerankUnavailable } from "../errors.js";
import type { CapabilityCall, RerankerModel } from "./types.js";

const rerankResponseSchema = z.object({
  scores: z
    .array(
      z.object({
        id: z.string(),
        score: z.coerce.number().min(0).max(1)
      })
    )
    .default([])
});

const MAX_PASSAGE_CHARS = 1200;

export interface OpenAIRerankerModelOptions {
  model?: string;
  getOpenAIClient?: typeof getOpenAIClient;
}

export const normalizeCompletionContent = (value: unknown): string => {
  if (typeof value === "string") {
    return value;
  }

  if (Array.isArray(value)) {
    return value
      .map((part: unknown) => {
        if (typeof part === "string") {
          return part;
        }
        if (part && typeof part === "object" && "text" in part && typeof part.text === "string") {
          return part.text;
        }
        return "";
      })
      .join("");
  }

  return "";
};

/**
 * Cross-attention style relevance scoring done by a chat model in JSON mode.
 * Candidates the model leaves out score 0.
 */
export class OpenAIRerankerModel implements RerankerModel {
  readonly model: string;
  private readonly getClient: typeof getOpenAIClient;

  constructor(options: OpenAIRerankerModelOptions = {}) {
    this.model = options.model ?? config.OPENAI_RERANK_MODEL;
    this.getClient = options.getOpenAIClient ?? getOpenAIClient;
  }

  async score(query: string, passages: string[], call?: CapabilityCall): Promise<number[]> {
    if (passages.length === 0) {
      return [];
    }

    const candidates: RerankerPromptCandidate[] = passages.map((text, index) => ({
      tempId: `cand_${index + 1}`,
      text: text.length > MAX_PASSAGE_CHARS ? `${text.slice(0, MAX_PASSAGE_CHARS)}...` : text
    }));

    const { client } = await this.getClient();
    const response = await client.chat.completions.create(
      {
        model: this.model,
        temperature: 0,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: RERANKER_SYSTEM_PROMPT },
          { role: "user", content: buildRerankerUserPrompt({ query, candidates }) }
        ]
      },
      { signal: call?.signal }
    );
    if (response.usage) {
      recordOpenAIUsage({
        promptTokens: response.usage.prompt_tokens,
        completionTokens: response.usage.completion_tokens,
        totalTokens: response.usage.total_tokens
      });
    }

    const content = normalizeCompletionContent(response.choices[0]?.message?.content);
    if (!content || content.trim().length === 0) {
      throw new RerankUnavailable("Reranker returned empty content.");
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : "invalid json";
      throw new RerankUnavailable(`Reranker returned invalid JSON: ${message}`);
    }

    const parsed = rerankResponseSchema.safeParse(parsedJson);
    if (!parsed.success) {
      throw new RerankUnavailable("Reranker JSON schema validation failed.");
    }

    const byTempId = new Map<string, number>();
    for (const entry of parsed.data.scores) {
      if (!byTempId.has(entry.id)) {
        byTempId.set(entry.id, entry.score);
      }
    }
    return candidates.map((candidate) => byTempId.get(candidate.tempId) ?? 0);
  }
}
