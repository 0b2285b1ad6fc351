import { getOpenAIClient } from "../../clients/openai.js";
import { config } from "../../config/index.js";
import { recordOpenAIUsage } from "../../observability/metrics.js";
import { LEGAL_ANSWER_SYSTEM_PROMPT, buildAnswerUserPrompt } from "../../prompts/index.js";
import { normalizeCompletionContent } from "./openai-reranker-model.js";
import type { CapabilityCall, GenerationRequest, Generator } from "./types.js";

export interface OpenAIGeneratorOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  getOpenAIClient?: typeof getOpenAIClient;
}

export class OpenAIGenerator implements Generator {
  readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly getClient: typeof getOpenAIClient;

  constructor(options: OpenAIGeneratorOptions = {}) {
    this.model = options.model ?? config.OPENAI_MODEL;
    this.temperature = options.temperature ?? config.LLM_TEMPERATURE;
    this.maxTokens = options.maxTokens ?? config.LLM_MAX_TOKENS;
    this.getClient = options.getOpenAIClient ?? getOpenAIClient;
  }

  async generate(request: GenerationRequest, call?: CapabilityCall): Promise<string> {
    const { client } = await this.getClient();
    const response = await client.chat.completions.create(
      {
        model: this.model,
        temperature: this.temperature,
        max_tokens: this.maxTokens,
        messages: [
          { role: "system", content: LEGAL_ANSWER_SYSTEM_PROMPT },
          { role: "user", content: buildAnswerUserPrompt(request) }
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

    const answer = normalizeCompletionContent(response.choices[0]?.message?.content).trim();
    if (answer.length === 0) {
      throw new Error("Generator returned an empty answer.");
    }
    return answer;
  }
}
