import Anthropic from "@anthropic-ai/sdk";
import { config } from "../config";

/** The external LLM capability: prompt text in, free-form text out */
export type TextCompletion = (prompt: string) => Promise<string>;

let client: Anthropic | null = null;

function getClient(): Anthropic | null {
  if (!config.anthropicApiKey) return null;
  if (!client) {
    // Retries happen in withRetry: one limiter permit per HTTP request
    client = new Anthropic({ apiKey: config.anthropicApiKey, maxRetries: 0 });
  }
  return client;
}

export interface CompletionOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export function createAnthropicCompletion(options: CompletionOptions = {}): TextCompletion {
  const anthropic = getClient();
  if (!anthropic) {
    throw new Error("ANTHROPIC_API_KEY is not set");
  }

  const model = options.model ?? config.llmModel;
  const maxTokens = options.maxTokens ?? config.llmMaxTokens;
  const temperature = options.temperature ?? config.llmTemperature;

  return async (prompt) => {
    // Errors propagate; the dispatcher decides whether to retry
    const response = await anthropic.messages.create({
      model,
      max_tokens: maxTokens,
      temperature,
      messages: [{ role: "user", content: prompt }],
    });

    return response.content
      .filter((block): block is Anthropic.TextBlock => block.type === "text")
      .map((block) => block.text)
      .join("");
  };
}
