import OpenAI from "openai";
import type { PipelineConfig } from "../../lib/config";
import { RateLimitError } from "./llmRetry";

export type CompletionRequest = {
  prompt: string;
  maxTokens?: number;
  signal?: AbortSignal;
};

/**
 * One chat-completion round trip. Resolves with the reply content (null when the
 * response carried none) and rejects on transport or HTTP failure.
 */
export interface CompletionTransport {
  complete(request: CompletionRequest): Promise<string | null>;
}

type TransportConfig = Pick<
  PipelineConfig,
  "apiKey" | "baseURL" | "model" | "maxTokens" | "temperature" | "requestTimeoutMs" | "simulateRateLimit"
>;

/**
 * Chat-completion transport backed by the OpenAI SDK (pointed at OpenRouter by default).
 * SDK retries are disabled; the orchestrator owns the retry loop.
 */
export function createOpenAITransport(config: TransportConfig): CompletionTransport {
  const client = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL,
    timeout: config.requestTimeoutMs,
    maxRetries: 0,
    defaultHeaders: {
      "X-Title": "Resume Extractor",
    },
  });

  return {
    async complete({ prompt, maxTokens, signal }) {
      // Simulate rate limit for testing if enabled
      if (config.simulateRateLimit) {
        throw new RateLimitError("Simulated rate limit for testing");
      }

      const response = await client.chat.completions.create(
        {
          model: config.model,
          messages: [{ role: "user", content: prompt }],
          max_tokens: maxTokens ?? config.maxTokens,
          temperature: config.temperature,
          stream: false,
        },
        { signal }
      );

      // Some providers answer 200 with an error body and no choices
      if (!Array.isArray(response.choices)) {
        return null;
      }

      return response.choices[0]?.message?.content ?? null;
    },
  };
}
