import OpenAI from "openai";
import { config } from "../../config/index.js";
import { LLM_COMPLETION_TIMEOUT_MS } from "../../config/timeouts.js";
import { log } from "../../utils/telemetry.js";

export interface CompletionRequest {
  system: string;
  user: string;
  maxTokens: number;
  temperature: number;
}

/** Returns the model's text, or throws. */
export type CompletionFn = (req: CompletionRequest) => Promise<string>;

export class CompletionTimeoutError extends Error {
  readonly name = "CompletionTimeoutError";

  constructor(readonly timeoutMs: number) {
    super(`Model completion timed out after ${timeoutMs}ms`);
  }
}

/**
 * Chat-completion backed CompletionFn, or undefined when OPENAI_API_KEY is
 * not configured (callers then use their keyword fallbacks).
 */
export function createOpenAICompletion(): CompletionFn | undefined {
  const apiKey = config.llm.openaiApiKey;
  if (!apiKey) {
    log.warn("OPENAI_API_KEY not set; language-model abilities use keyword fallbacks");
    return undefined;
  }
  const model = config.llm.model;
  const client = new OpenAI({ apiKey });

  return async ({ system, user, maxTokens, temperature }) => {
    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), LLM_COMPLETION_TIMEOUT_MS);

    try {
      const response = await client.chat.completions.create(
        {
          model,
          messages: [
            { role: "system", content: system },
            { role: "user", content: user },
          ],
          max_tokens: maxTokens,
          temperature,
        },
        { signal: abortController.signal },
      );
      return response.choices[0]?.message?.content ?? "";
    } catch (error) {
      if (abortController.signal.aborted) {
        throw new CompletionTimeoutError(LLM_COMPLETION_TIMEOUT_MS);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  };
}
