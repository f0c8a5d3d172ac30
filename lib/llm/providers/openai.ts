/**
 * OpenAI provider implementation
 */

import OpenAI from "openai";
import type { AnalysisProvider, CompletionOptions } from "../../providers/types";
import type { CompletionRequest, CompletionResult } from "../types";
import { ProviderError, toProviderError } from "../provider-error";
import { reportInfo } from "../../errors";

export class OpenAIProvider implements AnalysisProvider {
  readonly name = "openai" as const;
  private readonly client: OpenAI;

  constructor(apiKey: string) {
    this.client = new OpenAI({ apiKey, maxRetries: 0 });
  }

  async complete(
    request: CompletionRequest,
    options: CompletionOptions
  ): Promise<CompletionResult> {
    const startTime = Date.now();

    try {
      const completion = await this.client.chat.completions.create(
        {
          model: request.model,
          messages: [
            { role: "system", content: request.system },
            { role: "user", content: request.prompt },
          ],
          // GPT-5 models only support temperature of 1 (default)
          max_completion_tokens: request.maxTokens,
        },
        { signal: options.signal, timeout: options.timeoutMs }
      );

      const choice = completion.choices[0];
      const text = choice?.message?.content ?? "";

      reportInfo("OpenAI response", {
        context: "provider",
        provider: this.name,
        model: request.model,
        textLength: text.length,
        latencyMs: Date.now() - startTime,
        finishReason: choice?.finish_reason,
        refusal: choice?.message?.refusal ?? null,
      });

      return {
        text,
        finishReason: choice?.finish_reason || undefined,
        tokenUsage: completion.usage
          ? {
              promptTokens: completion.usage.prompt_tokens,
              completionTokens: completion.usage.completion_tokens,
              totalTokens: completion.usage.total_tokens,
            }
          : undefined,
      };
    } catch (err) {
      throw classifyOpenAIError(err);
    }
  }
}

/**
 * Timeout errors carry no HTTP status, so they are checked by class first.
 */
export function classifyOpenAIError(err: unknown): ProviderError {
  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return new ProviderError("Timeout", err.message, { provider: "openai", cause: err });
  }
  if (err instanceof OpenAI.APIConnectionError) {
    return new ProviderError("Unavailable", err.message, { provider: "openai", cause: err });
  }
  return toProviderError(err, "openai");
}
