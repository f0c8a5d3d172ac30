/**
 * Anthropic provider implementation
 */

import Anthropic from "@anthropic-ai/sdk";
import type { AnalysisProvider, CompletionOptions } from "../../providers/types";
import type { CompletionRequest, CompletionResult } from "../types";
import { ProviderError, toProviderError } from "../provider-error";
import { reportInfo } from "../../errors";

export class AnthropicProvider implements AnalysisProvider {
  readonly name = "anthropic" as const;
  private readonly client: Anthropic;

  constructor(apiKey: string) {
    // One attempt per candidate; the fallback chain replaces SDK retries
    this.client = new Anthropic({ apiKey, maxRetries: 0 });
  }

  async complete(
    request: CompletionRequest,
    options: CompletionOptions
  ): Promise<CompletionResult> {
    const startTime = Date.now();

    try {
      const message = await this.client.messages.create(
        {
          model: request.model,
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          system: request.system,
          messages: [{ role: "user", content: request.prompt }],
        },
        { signal: options.signal, timeout: options.timeoutMs }
      );

      const text = message.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("");

      reportInfo("Anthropic response", {
        context: "provider",
        provider: this.name,
        model: request.model,
        textLength: text.length,
        latencyMs: Date.now() - startTime,
        stopReason: message.stop_reason,
      });

      return {
        text,
        finishReason: message.stop_reason ?? undefined,
        tokenUsage: {
          promptTokens: message.usage.input_tokens,
          completionTokens: message.usage.output_tokens,
          totalTokens: message.usage.input_tokens + message.usage.output_tokens,
        },
      };
    } catch (err) {
      if (err instanceof Anthropic.APIConnectionTimeoutError) {
        throw new ProviderError("Timeout", err.message, { provider: this.name, cause: err });
      }
      throw toProviderError(err, this.name);
    }
  }
}
