/**
 * Provider Dispatcher
 *
 * Executes one candidate: renders the prompt for the analysis type, calls
 * the bound provider under a hard timeout and validates the response.
 * Every failure leaves here as a ProviderError.
 */

import { z } from "zod";
import type { ProviderRegistry } from "../providers/types";
import { buildPrompt } from "../llm/prompts";
import { ProviderError, isProviderError, toProviderError } from "../llm/provider-error";
import type { CompletionResult, ProviderBinding } from "../llm/types";
import type { DispatchRequest } from "./types";

const CompletionResultSchema = z.object({
  text: z.string().refine((text) => text.trim().length > 0, {
    message: "provider returned empty content",
  }),
  finishReason: z.string().optional(),
  tokenUsage: z
    .object({
      promptTokens: z.number().nonnegative(),
      completionTokens: z.number().nonnegative(),
      totalTokens: z.number().nonnegative(),
    })
    .optional(),
});

export class ProviderDispatcher {
  constructor(
    private readonly providers: ProviderRegistry,
    private readonly timeoutMs: number
  ) {}

  async dispatch(
    binding: ProviderBinding,
    request: DispatchRequest,
    signal?: AbortSignal
  ): Promise<CompletionResult> {
    const provider = this.providers.get(binding.provider);
    if (!provider) {
      throw new ProviderError(
        "AuthenticationFailed",
        `No credential configured for provider "${binding.provider}"`,
        { provider: binding.provider }
      );
    }
    if (signal?.aborted) {
      throw new ProviderError("Unavailable", "Request cancelled by caller", {
        provider: binding.provider,
      });
    }

    const spec = buildPrompt(request.analysisType, request.text, {
      instructions: request.instructions,
      tone: request.tone,
    });
    const controller = new AbortController();
    const onCallerAbort = () => controller.abort();
    signal?.addEventListener("abort", onCallerAbort, { once: true });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new ProviderError("Timeout", `No response within ${this.timeoutMs}ms`, {
          provider: binding.provider,
        });
        controller.abort(error);
        reject(error);
      }, this.timeoutMs);
    });

    try {
      const raw = await Promise.race([
        provider.complete(
          {
            model: binding.model,
            system: spec.system,
            prompt: spec.prompt,
            maxTokens: spec.maxTokens,
            temperature: spec.temperature,
          },
          { signal: controller.signal, timeoutMs: this.timeoutMs }
        ),
        timeout,
      ]);

      const parsed = CompletionResultSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ProviderError(
          "MalformedResponse",
          parsed.error.issues.map((issue) => issue.message).join("; "),
          { provider: binding.provider }
        );
      }
      return { ...parsed.data, text: parsed.data.text.trim() };
    } catch (err) {
      // The timer aborts with its own Timeout error as the reason
      const reason: unknown = controller.signal.reason;
      if (isProviderError(reason) && reason.kind === "Timeout") {
        throw reason;
      }
      if (signal?.aborted) {
        throw new ProviderError("Unavailable", "Request cancelled by caller", {
          provider: binding.provider,
          cause: err,
        });
      }
      throw toProviderError(err, binding.provider);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onCallerAbort);
    }
  }
}
