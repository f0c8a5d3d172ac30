/**
 * MockProvider - Deterministic LLM simulator for testing and development
 * No external API calls, same prompt produces same output.
 *
 * Each call consumes the next step of its script (falling back to
 * `defaultStep` once the script runs out), so tests can force any
 * candidate in a fallback chain to fail in a specific way.
 */

import type { AnalysisProvider, CompletionOptions } from "./types";
import type {
  CompletionRequest,
  CompletionResult,
  ProviderErrorKind,
  ProviderName,
} from "../llm/types";
import { ProviderError } from "../llm/provider-error";

export type MockStep =
  | { type: "ok"; text?: string }
  | { type: "fail"; kind: ProviderErrorKind; message?: string }
  /** Resolves with empty text, which the dispatcher rejects */
  | { type: "malformed" }
  /** Never settles until the call is aborted */
  | { type: "hang" };

export interface MockProviderOptions {
  script?: MockStep[];
  defaultStep?: MockStep;
  delayMs?: number;
}

export class MockProvider implements AnalysisProvider {
  readonly name: ProviderName;
  readonly calls: CompletionRequest[] = [];
  private readonly script: MockStep[];
  private readonly defaultStep: MockStep;
  private readonly delayMs: number;

  constructor(name: ProviderName, options: MockProviderOptions = {}) {
    this.name = name;
    this.script = [...(options.script ?? [])];
    this.defaultStep = options.defaultStep ?? { type: "ok" };
    this.delayMs = options.delayMs ?? 0;
  }

  async complete(
    request: CompletionRequest,
    options: CompletionOptions
  ): Promise<CompletionResult> {
    const step = this.script[this.calls.length] ?? this.defaultStep;
    this.calls.push(request);

    if (step.type === "hang") {
      await this.waitForAbort(options.signal);
    }
    await this.delay(this.delayMs, options.signal);

    switch (step.type) {
      case "fail":
        throw new ProviderError(step.kind, step.message ?? `mock ${step.kind}`, {
          provider: this.name,
        });
      case "malformed":
        return { text: "" };
      default: {
        const text = step.type === "ok" && step.text ? step.text : this.generateResponse(request);
        const promptTokens = Math.ceil(request.prompt.length / 4);
        const completionTokens = Math.ceil(text.length / 4);
        return {
          text,
          finishReason: "stop",
          tokenUsage: {
            promptTokens,
            completionTokens,
            totalTokens: promptTokens + completionTokens,
          },
        };
      }
    }
  }

  /**
   * Generate deterministic response based on prompt content
   */
  private generateResponse(request: CompletionRequest): string {
    const hash = this.simpleHash(request.prompt);
    return `Mock analysis from ${this.name}/${request.model} for prompt hash ${hash}.`;
  }

  /**
   * Simple hash function for deterministic output
   */
  private simpleHash(str: string): number {
    let hash = 0;
    for (let i = 0; i < str.length; i++) {
      const char = str.charCodeAt(i);
      hash = (hash << 5) - hash + char;
      hash = hash & hash; // Convert to 32-bit integer
    }
    return Math.abs(hash);
  }

  private delay(ms: number, signal: AbortSignal): Promise<void> {
    if (ms <= 0) {
      return signal.aborted ? Promise.reject(abortError()) : Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(abortError());
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(abortError());
      };
      const timer = setTimeout(() => {
        signal.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }

  private waitForAbort(signal: AbortSignal): Promise<never> {
    return new Promise((_, reject) => {
      if (signal.aborted) {
        reject(abortError());
        return;
      }
      signal.addEventListener("abort", () => reject(abortError()), { once: true });
    });
  }
}

function abortError(): Error {
  const err = new Error("Request aborted");
  err.name = "AbortError";
  return err;
}
