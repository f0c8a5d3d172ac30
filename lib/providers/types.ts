/**
 * Provider interface for LLM providers
 *
 * One capability for every vendor: take a rendered prompt, return text or
 * throw a ProviderError. The dispatcher and the fallback controller only
 * ever see this interface.
 */

import type { CompletionRequest, CompletionResult, ProviderName } from "../llm/types";

export interface CompletionOptions {
  /** Aborted on timeout or caller cancellation */
  signal: AbortSignal;
  timeoutMs: number;
}

export interface AnalysisProvider {
  readonly name: ProviderName;
  complete(request: CompletionRequest, options: CompletionOptions): Promise<CompletionResult>;
}

export type ProviderRegistry = ReadonlyMap<ProviderName, AnalysisProvider>;
