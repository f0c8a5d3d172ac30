/**
 * Model Display Utilities
 *
 * Friendly names and user-facing messages for analysis results.
 * Used by the CLI and by any UI that surfaces which model served a request.
 */

import { PROVIDER_LABELS, TIER_LABELS } from "./llm/capability-matrix";
import type { AnalysisErrorKind, AnalysisResult, ProviderErrorKind } from "./llm/types";

const MODEL_LABELS: Record<string, string> = {
  "claude-haiku-4-5-20251001": "Claude Haiku 4.5",
  "claude-sonnet-4-5-20250929": "Claude Sonnet 4.5",
  "claude-opus-4-6": "Claude Opus 4.6",
  "gpt-5-mini": "GPT-5 Mini",
  "gpt-5": "GPT-5",
  "gpt-5.2": "GPT-5.2",
  "gemini-2.5-flash": "Gemini 2.5 Flash",
  "gemini-2.5-pro": "Gemini 2.5 Pro",
};

/** Get user-friendly model name from "provider/model" or a bare model ID */
export function getFriendlyModelName(modelId: string): string {
  const model = modelId.includes("/") ? modelId.slice(modelId.indexOf("/") + 1) : modelId;
  return MODEL_LABELS[model] || model;
}

/** Map a terminal analysis error to the message shown to end users */
export function describeAnalysisError(error: AnalysisErrorKind | null): string {
  switch (error) {
    case "AllProvidersExhausted":
      return "Analysis unavailable right now. Please try again in a few minutes.";
    case "Cancelled":
      return "Analysis was cancelled.";
    default:
      return "Unexpected error. Please try again.";
  }
}

/** Short operator-facing description of a per-provider failure */
export function describeProviderError(kind: ProviderErrorKind): string {
  switch (kind) {
    case "AuthenticationFailed":
      return "Credential missing or rejected. Check the API key.";
    case "RateLimited":
      return "Provider quota exhausted.";
    case "Timeout":
      return "Provider timed out.";
    case "MalformedResponse":
      return "Provider returned unusable content.";
    case "Unavailable":
      return "Provider unreachable.";
  }
}

/** One-line transparency summary: which model served the request and why */
export function describeServedBy(result: AnalysisResult): string {
  if (!result.success || !result.modelUsed || !result.provider || !result.tier) {
    return describeAnalysisError(result.error);
  }
  const parts = [
    `${getFriendlyModelName(result.modelUsed)} (${PROVIDER_LABELS[result.provider]}, ${TIER_LABELS[result.tier]})`,
  ];
  if (result.fallbackUsed) parts.push(`after ${result.attempts.length - 1} failed attempt(s)`);
  return parts.join(" ");
}

/** Format an estimated per-1k-token cost for display */
export function formatCost(costPer1k: number): string {
  return `$${costPer1k.toFixed(4)}/1k tok`;
}
