/**
 * Result Normalizer
 *
 * Wraps the controller's terminal state and the complexity measurement into
 * the one record callers ever see. The schema mirrors AnalysisResult so the
 * content/error invariant can be checked at runtime as well.
 */

import { z } from "zod";
import type {
  AnalysisErrorKind,
  AnalysisResult,
  ComplexityFactors,
} from "../llm/types";
import { bindingId } from "../llm/types";
import type { FallbackOutcome } from "./types";

// ─── Schema ─────────────────────────────────────────────────────

const TierSchema = z.enum(["FAST_CHEAP", "BALANCED", "HIGH_CAPABILITY"]);
const ProviderSchema = z.enum(["anthropic", "openai", "gemini"]);

const ComplexitySchema = z.object({
  length: z.number().int().nonnegative(),
  sentenceCount: z.number().int().nonnegative(),
  questionCount: z.number().int().nonnegative(),
  actionWordCount: z.number().int().nonnegative(),
  technicalTermCount: z.number().int().nonnegative(),
  emotionalIntensity: z.number().int().nonnegative(),
  score: z.number().nonnegative(),
  isComplex: z.boolean(),
});

const AttemptSchema = z.object({
  model: z.string(),
  provider: ProviderSchema,
  tier: TierSchema,
  ok: z.boolean(),
  errorKind: z
    .enum(["AuthenticationFailed", "RateLimited", "Timeout", "MalformedResponse", "Unavailable"])
    .optional(),
  message: z.string().optional(),
  cancelled: z.boolean().optional(),
  latencyMs: z.number().nonnegative(),
});

export const AnalysisResultSchema = z
  .object({
    success: z.boolean(),
    content: z.string().nullable(),
    modelUsed: z.string().nullable(),
    provider: ProviderSchema.nullable(),
    tier: TierSchema.nullable(),
    complexity: ComplexitySchema,
    fallbackUsed: z.boolean(),
    error: z.enum(["AllProvidersExhausted", "Cancelled"]).nullable(),
    attempts: z.array(AttemptSchema),
    costOptimized: z.boolean(),
    latencyMs: z.number().nonnegative(),
  })
  .refine((r) => (r.content === null) !== (r.error === null), {
    message: "exactly one of content or error must be set",
  })
  .refine((r) => r.success === (r.content !== null), {
    message: "success must match the presence of content",
  });

/**
 * Safe validation that returns success/error result
 */
export function safeValidateAnalysisResult(
  data: unknown
): { success: true; data: AnalysisResult } | { success: false; error: string } {
  const result = AnalysisResultSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error.message };
}

// ─── Normalizer ─────────────────────────────────────────────────

function terminalError(outcome: FallbackOutcome): AnalysisErrorKind | null {
  switch (outcome.state.status) {
    case "SUCCEEDED":
      return null;
    case "CANCELLED":
      return "Cancelled";
    case "EXHAUSTED":
      return "AllProvidersExhausted";
  }
}

export function normalizeResult(
  outcome: FallbackOutcome,
  complexity: ComplexityFactors,
  latencyMs: number
): AnalysisResult {
  const succeeded =
    outcome.state.status === "SUCCEEDED" && outcome.content !== null && outcome.binding !== null;
  const binding = succeeded ? outcome.binding : null;

  return Object.freeze({
    success: succeeded,
    content: succeeded ? outcome.content : null,
    modelUsed: binding ? bindingId(binding) : null,
    provider: binding?.provider ?? null,
    tier: binding?.tier ?? null,
    complexity: Object.freeze({ ...complexity }),
    fallbackUsed: outcome.state.status === "SUCCEEDED" && outcome.state.index > 0,
    error: succeeded ? null : terminalError(outcome) ?? "AllProvidersExhausted",
    attempts: Object.freeze(outcome.attempts.map((a) => Object.freeze({ ...a }))),
    costOptimized: binding?.tier === "FAST_CHEAP",
    latencyMs: Math.max(0, latencyMs),
  });
}
