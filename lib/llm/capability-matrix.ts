/**
 * Tier Capability Matrix
 *
 * Default provider bindings for every capability tier. Costs are blended
 * input/output estimates in USD per 1k tokens and are only used to order
 * fallbacks and to report cost to the caller; they are not billing data.
 *
 * Several providers bind the same tier. That is what lets the selector
 * fall back across vendors instead of only across tiers.
 */

import type { ModelTier, ProviderBinding, ProviderName } from "./types";

// ─── Default Bindings ───────────────────────────────────────────

export const DEFAULT_BINDINGS: Record<ModelTier, ProviderBinding[]> = {
  // ── Fast / Cheap ──────────────────────────────────────────────
  // Routine mail: check-ins, confirmations, newsletters.
  FAST_CHEAP: [
    {
      provider: "anthropic",
      model: "claude-haiku-4-5-20251001",
      estimatedCostPer1kTokens: 0.003,
      tier: "FAST_CHEAP",
    },
    {
      provider: "openai",
      model: "gpt-5-mini",
      estimatedCostPer1kTokens: 0.0011,
      tier: "FAST_CHEAP",
    },
    {
      provider: "gemini",
      model: "gemini-2.5-flash",
      estimatedCostPer1kTokens: 0.0014,
      tier: "FAST_CHEAP",
    },
  ],

  // ── Balanced ──────────────────────────────────────────────────
  // Never chosen as primary by the threshold; serves as the first
  // cross-provider fallback in both directions.
  BALANCED: [
    {
      provider: "anthropic",
      model: "claude-sonnet-4-5-20250929",
      estimatedCostPer1kTokens: 0.009,
      tier: "BALANCED",
    },
    {
      provider: "openai",
      model: "gpt-5",
      estimatedCostPer1kTokens: 0.0056,
      tier: "BALANCED",
    },
  ],

  // ── High Capability ───────────────────────────────────────────
  // Incidents, escalations, dense technical threads.
  HIGH_CAPABILITY: [
    {
      provider: "anthropic",
      model: "claude-opus-4-6",
      estimatedCostPer1kTokens: 0.045,
      tier: "HIGH_CAPABILITY",
    },
    {
      provider: "openai",
      model: "gpt-5.2",
      estimatedCostPer1kTokens: 0.008,
      tier: "HIGH_CAPABILITY",
    },
    {
      provider: "gemini",
      model: "gemini-2.5-pro",
      estimatedCostPer1kTokens: 0.0056,
      tier: "HIGH_CAPABILITY",
    },
  ],
};

// ─── Tier Walks ─────────────────────────────────────────────────
// Fixed fallback order per primary tier. Simple mail climbs, complex
// mail steps down; neither is re-scored per attempt.

export const TIER_FALLBACK_ORDER: Record<ModelTier, ModelTier[]> = {
  FAST_CHEAP: ["FAST_CHEAP", "BALANCED", "HIGH_CAPABILITY"],
  BALANCED: ["BALANCED", "FAST_CHEAP", "HIGH_CAPABILITY"],
  HIGH_CAPABILITY: ["HIGH_CAPABILITY", "BALANCED", "FAST_CHEAP"],
};

// ─── Helpers ────────────────────────────────────────────────────

/**
 * Human-readable labels for CLI display
 */
export const TIER_LABELS: Record<ModelTier, string> = {
  FAST_CHEAP: "Fast / Cheap",
  BALANCED: "Balanced",
  HIGH_CAPABILITY: "High Capability",
};

export const PROVIDER_LABELS: Record<ProviderName, string> = {
  anthropic: "Anthropic",
  openai: "OpenAI",
  gemini: "Google",
};
