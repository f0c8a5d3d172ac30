/**
 * Score → candidate chain selection
 *
 * One threshold splits scores into simple and complex. Simple mail starts
 * on FAST_CHEAP, complex mail on HIGH_CAPABILITY; the rest of the chain is a
 * fixed walk over the other tiers that prefers a new provider at each step,
 * so a single vendor outage never takes the whole chain down.
 */

import type { RoutingConfig } from "../config";
import { TIER_FALLBACK_ORDER } from "../llm/capability-matrix";
import type {
  ModelTier,
  PromptKind,
  ProviderBinding,
  ProviderName,
  RoutingDecision,
} from "../llm/types";

export type SelectorConfig = Pick<
  RoutingConfig,
  "threshold" | "providerPriority" | "credentials" | "bindings" | "maxCandidates"
>;

export function primaryTierFor(score: number, threshold: number): ModelTier {
  return score > threshold ? "HIGH_CAPABILITY" : "FAST_CHEAP";
}

/**
 * Bindings of a tier whose provider is listed and holds a credential,
 * ordered by provider priority.
 */
function eligibleBindings(tier: ModelTier, config: SelectorConfig): ProviderBinding[] {
  const rank = new Map<ProviderName, number>(
    config.providerPriority.map((provider, i) => [provider, i])
  );

  return config.bindings[tier]
    .filter((binding) => rank.has(binding.provider) && Boolean(config.credentials[binding.provider]))
    .sort((a, b) => (rank.get(a.provider) ?? 0) - (rank.get(b.provider) ?? 0));
}

export function selectCandidates(
  score: number,
  analysisType: PromptKind,
  config: SelectorConfig
): RoutingDecision {
  const primaryTier = primaryTierFor(score, config.threshold);
  const tierWalk = TIER_FALLBACK_ORDER[primaryTier];
  const limit = config.maxCandidates;

  const chain: ProviderBinding[] = [];
  const usedProviders = new Set<ProviderName>();

  // Pass 1: one binding per tier, each from a provider not yet in the chain
  for (const tier of tierWalk) {
    if (chain.length >= limit) break;
    const pick = eligibleBindings(tier, config).find((b) => !usedProviders.has(b.provider));
    if (pick) {
      chain.push(pick);
      usedProviders.add(pick.provider);
    }
  }

  // Pass 2: fill remaining slots with the cheapest leftovers
  const leftovers = tierWalk
    .flatMap((tier) => eligibleBindings(tier, config))
    .filter((binding) => !chain.includes(binding))
    .map((binding, order) => ({ binding, order }))
    .sort(
      (a, b) =>
        a.binding.estimatedCostPer1kTokens - b.binding.estimatedCostPer1kTokens ||
        a.order - b.order
    );

  for (const { binding } of leftovers) {
    if (chain.length >= limit) break;
    chain.push(binding);
  }

  return {
    score,
    primaryTier,
    analysisType,
    candidates: chain,
  };
}
