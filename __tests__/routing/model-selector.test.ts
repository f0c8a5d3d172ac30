/**
 * Tests for score → fallback chain selection
 */

import { describe, expect, it } from "vitest";
import { createRoutingConfig, type RoutingConfigInput } from "@/lib/config";
import { bindingId, type ProviderName } from "@/lib/llm/types";
import { primaryTierFor, selectCandidates } from "@/lib/routing/model-selector";

const ALL_KEYS = { anthropic: "test-key-a", openai: "test-key-o", gemini: "test-key-g" };

function chain(
  score: number,
  credentials: Partial<Record<ProviderName, string>>,
  overrides: RoutingConfigInput = {}
) {
  const config = createRoutingConfig({ credentials, ...overrides });
  return selectCandidates(score, "summary", config).candidates.map(bindingId);
}

describe("primaryTierFor", () => {
  it("splits on the threshold, which counts as simple", () => {
    expect(primaryTierFor(6.55, 100)).toBe("FAST_CHEAP");
    expect(primaryTierFor(100, 100)).toBe("FAST_CHEAP");
    expect(primaryTierFor(100.01, 100)).toBe("HIGH_CAPABILITY");
  });
});

describe("selectCandidates", () => {
  it("starts simple mail on the fast tier and spreads across providers", () => {
    expect(chain(6.55, ALL_KEYS)).toEqual([
      "anthropic/claude-haiku-4-5-20251001",
      "openai/gpt-5",
      "gemini/gemini-2.5-pro",
    ]);
  });

  it("starts complex mail on the high-capability tier", () => {
    expect(chain(116.15, ALL_KEYS)).toEqual([
      "anthropic/claude-opus-4-6",
      "openai/gpt-5",
      "gemini/gemini-2.5-flash",
    ]);
  });

  it("reports the score, primary tier and analysis type", () => {
    const config = createRoutingConfig({ credentials: ALL_KEYS });
    const decision = selectCandidates(116.15, "action_items", config);
    expect(decision.score).toBe(116.15);
    expect(decision.primaryTier).toBe("HIGH_CAPABILITY");
    expect(decision.analysisType).toBe("action_items");
    expect(decision.candidates[0].tier).toBe("HIGH_CAPABILITY");
  });

  it("fills from a single provider when only one is configured", () => {
    expect(chain(10, { openai: "test-key-o" })).toEqual([
      "openai/gpt-5-mini",
      "openai/gpt-5",
      "openai/gpt-5.2",
    ]);
  });

  it("fills leftover slots cheapest first", () => {
    expect(chain(500, { anthropic: "test-key-a" })).toEqual([
      "anthropic/claude-opus-4-6",
      "anthropic/claude-haiku-4-5-20251001",
      "anthropic/claude-sonnet-4-5-20250929",
    ]);
  });

  it("skips tiers with no eligible provider", () => {
    expect(chain(10, { anthropic: "test-key-a", gemini: "test-key-g" })).toEqual([
      "anthropic/claude-haiku-4-5-20251001",
      "gemini/gemini-2.5-pro",
      "gemini/gemini-2.5-flash",
    ]);
  });

  it("follows the provider priority", () => {
    expect(chain(10, ALL_KEYS, { providerPriority: ["gemini", "openai", "anthropic"] })).toEqual([
      "gemini/gemini-2.5-flash",
      "openai/gpt-5",
      "anthropic/claude-opus-4-6",
    ]);
  });

  it("leaves out providers missing from the priority list", () => {
    const ids = chain(10, ALL_KEYS, { providerPriority: ["openai"] });
    expect(ids.every((id) => id.startsWith("openai/"))).toBe(true);
  });

  it("respects maxCandidates", () => {
    expect(chain(10, ALL_KEYS, { maxCandidates: 1 })).toEqual([
      "anthropic/claude-haiku-4-5-20251001",
    ]);
    expect(chain(10, ALL_KEYS, { maxCandidates: 8 })).toHaveLength(8);
  });

  it("returns an empty chain when no provider holds a credential", () => {
    const decision = selectCandidates(10, "summary", createRoutingConfig());
    expect(decision.candidates).toEqual([]);
    expect(decision.primaryTier).toBe("FAST_CHEAP");
  });

  it("never repeats a binding", () => {
    const ids = chain(10, ALL_KEYS, { maxCandidates: 10 });
    expect(new Set(ids).size).toBe(ids.length);
    expect(ids).toHaveLength(8);
  });

  it("is deterministic", () => {
    expect(chain(42, ALL_KEYS)).toEqual(chain(42, ALL_KEYS));
  });
});
