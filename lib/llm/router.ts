/**
 * Provider registry - maps provider names to their implementations
 */

import type { RoutingConfig } from "../config";
import type { AnalysisProvider, ProviderRegistry } from "../providers/types";
import type { ProviderName } from "./types";
import { AnthropicProvider } from "./providers/anthropic";
import { OpenAIProvider } from "./providers/openai";
import { GeminiProvider } from "./providers/gemini";

export function createProvider(name: ProviderName, apiKey: string): AnalysisProvider {
  switch (name) {
    case "anthropic":
      return new AnthropicProvider(apiKey);
    case "openai":
      return new OpenAIProvider(apiKey);
    case "gemini":
      return new GeminiProvider(apiKey);
  }
}

/**
 * One client per provider that holds a credential. Clients are shared by
 * every request; they carry no per-request state.
 */
export function createProviderRegistry(config: RoutingConfig): ProviderRegistry {
  const registry = new Map<ProviderName, AnalysisProvider>();
  for (const name of config.providerPriority) {
    const apiKey = config.credentials[name];
    if (apiKey) {
      registry.set(name, createProvider(name, apiKey));
    }
  }
  return registry;
}
