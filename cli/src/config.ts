/**
 * CLI Configuration Store
 *
 * Persists provider API keys and routing preferences using `conf`
 * (XDG-compliant). Config is stored at ~/.config/mailroute-cli/config.json
 *
 * Environment variables always win over stored values; see
 * loadRoutingConfig in lib/config.ts.
 */

import Conf from "conf";
import type { RoutingConfigInput } from "../../lib/config";
import type { ProviderName } from "../../lib/llm/types";

interface CliConfig {
  credentials: Partial<Record<ProviderName, string>>;
  threshold?: number;
  providerPriority?: ProviderName[];
}

const config = new Conf<CliConfig>({
  projectName: "mailroute-cli",
  defaults: {
    credentials: {},
  },
});

export function getStoredKey(provider: ProviderName): string | undefined {
  return config.get("credentials")[provider];
}

export function setStoredKey(provider: ProviderName, key: string): void {
  config.set("credentials", { ...config.get("credentials"), [provider]: key });
}

export function clearStoredKey(provider: ProviderName): void {
  const { [provider]: _removed, ...rest } = config.get("credentials");
  config.set("credentials", rest);
}

export function setStoredThreshold(threshold: number): void {
  config.set("threshold", threshold);
}

export function setStoredPriority(priority: ProviderName[]): void {
  config.set("providerPriority", priority);
}

export function resetStoredConfig(): void {
  config.clear();
}

/** Stored values shaped as overrides for loadRoutingConfig */
export function getStoredConfig(): RoutingConfigInput {
  return {
    credentials: config.get("credentials"),
    threshold: config.get("threshold"),
    providerPriority: config.get("providerPriority"),
  };
}

export function getConfigPath(): string {
  return config.path;
}
