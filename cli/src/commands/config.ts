/**
 * Config Commands
 *
 * mailroute config set-key <provider> [key] — Store a provider API key
 * mailroute config clear-key <provider>     — Remove a stored key
 * mailroute config set-threshold <n>        — Store the complexity threshold
 * mailroute config set-priority <list>      — Store the provider priority
 * mailroute config show                     — Show the effective configuration
 * mailroute config reset                    — Remove all stored settings
 */

import { Command } from "commander";
import chalk from "chalk";
import { createRoutingConfig, parseProviderPriority } from "../../../lib/config";
import { PROVIDER_LABELS } from "../../../lib/llm/capability-matrix";
import { PROVIDER_NAMES } from "../../../lib/llm/types";
import {
  clearStoredKey,
  getConfigPath,
  getStoredKey,
  resetStoredConfig,
  setStoredKey,
  setStoredPriority,
  setStoredThreshold,
} from "../config.js";
import { handleError, loadCliConfig, parseProviderName, readStdin } from "../shared.js";

const ENV_KEYS = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
  gemini: "GEMINI_API_KEY",
} as const;

export function registerConfigCommands(program: Command): void {
  const cfg = program.command("config").description("Manage stored keys and routing settings");

  cfg
    .command("set-key")
    .description("Save an API key for a provider")
    .argument("<provider>", PROVIDER_NAMES.join(" | "))
    .argument("[key]", "API key (read from stdin when omitted)")
    .action(async (providerArg: string, key?: string) => {
      try {
        const provider = parseProviderName(providerArg);
        const apiKey = (key ?? (await readStdin())).trim();

        if (!apiKey) {
          console.log(chalk.yellow(`Usage: mailroute config set-key ${provider} <api-key>`));
          process.exit(1);
        }

        setStoredKey(provider, apiKey);
        console.log(chalk.green("✓") + ` ${PROVIDER_LABELS[provider]} API key saved`);
        console.log(chalk.dim(`  Config: ${getConfigPath()}`));
      } catch (err) {
        handleError(err);
      }
    });

  cfg
    .command("clear-key")
    .description("Remove a stored API key")
    .argument("<provider>", PROVIDER_NAMES.join(" | "))
    .action((providerArg: string) => {
      try {
        const provider = parseProviderName(providerArg);
        clearStoredKey(provider);
        console.log(chalk.green("✓") + ` ${PROVIDER_LABELS[provider]} API key removed`);
      } catch (err) {
        handleError(err);
      }
    });

  cfg
    .command("set-threshold")
    .description("Save the complexity threshold")
    .argument("<threshold>", "Non-negative number")
    .action((value: string) => {
      try {
        // Validate through the same schema the router uses
        const { threshold } = createRoutingConfig({ threshold: Number(value) });
        setStoredThreshold(threshold);
        console.log(chalk.green("✓") + ` Threshold set to ${threshold}`);
      } catch (err) {
        handleError(err);
      }
    });

  cfg
    .command("set-priority")
    .description("Save the provider priority, e.g. openai,anthropic")
    .argument("<providers>", "Comma-separated provider names")
    .action((value: string) => {
      try {
        const { providerPriority } = createRoutingConfig({
          providerPriority: parseProviderPriority(value),
        });
        setStoredPriority([...providerPriority]);
        console.log(chalk.green("✓") + ` Priority set to ${providerPriority.join(", ")}`);
      } catch (err) {
        handleError(err);
      }
    });

  cfg
    .command("show")
    .description("Show the effective configuration (environment overrides stored values)")
    .action(() => {
      try {
        const config = loadCliConfig();

        console.log();
        console.log(chalk.bold("mailroute"));
        console.log();
        for (const name of PROVIDER_NAMES) {
          const source = process.env[ENV_KEYS[name]]?.trim()
            ? "env"
            : getStoredKey(name)
              ? "stored"
              : null;
          console.log(
            "  " +
              PROVIDER_LABELS[name].padEnd(12) +
              (source ? chalk.green(maskKey(config.credentials[name])) + chalk.dim(` (${source})`) : chalk.dim("not set"))
          );
        }
        console.log();
        console.log("  Threshold".padEnd(14) + config.threshold);
        console.log("  Priority".padEnd(14) + config.providerPriority.join(", "));
        console.log("  Timeout".padEnd(14) + `${config.timeoutMs}ms`);
        console.log("  Candidates".padEnd(14) + config.maxCandidates);
        console.log();
        console.log(chalk.dim(`  Config: ${getConfigPath()}`));
        console.log();
      } catch (err) {
        handleError(err);
      }
    });

  cfg
    .command("reset")
    .description("Remove all stored settings")
    .action(() => {
      resetStoredConfig();
      console.log(chalk.green("✓") + " Stored settings removed");
    });
}

function maskKey(key: string | undefined): string {
  if (!key) return "";
  return key.length <= 8 ? "****" : `${key.slice(0, 4)}...${key.slice(-4)}`;
}
