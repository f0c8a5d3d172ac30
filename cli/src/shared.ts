/**
 * Helpers shared by the command modules.
 */

import chalk from "chalk";
import { ConfigError, loadRoutingConfig, type RoutingConfig } from "../../lib/config";
import { EMAIL_TASKS, PROVIDER_NAMES } from "../../lib/llm/types";
import type { EmailTask, ProviderName } from "../../lib/llm/types";
import { getStoredConfig } from "./config.js";

/** Read all of stdin when it is piped; empty string on a TTY */
export async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) return "";
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString();
}

/** Text from the positional argument, falling back to piped stdin */
export async function resolveText(arg: string | undefined): Promise<string> {
  if (arg !== undefined && arg.length > 0) return arg;
  return readStdin();
}

/** Environment plus stored CLI settings, validated */
export function loadCliConfig(): RoutingConfig {
  return loadRoutingConfig(process.env, getStoredConfig());
}

export function parseProviderName(value: string): ProviderName {
  const name = value.trim().toLowerCase();
  const match = PROVIDER_NAMES.find((p) => p === name);
  if (!match) {
    throw new Error(`Unknown provider "${value}" (expected ${PROVIDER_NAMES.join(", ")})`);
  }
  return match;
}

export function parseAnalysisType(value: string): EmailTask {
  const match = EMAIL_TASKS.find((t) => t === value);
  if (!match) {
    throw new Error(`Unknown analysis type "${value}" (expected ${EMAIL_TASKS.join(", ")})`);
  }
  return match;
}

export function handleError(err: unknown): never {
  if (err instanceof ConfigError) {
    console.log(chalk.red("Configuration error:"));
    for (const issue of err.issues) {
      console.log("  " + chalk.dim("•") + " " + issue);
    }
  } else if (err instanceof Error) {
    console.log(chalk.red(`Error: ${err.message}`));
  } else {
    console.log(chalk.red(`Error: ${String(err)}`));
  }
  process.exit(1);
}
