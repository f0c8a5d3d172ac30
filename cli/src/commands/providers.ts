/**
 * Providers Command
 *
 * mailroute providers — List model bindings per tier and whether each
 * provider has a credential.
 */

import { Command } from "commander";
import chalk from "chalk";
import { PROVIDER_LABELS, TIER_LABELS } from "../../../lib/llm/capability-matrix";
import { MODEL_TIERS, PROVIDER_NAMES } from "../../../lib/llm/types";
import { formatCost, getFriendlyModelName } from "../../../lib/models";
import { handleError, loadCliConfig } from "../shared.js";

export function registerProvidersCommand(program: Command): void {
  program
    .command("providers")
    .description("List providers, their credential status, and model bindings")
    .option("--json", "Output raw JSON")
    .action((opts: { json?: boolean }) => {
      try {
        const config = loadCliConfig();
        const status = PROVIDER_NAMES.map((name) => ({
          provider: name,
          configured: Boolean(config.credentials[name]),
          priority: config.providerPriority.indexOf(name),
        }));

        if (opts.json) {
          console.log(JSON.stringify({ providers: status, bindings: config.bindings }, null, 2));
          return;
        }

        console.log();
        console.log(chalk.bold("Providers"));
        console.log();
        for (const s of status) {
          const mark = s.configured ? chalk.green("✓") : chalk.dim("·");
          const note =
            s.priority < 0 ? chalk.dim("not in priority list") : chalk.dim(`priority ${s.priority + 1}`);
          console.log(`  ${mark} ${PROVIDER_LABELS[s.provider].padEnd(12)}${note}`);
        }

        for (const tier of MODEL_TIERS) {
          console.log();
          console.log("  " + chalk.dim(TIER_LABELS[tier]));
          for (const binding of config.bindings[tier]) {
            console.log(
              "    " +
                chalk.bold(getFriendlyModelName(binding.model).padEnd(20)) +
                PROVIDER_LABELS[binding.provider].padEnd(11) +
                chalk.dim(formatCost(binding.estimatedCostPer1kTokens))
            );
          }
        }
        console.log();
      } catch (err) {
        handleError(err);
      }
    });
}
