/**
 * Route Command
 *
 * mailroute route "text" — Show which models would be tried, in order,
 * without dispatching anything.
 */

import { Command } from "commander";
import chalk from "chalk";
import { PROVIDER_LABELS, TIER_LABELS } from "../../../lib/llm/capability-matrix";
import { scoreComplexity } from "../../../lib/llm/complexity-scorer";
import { selectCandidates } from "../../../lib/routing/model-selector";
import { formatCost, getFriendlyModelName } from "../../../lib/models";
import { handleError, loadCliConfig, parseAnalysisType, resolveText } from "../shared.js";

export function registerRouteCommand(program: Command): void {
  program
    .command("route")
    .description("Preview the fallback chain for a text")
    .argument("[text]", "Text to route")
    .option("-t, --type <type>", "Analysis type", "summary")
    .option("--json", "Output raw JSON")
    .action(async (text: string | undefined, opts: { type: string; json?: boolean }) => {
      try {
        const config = loadCliConfig();
        const analysisType = parseAnalysisType(opts.type);
        const { score } = scoreComplexity(await resolveText(text), config);
        const decision = selectCandidates(score, analysisType, config);

        if (opts.json) {
          console.log(JSON.stringify(decision, null, 2));
          return;
        }

        console.log();
        console.log(
          chalk.bold("Score ") +
            chalk.cyan(String(decision.score)) +
            chalk.dim(" → ") +
            chalk.bold(TIER_LABELS[decision.primaryTier])
        );
        console.log();

        if (decision.candidates.length === 0) {
          console.log(
            chalk.yellow("No providers configured.") +
              " Run " +
              chalk.bold("mailroute config set-key <provider>") +
              " or set an API key in the environment."
          );
          console.log();
          return;
        }

        decision.candidates.forEach((binding, i) => {
          console.log(
            "  " +
              chalk.dim(`${i + 1}.`) +
              " " +
              chalk.bold(getFriendlyModelName(binding.model).padEnd(20)) +
              PROVIDER_LABELS[binding.provider].padEnd(11) +
              TIER_LABELS[binding.tier].padEnd(18) +
              chalk.dim(formatCost(binding.estimatedCostPer1kTokens))
          );
        });
        console.log();
      } catch (err) {
        handleError(err);
      }
    });
}
