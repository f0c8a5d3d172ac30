/**
 * Score Command
 *
 * mailroute score "text" — Show the complexity factors for a text.
 * No provider is contacted.
 */

import { Command } from "commander";
import chalk from "chalk";
import { scoreComplexity } from "../../../lib/llm/complexity-scorer";
import { handleError, loadCliConfig, resolveText } from "../shared.js";

export function registerScoreCommand(program: Command): void {
  program
    .command("score")
    .description("Score the complexity of a text (reads stdin when no text is given)")
    .argument("[text]", "Text to score")
    .option("--json", "Output raw JSON")
    .action(async (text: string | undefined, opts: { json?: boolean }) => {
      try {
        const config = loadCliConfig();
        const factors = scoreComplexity(await resolveText(text), config);

        if (opts.json) {
          console.log(JSON.stringify(factors, null, 2));
          return;
        }

        console.log();
        console.log(
          chalk.bold("Score ") +
            chalk.cyan(String(factors.score)) +
            chalk.dim(` (threshold ${config.threshold}) `) +
            (factors.isComplex ? chalk.yellow("complex") : chalk.green("simple"))
        );
        console.log();
        const rows: Array<[string, number]> = [
          ["Length", factors.length],
          ["Sentences", factors.sentenceCount],
          ["Questions", factors.questionCount],
          ["Action words", factors.actionWordCount],
          ["Technical terms", factors.technicalTermCount],
          ["Emotional words", factors.emotionalIntensity],
        ];
        for (const [label, value] of rows) {
          console.log("  " + chalk.dim(label.padEnd(18)) + value);
        }
        console.log();
      } catch (err) {
        handleError(err);
      }
    });
}
