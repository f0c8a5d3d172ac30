/**
 * Analyze Commands
 *
 * mailroute analyze "email body" -t action_items --subject "..."
 * mailroute analyze "email body" -t draft_reply --tone friendly
 * mailroute digest emails.json
 *
 * Runs the full routing pipeline against the configured providers.
 * Ctrl-C cancels the request; no further fallback attempts are made.
 */

import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import * as fs from "fs";
import { z } from "zod";
import { setReportingSilenced } from "../../../lib/errors";
import { HybridAnalyzer } from "../../../lib/llm/hybrid-analyzer";
import type { AnalysisResult, EmailInput, EmailTask } from "../../../lib/llm/types";
import { describeProviderError, describeServedBy } from "../../../lib/models";
import { handleError, loadCliConfig, parseAnalysisType, resolveText } from "../shared.js";

const EmailListSchema = z.array(
  z.object({
    content: z.string(),
    subject: z.string().optional(),
    sender: z.string().optional(),
  })
);

interface AnalyzeOpts {
  type: string;
  subject?: string;
  sender?: string;
  instructions?: string;
  tone?: string;
  json?: boolean;
  verbose?: boolean;
}

export function registerAnalyzeCommands(program: Command): void {
  program
    .command("analyze")
    .description("Analyze an email (reads stdin when no text is given)")
    .argument("[text]", "Email body")
    .option(
      "-t, --type <type>",
      "summary | action_items | recommendations | custom | draft_reply | sentiment",
      "summary"
    )
    .option("-s, --subject <subject>", "Email subject")
    .option("--sender <sender>", "Email sender")
    .option("-i, --instructions <text>", "Instructions for the custom analysis type")
    .option("--tone <tone>", "Reply tone for draft_reply (default: professional)")
    .option("--json", "Output the full result as JSON")
    .option("-v, --verbose", "Show every attempt and structured logs")
    .action(async (text: string | undefined, opts: AnalyzeOpts) => {
      try {
        const analysisType = parseAnalysisType(opts.type);
        const content = await resolveText(text);
        if (!content.trim()) {
          console.log(chalk.yellow('Usage: mailroute analyze "email body" [-t type]'));
          process.exit(1);
        }

        setReportingSilenced(!opts.verbose);
        const analyzer = new HybridAnalyzer(loadCliConfig());
        const email: EmailInput = { content, subject: opts.subject, sender: opts.sender };

        const result = await withCancellation(opts.json, (signal) =>
          runAnalysis(analyzer, analysisType, email, opts, signal)
        );
        printResult(result, opts);
      } catch (err) {
        handleError(err);
      }
    });

  program
    .command("digest")
    .description("Daily summary of a JSON file of emails ([{ content, subject?, sender? }])")
    .argument("<file>", "Path to the JSON file")
    .option("--json", "Output the full result as JSON")
    .option("-v, --verbose", "Show every attempt and structured logs")
    .action(async (file: string, opts: { json?: boolean; verbose?: boolean }) => {
      try {
        let raw: unknown;
        try {
          raw = JSON.parse(fs.readFileSync(file, "utf-8"));
        } catch (err) {
          console.log(chalk.red(`Cannot read file: ${file}`));
          console.log(chalk.dim(err instanceof Error ? err.message : String(err)));
          process.exit(1);
        }

        const parsed = EmailListSchema.safeParse(raw);
        if (!parsed.success) {
          console.log(chalk.red("Expected an array of { content, subject?, sender? } objects"));
          console.log(chalk.dim(parsed.error.message));
          process.exit(1);
        }

        setReportingSilenced(!opts.verbose);
        const analyzer = new HybridAnalyzer(loadCliConfig());
        const result = await withCancellation(opts.json, (signal) =>
          analyzer.generateDailySummary(parsed.data, { signal })
        );

        printResult(result, opts);
        if (!opts.json && result.emailCount > 0) {
          console.log(
            chalk.dim(`${result.emailCount} emails · average complexity ${result.averageComplexity}`)
          );
        }
      } catch (err) {
        handleError(err);
      }
    });
}

function runAnalysis(
  analyzer: HybridAnalyzer,
  analysisType: EmailTask,
  email: EmailInput,
  opts: Pick<AnalyzeOpts, "instructions" | "tone">,
  signal: AbortSignal
): Promise<AnalysisResult> {
  switch (analysisType) {
    case "summary":
      return analyzer.summarizeEmail(email, { signal });
    case "action_items":
      return analyzer.extractActionItems(email, { signal });
    case "recommendations":
      return analyzer.recommendResponse(email, { signal });
    case "custom":
      return analyzer.analyze(email.content, "custom", { signal, instructions: opts.instructions });
    case "draft_reply":
      return analyzer.draftReply(email, opts.tone, { signal });
    case "sentiment":
      return analyzer.analyzeSentiment(email, { signal });
  }
}

/**
 * Run with a spinner (unless JSON output is requested) and abort the
 * request on SIGINT.
 */
async function withCancellation<T>(
  json: boolean | undefined,
  run: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);

  const spinner = json ? null : ora({ text: "Routing email...", color: "blue" }).start();
  try {
    return await run(controller.signal);
  } finally {
    spinner?.stop();
    process.off("SIGINT", onInterrupt);
  }
}

function printResult(result: AnalysisResult, opts: Pick<AnalyzeOpts, "json" | "verbose">): void {
  if (opts.json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (result.success && result.content !== null) {
    console.log(chalk.blue("▸") + " " + chalk.bold(describeServedBy(result)));
    console.log();
    console.log(result.content);
    console.log();
    console.log(
      chalk.dim(
        `score ${result.complexity.score} · ${result.latencyMs}ms` +
          (result.costOptimized ? " · cost-optimized" : "")
      )
    );
  } else {
    console.log(chalk.red(describeServedBy(result)));
  }

  if (opts.verbose || !result.success) {
    for (const attempt of result.attempts) {
      const mark = attempt.ok ? chalk.green("✓") : chalk.red("✗");
      const reason = attempt.cancelled
        ? chalk.dim(" cancelled")
        : attempt.errorKind
          ? chalk.dim(` ${describeProviderError(attempt.errorKind)}`)
          : "";
      console.log(`  ${mark} ${attempt.provider}/${attempt.model} ${chalk.dim(`${attempt.latencyMs}ms`)}${reason}`);
    }
  }

  if (!result.success) process.exitCode = 1;
}
