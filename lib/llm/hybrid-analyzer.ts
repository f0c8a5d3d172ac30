/**
 * Hybrid email analyzer
 *
 * score → select → dispatch (with fallback) → normalize, one request at a
 * time. The analyzer holds only read-only configuration and stateless
 * provider clients, so a single instance serves concurrent requests.
 */

import { loadRoutingConfig, type RoutingConfig } from "../config";
import { reportInfo, reportWarning } from "../errors";
import type { ProviderRegistry } from "../providers/types";
import { ProviderDispatcher } from "../routing/dispatcher";
import { FallbackController } from "../routing/fallback-controller";
import { selectCandidates } from "../routing/model-selector";
import { normalizeResult } from "../routing/result";
import { scoreComplexity } from "./complexity-scorer";
import { DEFAULT_REPLY_TONE, formatDigest, formatEmail, truncateBody } from "./prompts";
import { createProviderRegistry } from "./router";
import type {
  AnalysisResult,
  ComplexityFactors,
  DailySummaryResult,
  EmailInput,
  EmailTask,
  PromptKind,
  RoutingDecision,
} from "./types";
import { bindingId } from "./types";

export interface AnalyzeOptions {
  /** Stops further fallback attempts once aborted */
  signal?: AbortSignal;
  /** Instructions for the "custom" analysis type */
  instructions?: string;
  /** Reply tone for "draft_reply" */
  tone?: string;
}

export const NO_EMAILS_MESSAGE = "No emails to summarize.";

export class HybridAnalyzer {
  readonly config: RoutingConfig;
  private readonly dispatcher: ProviderDispatcher;

  constructor(config: RoutingConfig, providers: ProviderRegistry = createProviderRegistry(config)) {
    this.config = config;
    this.dispatcher = new ProviderDispatcher(providers, config.timeoutMs);
  }

  score(text: unknown): ComplexityFactors {
    return scoreComplexity(text, this.config);
  }

  route(text: unknown, analysisType: PromptKind = "summary"): RoutingDecision {
    return selectCandidates(this.score(text).score, analysisType, this.config);
  }

  /**
   * Analyze one piece of text. Never rejects for provider failures: those
   * end up in the result's `error` field.
   */
  async analyze(
    text: string,
    analysisType: EmailTask,
    options: AnalyzeOptions = {}
  ): Promise<AnalysisResult> {
    const complexity = this.score(text);
    const decision = selectCandidates(complexity.score, analysisType, this.config);
    return this.execute(decision, complexity, truncateBody(text), options);
  }

  summarizeEmail(email: EmailInput, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
    return this.analyzeEmail(email, "summary", options);
  }

  extractActionItems(email: EmailInput, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
    return this.analyzeEmail(email, "action_items", options);
  }

  recommendResponse(email: EmailInput, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
    return this.analyzeEmail(email, "recommendations", options);
  }

  /** Draft a reply in the requested tone */
  draftReply(
    email: EmailInput,
    tone: string = DEFAULT_REPLY_TONE,
    options: AnalyzeOptions = {}
  ): Promise<AnalysisResult> {
    return this.analyzeEmail(email, "draft_reply", { ...options, tone });
  }

  /** Sentiment, tone and urgency of one email */
  analyzeSentiment(email: EmailInput, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
    return this.analyzeEmail(email, "sentiment", options);
  }

  /**
   * Digest of a day's mail. Routed on the average complexity of the
   * individual emails rather than on the (always long) digest itself.
   */
  async generateDailySummary(
    emails: EmailInput[],
    options: AnalyzeOptions = {}
  ): Promise<DailySummaryResult> {
    if (emails.length === 0) {
      return Object.freeze({
        success: true,
        content: NO_EMAILS_MESSAGE,
        modelUsed: null,
        provider: null,
        tier: null,
        complexity: this.score(""),
        fallbackUsed: false,
        error: null,
        attempts: [],
        costOptimized: true,
        latencyMs: 0,
        emailCount: 0,
        averageComplexity: 0,
      });
    }

    const scores = emails.map((email) => this.score(emailScoringText(email)).score);
    const averageComplexity =
      Math.round((scores.reduce((sum, s) => sum + s, 0) / scores.length) * 100) / 100;

    const digest = formatDigest(emails);
    const decision = selectCandidates(averageComplexity, "daily_summary", this.config);
    // Counts describe the digest; score and isComplex are the routing average
    const complexity = {
      ...this.score(digest),
      score: averageComplexity,
      isComplex: averageComplexity > this.config.threshold,
    };
    const result = await this.execute(decision, complexity, digest, options);

    return Object.freeze({
      ...result,
      emailCount: emails.length,
      averageComplexity,
    });
  }

  private analyzeEmail(
    email: EmailInput,
    analysisType: EmailTask,
    options: AnalyzeOptions
  ): Promise<AnalysisResult> {
    const complexity = this.score(emailScoringText(email));
    const decision = selectCandidates(complexity.score, analysisType, this.config);
    return this.execute(decision, complexity, formatEmail(email), options);
  }

  private async execute(
    decision: RoutingDecision,
    complexity: ComplexityFactors,
    body: string,
    options: AnalyzeOptions
  ): Promise<AnalysisResult> {
    const startTime = Date.now();

    if (decision.candidates.length === 0) {
      reportWarning("No providers configured; skipping dispatch", {
        context: "routing",
        analysisType: decision.analysisType,
        providerPriority: this.config.providerPriority,
      });
    } else {
      reportInfo("Routing decision", {
        context: "routing",
        analysisType: decision.analysisType,
        score: decision.score,
        primaryTier: decision.primaryTier,
        candidates: decision.candidates.map(bindingId),
      });
    }

    const controller = new FallbackController(decision.candidates);
    const outcome = await controller.run(
      async (binding) => {
        const completion = await this.dispatcher.dispatch(
          binding,
          {
            text: body,
            analysisType: decision.analysisType,
            instructions: options.instructions,
            tone: options.tone,
          },
          options.signal
        );
        return completion.text;
      },
      { signal: options.signal }
    );

    return normalizeResult(outcome, complexity, Date.now() - startTime);
  }
}

/** Subject and body are both evidence of complexity; headers are not */
function emailScoringText(email: EmailInput): string {
  return [email.subject, email.content].filter((part) => Boolean(part)).join("\n");
}

/**
 * Build an analyzer from the environment (or an explicit configuration).
 */
export function createHybridAnalyzer(config: RoutingConfig = loadRoutingConfig()): HybridAnalyzer {
  return new HybridAnalyzer(config);
}
