/**
 * End-to-end tests for the analyzer: score → select → dispatch → fallback
 * → normalize, against scripted in-process providers.
 */

import { beforeAll, describe, expect, it } from "vitest";
import { createRoutingConfig, type RoutingConfigInput } from "@/lib/config";
import { setReportingSilenced } from "@/lib/errors";
import { HybridAnalyzer, NO_EMAILS_MESSAGE } from "@/lib/llm/hybrid-analyzer";
import { MAX_BODY_CHARS } from "@/lib/llm/prompts";
import type { ProviderName } from "@/lib/llm/types";
import { MockProvider, type MockStep } from "@/lib/providers/mock-provider";
import type { AnalysisProvider } from "@/lib/providers/types";
import { safeValidateAnalysisResult } from "@/lib/routing/result";

const SIMPLE = "Hi, just checking in on the project status. Thanks!";
const URGENT =
  "URGENT: Critical production database failure affecting 1000+ users, need immediate response. Can you restart the server and check the API logs?";

const ALL_KEYS = { anthropic: "test-key-a", openai: "test-key-o", gemini: "test-key-g" };

beforeAll(() => {
  setReportingSilenced(true);
});

function setup(
  scripts: Partial<Record<ProviderName, MockStep[]>> = {},
  overrides: RoutingConfigInput = {}
) {
  const mocks = {
    anthropic: new MockProvider("anthropic", { script: scripts.anthropic }),
    openai: new MockProvider("openai", { script: scripts.openai }),
    gemini: new MockProvider("gemini", { script: scripts.gemini }),
  };
  const registry = new Map<ProviderName, AnalysisProvider>([
    ["anthropic", mocks.anthropic],
    ["openai", mocks.openai],
    ["gemini", mocks.gemini],
  ]);
  const config = createRoutingConfig({ credentials: ALL_KEYS, ...overrides });
  return { analyzer: new HybridAnalyzer(config, registry), mocks };
}

describe("HybridAnalyzer.analyze", () => {
  it("serves simple mail from the fast tier", async () => {
    const { analyzer, mocks } = setup();

    const result = await analyzer.analyze(SIMPLE, "summary");

    expect(result.success).toBe(true);
    expect(result.modelUsed).toBe("anthropic/claude-haiku-4-5-20251001");
    expect(result.provider).toBe("anthropic");
    expect(result.tier).toBe("FAST_CHEAP");
    expect(result.costOptimized).toBe(true);
    expect(result.fallbackUsed).toBe(false);
    expect(result.error).toBeNull();
    expect(result.complexity.score).toBe(6.55);
    expect(
      result.content?.startsWith("Mock analysis from anthropic/claude-haiku-4-5-20251001")
    ).toBe(true);
    expect(mocks.anthropic.calls).toHaveLength(1);
    expect(mocks.openai.calls).toHaveLength(0);
  });

  it("serves complex mail from the high-capability tier", async () => {
    const { analyzer } = setup();

    const result = await analyzer.analyze(URGENT, "summary");

    expect(result.complexity.isComplex).toBe(true);
    expect(result.modelUsed).toBe("anthropic/claude-opus-4-6");
    expect(result.tier).toBe("HIGH_CAPABILITY");
    expect(result.costOptimized).toBe(false);
  });

  it("falls back silently when the primary provider is rate limited", async () => {
    const { analyzer, mocks } = setup({
      anthropic: [{ type: "fail", kind: "RateLimited", message: "quota exceeded" }],
      openai: [{ type: "ok", text: "Status check-in; no action needed." }],
    });

    const result = await analyzer.analyze(SIMPLE, "summary");

    expect(result.success).toBe(true);
    expect(result.fallbackUsed).toBe(true);
    expect(result.error).toBeNull();
    expect(result.content).toBe("Status check-in; no action needed.");
    expect(result.modelUsed).toBe("openai/gpt-5");
    expect(result.tier).toBe("BALANCED");
    expect(result.attempts.map((a) => [a.provider, a.ok, a.errorKind])).toEqual([
      ["anthropic", false, "RateLimited"],
      ["openai", true, undefined],
    ]);
    expect(mocks.gemini.calls).toHaveLength(0);
  });

  it("falls back after a timeout", async () => {
    const { analyzer } = setup({ anthropic: [{ type: "hang" }] }, { timeoutMs: 20 });

    const result = await analyzer.analyze(SIMPLE, "summary");

    expect(result.success).toBe(true);
    expect(result.provider).toBe("openai");
    expect(result.attempts[0].errorKind).toBe("Timeout");
  });

  it("falls back past a malformed response", async () => {
    const { analyzer } = setup({ anthropic: [{ type: "malformed" }] });

    const result = await analyzer.analyze(SIMPLE, "summary");

    expect(result.provider).toBe("openai");
    expect(result.attempts[0].errorKind).toBe("MalformedResponse");
  });

  it("reports exhaustion when every candidate fails", async () => {
    const { analyzer, mocks } = setup({
      anthropic: [{ type: "fail", kind: "Unavailable" }],
      openai: [{ type: "fail", kind: "Timeout" }],
      gemini: [{ type: "fail", kind: "AuthenticationFailed" }],
    });

    const result = await analyzer.analyze(SIMPLE, "summary");

    expect(result.success).toBe(false);
    expect(result.content).toBeNull();
    expect(result.error).toBe("AllProvidersExhausted");
    expect(result.modelUsed).toBeNull();
    expect(result.attempts).toHaveLength(3);
    expect(mocks.anthropic.calls).toHaveLength(1);
    expect(mocks.openai.calls).toHaveLength(1);
    expect(mocks.gemini.calls).toHaveLength(1);
  });

  it("short-circuits to exhaustion with no configured providers", async () => {
    const { mocks } = setup();
    const registry = new Map<ProviderName, AnalysisProvider>([["anthropic", mocks.anthropic]]);
    const analyzer = new HybridAnalyzer(createRoutingConfig(), registry);

    expect(analyzer.route(SIMPLE).candidates).toEqual([]);

    const result = await analyzer.analyze(SIMPLE, "summary");

    expect(result.error).toBe("AllProvidersExhausted");
    expect(result.attempts).toEqual([]);
    expect(result.fallbackUsed).toBe(false);
    expect(mocks.anthropic.calls).toHaveLength(0);
  });

  it("reports cancellation without trying any provider", async () => {
    const { analyzer, mocks } = setup();
    const abort = new AbortController();
    abort.abort();

    const result = await analyzer.analyze(SIMPLE, "summary", { signal: abort.signal });

    expect(result.success).toBe(false);
    expect(result.error).toBe("Cancelled");
    expect(mocks.anthropic.calls).toHaveLength(0);
  });

  it("passes custom instructions to the provider", async () => {
    const { analyzer, mocks } = setup();

    await analyzer.analyze("Quarterly numbers attached.", "custom", {
      instructions: "List every number mentioned.",
    });

    expect(mocks.anthropic.calls[0].prompt).toBe(
      "List every number mentioned.\n\nEmail:\nQuarterly numbers attached."
    );
  });

  it("truncates long bodies before sending them", async () => {
    const { analyzer, mocks } = setup();

    const result = await analyzer.analyze("x".repeat(20000), "summary");

    // Scoring still sees the full text
    expect(result.complexity.length).toBe(20000);
    const { prompt } = mocks.anthropic.calls[0];
    expect(prompt.endsWith("Email:\n" + "x".repeat(MAX_BODY_CHARS) + "...")).toBe(true);
    expect(prompt.length).toBeLessThan(5000);
  });

  it("records a caller abort during a call as a cancelled attempt", async () => {
    const { analyzer } = setup({ anthropic: [{ type: "hang" }] });
    const abort = new AbortController();
    setTimeout(() => abort.abort(), 10);

    const result = await analyzer.analyze(SIMPLE, "summary", { signal: abort.signal });

    expect(result.error).toBe("Cancelled");
    expect(result.attempts).toHaveLength(1);
    expect(result.attempts[0].cancelled).toBe(true);
    expect(result.attempts[0].errorKind).toBeUndefined();
    expect(safeValidateAnalysisResult(result).success).toBe(true);
  });

  it("returns frozen results that satisfy the result schema", async () => {
    const { analyzer } = setup({ anthropic: [{ type: "fail", kind: "RateLimited" }] });

    const results = await Promise.all([
      analyzer.analyze(SIMPLE, "summary"),
      analyzer.analyze(URGENT, "recommendations"),
      new HybridAnalyzer(createRoutingConfig(), new Map()).analyze(SIMPLE, "summary"),
    ]);

    for (const result of results) {
      expect(Object.isFrozen(result)).toBe(true);
      expect(safeValidateAnalysisResult(result).success).toBe(true);
    }
  });

  it("serves concurrent requests independently", async () => {
    const { analyzer } = setup();

    const results = await Promise.all(
      Array.from({ length: 5 }, () => analyzer.analyze(URGENT, "action_items"))
    );

    expect(new Set(results.map((r) => r.content)).size).toBe(1);
    expect(results.every((r) => r.modelUsed === "anthropic/claude-opus-4-6")).toBe(true);
  });
});

describe("HybridAnalyzer email operations", () => {
  const email = {
    content: "Can we move the review to Thursday?",
    subject: "Review",
    sender: "sam@example.com",
  };

  it("summarizes an email with its headers", async () => {
    const { analyzer, mocks } = setup();

    const result = await analyzer.summarizeEmail(email);

    expect(result.success).toBe(true);
    const request = mocks.anthropic.calls[0];
    expect(request.maxTokens).toBe(500);
    expect(
      request.prompt.endsWith(
        "Email:\nFrom: sam@example.com\nSubject: Review\n\nCan we move the review to Thursday?"
      )
    ).toBe(true);
  });

  it("scores the subject together with the body", async () => {
    const { analyzer } = setup();

    const result = await analyzer.summarizeEmail(email);

    // "Review\nCan we move the review to Thursday?" is 42 characters
    expect(result.complexity.length).toBe(42);
    expect(result.complexity.questionCount).toBe(1);
  });

  it("extracts action items with the action-item template", async () => {
    const { analyzer, mocks } = setup();

    await analyzer.extractActionItems(email);

    expect(mocks.anthropic.calls[0].maxTokens).toBe(300);
    expect(mocks.anthropic.calls[0].system).toBe(
      "You are an AI assistant that extracts actionable items from emails."
    );
  });

  it("recommends a response with the recommendation template", async () => {
    const { analyzer, mocks } = setup();

    await analyzer.recommendResponse(email);

    expect(mocks.anthropic.calls[0].maxTokens).toBe(400);
    expect(mocks.anthropic.calls[0].temperature).toBe(0.6);
  });

  it("drafts a reply in the requested tone", async () => {
    const { analyzer, mocks } = setup();

    const result = await analyzer.draftReply(email, "friendly");

    expect(result.success).toBe(true);
    const request = mocks.anthropic.calls[0];
    expect(request.maxTokens).toBe(300);
    expect(request.temperature).toBe(0.7);
    expect(request.system).toBe("You are an AI assistant that drafts email replies.");
    expect(request.prompt.startsWith("Write a friendly reply to this email.\n")).toBe(true);
    expect(request.prompt.endsWith("Can we move the review to Thursday?")).toBe(true);
  });

  it("drafts a professional reply by default", async () => {
    const { analyzer, mocks } = setup();

    await analyzer.draftReply(email);

    expect(mocks.anthropic.calls[0].prompt.split("\n")[0]).toBe(
      "Write a professional reply to this email."
    );
  });

  it("analyzes sentiment with the sentiment template", async () => {
    const { analyzer, mocks } = setup();

    const result = await analyzer.analyzeSentiment(email);

    expect(result.success).toBe(true);
    const request = mocks.anthropic.calls[0];
    expect(request.maxTokens).toBe(200);
    expect(request.temperature).toBe(0.3);
    expect(request.system).toBe("You are an AI assistant that analyzes email sentiment and tone.");
    expect(request.prompt.startsWith("Analyze the sentiment and tone of this email.\n")).toBe(true);
  });
});

describe("HybridAnalyzer.generateDailySummary", () => {
  it("answers an empty day without calling a provider", async () => {
    const { analyzer, mocks } = setup();

    const result = await analyzer.generateDailySummary([]);

    expect(result.success).toBe(true);
    expect(result.content).toBe(NO_EMAILS_MESSAGE);
    expect(result.emailCount).toBe(0);
    expect(result.averageComplexity).toBe(0);
    expect(mocks.anthropic.calls).toHaveLength(0);
    expect(safeValidateAnalysisResult(result).success).toBe(true);
  });

  it("routes the digest on the average email complexity", async () => {
    const { analyzer, mocks } = setup();

    const result = await analyzer.generateDailySummary([
      { content: SIMPLE },
      { content: "Thanks!", subject: "Re: lunch" },
    ]);

    // 6.55 and 2.85
    expect(result.averageComplexity).toBe(4.7);
    expect(result.emailCount).toBe(2);
    expect(result.tier).toBe("FAST_CHEAP");

    const request = mocks.anthropic.calls[0];
    expect(request.maxTokens).toBe(500);
    expect(
      request.prompt.endsWith(
        "Emails:\n#1\nFrom: unknown\nSubject: (no subject)\nSnippet: " +
          SIMPLE +
          "\n\n#2\nFrom: unknown\nSubject: Re: lunch\nSnippet: Thanks!"
      )
    ).toBe(true);
  });

  it("uses the high-capability tier for a demanding day", async () => {
    const { analyzer } = setup();

    const result = await analyzer.generateDailySummary([{ content: URGENT }, { content: URGENT }]);

    expect(result.averageComplexity).toBe(116.15);
    expect(result.tier).toBe("HIGH_CAPABILITY");
    expect(result.complexity.isComplex).toBe(true);
  });

  it("reports the routing average as the complexity score", async () => {
    const { analyzer } = setup();

    // The digest of twenty check-ins is long enough to score as complex on its own
    const result = await analyzer.generateDailySummary(
      Array.from({ length: 20 }, () => ({ content: SIMPLE }))
    );

    expect(result.averageComplexity).toBe(6.55);
    expect(result.complexity.score).toBe(6.55);
    expect(result.complexity.isComplex).toBe(false);
    expect(result.tier).toBe("FAST_CHEAP");
  });
});
