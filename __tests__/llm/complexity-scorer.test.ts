/**
 * Tests for the deterministic complexity scorer
 */

import { describe, expect, it } from "vitest";
import {
  DEFAULT_SCORER_OPTIONS,
  scoreComplexity,
  weightedScore,
} from "@/lib/llm/complexity-scorer";

const SIMPLE = "Hi, just checking in on the project status. Thanks!";
const URGENT =
  "URGENT: Critical production database failure affecting 1000+ users, need immediate response. Can you restart the server and check the API logs?";

describe("scoreComplexity", () => {
  it("scores a short check-in well under the threshold", () => {
    const factors = scoreComplexity(SIMPLE);

    expect(factors).toEqual({
      length: 51,
      sentenceCount: 2,
      questionCount: 0,
      actionWordCount: 0,
      technicalTermCount: 0,
      emotionalIntensity: 0,
      score: 6.55,
      isComplex: false,
    });
  });

  it("scores an urgent production incident above the threshold", () => {
    const factors = scoreComplexity(URGENT);

    expect(factors.length).toBe(143);
    expect(factors.sentenceCount).toBe(2);
    expect(factors.questionCount).toBe(1);
    expect(factors.actionWordCount).toBe(3);
    expect(factors.technicalTermCount).toBe(5);
    expect(factors.emotionalIntensity).toBe(0);
    expect(factors.score).toBe(116.15);
    expect(factors.isComplex).toBe(true);
  });

  it("returns all zeros for empty text", () => {
    const factors = scoreComplexity("");
    expect(factors.score).toBe(0);
    expect(factors.length).toBe(0);
    expect(factors.isComplex).toBe(false);
  });

  it("treats non-string input as empty text", () => {
    expect(scoreComplexity(undefined)).toEqual(scoreComplexity(""));
    expect(scoreComplexity(42)).toEqual(scoreComplexity(""));
    expect(scoreComplexity({ text: "urgent" })).toEqual(scoreComplexity(""));
  });

  it("is deterministic", () => {
    expect(scoreComplexity(URGENT)).toEqual(scoreComplexity(URGENT));
  });

  it("matches lexicon terms case-insensitively on word boundaries", () => {
    const factors = scoreComplexity("ASAP please. The apiary is not an API.");
    expect(factors.actionWordCount).toBe(1);
    expect(factors.technicalTermCount).toBe(1);
  });

  it("counts a multi-word term once", () => {
    expect(scoreComplexity("Please reply as soon as possible").actionWordCount).toBe(1);
  });

  it("never decreases when a lexicon term is appended", () => {
    const base = "Could you look at this when you get a chance";
    const before = scoreComplexity(base).score;
    expect(scoreComplexity(`${base} urgent`).score).toBeGreaterThan(before);
    expect(scoreComplexity(`${base} database`).score).toBeGreaterThan(before);
    expect(scoreComplexity(`${base} frustrated`).score).toBeGreaterThan(before);
  });

  it("stops growing with length past the saturation point", () => {
    expect(scoreComplexity("a".repeat(5000)).score).toBe(50);
    expect(scoreComplexity("a".repeat(9000)).score).toBe(50);
  });

  it("honours a custom threshold", () => {
    const options = { ...DEFAULT_SCORER_OPTIONS, threshold: 5 };
    expect(scoreComplexity(SIMPLE, options).isComplex).toBe(true);
  });

  it("honours custom lexicons", () => {
    const options = {
      ...DEFAULT_SCORER_OPTIONS,
      lexicons: { action: ["invoice"], technical: [], emotional: [] },
    };
    const factors = scoreComplexity("Invoice attached, invoice overdue", options);
    expect(factors.actionWordCount).toBe(2);
    expect(factors.technicalTermCount).toBe(0);
  });
});

describe("weightedScore", () => {
  it("combines the factors with the configured weights", () => {
    const score = weightedScore({
      length: 100,
      sentenceCount: 1,
      questionCount: 1,
      actionWordCount: 1,
      technicalTermCount: 1,
      emotionalIntensity: 1,
    });
    // 100*0.05 + 2 + 10 + 15 + 10 + 10
    expect(score).toBe(52);
  });
});
