/**
 * Deterministic Complexity Scorer
 *
 * Measures how demanding an email is to analyze without any LLM calls.
 * Counts sentence punctuation, questions and three lexicons (urgency,
 * technical, emotional), then combines them with configurable weights.
 *
 * Length contributes linearly only up to a saturation point, so a long
 * quoted thread cannot outweigh the semantic signals on its own.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { ComplexityFactors } from "./types";
import type { ComplexityWeights, Lexicons, ScorerOptions } from "./scoring-types";

// ─── Defaults ───────────────────────────────────────────────────

export const LexiconsSchema = z.object({
  action: z.array(z.string().min(1)),
  technical: z.array(z.string().min(1)),
  emotional: z.array(z.string().min(1)),
});

const lexiconData: unknown = JSON.parse(
  readFileSync(new URL("./lexicons.json", import.meta.url), "utf-8")
);

export const DEFAULT_LEXICONS: Lexicons = LexiconsSchema.parse(lexiconData);

export const DEFAULT_WEIGHTS: ComplexityWeights = {
  length: 0.05,
  sentence: 2,
  question: 10,
  actionWord: 15,
  technicalTerm: 10,
  emotional: 10,
};

export const DEFAULT_LENGTH_SATURATION = 1000;
export const DEFAULT_THRESHOLD = 100;

export const DEFAULT_SCORER_OPTIONS: ScorerOptions = {
  weights: DEFAULT_WEIGHTS,
  lexicons: DEFAULT_LEXICONS,
  lengthSaturation: DEFAULT_LENGTH_SATURATION,
  threshold: DEFAULT_THRESHOLD,
};

// ─── Lexicon Matching ───────────────────────────────────────────

const SENTENCE_TERMINATORS = /[.!?]+/g;
const QUESTION_MARK = /\?/g;

// Compiled once per word list; lists are read-only after configuration.
const compiledLexicons = new WeakMap<readonly string[], RegExp | null>();

function escapeTerm(term: string): string {
  return term
    .trim()
    .replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
    .replace(/\s+/g, "\\s+");
}

function compileLexicon(terms: readonly string[]): RegExp | null {
  const cached = compiledLexicons.get(terms);
  if (cached !== undefined) return cached;

  const alternatives = terms
    .map((t) => t.trim())
    .filter((t) => t.length > 0)
    // Longest first so "as soon as possible" wins over any shorter prefix
    .sort((a, b) => b.length - a.length)
    .map(escapeTerm);

  const pattern =
    alternatives.length > 0 ? new RegExp(`\\b(?:${alternatives.join("|")})\\b`, "gi") : null;
  compiledLexicons.set(terms, pattern);
  return pattern;
}

function countMatches(text: string, pattern: RegExp | null): number {
  if (!pattern) return 0;
  return text.match(pattern)?.length ?? 0;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

// ─── Public API ─────────────────────────────────────────────────

/**
 * Weighted sum of the counted factors. Exposed separately so callers can
 * re-score stored factors under different weights.
 */
export function weightedScore(
  factors: Omit<ComplexityFactors, "score" | "isComplex">,
  options: Pick<ScorerOptions, "weights" | "lengthSaturation"> = DEFAULT_SCORER_OPTIONS
): number {
  const { weights, lengthSaturation } = options;
  const cappedLength = Math.min(factors.length, Math.max(0, lengthSaturation));

  const score =
    cappedLength * weights.length +
    factors.sentenceCount * weights.sentence +
    factors.questionCount * weights.question +
    factors.actionWordCount * weights.actionWord +
    factors.technicalTermCount * weights.technicalTerm +
    factors.emotionalIntensity * weights.emotional;

  return Math.max(0, round2(score));
}

/**
 * Score a text. Never throws: anything that is not a string scores as empty.
 */
export function scoreComplexity(
  input: unknown,
  options: ScorerOptions = DEFAULT_SCORER_OPTIONS
): ComplexityFactors {
  const text = typeof input === "string" ? input : "";

  const counted = {
    length: text.length,
    sentenceCount: countMatches(text, SENTENCE_TERMINATORS),
    questionCount: countMatches(text, QUESTION_MARK),
    actionWordCount: countMatches(text, compileLexicon(options.lexicons.action)),
    technicalTermCount: countMatches(text, compileLexicon(options.lexicons.technical)),
    emotionalIntensity: countMatches(text, compileLexicon(options.lexicons.emotional)),
  };

  const score = weightedScore(counted, options);

  return {
    ...counted,
    score,
    isComplex: score > options.threshold,
  };
}
