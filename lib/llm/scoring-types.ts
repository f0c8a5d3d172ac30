/**
 * Complexity Scoring — Types
 *
 * Weights and word lists that turn an email's structural features into a
 * single complexity score. Everything here is configuration: the scorer
 * itself holds no constants that decide routing.
 */

// ─── Lexicons ───────────────────────────────────────────────────

export interface Lexicons {
  /** Urgency / importance vocabulary ("urgent", "asap", "deadline") */
  action: string[];
  /** Technical vocabulary ("api", "server", "database") */
  technical: string[];
  /** Emotional register ("frustrated", "disappointed", "excited") */
  emotional: string[];
}

// ─── Weights ────────────────────────────────────────────────────

export interface ComplexityWeights {
  length: number;      // per character, up to lengthSaturation
  sentence: number;
  question: number;
  actionWord: number;
  technicalTerm: number;
  emotional: number;
}

export interface ScorerOptions {
  weights: ComplexityWeights;
  lexicons: Lexicons;
  /** Characters beyond this count add nothing (long quoted threads) */
  lengthSaturation: number;
  /** Scores strictly above this are complex */
  threshold: number;
}
