/**
 * Hybrid routing types
 */

export type ModelTier = "FAST_CHEAP" | "BALANCED" | "HIGH_CAPABILITY";

export const MODEL_TIERS: readonly ModelTier[] = [
  "FAST_CHEAP",
  "BALANCED",
  "HIGH_CAPABILITY",
] as const;

export type ProviderName = "anthropic" | "openai" | "gemini";

export const PROVIDER_NAMES: readonly ProviderName[] = [
  "anthropic",
  "openai",
  "gemini",
] as const;

export type AnalysisType = "summary" | "action_items" | "recommendations" | "custom";

export const ANALYSIS_TYPES: readonly AnalysisType[] = [
  "summary",
  "action_items",
  "recommendations",
  "custom",
] as const;

/** Single-email tasks: the analysis types plus reply drafting and sentiment */
export type EmailTask = AnalysisType | "draft_reply" | "sentiment";

export const EMAIL_TASKS: readonly EmailTask[] = [
  ...ANALYSIS_TYPES,
  "draft_reply",
  "sentiment",
] as const;

/** Every prompt template, including the digest used for daily summaries */
export type PromptKind = EmailTask | "daily_summary";

export interface ProviderBinding {
  provider: ProviderName;
  model: string;
  estimatedCostPer1kTokens: number;
  tier: ModelTier;
}

export interface ComplexityFactors {
  length: number;
  sentenceCount: number;
  questionCount: number;
  actionWordCount: number;
  technicalTermCount: number;
  emotionalIntensity: number;
  score: number;
  isComplex: boolean;
}

export interface RoutingDecision {
  score: number;
  primaryTier: ModelTier;
  analysisType: PromptKind;
  candidates: ProviderBinding[];
}

export type ProviderErrorKind =
  | "AuthenticationFailed"
  | "RateLimited"
  | "Timeout"
  | "MalformedResponse"
  | "Unavailable";

export type AnalysisErrorKind = "AllProvidersExhausted" | "Cancelled";

export interface AttemptRecord {
  model: string;
  provider: ProviderName;
  tier: ModelTier;
  ok: boolean;
  errorKind?: ProviderErrorKind;
  message?: string;
  /** Set when the caller aborted while this attempt was in flight */
  cancelled?: boolean;
  latencyMs: number;
}

export interface AnalysisResult {
  success: boolean;
  content: string | null;
  modelUsed: string | null;
  provider: ProviderName | null;
  tier: ModelTier | null;
  complexity: ComplexityFactors;
  fallbackUsed: boolean;
  error: AnalysisErrorKind | null;
  attempts: readonly AttemptRecord[];
  costOptimized: boolean;
  latencyMs: number;
}

export interface EmailInput {
  content: string;
  subject?: string;
  sender?: string;
}

/**
 * `complexity.score` and `isComplex` carry the average over the individual
 * emails, which is what routing used; the other counts describe the digest.
 */
export interface DailySummaryResult extends AnalysisResult {
  emailCount: number;
  averageComplexity: number;
}

export interface CompletionRequest {
  model: string;
  system: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
}

export interface CompletionResult {
  text: string;
  finishReason?: string;
  tokenUsage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

/** Stable identifier of a binding, e.g. "anthropic/claude-haiku-4-5-20251001" */
export function bindingId(binding: ProviderBinding): string {
  return `${binding.provider}/${binding.model}`;
}
