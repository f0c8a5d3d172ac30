/**
 * Public entry point.
 */

export { HybridAnalyzer, createHybridAnalyzer, NO_EMAILS_MESSAGE } from "./llm/hybrid-analyzer";
export type { AnalyzeOptions } from "./llm/hybrid-analyzer";
export { scoreComplexity, weightedScore, DEFAULT_SCORER_OPTIONS } from "./llm/complexity-scorer";
export { selectCandidates, primaryTierFor } from "./routing/model-selector";
export { ProviderDispatcher } from "./routing/dispatcher";
export { FallbackController, transition, isTerminal } from "./routing/fallback-controller";
export { normalizeResult, safeValidateAnalysisResult } from "./routing/result";
export {
  ConfigError,
  createRoutingConfig,
  loadRoutingConfig,
  configuredProviders,
} from "./config";
export type { RoutingConfig, RoutingConfigInput } from "./config";
export { ProviderError, toProviderError } from "./llm/provider-error";
export { createProvider, createProviderRegistry } from "./llm/router";
export { MockProvider } from "./providers/mock-provider";
export type { MockStep } from "./providers/mock-provider";
export type { AnalysisProvider, ProviderRegistry } from "./providers/types";
export { setReportingSilenced } from "./errors";
export { describeServedBy, describeAnalysisError } from "./models";
export type * from "./llm/types";
export { MODEL_TIERS, PROVIDER_NAMES, ANALYSIS_TYPES, EMAIL_TASKS, bindingId } from "./llm/types";
