/**
 * Routing Configuration
 *
 * Builds the read-only RoutingConfig that every stage of the pipeline
 * receives explicitly. Nothing below reads process.env except
 * loadRoutingConfig(), and the returned object is frozen.
 *
 * Environment:
 *   ANTHROPIC_API_KEY / OPENAI_API_KEY / GEMINI_API_KEY
 *   COMPLEXITY_THRESHOLD   numeric cutoff between tiers (default 100)
 *   PROVIDER_PRIORITY      comma list, e.g. "anthropic,openai,gemini"
 *   PROVIDER_TIMEOUT_MS    per-candidate timeout (default 30000)
 *   MAX_CANDIDATES         fallback chain length (default 3)
 */

import { z } from "zod";
import { DEFAULT_BINDINGS } from "./llm/capability-matrix";
import {
  DEFAULT_LENGTH_SATURATION,
  DEFAULT_LEXICONS,
  DEFAULT_THRESHOLD,
  DEFAULT_WEIGHTS,
  LexiconsSchema,
} from "./llm/complexity-scorer";
import type { ComplexityWeights } from "./llm/scoring-types";
import { PROVIDER_NAMES, type ModelTier, type ProviderName } from "./llm/types";

// ─── Schema ─────────────────────────────────────────────────────

const ProviderNameSchema = z.enum(["anthropic", "openai", "gemini"]);
const ModelTierSchema = z.enum(["FAST_CHEAP", "BALANCED", "HIGH_CAPABILITY"]);

const ProviderBindingSchema = z.object({
  provider: ProviderNameSchema,
  model: z.string().min(1),
  estimatedCostPer1kTokens: z.number().nonnegative(),
  tier: ModelTierSchema,
});

const tierBindings = (tier: ModelTier) =>
  z.array(ProviderBindingSchema).refine((list) => list.every((b) => b.tier === tier), {
    message: `every binding listed under ${tier} must declare tier ${tier}`,
  });

export const RoutingConfigSchema = z.object({
  threshold: z.number().finite().nonnegative(),
  providerPriority: z
    .array(ProviderNameSchema)
    .refine((list) => new Set(list).size === list.length, {
      message: "providerPriority must not repeat a provider",
    }),
  credentials: z.object({
    anthropic: z.string().min(1).optional(),
    openai: z.string().min(1).optional(),
    gemini: z.string().min(1).optional(),
  }),
  timeoutMs: z.number().int().positive(),
  maxCandidates: z.number().int().min(1).max(10),
  bindings: z.object({
    FAST_CHEAP: tierBindings("FAST_CHEAP"),
    BALANCED: tierBindings("BALANCED"),
    HIGH_CAPABILITY: tierBindings("HIGH_CAPABILITY"),
  }),
  weights: z.object({
    length: z.number().nonnegative(),
    sentence: z.number().nonnegative(),
    question: z.number().nonnegative(),
    actionWord: z.number().nonnegative(),
    technicalTerm: z.number().nonnegative(),
    emotional: z.number().nonnegative(),
  }),
  lexicons: LexiconsSchema,
  lengthSaturation: z.number().nonnegative(),
});

export type RoutingConfig = Readonly<z.infer<typeof RoutingConfigSchema>>;

export type RoutingConfigInput = Partial<Omit<RoutingConfig, "weights" | "credentials">> & {
  weights?: Partial<ComplexityWeights>;
  credentials?: Partial<Record<ProviderName, string | undefined>>;
};

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_CANDIDATES = 3;
export const DEFAULT_PROVIDER_PRIORITY: ProviderName[] = ["anthropic", "openai", "gemini"];

// ─── Errors ─────────────────────────────────────────────────────

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid routing configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

// ─── Builders ───────────────────────────────────────────────────

function cleanCredentials(
  credentials: Partial<Record<ProviderName, string | undefined>> = {}
): Partial<Record<ProviderName, string>> {
  const cleaned: Partial<Record<ProviderName, string>> = {};
  for (const provider of PROVIDER_NAMES) {
    const value = credentials[provider]?.trim();
    if (value) cleaned[provider] = value;
  }
  return cleaned;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Merge overrides onto the defaults, validate, and freeze.
 * Throws ConfigError listing every invalid key.
 */
export function createRoutingConfig(overrides: RoutingConfigInput = {}): RoutingConfig {
  const candidate = {
    threshold: overrides.threshold ?? DEFAULT_THRESHOLD,
    providerPriority: [...(overrides.providerPriority ?? DEFAULT_PROVIDER_PRIORITY)],
    credentials: cleanCredentials(overrides.credentials),
    timeoutMs: overrides.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    maxCandidates: overrides.maxCandidates ?? DEFAULT_MAX_CANDIDATES,
    bindings: overrides.bindings ?? DEFAULT_BINDINGS,
    weights: { ...DEFAULT_WEIGHTS, ...overrides.weights },
    lexicons: overrides.lexicons ?? DEFAULT_LEXICONS,
    lengthSaturation: overrides.lengthSaturation ?? DEFAULT_LENGTH_SATURATION,
  };

  const result = RoutingConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return deepFreeze(result.data);
}

// ─── Environment ────────────────────────────────────────────────

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  GEMINI_API_KEY: z.string().optional(),
  COMPLEXITY_THRESHOLD: z.preprocess(blankToUndefined, z.coerce.number().finite().optional()),
  PROVIDER_PRIORITY: z.preprocess(blankToUndefined, z.string().optional()),
  PROVIDER_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().optional()),
  MAX_CANDIDATES: z.preprocess(blankToUndefined, z.coerce.number().int().optional()),
});

/**
 * Parse "openai, Anthropic" into ["openai", "anthropic"].
 */
export function parseProviderPriority(raw: string): ProviderName[] {
  const names = raw
    .split(",")
    .map((part) => part.trim().toLowerCase())
    .filter((part) => part.length > 0);

  const unknown = names.filter((name) => !ProviderNameSchema.safeParse(name).success);
  if (unknown.length > 0) {
    throw new ConfigError([
      `PROVIDER_PRIORITY: unknown provider(s) ${unknown.join(", ")} (expected ${PROVIDER_NAMES.join(", ")})`,
    ]);
  }
  return names.map((name) => ProviderNameSchema.parse(name));
}

/**
 * Build the configuration from environment variables. `fallback` supplies
 * values (e.g. keys saved by the CLI) used where the environment is silent.
 */
export function loadRoutingConfig(
  env: Record<string, string | undefined> = process.env,
  fallback: RoutingConfigInput = {}
): RoutingConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  const vars = parsed.data;

  return createRoutingConfig({
    ...fallback,
    threshold: vars.COMPLEXITY_THRESHOLD ?? fallback.threshold,
    providerPriority:
      vars.PROVIDER_PRIORITY !== undefined
        ? parseProviderPriority(vars.PROVIDER_PRIORITY)
        : fallback.providerPriority,
    timeoutMs: vars.PROVIDER_TIMEOUT_MS ?? fallback.timeoutMs,
    maxCandidates: vars.MAX_CANDIDATES ?? fallback.maxCandidates,
    credentials: {
      anthropic: vars.ANTHROPIC_API_KEY?.trim() || fallback.credentials?.anthropic,
      openai: vars.OPENAI_API_KEY?.trim() || fallback.credentials?.openai,
      gemini: vars.GEMINI_API_KEY?.trim() || fallback.credentials?.gemini,
    },
  });
}

/**
 * Providers that hold a credential, in priority order.
 */
export function configuredProviders(config: RoutingConfig): ProviderName[] {
  return config.providerPriority.filter((provider) => Boolean(config.credentials[provider]));
}

