/**
 * Provider failure taxonomy
 *
 * Every vendor SDK failure is mapped onto one of five kinds before it
 * reaches the fallback controller, so the controller never needs to know
 * which vendor it is talking to.
 */

import type { ProviderErrorKind, ProviderName } from "./types";

export class ProviderError extends Error {
  readonly kind: ProviderErrorKind;
  readonly provider: ProviderName | null;
  readonly status?: number;

  constructor(
    kind: ProviderErrorKind,
    message: string,
    options: { provider?: ProviderName | null; status?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "ProviderError";
    this.kind = kind;
    this.provider = options.provider ?? null;
    this.status = options.status;
  }

  /** Configuration defect rather than transient unavailability */
  get isConfigurationDefect(): boolean {
    return this.kind === "AuthenticationFailed";
  }
}

export function isProviderError(err: unknown): err is ProviderError {
  return err instanceof ProviderError;
}

/**
 * Map an HTTP status from a provider API to a failure kind.
 */
export function classifyHttpStatus(status: number): ProviderErrorKind {
  if (status === 401 || status === 403) return "AuthenticationFailed";
  if (status === 429) return "RateLimited";
  if (status === 408 || status === 504) return "Timeout";
  return "Unavailable";
}

/**
 * Read a numeric `status` off any thrown value (all three SDKs attach one
 * to their API errors).
 */
export function statusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err) {
    const { status } = err;
    if (typeof status === "number") return status;
  }
  return undefined;
}

/**
 * Fallback classification for values that are not already ProviderErrors.
 * Provider implementations check their SDK's own error classes first.
 */
export function toProviderError(err: unknown, provider: ProviderName | null): ProviderError {
  if (isProviderError(err)) return err;

  const message = err instanceof Error ? err.message : String(err);
  const status = statusOf(err);

  if (status !== undefined) {
    return new ProviderError(classifyHttpStatus(status), message, { provider, status, cause: err });
  }

  if (err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError")) {
    return new ProviderError("Timeout", message, { provider, cause: err });
  }

  return new ProviderError("Unavailable", message, { provider, cause: err });
}
