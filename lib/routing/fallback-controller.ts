/**
 * Fallback Controller
 *
 * NOT_STARTED → TRYING(0) → … → SUCCEEDED | EXHAUSTED, plus CANCELLED when
 * the caller aborts. Each candidate is attempted at most once and strictly
 * in order; per-provider failures are logged here and never surface to the
 * caller individually. An attempt interrupted by the caller's abort is
 * recorded as cancelled, not as a provider failure.
 */

import { reportError, reportInfo, reportWarning } from "../errors";
import { toProviderError } from "../llm/provider-error";
import type { AttemptRecord, ProviderBinding } from "../llm/types";
import { bindingId } from "../llm/types";
import type {
  FallbackEvent,
  FallbackOutcome,
  FallbackState,
  TerminalFallbackState,
} from "./types";

export type AttemptFn = (binding: ProviderBinding, index: number) => Promise<string>;

export class InvalidTransitionError extends Error {
  constructor(state: FallbackState, event: FallbackEvent) {
    super(`Cannot apply "${event.type}" in state ${state.status}`);
    this.name = "InvalidTransitionError";
  }
}

/**
 * Pure transition function over the controller's states.
 */
export function transition(
  state: FallbackState,
  event: FallbackEvent,
  candidateCount: number
): FallbackState {
  switch (state.status) {
    case "NOT_STARTED":
      if (event.type === "start") {
        return candidateCount > 0 ? { status: "TRYING", index: 0 } : { status: "EXHAUSTED" };
      }
      if (event.type === "cancel") return { status: "CANCELLED" };
      break;

    case "TRYING":
      if (event.type === "success") return { status: "SUCCEEDED", index: state.index };
      if (event.type === "failure") {
        return state.index + 1 < candidateCount
          ? { status: "TRYING", index: state.index + 1 }
          : { status: "EXHAUSTED" };
      }
      if (event.type === "cancel") return { status: "CANCELLED" };
      break;

    default:
      break;
  }
  throw new InvalidTransitionError(state, event);
}

export function isTerminal(state: FallbackState): state is TerminalFallbackState {
  return (
    state.status === "SUCCEEDED" || state.status === "EXHAUSTED" || state.status === "CANCELLED"
  );
}

export class FallbackController {
  private current: FallbackState = { status: "NOT_STARTED" };
  private readonly history: FallbackState[] = [{ status: "NOT_STARTED" }];

  constructor(private readonly candidates: readonly ProviderBinding[]) {}

  get state(): FallbackState {
    return this.current;
  }

  /** Every state visited, in order */
  get states(): readonly FallbackState[] {
    return this.history;
  }

  private apply(event: FallbackEvent): FallbackState {
    this.current = transition(this.current, event, this.candidates.length);
    this.history.push(this.current);
    return this.current;
  }

  async run(attempt: AttemptFn, options: { signal?: AbortSignal } = {}): Promise<FallbackOutcome> {
    const { signal } = options;
    const attempts: AttemptRecord[] = [];
    let content: string | null = null;
    let binding: ProviderBinding | null = null;

    let state = this.apply(signal?.aborted ? { type: "cancel" } : { type: "start" });

    while (state.status === "TRYING") {
      if (signal?.aborted) {
        state = this.apply({ type: "cancel" });
        break;
      }

      const index = state.index;
      const candidate = this.candidates[index];
      const startTime = Date.now();

      try {
        content = await attempt(candidate, index);
        binding = candidate;
        attempts.push({
          model: candidate.model,
          provider: candidate.provider,
          tier: candidate.tier,
          ok: true,
          latencyMs: Date.now() - startTime,
        });
        state = this.apply({ type: "success" });
      } catch (err) {
        const base = {
          model: candidate.model,
          provider: candidate.provider,
          tier: candidate.tier,
          ok: false,
          latencyMs: Date.now() - startTime,
        };

        // The caller gave up; the provider did not fail
        if (signal?.aborted) {
          attempts.push({ ...base, cancelled: true });
          reportInfo("Attempt cancelled by caller", {
            context: "fallback",
            candidate: bindingId(candidate),
            index,
          });
          state = this.apply({ type: "cancel" });
          continue;
        }

        const error = toProviderError(err, candidate.provider);
        attempts.push({ ...base, errorKind: error.kind, message: error.message });

        const meta = {
          context: "fallback",
          candidate: bindingId(candidate),
          index,
          remaining: this.candidates.length - index - 1,
          kind: error.kind,
        };
        if (error.isConfigurationDefect) {
          reportError(error, { ...meta, defect: "configuration" });
        } else {
          reportWarning(`Candidate failed: ${error.message}`, meta);
        }

        state = this.apply({ type: "failure" });
      }
    }

    if (!isTerminal(state)) {
      throw new InvalidTransitionError(state, { type: "start" });
    }

    if (state.status === "EXHAUSTED") {
      reportError(new Error("All providers exhausted"), {
        context: "fallback",
        candidates: this.candidates.map(bindingId),
        attempts: attempts.length,
      });
    }

    return { state, content, binding, attempts };
  }
}
