/**
 * Types for fallback routing
 */

import type { AttemptRecord, ProviderBinding, PromptKind } from "../llm/types";

export type FallbackState =
  | { status: "NOT_STARTED" }
  | { status: "TRYING"; index: number }
  | { status: "SUCCEEDED"; index: number }
  | { status: "EXHAUSTED" }
  | { status: "CANCELLED" };

export type TerminalFallbackState = Extract<
  FallbackState,
  { status: "SUCCEEDED" | "EXHAUSTED" | "CANCELLED" }
>;

export type FallbackEvent =
  | { type: "start" }
  | { type: "success" }
  | { type: "failure" }
  | { type: "cancel" };

export interface FallbackOutcome {
  state: TerminalFallbackState;
  content: string | null;
  binding: ProviderBinding | null;
  attempts: AttemptRecord[];
}

export interface DispatchRequest {
  text: string;
  analysisType: PromptKind;
  /** Free-form instructions for the "custom" analysis type */
  instructions?: string;
  /** Reply tone for "draft_reply", e.g. "professional" or "friendly" */
  tone?: string;
}
