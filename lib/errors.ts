/**
 * Centralized Error Reporting
 *
 * Structured logging for the routing pipeline: one JSON line per event on
 * the console, so log aggregators can pick out provider failures,
 * fallbacks and configuration defects by `context` and `level`.
 *
 * Usage:
 *   import { reportError } from "@/lib/errors";
 *   reportError(err, { context: "dispatch", provider: "openai" });
 */

interface ErrorContext {
  /** Pipeline stage (e.g., "routing", "fallback", "provider") */
  context: string;
  [key: string]: unknown;
}

type Level = "error" | "warn" | "info";

const sinks: Record<Level, (line: string) => void> = {
  error: (line) => console.error(line),
  warn: (line) => console.warn(line),
  info: (line) => console.log(line),
};

let silenced = false;

/**
 * Mute all reporting (tests, `--json` CLI output).
 */
export function setReportingSilenced(value: boolean): void {
  silenced = value;
}

function emit(level: Level, message: string, meta: ErrorContext, extra: object = {}): void {
  if (silenced) return;
  try {
    sinks[level](
      JSON.stringify({
        level,
        timestamp: new Date().toISOString(),
        message,
        ...extra,
        ...meta,
      })
    );
  } catch {
    // Metadata that cannot be serialized; never throw from the reporter
    sinks[level](`[${level}] ${message}`);
  }
}

/**
 * Report an error with structured context. Safe to call from catch blocks.
 */
export function reportError(error: unknown, meta: ErrorContext): void {
  const err = error instanceof Error ? error : new Error(String(error));
  emit("error", err.message, meta, {
    name: err.name,
    stack: err.stack?.split("\n").slice(0, 5).join("\n"),
  });
}

/** Non-fatal issue worth investigating (a candidate failed, no providers) */
export function reportWarning(message: string, meta: ErrorContext): void {
  emit("warn", message, meta);
}

/** Routine event (routing decision, provider response) */
export function reportInfo(message: string, meta: ErrorContext): void {
  emit("info", message, meta);
}
