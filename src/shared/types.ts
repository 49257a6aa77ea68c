/**
 * Shared types for stepline.
 */

// ---------------------------------------------------------------------------
// Log Entry
// ---------------------------------------------------------------------------

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  /** ISO-8601 timestamp. */
  ts: string;
  /** Severity level. */
  level: LogLevel;
  /** Tool that emitted the log (e.g. "synth"). */
  tool: string;
  /** Step running when the log was emitted, if any. */
  step: string;
  /** Human-readable message. */
  msg: string;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}
