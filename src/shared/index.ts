/**
 * Shared utilities for stepline.
 */
export type { LogEntry, LogLevel } from "./types.js";
export { LOG_LEVELS, isLogLevel } from "./types.js";
export { Logger, createLogger } from "./logger.js";
export type { LoggerContext, LoggerOptions } from "./logger.js";
export { redactSecrets } from "./redact.js";
