/**
 * Logging Contract
 *
 * The structured logger used throughout the client. The platform provides
 * the console implementation (createLogger); embedders may pass their own.
 */

/**
 * Structured logger.
 * `data` is merged into the emitted record, so keep its keys flat.
 */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

/** Severity levels, lowest first */
export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
