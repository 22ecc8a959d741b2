/**
 * Logging
 *
 * Structured JSON logging to the console, one record per line.
 * Debug records are dropped in production, and below SATKIT_LOG_LEVEL
 * when it is set.
 */

import { LOG_LEVELS, type Logger, type LogLevel } from "@satkit/contracts";

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * The lowest level that is emitted.
 * Read on every call so tests and embedders can change it at runtime.
 */
export function currentLogLevel(): LogLevel {
  const configured = process.env.SATKIT_LOG_LEVEL?.toLowerCase();
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(currentLogLevel());
}

/**
 * Creates a simple structured logger.
 * Prefixes all records with a context identifier.
 */
export function createLogger(context: string): Logger {
  return {
    info(message, data) {
      if (enabled("info")) {
        console.log(JSON.stringify({ level: "info", context, message, ...data }));
      }
    },
    warn(message, data) {
      if (enabled("warn")) {
        console.warn(JSON.stringify({ level: "warn", context, message, ...data }));
      }
    },
    error(message, data) {
      console.error(JSON.stringify({ level: "error", context, message, ...data }));
    },
    debug(message, data) {
      if (enabled("debug")) {
        console.debug(JSON.stringify({ level: "debug", context, message, ...data }));
      }
    },
  };
}
