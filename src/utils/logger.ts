/**
 * Structured logging via pino.
 * Credential-looking fields are redacted before they reach any transport.
 */

import pino from "pino";
import type { Logger } from "pino";
import { join } from "node:path";
import { getLogDir } from "./pathResolver.js";

const REDACT_PATHS = [
  "token",
  "apiKey",
  "password",
  "secret",
  "authorization",
  "*.token",
  "*.apiKey",
  "*.password",
  "*.secret",
];

/** Level names accepted on the command line and in `app.log_level`. */
export const CLI_LOG_LEVELS = ["DEBUG", "INFO", "WARNING", "ERROR", "CRITICAL"] as const;

export type CliLogLevel = (typeof CLI_LOG_LEVELS)[number];

const PINO_LEVELS: Readonly<Record<CliLogLevel, pino.Level>> = {
  DEBUG: "debug",
  INFO: "info",
  WARNING: "warn",
  ERROR: "error",
  CRITICAL: "fatal",
};

export function isCliLogLevel(value: string): value is CliLogLevel {
  return (CLI_LOG_LEVELS as readonly string[]).includes(value);
}

export function toPinoLevel(level: CliLogLevel): pino.Level {
  return PINO_LEVELS[level];
}

const logger = pino({
  name: "strata",
  level: process.env["STRATA_LOG_LEVEL"] ?? "info",
  redact: {
    paths: REDACT_PATHS,
    censor: "[REDACTED]",
  },
  ...(process.env["STRATA_LOG_FILE"] === "1"
    ? {
        transport: {
          target: "pino/file",
          options: { destination: join(getLogDir(), "strata.log"), mkdir: true },
        },
      }
    : {}),
  timestamp: pino.stdTimeFunctions.isoTime,
});

/** Child logger bound to a component or plugin scope. */
export function createLogger(scope: string): Logger {
  return logger.child({ scope });
}

/**
 * Apply a CLI level to the root logger. Child loggers created afterwards
 * inherit it. STRATA_LOG_LEVEL, when set, takes precedence.
 */
export function setLogLevel(level: CliLogLevel): void {
  if (process.env["STRATA_LOG_LEVEL"] !== undefined) return;
  logger.level = toPinoLevel(level);
}

export { logger };
export type { Logger };
