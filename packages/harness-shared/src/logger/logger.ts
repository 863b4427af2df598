import pino, { type Logger, type LoggerOptions } from "pino";

import type { HarnessEnv } from "../config/env.schema";

/**
 * Config and context paths that must be redacted from logs. Rule options
 * may carry templater credentials, so any nesting depth is covered.
 * Exported for testing to prevent regression.
 */
export const REDACTED_FIELD_PATHS = [
  "password",
  "token",
  "secret",
  "*.password",
  "*.token",
  "*.secret",
  "config.*.password",
  "config.*.secret",
] as const;

/**
 * Creates pino options based on environment settings.
 * JSON lines in production or with LOG_FORMAT=json, pino-pretty otherwise.
 * Exported for testing.
 */
export function createLoggerOptions(
  nodeEnv: string | undefined,
  logFormat: string | undefined,
  logLevel: string | undefined,
): LoggerOptions {
  const isProduction = nodeEnv === "production";
  const useJson = logFormat === "json" || isProduction;

  return {
    name: "lintcase",
    level: logLevel ?? (isProduction ? "info" : "debug"),
    transport: useJson
      ? undefined
      : {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "SYS:standard" },
        },
    redact: {
      paths: [...REDACTED_FIELD_PATHS],
      censor: "[REDACTED]",
    },
    base: { service: "lintcase" },
  };
}

export function createLogger(
  env: Pick<HarnessEnv, "NODE_ENV" | "LOG_FORMAT" | "LOG_LEVEL">,
): Logger {
  return pino(createLoggerOptions(env.NODE_ENV, env.LOG_FORMAT, env.LOG_LEVEL));
}

/**
 * Logger that drops everything, for tests and library callers that do not
 * pass their own.
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

export type { Logger };
