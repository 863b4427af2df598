import { ErrorCode } from "@lintcase/shared-types";
import { z } from "zod";

import { AppError } from "../common/errors";

export const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
] as const;

export const DEFAULT_CASE_TIMEOUT_MS = 10_000;
export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_DIALECT = "ansi";

// =============================================================================
// Capability Schemas
// =============================================================================

/**
 * Infrastructure schema - runtime mode and logging.
 */
export const infrastructureSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  LOG_FORMAT: z.enum(["json", "text"]).default("text"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

/**
 * Runner schema - how cases are evaluated against the rule engine.
 */
export const runnerSchema = z.object({
  LINT_CASE_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_CASE_TIMEOUT_MS),
  LINT_CONCURRENCY: z.coerce
    .number()
    .int()
    .min(1)
    .max(64)
    .default(DEFAULT_CONCURRENCY),
  LINT_DEFAULT_DIALECT: z
    .string()
    .min(1, "LINT_DEFAULT_DIALECT must not be empty")
    .default(DEFAULT_DIALECT),
});

// =============================================================================
// Application Schema
// =============================================================================

/**
 * Harness environment schema.
 * Composes: infrastructure + runner
 */
export const harnessEnvSchema = infrastructureSchema.merge(runnerSchema);

export type HarnessEnv = z.infer<typeof harnessEnvSchema>;

/**
 * Validates the process environment at start-up.
 *
 * @example
 * ```typescript
 * const env = validateHarnessEnv(process.env);
 * ```
 */
export function validateHarnessEnv(env: Record<string, unknown>): HarnessEnv {
  const result = harnessEnvSchema.safeParse(env);
  if (!result.success) {
    throw new AppError(
      ErrorCode.CONFIG_ERROR,
      result.error,
      { operation: "validateHarnessEnv" },
      {
        violations: result.error.issues.map(
          (issue) => `${issue.path.join(".")}: ${issue.message}`,
        ),
      },
    );
  }
  return result.data;
}
