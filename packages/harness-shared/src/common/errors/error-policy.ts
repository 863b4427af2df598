import { ErrorCode } from "@lintcase/shared-types";

import { AppError } from "./app-error";

/**
 * Fatal errors stop the whole run: nothing after them can produce a
 * meaningful result (bad fixture data, no engine, bad configuration).
 */
const FATAL_CODES = new Set<ErrorCode>([
  ErrorCode.MALFORMED_FIXTURE,
  ErrorCode.RULE_ENGINE_UNAVAILABLE,
  ErrorCode.RUN_CANCELLED,
  ErrorCode.CONFIG_ERROR,
]);

export function isFatal(error: unknown): boolean {
  if (!(error instanceof AppError)) {
    return false;
  }
  return FATAL_CODES.has(error.code);
}
