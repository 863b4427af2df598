import { ErrorCode } from "@lintcase/shared-types";

import { AppError, type ErrorContext } from "./app-error";

/**
 * Converts unknown thrown values to AppError. An AppError passes through
 * unchanged; anything else becomes UNKNOWN with the original as cause.
 */
export function toAppError(error: unknown, context?: ErrorContext): AppError {
  if (error instanceof AppError) {
    return error;
  }
  return new AppError(ErrorCode.UNKNOWN, error, context);
}

/**
 * Human-readable description of a cause chain, for logs and CLI output.
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof AppError) {
    const detail = cause.extensions?.violations?.join("; ");
    return detail ? `${cause.message} (${detail})` : cause.message;
  }
  if (cause instanceof Error) {
    return cause.message;
  }
  if (cause === undefined) {
    return "unknown cause";
  }
  return String(cause);
}
