import { ErrorCode, ErrorMessages } from "@lintcase/shared-types";

/**
 * Debugging context for error tracing. Logged (through safeContext), never
 * part of the user-facing message.
 */
export interface ErrorContext {
  // Correlation - where the error happened
  source?: string;
  caseName?: string;
  ruleId?: string;
  dialect?: string;

  // Operational details
  operation?: string;
  timeoutMs?: number;
  modulePath?: string;
}

/**
 * Specific problems attached to an error. These ARE shown to the user.
 */
export interface AppErrorExtensions {
  /** One entry per problem, e.g. "test_fail_simple: fix_str requires fail_str" */
  violations?: string[];
}

/**
 * Centralized error class for harness errors.
 *
 * The message is derived from the error code so every user-facing text is
 * auditable in error-messages.ts.
 *
 * @param code - Error code from ErrorCode enum
 * @param cause - Original error for error chaining
 * @param context - Debugging context (logged, never in the message)
 * @param extensions - Problem details shown to the user
 */
export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    readonly cause?: unknown,
    readonly context?: ErrorContext,
    readonly extensions?: AppErrorExtensions,
  ) {
    super(ErrorMessages[code]);
    this.name = "AppError";
  }
}
