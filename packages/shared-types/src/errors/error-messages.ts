import { ErrorCode } from "./error-codes.js";

/**
 * User-facing message for each error code.
 *
 * Specific problems (offending case names, expected vs. actual text) travel
 * in the error's extensions, never in these messages.
 */
export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCode.MALFORMED_FIXTURE]:
    "Fixture file does not match the test case schema.",

  [ErrorCode.RULE_ENGINE_UNAVAILABLE]: "The rule engine could not be invoked.",
  [ErrorCode.RULE_ENGINE_TIMEOUT]:
    "The rule engine did not answer within the case timeout.",

  [ErrorCode.ASSERTION_FAILED]:
    "The rule engine's result does not match the declared outcome.",

  [ErrorCode.RUN_CANCELLED]: "The run was cancelled.",

  [ErrorCode.CONFIG_ERROR]: "Harness configuration error.",
  [ErrorCode.UNKNOWN]: "An unexpected error occurred.",
};
