/**
 * Error codes shared by the fixture loader, the runner and the CLI.
 *
 * Load-time and run-level codes abort processing; case-level codes
 * (RULE_ENGINE_TIMEOUT, ASSERTION_FAILED) are recorded per case.
 */
export enum ErrorCode {
  // Fixture loading
  MALFORMED_FIXTURE = "MALFORMED_FIXTURE",

  // Rule engine boundary
  RULE_ENGINE_UNAVAILABLE = "RULE_ENGINE_UNAVAILABLE",
  RULE_ENGINE_TIMEOUT = "RULE_ENGINE_TIMEOUT",

  // Case evaluation
  ASSERTION_FAILED = "ASSERTION_FAILED",

  // Run control
  RUN_CANCELLED = "RUN_CANCELLED",

  // Infrastructure
  CONFIG_ERROR = "CONFIG_ERROR",
  UNKNOWN = "UNKNOWN",
}
