// Errors
export {
  AppError,
  type AppErrorExtensions,
  type ErrorContext,
  describeCause,
  isFatal,
  redactContext,
  safeContext,
  toAppError,
} from "./common/errors";

// Configuration
export {
  harnessEnvSchema,
  infrastructureSchema,
  LOG_LEVELS,
  runnerSchema,
  DEFAULT_CASE_TIMEOUT_MS,
  DEFAULT_CONCURRENCY,
  DEFAULT_DIALECT,
  validateHarnessEnv,
  type HarnessEnv,
} from "./config/env.schema";

// Logging
export {
  createLogger,
  createLoggerOptions,
  createSilentLogger,
  REDACTED_FIELD_PATHS,
  type Logger,
} from "./logger/logger";
