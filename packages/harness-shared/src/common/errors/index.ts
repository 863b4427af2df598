export {
  AppError,
  type AppErrorExtensions,
  type ErrorContext,
} from "./app-error";
export { isFatal } from "./error-policy";
export { redactContext, safeContext } from "./redact-context";
export { describeCause, toAppError } from "./wrap-error";
