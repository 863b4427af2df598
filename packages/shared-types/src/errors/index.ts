export { ErrorCode } from "./error-codes.js";
export { ErrorMessages } from "./error-messages.js";
