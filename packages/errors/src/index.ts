export { AppError, errorMessage } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  NotFoundError,
  ValidationError,
  RateLimitedError,
  ExternalServiceError,
  DimensionMismatchError,
  PreflightBlockedError,
  ChunkingError,
  TokenizerUnavailableError,
} from "./errors.js";

export { RetryPolicy, withRetry, isRetryableError } from "./retry.js";
export type { RetryPolicyOptions, RetryOptions, RetryAttemptInfo, RetryOutcome } from "./retry.js";
