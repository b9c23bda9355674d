// Logger
export { ConsoleLogger, createLogger } from "./logger.js";
// Rate limiter
export { createRateLimiter, TokenBucketRateLimiter } from "./rate-limiter.js";
export type { RetryOptions } from "./retry.js";
// Retry helper
export {
  errorMessage,
  errorStatus,
  isRetryableError,
  withRetry,
} from "./retry.js";
// Types
export type {
  Logger,
  LogLevel,
  RateLimiter,
  RateLimiterConfig,
  RunError,
} from "./types.js";
