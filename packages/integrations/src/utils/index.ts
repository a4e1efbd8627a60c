/**
 * Utility Functions
 * Rate limiting, backoff, results, clocks and logging
 */

// Rate limiter exports
export {
  CostRateLimiter,
  DEFAULT_COST_LIMITS,
  type RateLimitState,
  type CostRateLimiterOptions,
} from './rate-limiter.js';

// Backoff exports
export {
  BackoffPolicy,
  calculateBackoffDelay,
  DEFAULT_BACKOFF_OPTIONS,
  type BackoffOptions,
} from './backoff.js';

// Result exports
export {
  ok,
  err,
  apiError,
  isRetryableKind,
  describeError,
  CommerceApiError,
  type Result,
  type ApiError,
  type SyncErrorKind,
} from './result.js';

// Clock exports
export { systemClock, ManualClock, type Clock } from './clock.js';

// Logger exports
export { createLogger, type Logger } from './logger.js';
