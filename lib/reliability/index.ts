/**
 * Reliability Utilities
 *
 * Retry and timeout patterns for external API calls.
 */

export {
  AttemptTimeoutError,
  type RetryAttempt,
  type RetryConfig,
  type RetryNotice,
  type Sleep,
  calculateBackoff,
  defaultSleep,
  getErrorStatus,
  isRetryableError,
  isTransientStatus,
  withRetry,
  withTimeout,
} from './client_wrap';
