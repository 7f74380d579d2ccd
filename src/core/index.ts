/**
 * Core module exports
 */
export { logger, setLogLevel, createChildLogger, type LogLevel } from './Logger.js';
export {
  RegistrarError,
  AuthError,
  RateLimitedError,
  TransientError,
  ValidationError,
  errorFromStatus,
  toRegistrarError,
  parseRetryAfter,
  formatZodError,
  type RegistrarErrorCode,
  type ValidationIssue,
} from './errors.js';
export { withRetry, backoffDelay, DEFAULT_RETRY_OPTIONS, type RetryOptions } from './retry.js';
