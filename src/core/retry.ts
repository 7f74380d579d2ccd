/**
 * Bounded exponential backoff for registrar calls
 */
import { RateLimitedError, toRegistrarError, type RegistrarError } from './errors.js';

export interface RetryOptions {
  /** Total attempts, including the first one */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Called before sleeping ahead of the next attempt */
  onRetry?: (error: RegistrarError, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  attempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before the attempt following `attempt` (1-based)
 */
export function backoffDelay(attempt: number, error: RegistrarError, options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs'>): number {
  const exponential = options.baseDelayMs * 2 ** (attempt - 1);
  const requested = error instanceof RateLimitedError ? error.retryAfterMs ?? 0 : 0;
  return Math.min(Math.max(exponential, requested), options.maxDelayMs);
}

/**
 * Run `fn`, retrying retryable registrar errors.
 * Anything thrown is rethrown as a RegistrarError.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = DEFAULT_RETRY_OPTIONS): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const attempts = Math.max(1, options.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (thrown) {
      const error = toRegistrarError(thrown);
      if (!error.retryable || attempt >= attempts) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, error, options);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
