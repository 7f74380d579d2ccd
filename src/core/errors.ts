/**
 * Error taxonomy for registrar and reconciliation failures
 */
import { ZodError } from 'zod';

export type RegistrarErrorCode = 'AUTH' | 'RATE_LIMITED' | 'TRANSIENT' | 'VALIDATION' | 'UNKNOWN';

export interface ValidationIssue {
  field: string;
  message: string;
}

/**
 * Base class for every error a registrar or the reconciler surfaces
 */
export class RegistrarError extends Error {
  constructor(
    message: string,
    public readonly code: RegistrarErrorCode = 'UNKNOWN',
    public readonly retryable: boolean = false,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'RegistrarError';
  }
}

/**
 * Bad or insufficient credentials. Never retried.
 */
export class AuthError extends RegistrarError {
  constructor(message: string, status?: number) {
    super(message, 'AUTH', false, status);
    this.name = 'AuthError';
  }
}

/**
 * The registrar is throttling us. Retried after backing off.
 */
export class RateLimitedError extends RegistrarError {
  constructor(
    message: string,
    public readonly retryAfterMs?: number,
    status: number = 429
  ) {
    super(message, 'RATE_LIMITED', true, status);
    this.name = 'RateLimitedError';
  }
}

/**
 * Network failure or server-side error. Retried.
 */
export class TransientError extends RegistrarError {
  constructor(message: string, status?: number) {
    super(message, 'TRANSIENT', true, status);
    this.name = 'TransientError';
  }
}

/**
 * Malformed record, desired-state file or configuration. Never retried.
 */
export class ValidationError extends RegistrarError {
  constructor(
    message: string,
    public readonly details: ValidationIssue[] = [],
    status?: number
  ) {
    super(message, 'VALIDATION', false, status);
    this.name = 'ValidationError';
  }

  static fromZod(error: ZodError, context: string): ValidationError {
    const details = formatZodError(error);
    const summary = details.map((d) => (d.field ? `${d.field}: ${d.message}` : d.message)).join('; ');
    return new ValidationError(`${context}: ${summary}`, details);
  }
}

/**
 * Format Zod validation errors
 */
export function formatZodError(error: ZodError): ValidationIssue[] {
  return error.errors.map((err) => ({
    field: err.path.join('.'),
    message: err.message,
  }));
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }

  const date = Date.parse(value);
  if (isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

/**
 * Map an HTTP status from a provider API onto the error taxonomy
 */
export function errorFromStatus(status: number, message: string, retryAfterMs?: number): RegistrarError {
  if (status === 401 || status === 403) {
    return new AuthError(message, status);
  }
  if (status === 429) {
    return new RateLimitedError(message, retryAfterMs, status);
  }
  if (status === 408 || status >= 500) {
    return new TransientError(message, status);
  }
  if (status >= 400) {
    return new ValidationError(message, [], status);
  }
  return new RegistrarError(message, 'UNKNOWN', false, status);
}

/**
 * Wrap anything thrown into a RegistrarError
 */
export function toRegistrarError(error: unknown): RegistrarError {
  if (error instanceof RegistrarError) {
    return error;
  }
  if (error instanceof ZodError) {
    return ValidationError.fromZod(error, 'Invalid data');
  }
  const message = error instanceof Error ? error.message : String(error);
  return new RegistrarError(message);
}
