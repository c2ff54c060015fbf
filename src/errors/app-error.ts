import { describeFailure } from '../services/failures.js';
import type { ResolutionFailure } from '../types/resolution.js';

/**
 * Base application error class with status code support
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;

  constructor(
    message: string,
    statusCode = 500,
    code = 'INTERNAL_ERROR',
    isOperational = true
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Not found error (404)
 */
export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 404, 'NOT_FOUND');
  }
}

/**
 * Validation error (400)
 */
export class ValidationError extends AppError {
  public readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR');
    this.details = details;
  }
}

/**
 * Outbound URL rejected by the safety gate. Never retried.
 */
export class SecurityRejectionError extends AppError {
  public readonly url: string;
  public readonly reason: string;

  constructor(reason: string, url: string) {
    super(reason, 403, 'BLOCKED_URL');
    this.url = url;
    this.reason = reason;
  }

  toFailure(): ResolutionFailure {
    return { kind: 'blocked', reason: this.reason };
  }
}

/**
 * A wrapped link could not be decoded
 */
export class DecodeError extends AppError {
  public readonly url: string;
  public readonly failure: ResolutionFailure;

  constructor(failure: ResolutionFailure, url: string, message?: string) {
    super(message ?? describeFailure(failure), 422, 'DECODE_FAILED');
    this.url = url;
    this.failure = failure;
  }
}

/**
 * Retry bookkeeping changed between read and write (409)
 */
export class RetryStateConflictError extends AppError {
  public readonly articleId: string;

  constructor(articleId: string) {
    super(
      `Retry state for article ${articleId} was modified concurrently`,
      409,
      'RETRY_STATE_CONFLICT'
    );
    this.articleId = articleId;
  }
}
