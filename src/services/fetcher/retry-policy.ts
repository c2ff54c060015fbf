import {
  AppError,
  DecodeError,
  SecurityRejectionError,
} from '../../errors/app-error.js';
import type { ResolutionFailure } from '../../types/resolution.js';
import { type Sleep, sleep as defaultSleep } from '../../utils/timer-utils.js';
import { logDebug } from '../logger.js';

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  sleep?: Sleep;
  shouldRetry?: (error: AppError) => boolean;
}

function isRetryableByDefault(error: AppError): boolean {
  if (error instanceof SecurityRejectionError) return false;
  return !(error instanceof DecodeError && error.failure.kind === 'blocked');
}

/**
 * Retries a whole operation with pure exponential delays
 * (`baseDelayMs * 2^attempt`, no jitter).
 */
export class RetryPolicy {
  private readonly maxAttempts: number;
  private readonly sleep: Sleep;
  private readonly shouldRetry: (error: AppError) => boolean;

  constructor(
    private readonly options: RetryPolicyOptions,
    private readonly url: string
  ) {
    this.maxAttempts = Math.min(Math.max(1, options.maxAttempts), 10);
    this.sleep = options.sleep ?? defaultSleep;
    this.shouldRetry = options.shouldRetry ?? isRetryableByDefault;
  }

  async execute<T>(operation: (attempt: number) => Promise<T>): Promise<T> {
    let lastError: AppError | undefined;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        const normalized = this.normalizeError(error);
        if (!this.shouldRetry(normalized)) throw normalized;
        lastError = normalized;

        if (attempt + 1 < this.maxAttempts) {
          const delay = this.calculateDelay(attempt);
          logDebug('Retrying request', {
            url: this.url,
            attempt: attempt + 1,
            delay: `${delay}ms`,
            error: normalized.message,
          });
          await this.sleep(delay);
        }
      }
    }

    throw this.buildFinalError(lastError);
  }

  calculateDelay(attempt: number): number {
    return this.options.baseDelayMs * 2 ** attempt;
  }

  private normalizeError(error: unknown): AppError {
    if (error instanceof AppError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new DecodeError({ kind: 'unclassified', message }, this.url);
  }

  private buildFinalError(error: AppError | undefined): DecodeError {
    const failure: ResolutionFailure =
      error instanceof DecodeError
        ? error.failure
        : { kind: 'unclassified', message: error?.message ?? 'Unknown error' };
    const detail = error?.message ?? 'Unknown error';
    return new DecodeError(
      failure,
      this.url,
      `Failed to decode after ${this.maxAttempts} attempts: ${detail}`
    );
  }
}
