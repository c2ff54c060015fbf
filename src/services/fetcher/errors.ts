import { isAxiosError } from 'axios';

import {
  AppError,
  DecodeError,
  SecurityRejectionError,
} from '../../errors/app-error.js';
import type { ResolutionFailure } from '../../types/resolution.js';

const TIMEOUT_CODES: ReadonlySet<string> = new Set([
  'ECONNABORTED',
  'ETIMEDOUT',
]);

export function parseRetryAfter(header: unknown): number | undefined {
  if (typeof header !== 'string' && typeof header !== 'number') {
    return undefined;
  }
  const parsed = Number.parseInt(String(header), 10);
  return Number.isNaN(parsed) || parsed < 0 ? undefined : parsed;
}

export function failureForStatus(
  status: number,
  retryAfter?: unknown
): ResolutionFailure {
  if (status === 429) {
    const retryAfterSeconds = parseRetryAfter(retryAfter);
    return retryAfterSeconds === undefined
      ? { kind: 'rate-limited' }
      : { kind: 'rate-limited', retryAfterSeconds };
  }
  return { kind: 'http-status', status };
}

function failureForTransportError(
  error: unknown,
  timeoutMs: number
): ResolutionFailure {
  if (isAxiosError(error)) {
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return { kind: 'timeout', timeoutMs };
    }
    if (error.response) {
      return failureForStatus(
        error.response.status,
        error.response.headers['retry-after']
      );
    }
    return error.code
      ? { kind: 'network', message: error.message, code: error.code }
      : { kind: 'network', message: error.message };
  }

  if (error instanceof Error) {
    if (error.name === 'TimeoutError') return { kind: 'timeout', timeoutMs };
    return { kind: 'network', message: error.message };
  }
  return { kind: 'unclassified', message: 'Unexpected error' };
}

// Socket-level rejections arrive wrapped by the HTTP client.
function findSecurityRejection(
  error: unknown
): SecurityRejectionError | undefined {
  let current = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if (current instanceof SecurityRejectionError) return current;
    current = current.cause;
  }
  return undefined;
}

/**
 * Converts whatever the HTTP layer threw into a typed error. Application
 * errors (including safety rejections of a redirect hop) pass through.
 */
export function mapRequestError(
  error: unknown,
  url: string,
  timeoutMs: number
): AppError {
  if (error instanceof AppError) return error;
  const rejection = findSecurityRejection(error);
  if (rejection) return new SecurityRejectionError(rejection.reason, url);
  return new DecodeError(failureForTransportError(error, timeoutMs), url);
}
