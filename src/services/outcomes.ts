import {
  DecodeError,
  SecurityRejectionError,
} from '../errors/app-error.js';
import type {
  BlockedOutcome,
  EncodingVariant,
  FailedOutcome,
  ResolutionFailure,
  ResolvedOutcome,
  ResolutionOutcome,
} from '../types/resolution.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { describeFailure } from './failures.js';
import { logError, logWarn } from './logger.js';

export function resolvedOutcome(
  url: string,
  variant: EncodingVariant
): ResolvedOutcome {
  const outcome: ResolvedOutcome = { status: 'resolved', url, variant };
  return Object.freeze(outcome);
}

export function blockedOutcome(reason: string, url?: string): BlockedOutcome {
  const outcome: BlockedOutcome =
    url === undefined
      ? { status: 'blocked', reason }
      : { status: 'blocked', reason, url };
  return Object.freeze(outcome);
}

export function failedOutcome(
  failure: ResolutionFailure,
  message: string = describeFailure(failure)
): FailedOutcome {
  const outcome: FailedOutcome = { status: 'failed', failure, message };
  return Object.freeze(outcome);
}

/**
 * Converts an error raised while decoding `wrappedLink` into an outcome.
 */
export function toOutcome(
  error: unknown,
  wrappedLink: string
): ResolutionOutcome {
  if (error instanceof SecurityRejectionError) {
    logWarn('Resolved URL rejected by safety check', {
      wrappedLink,
      url: error.url,
      reason: error.reason,
    });
    return blockedOutcome(error.reason, error.url);
  }

  if (error instanceof DecodeError) {
    if (error.failure.kind === 'blocked') {
      return blockedOutcome(error.failure.reason, error.url);
    }
    return failedOutcome(error.failure, error.message);
  }

  const message = getErrorMessage(error);
  logError('Unexpected error while decoding link', {
    wrappedLink,
    error: message,
  });
  return failedOutcome({ kind: 'unclassified', message });
}
