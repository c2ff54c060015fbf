import { ValidationError } from '../../errors/app-error.js';
import {
  type RetryPolicyConfig,
  resolveRetryPolicy,
} from '../../schemas/options.js';

export type RandomSource = () => number;

export type BackoffPolicy = Pick<
  RetryPolicyConfig,
  'baseBackoffSeconds' | 'maxJitterSeconds'
>;

/**
 * Seconds to wait before the next attempt:
 * `base * 2^retryCount` plus uniform jitter in `[0, maxJitter)`.
 */
export function computeBackoff(
  retryCount: number,
  policy: BackoffPolicy = resolveRetryPolicy(),
  random: RandomSource = Math.random
): number {
  if (!Number.isInteger(retryCount) || retryCount < 0) {
    throw new ValidationError('Retry count must be a non-negative integer', {
      retryCount,
    });
  }
  const jitter = random() * policy.maxJitterSeconds;
  return policy.baseBackoffSeconds * 2 ** retryCount + jitter;
}
