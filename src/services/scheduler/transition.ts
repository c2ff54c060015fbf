import type {
  ResolutionFailure,
  ResolutionOutcome,
} from '../../types/resolution.js';
import { describeFailure, failureFromMessage } from '../failures.js';
import { classifyFailure } from './classify.js';

export type RetryStatus = 'pending' | 'success' | 'failed';

export interface RetryState {
  readonly status: RetryStatus;
  readonly retryCount: number;
  readonly nextRetryAt: Date | null;
  readonly lastError: string | null;
  readonly canonicalUrl: string | null;
  /** Bumped by every transition; stores compare it before writing. */
  readonly version: number;
}

export type AttemptResult =
  | { readonly ok: true; readonly canonicalUrl: string }
  | {
      readonly ok: false;
      readonly failure: ResolutionFailure;
      readonly error: string;
    };

export type FailedAttempt = Extract<AttemptResult, { ok: false }>;

export type TerminationReason = 'permanent-error' | 'max-retries-exceeded';

export type ScheduleDecision =
  | { readonly action: 'complete'; readonly canonicalUrl: string }
  | {
      readonly action: 'schedule';
      readonly retryCount: number;
      readonly nextRetryAt: Date;
      readonly delaySeconds: number;
      readonly error: string;
    }
  | {
      readonly action: 'terminate';
      readonly reason: TerminationReason;
      readonly retryCount: number;
      readonly error: string;
    }
  | { readonly action: 'ignore'; readonly reason: 'already-terminal' };

export interface TransitionPolicy {
  readonly maxRetries: number;
  readonly computeDelay: (retryCount: number) => number;
}

export interface Transition {
  readonly decision: ScheduleDecision;
  readonly next: RetryState;
}

export function initialRetryState(): RetryState {
  return {
    status: 'pending',
    retryCount: 0,
    nextRetryAt: null,
    lastError: null,
    canonicalUrl: null,
    version: 0,
  };
}

export function isTerminal(state: RetryState): boolean {
  return state.status !== 'pending';
}

export function failedAttempt(
  error: ResolutionFailure | string
): FailedAttempt {
  if (typeof error === 'string') {
    return { ok: false, failure: failureFromMessage(error), error };
  }
  return { ok: false, failure: error, error: describeFailure(error) };
}

export function attemptResultFromOutcome(
  outcome: ResolutionOutcome
): AttemptResult {
  switch (outcome.status) {
    case 'resolved':
      return { ok: true, canonicalUrl: outcome.url };
    case 'blocked':
      return failedAttempt({ kind: 'blocked', reason: outcome.reason });
    case 'failed':
      return { ok: false, failure: outcome.failure, error: outcome.message };
  }
}

/**
 * Disposition of a failed attempt made with `retryCount` prior retries.
 * The retry cap wins over classification.
 */
export function decideFailure(
  retryCount: number,
  failure: ResolutionFailure,
  error: string,
  policy: TransitionPolicy,
  now: Date
): ScheduleDecision {
  if (retryCount >= policy.maxRetries) {
    return {
      action: 'terminate',
      reason: 'max-retries-exceeded',
      retryCount,
      error,
    };
  }
  if (classifyFailure(failure) === 'permanent') {
    return {
      action: 'terminate',
      reason: 'permanent-error',
      retryCount,
      error,
    };
  }

  const delaySeconds = policy.computeDelay(retryCount);
  return {
    action: 'schedule',
    retryCount: retryCount + 1,
    nextRetryAt: new Date(now.getTime() + delaySeconds * 1000),
    delaySeconds,
    error,
  };
}

function applyDecision(
  state: RetryState,
  decision: ScheduleDecision
): RetryState {
  const version = state.version + 1;
  switch (decision.action) {
    case 'complete':
      return {
        ...state,
        status: 'success',
        nextRetryAt: null,
        lastError: null,
        canonicalUrl: decision.canonicalUrl,
        version,
      };
    case 'schedule':
      return {
        ...state,
        status: 'pending',
        retryCount: decision.retryCount,
        nextRetryAt: decision.nextRetryAt,
        lastError: decision.error,
        version,
      };
    case 'terminate':
      return {
        ...state,
        status: 'failed',
        nextRetryAt: null,
        lastError: decision.error,
        version,
      };
    case 'ignore':
      return state;
  }
}

/**
 * Pure retry-state transition. Terminal states never change; every other
 * transition yields a new state with `version + 1`.
 */
export function transitionRetryState(
  state: RetryState,
  result: AttemptResult,
  policy: TransitionPolicy,
  now: Date
): Transition {
  if (isTerminal(state)) {
    return {
      decision: { action: 'ignore', reason: 'already-terminal' },
      next: state,
    };
  }

  const decision: ScheduleDecision = result.ok
    ? { action: 'complete', canonicalUrl: result.canonicalUrl }
    : decideFailure(
        state.retryCount,
        result.failure,
        result.error,
        policy,
        now
      );

  return { decision, next: applyDecision(state, decision) };
}
