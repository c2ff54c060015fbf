import {
  NotFoundError,
  RetryStateConflictError,
} from '../../errors/app-error.js';
import {
  type RetryPolicyConfig,
  resolveRetryPolicy,
} from '../../schemas/options.js';
import type {
  FailureClass,
  ResolutionFailure,
  ResolutionOutcome,
} from '../../types/resolution.js';
import type { Clock } from '../../utils/timer-utils.js';
import { logDebug, logError, logInfo, logWarn } from '../logger.js';
import type { ArticleRef, ArticleStore } from '../store/article-store.js';
import { computeBackoff, type RandomSource } from './backoff.js';
import { classifyFailure } from './classify.js';
import {
  type AttemptResult,
  attemptResultFromOutcome,
  decideFailure,
  failedAttempt,
  type ScheduleDecision,
  transitionRetryState,
  type TransitionPolicy,
} from './transition.js';

export interface SchedulerDeps {
  clock?: Clock;
  random?: RandomSource;
}

/**
 * Turns resolution outcomes into retry bookkeeping. State transitions are
 * computed by `transitionRetryState` and written back with a version check,
 * so two schedulers racing on one article cannot both apply.
 */
export class ResolutionRetryScheduler {
  readonly policy: RetryPolicyConfig;
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly transitionPolicy: TransitionPolicy;

  constructor(
    private readonly store: ArticleStore,
    policy: Partial<RetryPolicyConfig> = {},
    deps: SchedulerDeps = {}
  ) {
    this.policy = resolveRetryPolicy(policy);
    this.clock = deps.clock ?? Date.now;
    this.random = deps.random ?? Math.random;
    this.transitionPolicy = {
      maxRetries: this.policy.maxRetries,
      computeDelay: (retryCount) => this.nextDelay(retryCount),
    };
  }

  classify(failure: ResolutionFailure | string): FailureClass {
    return classifyFailure(failure);
  }

  /** Seconds until the next attempt after `retryCount` prior retries. */
  nextDelay(retryCount: number): number {
    return computeBackoff(retryCount, this.policy, this.random);
  }

  /**
   * Decision for a failure without touching the store.
   */
  enqueue(
    articleRef: ArticleRef,
    failure: ResolutionFailure | string,
    retryCount: number
  ): ScheduleDecision {
    const attempt = failedAttempt(failure);
    const decision = decideFailure(
      retryCount,
      attempt.failure,
      attempt.error,
      this.transitionPolicy,
      this.now()
    );
    logDebug('Retry decision computed', {
      articleId: articleRef.id,
      action: decision.action,
    });
    return decision;
  }

  async report(
    articleId: string,
    outcome: ResolutionOutcome
  ): Promise<ScheduleDecision> {
    return this.apply(articleId, attemptResultFromOutcome(outcome));
  }

  async markComplete(
    articleId: string,
    canonicalUrl: string
  ): Promise<ScheduleDecision> {
    return this.apply(articleId, { ok: true, canonicalUrl });
  }

  async markFailed(
    articleId: string,
    error: ResolutionFailure | string
  ): Promise<ScheduleDecision> {
    return this.apply(articleId, failedAttempt(error));
  }

  async getPendingRetries(now: Date = this.now()): Promise<ArticleRef[]> {
    return this.store.findDueForRetry(now);
  }

  private now(): Date {
    return new Date(this.clock());
  }

  private async apply(
    articleId: string,
    result: AttemptResult
  ): Promise<ScheduleDecision> {
    const state = await this.store.getRetryState(articleId);
    if (!state) {
      throw new NotFoundError(`Retry state for article ${articleId}`);
    }

    const { decision, next } = transitionRetryState(
      state,
      result,
      this.transitionPolicy,
      this.now()
    );
    if (decision.action !== 'ignore') {
      const applied = await this.store.saveRetryState(
        articleId,
        next,
        state.version
      );
      if (!applied) throw new RetryStateConflictError(articleId);
    }

    this.logDecision(articleId, decision);
    return decision;
  }

  private logDecision(articleId: string, decision: ScheduleDecision): void {
    switch (decision.action) {
      case 'complete':
        logInfo('Article resolved', {
          articleId,
          url: decision.canonicalUrl,
        });
        return;
      case 'schedule':
        logWarn('Resolution failed, retry scheduled', {
          articleId,
          retryCount: decision.retryCount,
          nextRetryAt: decision.nextRetryAt.toISOString(),
          error: decision.error,
        });
        return;
      case 'terminate':
        logError('Resolution failed permanently', {
          articleId,
          reason: decision.reason,
          error: decision.error,
        });
        return;
      case 'ignore':
        logDebug('Outcome ignored for terminal article', { articleId });
        return;
    }
  }
}
