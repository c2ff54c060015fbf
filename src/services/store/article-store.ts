import type { RetryState } from '../scheduler/transition.js';

export interface ArticleRef {
  readonly id: string;
  readonly wrappedLink: string;
}

/**
 * Persistence port for retry bookkeeping. Writes carry the version the
 * caller read and resolve `false` without writing when the stored version
 * has moved on.
 */
export interface ArticleStore {
  getRetryState(articleId: string): Promise<RetryState | undefined>;

  /**
   * Replaces the stored state with `next`, as computed by
   * `transitionRetryState`, if the stored version is still `expectedVersion`
   */
  saveRetryState(
    articleId: string,
    next: RetryState,
    expectedVersion: number
  ): Promise<boolean>;

  /**
   * Pending articles whose `nextRetryAt` is at or before `now`, oldest first
   */
  findDueForRetry(now: Date): Promise<ArticleRef[]>;
}
