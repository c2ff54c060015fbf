import { RetryStateConflictError } from '../../errors/app-error.js';
import type { LinkDecoder } from '../../types/resolution.js';
import { logInfo, logWarn } from '../logger.js';
import type { ResolutionRetryScheduler } from './scheduler.js';

export interface RetryRunSummary {
  attempted: number;
  resolved: number;
  rescheduled: number;
  failed: number;
  conflicts: number;
}

/**
 * Polls the store for articles whose retry time has passed and re-attempts
 * them one at a time, so the decoder's request spacing holds across the
 * batch.
 */
export class RetryWorker {
  constructor(
    private readonly decoder: LinkDecoder,
    private readonly scheduler: ResolutionRetryScheduler
  ) {}

  async runOnce(now?: Date): Promise<RetryRunSummary> {
    const summary: RetryRunSummary = {
      attempted: 0,
      resolved: 0,
      rescheduled: 0,
      failed: 0,
      conflicts: 0,
    };

    const due = await this.scheduler.getPendingRetries(now);
    for (const article of due) {
      summary.attempted += 1;
      const outcome = await this.decoder.decode(article.wrappedLink);

      try {
        const decision = await this.scheduler.report(article.id, outcome);
        if (decision.action === 'complete') summary.resolved += 1;
        if (decision.action === 'schedule') summary.rescheduled += 1;
        if (decision.action === 'terminate') summary.failed += 1;
      } catch (error) {
        if (!(error instanceof RetryStateConflictError)) throw error;
        summary.conflicts += 1;
        logWarn('Skipped article updated by another worker', {
          articleId: article.id,
        });
      }
    }

    if (summary.attempted > 0) logInfo('Retry run finished', { ...summary });
    return summary;
  }
}
