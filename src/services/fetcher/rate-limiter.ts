import {
  type Clock,
  type Sleep,
  sleep as defaultSleep,
} from '../../utils/timer-utils.js';

/**
 * Gate in front of outbound redirect-follow requests. Swap in a shared
 * implementation when several processes draw from one outbound quota.
 */
export interface RequestSpacer {
  acquire(): Promise<void>;
}

/**
 * Process-local spacing: each caller reserves the next free slot, so
 * consecutive requests start at least `intervalMs` apart. State is lost on
 * restart.
 */
export class IntervalSpacer implements RequestSpacer {
  private nextSlotAt = 0;

  constructor(
    private readonly intervalMs: number,
    private readonly clock: Clock = Date.now,
    private readonly sleep: Sleep = defaultSleep
  ) {}

  async acquire(): Promise<void> {
    const now = this.clock();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.intervalMs;

    const wait = slot - now;
    if (wait > 0) await this.sleep(wait);
  }
}
