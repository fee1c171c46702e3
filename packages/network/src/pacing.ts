/**
 * Pacing Policy
 *
 * Human-looking rhythm on top of the rate window: a short random pause
 * between result pages and a longer break every few dozen items.
 */

import {
  createLogger,
  formatDuration,
  randomBetween,
  randomIntBetween,
  sleep as defaultSleep,
  type SleepFn,
} from '@mediafetch/utils';

const log = createLogger({ component: 'pacing' });

interface Range {
  min: number;
  max: number;
}

export interface PacingOptions {
  pageDelayMs?: Range;
  breakEveryItems?: Range;
  breakDurationMs?: Range;
  sleep?: SleepFn;
  random?: () => number;
}

export class PacingPolicy {
  private readonly pageDelayMs: Range;
  private readonly breakEveryItems: Range;
  private readonly breakDurationMs: Range;
  private readonly sleep: SleepFn;
  private readonly random: () => number;

  private itemsSinceBreak = 0;
  private nextBreakAt: number;

  constructor(options: PacingOptions = {}) {
    this.pageDelayMs = options.pageDelayMs ?? { min: 1_000, max: 3_000 };
    this.breakEveryItems = options.breakEveryItems ?? { min: 50, max: 80 };
    this.breakDurationMs = options.breakDurationMs ?? { min: 10_000, max: 30_000 };
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.nextBreakAt = this.drawBreakInterval();
  }

  /**
   * No waiting at all, for tests and one-shot tools
   */
  static none(): PacingPolicy {
    return new PacingPolicy({
      pageDelayMs: { min: 0, max: 0 },
      breakEveryItems: { min: Number.MAX_SAFE_INTEGER, max: Number.MAX_SAFE_INTEGER },
      breakDurationMs: { min: 0, max: 0 },
    });
  }

  async beforeNextPage(signal?: AbortSignal): Promise<void> {
    await this.sleep(randomBetween(this.pageDelayMs.min, this.pageDelayMs.max, this.random), signal);
  }

  async afterItem(signal?: AbortSignal): Promise<void> {
    this.itemsSinceBreak++;
    if (this.itemsSinceBreak < this.nextBreakAt) {
      return;
    }

    const duration = randomBetween(this.breakDurationMs.min, this.breakDurationMs.max, this.random);
    log.info({ items: this.itemsSinceBreak }, `Pausing for ${formatDuration(duration)}`);
    this.itemsSinceBreak = 0;
    this.nextBreakAt = this.drawBreakInterval();
    await this.sleep(duration, signal);
  }

  private drawBreakInterval(): number {
    return randomIntBetween(this.breakEveryItems.min, this.breakEveryItems.max, this.random);
  }
}
