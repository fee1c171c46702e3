/**
 * Rate Limiter
 * 
 * Sliding-window limiter for the metadata API: at most `maxRequests`
 * recorded requests within any `windowMs`, plus a random jitter before
 * every admission so requests do not leave at a regular cadence.
 *
 * `admit()` takes a single-slot gate that only `record()` gives back, so
 * concurrent callers pass the count check and push their timestamp one at
 * a time.
 */

import {
  ConcurrencyLimiter,
  createLogger,
  formatDuration,
  randomBetween,
  sleep as defaultSleep,
  type SleepFn,
} from '@mediafetch/utils';

const log = createLogger({ component: 'rate-limiter' });

export interface RateLimiterOptions {
  maxRequests?: number;
  windowMs?: number;
  jitterMs?: { min: number; max: number };
  now?: () => number;
  sleep?: SleepFn;
  random?: () => number;
}

export interface RateLimiterStats {
  requestsInWindow: number;
  maxRequests: number;
  windowMs: number;
}

export class RateLimiter {
  private readonly timestamps: number[] = [];
  private readonly gate = new ConcurrencyLimiter(1);
  private holdingGate = false;

  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly jitter: { min: number; max: number };
  private readonly now: () => number;
  private readonly sleep: SleepFn;
  private readonly random: () => number;

  constructor(options: RateLimiterOptions = {}) {
    this.maxRequests = options.maxRequests ?? 75;
    this.windowMs = options.windowMs ?? 660_000;
    this.jitter = options.jitterMs ?? { min: 500, max: 5_000 };
    this.now = options.now ?? (() => performance.now());
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Wait until another request fits in the window, then add jitter.
   * The caller must follow up with record().
   */
  async admit(signal?: AbortSignal): Promise<void> {
    await this.gate.acquire(signal);
    this.holdingGate = true;

    try {
      for (;;) {
        const now = this.now();
        this.prune(now);
        if (this.timestamps.length < this.maxRequests) {
          break;
        }
        const oldest = this.timestamps[0] ?? now;
        const waitMs = Math.max(0, oldest + this.windowMs - now);
        log.info(
          { requestsInWindow: this.timestamps.length, waitMs },
          `Rate window full, waiting ${formatDuration(waitMs)}`
        );
        await this.sleep(waitMs, signal);
      }

      await this.sleep(randomBetween(this.jitter.min, this.jitter.max, this.random), signal);
    } catch (error) {
      this.releaseGate();
      throw error;
    }
  }

  /**
   * Record that a request was just issued and let the next caller in
   */
  record(): void {
    this.timestamps.push(this.now());
    this.releaseGate();
  }

  /**
   * admit, run, record
   */
  async schedule<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.admit(signal);
    try {
      return await fn();
    } finally {
      this.record();
    }
  }

  stats(): RateLimiterStats {
    this.prune(this.now());
    return {
      requestsInWindow: this.timestamps.length,
      maxRequests: this.maxRequests,
      windowMs: this.windowMs,
    };
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    while (this.timestamps.length > 0 && (this.timestamps[0] ?? cutoff) <= cutoff) {
      this.timestamps.shift();
    }
  }

  private releaseGate(): void {
    if (this.holdingGate) {
      this.holdingGate = false;
      this.gate.release();
    }
  }
}
