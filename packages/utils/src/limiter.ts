/**
 * Concurrency Limiter
 * 
 * Bounds how many async sections run at once. With a limit of 1 it is a
 * mutex: sections run strictly one after another in arrival order.
 */

import { AbortError } from './time.js';

export class ConcurrencyLimiter {
  private running = 0;
  private readonly queue: Array<() => void> = [];
  private readonly maxConcurrent: number;

  constructor(maxConcurrent: number = 1) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
    this.maxConcurrent = maxConcurrent;
  }

  /**
   * Acquire a slot, waiting in FIFO order when all slots are taken.
   * A waiter whose signal fires leaves the queue with an AbortError.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new AbortError();
    }
    if (this.running < this.maxConcurrent) {
      this.running++;
      return;
    }

    // the releasing caller hands its slot over without decrementing
    await new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const position = this.queue.indexOf(grant);
        if (position !== -1) {
          this.queue.splice(position, 1);
        }
        reject(new AbortError());
      };
      const grant = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      this.queue.push(grant);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Release a slot, handing it straight to the next waiter if there is one
   */
  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
      return;
    }
    if (this.running > 0) {
      this.running--;
    }
  }

  /**
   * Execute a function with concurrency control
   */
  async execute<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getStatus(): { running: number; queued: number; maxConcurrent: number } {
    return {
      running: this.running,
      queued: this.queue.length,
      maxConcurrent: this.maxConcurrent,
    };
  }
}
