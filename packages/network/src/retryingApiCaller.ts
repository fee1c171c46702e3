/**
 * Retrying API Caller
 * 
 * Runs one metadata request with rate limiting, proxy rotation and
 * backoff. The request function reports what happened as a CallOutcome:
 * - success: returned to the caller
 * - rateLimited: rotate proxy, wait Retry-After (or the default), retry
 * - transient: wait base * 2^attempt (capped), retry
 * - fatal: thrown at once, retrying cannot help
 *
 * When attempts run out an ExhaustedRetriesError carries the last cause.
 * Request functions must be safe to repeat.
 */

import {
  ExhaustedRetriesError,
  RateLimitedError,
  type AttemptContext,
  type CallOutcome,
} from '@mediafetch/core';
import {
  createLogger,
  errorMessage,
  exponentialBackoff,
  formatDuration,
  sleep as defaultSleep,
  type SleepFn,
} from '@mediafetch/utils';
import type { ProxyRotator } from './proxyRotator.js';
import type { RateLimiter } from './rateLimiter.js';

const log = createLogger({ component: 'api-caller' });

export interface RetryEvent {
  endpoint: string;
  attempt: number;
  maxAttempts: number;
  waitMs: number;
  cause: unknown;
}

export interface RetryingApiCallerOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxBackoffMs?: number;
  defaultRetryAfterMs?: number;
  sleep?: SleepFn;
  onRetry?: (event: RetryEvent) => void;
}

export interface CallOptions {
  /** Name of the endpoint, used in logs and the terminal error */
  endpoint: string;
  signal?: AbortSignal;
}

export type AttemptFn<T> = (context: AttemptContext) => Promise<CallOutcome<T>>;

export class RetryingApiCaller {
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxBackoffMs: number;
  private readonly defaultRetryAfterMs: number;
  private readonly sleep: SleepFn;
  private readonly onRetry?: (event: RetryEvent) => void;

  constructor(
    private readonly limiter: RateLimiter,
    private readonly proxies: ProxyRotator,
    options: RetryingApiCallerOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 1_000;
    this.maxBackoffMs = options.maxBackoffMs ?? 60_000;
    this.defaultRetryAfterMs = options.defaultRetryAfterMs ?? 300_000;
    this.sleep = options.sleep ?? defaultSleep;
    this.onRetry = options.onRetry;
  }

  async call<T>(fn: AttemptFn<T>, options: CallOptions): Promise<T> {
    const { endpoint, signal } = options;
    let lastCause: unknown;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      await this.limiter.admit(signal);

      let result: CallOutcome<T>;
      try {
        result = await fn({ attempt, proxy: this.proxies.current(), signal });
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        result = { kind: 'transient', error };
      } finally {
        this.limiter.record();
      }

      // a rate-limited attempt rotates below, which also resets the count
      if (result.kind !== 'rateLimited') {
        this.proxies.requestIssued();
      }

      let waitMs: number;
      switch (result.kind) {
        case 'success':
          return result.value;

        case 'fatal':
          log.error({ endpoint, error: result.error.message }, 'Non-retryable API failure');
          throw result.error;

        case 'rateLimited':
          this.proxies.rotate('on_error');
          lastCause = new RateLimitedError(result.retryAfterMs);
          waitMs = result.retryAfterMs ?? this.defaultRetryAfterMs;
          break;

        case 'transient':
          lastCause = result.error;
          waitMs = exponentialBackoff(attempt, this.baseDelayMs, this.maxBackoffMs);
          break;
      }

      if (attempt + 1 >= this.maxAttempts) {
        break;
      }

      log.warn(
        { endpoint, attempt: attempt + 1, maxAttempts: this.maxAttempts, waitMs, cause: errorMessage(lastCause) },
        `Retrying in ${formatDuration(waitMs)}`
      );
      this.onRetry?.({ endpoint, attempt, maxAttempts: this.maxAttempts, waitMs, cause: lastCause });
      await this.sleep(waitMs, signal);
    }

    const error = new ExhaustedRetriesError(endpoint, this.maxAttempts, lastCause);
    log.error({ endpoint, attempts: this.maxAttempts, cause: errorMessage(lastCause) }, 'Retries exhausted');
    throw error;
  }
}
