/**
 * Retry Logic
 * 
 * Configurable retry wrapper with exponential backoff.
 */

import { sleep as defaultSleep, type SleepFn } from './time.js';

export interface RetryOptions {
  maxAttempts: number;
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  retryIf?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  signal?: AbortSignal;
  sleep?: SleepFn;
}

const defaultOptions: RetryOptions = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
};

/**
 * Delay before retry number `attempt` (zero-based): base * 2^attempt, capped.
 */
export function exponentialBackoff(attempt: number, baseDelay: number, maxDelay: number): number {
  return Math.max(0, Math.min(baseDelay * 2 ** attempt, maxDelay));
}

/**
 * Execute a function with automatic retry on failure
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...defaultOptions, ...options };
  const wait = opts.sleep ?? defaultSleep;
  
  let lastError: unknown;
  let delay = opts.initialDelay;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      
      // Check if we should retry
      if (opts.retryIf && !opts.retryIf(error)) {
        throw error;
      }
      
      // Last attempt, throw the error
      if (attempt === opts.maxAttempts) {
        throw error;
      }
      
      opts.onRetry?.(error, attempt, delay);
      
      await wait(delay, opts.signal);
      
      // Calculate next delay with exponential backoff
      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelay);
    }
  }

  throw lastError;
}
