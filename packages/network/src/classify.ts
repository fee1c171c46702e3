/**
 * Response Classification
 *
 * Maps raw HTTP results onto the outcome union the retry loop switches on.
 */

import {
  ApiError,
  AuthenticationError,
  NotFoundError,
  outcome,
  TransientError,
  type CallOutcome,
} from '@mediafetch/core';
import { errorMessage } from '@mediafetch/utils';
import type { HttpResponse } from './httpSession.js';

export type FailureOutcome = Exclude<CallOutcome<never>, { kind: 'success' }>;

function headerValue(headers: HttpResponse['headers'], name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Retry-After as milliseconds: delta-seconds or an HTTP date
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

/**
 * Classify an HTTP response. Returns null for 2xx/3xx, which the caller
 * goes on to parse.
 */
export function classifyResponse(response: HttpResponse): FailureOutcome | null {
  const { statusCode, body, url } = response;

  if (statusCode < 400) {
    return null;
  }

  // some APIs answer throttling with 401 and a "please wait" message
  if (statusCode === 429 || (statusCode === 401 && /wait/i.test(body))) {
    return {
      kind: 'rateLimited',
      retryAfterMs: parseRetryAfter(headerValue(response.headers, 'retry-after')),
    };
  }

  if (statusCode === 401 || statusCode === 403) {
    return {
      kind: 'fatal',
      error: new AuthenticationError(`Request to ${url} was refused (${statusCode}); credentials are missing or expired`),
    };
  }

  if (statusCode === 404) {
    return { kind: 'fatal', error: new NotFoundError('Resource', url) };
  }

  if (statusCode === 408 || statusCode >= 500) {
    return { kind: 'transient', error: new TransientError(`HTTP ${statusCode} from ${url}`) };
  }

  return { kind: 'fatal', error: new ApiError(statusCode, body.slice(0, 200)) };
}

/**
 * Errors thrown while talking to the server (reset sockets, timeouts,
 * DNS failures) are worth another attempt.
 */
export function classifyNetworkError<T>(error: unknown, url: string): CallOutcome<T> {
  return outcome.transient(new TransientError(`Network error for ${url}: ${errorMessage(error)}`, error));
}
