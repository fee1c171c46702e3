import { describe, it, expect } from 'vitest';
import { ApiError, AuthenticationError, NotFoundError, TransientError } from '@mediafetch/core';
import { classifyNetworkError, classifyResponse, parseRetryAfter } from '../classify.js';
import type { HttpResponse } from '../httpSession.js';

function response(statusCode: number, body = '', headers: HttpResponse['headers'] = {}): HttpResponse {
  return { url: 'https://api.test/feed', statusCode, body, headers };
}

describe('classifyResponse', () => {
  it('should pass successful responses through', () => {
    expect(classifyResponse(response(200, '{}'))).toBeNull();
  });

  it('should read Retry-After on 429', () => {
    expect(classifyResponse(response(429, '', { 'retry-after': '30' }))).toEqual({
      kind: 'rateLimited',
      retryAfterMs: 30_000,
    });
  });

  it('should treat a 401 asking to wait as throttling', () => {
    expect(classifyResponse(response(401, '{"message":"Please wait a few minutes"}'))).toEqual({
      kind: 'rateLimited',
      retryAfterMs: undefined,
    });
  });

  it('should mark other 401 and 403 responses as authentication failures', () => {
    expect(classifyResponse(response(401, 'login required'))).toMatchObject({ kind: 'fatal' });
    const forbidden = classifyResponse(response(403));
    expect(forbidden?.kind === 'fatal' && forbidden.error).toBeInstanceOf(AuthenticationError);
  });

  it('should mark 404 as not found', () => {
    const result = classifyResponse(response(404));
    expect(result?.kind === 'fatal' && result.error).toBeInstanceOf(NotFoundError);
  });

  it('should retry server errors and timeouts', () => {
    const result = classifyResponse(response(503));
    expect(result?.kind).toBe('transient');
    expect(result?.kind === 'transient' && result.error).toBeInstanceOf(TransientError);
    expect(classifyResponse(response(408))?.kind).toBe('transient');
  });

  it('should not retry other client errors', () => {
    const result = classifyResponse(response(400, 'bad cursor'));
    expect(result?.kind === 'fatal' && result.error).toBeInstanceOf(ApiError);
    expect(result?.kind === 'fatal' && result.error.message).toBe('API error 400: bad cursor');
  });
});

describe('parseRetryAfter', () => {
  it('should parse delta seconds', () => {
    expect(parseRetryAfter('120')).toBe(120_000);
  });

  it('should parse an HTTP date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2015 07:28:00 GMT');
    expect(parseRetryAfter('Wed, 21 Oct 2015 07:28:30 GMT', now)).toBe(30_000);
  });

  it('should ignore missing or garbage values', () => {
    expect(parseRetryAfter(undefined)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});

describe('classifyNetworkError', () => {
  it('should wrap socket errors as transient', () => {
    const result = classifyNetworkError<string>(new Error('ECONNRESET'), 'https://api.test/feed');
    expect(result.kind).toBe('transient');
    expect(result.kind === 'transient' && result.error instanceof TransientError && result.error.message).toBe(
      'Network error for https://api.test/feed: ECONNRESET'
    );
  });
});
