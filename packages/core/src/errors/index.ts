/**
 * Custom Error Classes
 *
 * Retryable: RateLimitedError, TransientError.
 * Everything else surfaces to the caller on first sight.
 */

/**
 * Base error class for all mediafetch errors
 */
export class MediaFetchError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MediaFetchError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Server signalled throttling
 */
export class RateLimitedError extends MediaFetchError {
  public readonly retryAfterMs?: number;

  constructor(retryAfterMs?: number, message?: string) {
    const suffix = retryAfterMs !== undefined ? `, retry after ${(retryAfterMs / 1000).toFixed(1)}s` : '';
    super(message ?? `Rate limited${suffix}`, 'RATE_LIMITED', { retryAfterMs });
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Network failure, timeout or 5xx
 */
export class TransientError extends MediaFetchError {
  constructor(message: string, cause?: unknown) {
    super(message, 'TRANSIENT', undefined, { cause });
    this.name = 'TransientError';
  }
}

/**
 * Invalid or expired credentials
 */
export class AuthenticationError extends MediaFetchError {
  constructor(message: string = 'Authentication failed') {
    super(message, 'AUTHENTICATION');
    this.name = 'AuthenticationError';
  }
}

/**
 * Not found error for missing resources
 */
export class NotFoundError extends MediaFetchError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} not found: ${identifier}`,
      'NOT_FOUND',
      { resource, identifier }
    );
    this.name = 'NotFoundError';
  }
}

/**
 * The source exists but its content is not visible to this session
 */
export class PrivateResourceError extends MediaFetchError {
  constructor(identifier: string) {
    super(`Resource is private: ${identifier}`, 'PRIVATE', { identifier });
    this.name = 'PrivateResourceError';
  }
}

/**
 * Any other non-retryable HTTP error from the metadata API
 */
export class ApiError extends MediaFetchError {
  public readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(`API error ${statusCode}: ${message}`, 'API_ERROR', { statusCode });
    this.name = 'ApiError';
    this.statusCode = statusCode;
  }
}

export class ExhaustedRetriesError extends MediaFetchError {
  public readonly endpoint: string;
  public readonly attempts: number;
  public readonly lastCause: unknown;

  constructor(endpoint: string, attempts: number, lastCause: unknown) {
    const causeMessage = lastCause instanceof Error ? lastCause.message : String(lastCause);
    super(
      `Gave up on ${endpoint} after ${attempts} attempts: ${causeMessage}`,
      'EXHAUSTED_RETRIES',
      { endpoint, attempts },
      { cause: lastCause }
    );
    this.name = 'ExhaustedRetriesError';
    this.endpoint = endpoint;
    this.attempts = attempts;
    this.lastCause = lastCause;
  }
}

/**
 * A single asset transfer failed
 */
export class TransferError extends MediaFetchError {
  public readonly url: string;
  public readonly reason: string;
  public readonly statusCode?: number;

  constructor(url: string, reason: string, statusCode?: number) {
    super(`Transfer failed: ${reason}`, 'TRANSFER_FAILED', { url, statusCode });
    this.name = 'TransferError';
    this.url = url;
    this.reason = reason;
    this.statusCode = statusCode;
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends MediaFetchError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}
