/**
 * @mediafetch/network
 * 
 * Everything that talks to the metadata API:
 * - Sliding-window rate limiting
 * - Proxy rotation
 * - HTTP session and response classification
 * - Retry with backoff
 * - Pacing and pagination
 */

export { RateLimiter, type RateLimiterOptions, type RateLimiterStats } from './rateLimiter.js';

export {
  parseProxyUrl,
  parseProxyList,
  redactProxy,
  type ProxyParseResult,
  type ProxyListParseResult,
} from './proxyList.js';

export { ProxyRotator, type ProxyRotatorOptions } from './proxyRotator.js';

export {
  HttpSession,
  withSession,
  createDispatcher,
  DEFAULT_USER_AGENT,
  type HttpResponse,
  type HttpSessionOptions,
  type GetOptions,
  type DispatcherFactory,
} from './httpSession.js';

export {
  classifyResponse,
  classifyNetworkError,
  parseRetryAfter,
  type FailureOutcome,
} from './classify.js';

export {
  RetryingApiCaller,
  type RetryingApiCallerOptions,
  type RetryEvent,
  type CallOptions,
  type AttemptFn,
} from './retryingApiCaller.js';

export { PacingPolicy, type PacingOptions } from './pacing.js';

export { paginate, type PaginateOptions } from './paginate.js';
