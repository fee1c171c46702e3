/**
 * Metadata API boundary
 */

import type { MediaFetchError } from '../errors/index.js';
import type { AssetDescriptor } from './asset.js';
import type { ProxyEndpoint } from './proxy.js';

/**
 * Result of one attempted API call, classified for the retry loop
 */
export type CallOutcome<T> =
  | { kind: 'success'; value: T }
  | { kind: 'rateLimited'; retryAfterMs?: number }
  | { kind: 'transient'; error: unknown }
  | { kind: 'fatal'; error: MediaFetchError };

export const outcome = {
  success: <T>(value: T): CallOutcome<T> => ({ kind: 'success', value }),
  rateLimited: <T>(retryAfterMs?: number): CallOutcome<T> => ({ kind: 'rateLimited', retryAfterMs }),
  transient: <T>(error: unknown): CallOutcome<T> => ({ kind: 'transient', error }),
  fatal: <T>(error: MediaFetchError): CallOutcome<T> => ({ kind: 'fatal', error }),
};

export interface AttemptContext {
  /** Zero-based attempt number */
  attempt: number;
  proxy: ProxyEndpoint | null;
  signal?: AbortSignal;
}

export interface Page<TItem> {
  items: TItem[];
  nextCursor: string | null;
}

/**
 * A paginated metadata API. The core only knows it through this shape.
 */
export interface MetadataSource<TItem> {
  readonly name: string;
  fetchPage(cursor: string | null, context: AttemptContext): Promise<CallOutcome<Page<TItem>>>;
  toDescriptors(item: TItem): AssetDescriptor[];
}
