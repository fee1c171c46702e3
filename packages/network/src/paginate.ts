/**
 * Pagination
 *
 * Walks a cursor-paginated metadata source one page at a time. Every
 * page request goes through the shared RetryingApiCaller, so pages are
 * serialized behind the single rate window.
 */

import type { MetadataSource, Page } from '@mediafetch/core';
import { createLogger } from '@mediafetch/utils';
import { PacingPolicy } from './pacing.js';
import type { RetryingApiCaller } from './retryingApiCaller.js';

const log = createLogger({ component: 'paginate' });

export interface PaginateOptions {
  /** Stop after this many items */
  limit?: number;
  pacing?: PacingPolicy;
  signal?: AbortSignal;
}

export async function* paginate<TItem>(
  source: MetadataSource<TItem>,
  caller: RetryingApiCaller,
  options: PaginateOptions = {}
): AsyncGenerator<TItem, void, undefined> {
  const pacing = options.pacing ?? PacingPolicy.none();
  const { limit, signal } = options;

  let cursor: string | null = null;
  let count = 0;
  let pageNumber = 0;

  while (!signal?.aborted) {
    if (pageNumber > 0) {
      await pacing.beforeNextPage(signal);
    }

    const requestCursor: string | null = cursor;
    const page: Page<TItem> = await caller.call(
      context => source.fetchPage(requestCursor, context),
      { endpoint: `${source.name} page ${pageNumber + 1}`, signal }
    );
    pageNumber++;
    log.debug({ source: source.name, page: pageNumber, items: page.items.length }, 'Fetched page');

    for (const item of page.items) {
      yield item;
      count++;
      if (limit !== undefined && count >= limit) {
        return;
      }
      await pacing.afterItem(signal);
    }

    if (!page.nextCursor || page.nextCursor === cursor) {
      return;
    }
    cursor = page.nextCursor;
  }
}
