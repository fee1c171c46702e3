/**
 * JSON Feed Source
 *
 * Generic cursor-paginated feed:
 *   GET <feed-url>?cursor=<c>  ->  { items: [{ id, url, kind?, filename? }], nextCursor, private? }
 *
 * A feed that answers with `private: true` is visible but its items are
 * not, which ends the run.
 */

import { join } from 'node:path';
import { z } from 'zod';
import {
  ApiError,
  outcome,
  PrivateResourceError,
  ValidationError,
  type AssetDescriptor,
  type AssetKind,
  type AttemptContext,
  type CallOutcome,
  type MetadataSource,
  type Page,
} from '@mediafetch/core';
import { classifyNetworkError, classifyResponse, type HttpResponse, type HttpSession } from '@mediafetch/network';
import { getUrlExtension, sanitizeFilename } from '@mediafetch/utils';

const VIDEO_EXTENSIONS = new Set(['mp4', 'mov', 'webm', 'm4v', 'mkv']);

const feedItemSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  url: z.string().url(),
  kind: z.enum(['image', 'video']).optional(),
  filename: z.string().min(1).optional(),
});

const feedPageSchema = z.object({
  items: z.array(feedItemSchema),
  nextCursor: z.union([z.string(), z.number()]).transform(String).nullable().optional(),
  private: z.boolean().optional(),
});

export type FeedItem = z.infer<typeof feedItemSchema>;

export class JsonFeedSource implements MetadataSource<FeedItem> {
  readonly name: string;
  private readonly baseUrl: string;
  private readonly baseQuery: Record<string, string>;

  constructor(
    private readonly session: HttpSession,
    feedUrl: string,
    private readonly outputDir: string
  ) {
    const url = new URL(feedUrl);
    this.name = url.host;
    this.baseUrl = `${url.origin}${url.pathname}`;
    this.baseQuery = Object.fromEntries(url.searchParams);
  }

  async fetchPage(cursor: string | null, context: AttemptContext): Promise<CallOutcome<Page<FeedItem>>> {
    let response: HttpResponse;
    try {
      response = await this.session.get(this.baseUrl, {
        query: { ...this.baseQuery, cursor: cursor ?? undefined },
        signal: context.signal,
      });
    } catch (error) {
      return classifyNetworkError(error, this.baseUrl);
    }

    const failure = classifyResponse(response);
    if (failure) {
      return failure;
    }

    let body: unknown;
    try {
      body = JSON.parse(response.body);
    } catch {
      return outcome.fatal(new ApiError(response.statusCode, 'Feed did not return JSON'));
    }

    const parsed = feedPageSchema.safeParse(body);
    if (parsed.success && parsed.data.private === true) {
      return outcome.fatal(new PrivateResourceError(this.name));
    }
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return outcome.fatal(
        new ValidationError(issue ? `feed.${issue.path.join('.')}` : 'feed', issue?.message ?? 'unexpected shape')
      );
    }

    return outcome.success({
      items: parsed.data.items,
      nextCursor: parsed.data.nextCursor ?? null,
    });
  }

  toDescriptors(item: FeedItem): AssetDescriptor[] {
    const extension = getUrlExtension(item.url);
    const kind: AssetKind = item.kind ?? (VIDEO_EXTENSIONS.has(extension) ? 'video' : 'image');
    const fallbackName = `${item.id}.${extension || (kind === 'video' ? 'mp4' : 'jpg')}`;
    const filename = sanitizeFilename(item.filename ?? fallbackName) || sanitizeFilename(fallbackName);

    return [
      {
        id: item.id,
        url: item.url,
        destination: join(this.outputDir, filename),
        kind,
      },
    ];
  }
}
