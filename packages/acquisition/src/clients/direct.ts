/**
 * Direct Transfer Client
 *
 * Fetches one asset at a time with a plain GET. Content URLs are
 * pre-authorized, so requests carry a user agent and nothing else: no
 * cookies, no API headers.
 */

import { createWriteStream } from 'node:fs';
import { dirname } from 'node:path';
import { pipeline } from 'node:stream/promises';
import { request, type Dispatcher } from 'undici';
import { TransferError, type AssetDescriptor, type ProxyEndpoint } from '@mediafetch/core';
import { createDispatcher, DEFAULT_USER_AGENT, type DispatcherFactory } from '@mediafetch/network';
import {
  AbortError,
  createLogger,
  ensureDir,
  errorMessage,
  moveFile,
  removeFile,
  retry,
  type SleepFn,
} from '@mediafetch/utils';
import type { SingleTransferClient, TransferOptions } from '../types.js';

const log = createLogger({ component: 'direct-transfer' });

/** Statuses that will not change on retry */
const PERMANENT_STATUSES = new Set([403, 404, 410]);

export interface DirectTransferOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  timeoutMs?: number;
  sleep?: SleepFn;
  dispatcherFactory?: DispatcherFactory;
}

export class DirectTransferClient implements SingleTransferClient {
  private readonly dispatchers = new Map<string, Dispatcher>();
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly timeoutMs: number;
  private readonly sleep?: SleepFn;
  private readonly dispatcherFactory: DispatcherFactory;

  constructor(options: DirectTransferOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 1_000;
    this.maxDelayMs = options.maxDelayMs ?? 60_000;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.sleep = options.sleep;
    this.dispatcherFactory = options.dispatcherFactory ?? createDispatcher;
  }

  async transfer(item: AssetDescriptor, options: TransferOptions): Promise<void> {
    const { proxy, signal } = options;

    await retry(() => this.fetchOnce(item, proxy, signal), {
      maxAttempts: this.maxAttempts,
      initialDelay: this.baseDelayMs,
      maxDelay: this.maxDelayMs,
      backoffMultiplier: 2,
      retryIf: error => !signal?.aborted && !isPermanent(error),
      onRetry: (error, attempt, delay) => {
        log.warn({ id: item.id, attempt, delay, error: errorMessage(error) }, 'Retrying transfer');
      },
      signal,
      sleep: this.sleep,
    });

    log.debug({ id: item.id, destination: item.destination }, 'Transfer complete');
  }

  /**
   * Close every pooled connection
   */
  async close(): Promise<void> {
    const dispatchers = [...this.dispatchers.values()];
    this.dispatchers.clear();
    await Promise.allSettled(dispatchers.map(d => d.close()));
  }

  private async fetchOnce(
    item: AssetDescriptor,
    proxy: ProxyEndpoint | null,
    signal?: AbortSignal
  ): Promise<void> {
    const partPath = `${item.destination}.part`;
    await ensureDir(dirname(item.destination));

    try {
      const { statusCode, body } = await request(item.url, {
        method: 'GET',
        headers: { 'user-agent': DEFAULT_USER_AGENT },
        dispatcher: this.dispatcherFor(proxy),
        maxRedirections: 5,
        signal,
      });

      if (statusCode >= 400) {
        await body.dump();
        throw new TransferError(item.url, `HTTP ${statusCode}`, statusCode);
      }

      await pipeline(body, createWriteStream(partPath));
      await moveFile(partPath, item.destination);
    } catch (error) {
      await removeFile(partPath);
      if (error instanceof TransferError || error instanceof AbortError) {
        throw error;
      }
      if (signal?.aborted) {
        throw new AbortError();
      }
      throw new TransferError(item.url, errorMessage(error));
    }
  }

  private dispatcherFor(proxy: ProxyEndpoint | null): Dispatcher {
    const key = proxy?.url ?? 'direct';
    let dispatcher = this.dispatchers.get(key);
    if (!dispatcher) {
      dispatcher = this.dispatcherFactory(proxy, this.timeoutMs);
      this.dispatchers.set(key, dispatcher);
    }
    return dispatcher;
  }
}

function isPermanent(error: unknown): boolean {
  return (
    error instanceof TransferError &&
    error.statusCode !== undefined &&
    PERMANENT_STATUSES.has(error.statusCode)
  );
}
