/**
 * aria2 Client
 *
 * Parallel transfer agent backed by a running aria2 daemon, driven over
 * its JSON-RPC API.
 * API Docs: https://aria2.github.io/manual/en/html/aria2c.html#rpc-interface
 *
 * Features:
 * - JSON-RPC 2.0 interface with optional secret token
 * - Whole-batch submission with a global concurrency cap
 * - Status polling until every gid settles
 * - Cooperative cancellation through AbortSignal
 */

import { basename, dirname } from 'node:path';
import { z } from 'zod';
import type { AssetDescriptor, ProxyEndpoint } from '@mediafetch/core';
import { DEFAULT_USER_AGENT } from '@mediafetch/network';
import {
  AbortError,
  createLogger,
  errorMessage,
  sleep as defaultSleep,
  type SleepFn,
} from '@mediafetch/utils';
import type {
  BatchTransferOptions,
  ItemTransferResult,
  ParallelTransferAgent,
} from '../types.js';

const log = createLogger({ component: 'aria2' });

export interface Aria2Config {
  host: string;
  port: number;
  secret: string;
  maxConnectionsPerServer: number;
  pollIntervalMs: number;
  sleep: SleepFn;
}

const downloadStates = ['active', 'waiting', 'paused', 'error', 'complete', 'removed'] as const;

const statusSchema = z.object({
  gid: z.string(),
  status: z.enum(downloadStates),
  totalLength: z.string(),
  completedLength: z.string(),
  errorCode: z.string().optional(),
  errorMessage: z.string().optional(),
});

export type Aria2Status = z.infer<typeof statusSchema>;

const versionSchema = z.object({
  version: z.string(),
  enabledFeatures: z.array(z.string()),
});

export interface Aria2DownloadOptions {
  dir?: string;
  out?: string;
  'max-connection-per-server'?: string;
  'user-agent'?: string;
  'all-proxy'?: string;
  'continue'?: 'true' | 'false';
  'auto-file-renaming'?: 'true' | 'false';
  'allow-overwrite'?: 'true' | 'false';
  'conditional-get'?: 'true' | 'false';
}

interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: string;
  method: string;
  params: unknown[];
}

const jsonRpcResponseSchema = z.object({
  id: z.string().nullable().optional(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
    })
    .optional(),
});

const STATUS_KEYS = ['gid', 'status', 'totalLength', 'completedLength', 'errorCode', 'errorMessage'];

export class Aria2RpcError extends Error {
  constructor(message: string, readonly code?: number) {
    super(message);
    this.name = 'Aria2RpcError';
  }
}

export class Aria2Client implements ParallelTransferAgent {
  readonly name = 'aria2';
  private config: Aria2Config;
  private requestId: number = 0;

  constructor(config?: Partial<Aria2Config>) {
    this.config = {
      host: config?.host ?? process.env.ARIA2_HOST ?? 'localhost',
      port: config?.port ?? parseInt(process.env.ARIA2_PORT ?? '6800', 10),
      secret: config?.secret ?? process.env.ARIA2_SECRET ?? '',
      maxConnectionsPerServer: config?.maxConnectionsPerServer ?? 4,
      pollIntervalMs: config?.pollIntervalMs ?? 500,
      sleep: config?.sleep ?? defaultSleep,
    };
  }

  get rpcUrl(): string {
    return `http://${this.config.host}:${this.config.port}/jsonrpc`;
  }

  private get secretToken(): string {
    return this.config.secret ? `token:${this.config.secret}` : '';
  }

  /**
   * Make a JSON-RPC call to aria2
   */
  protected async rpc<T>(
    method: string,
    params: unknown[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const id = `mediafetch-${++this.requestId}`;

    // Prepend secret token if configured
    const fullParams = this.secretToken ? [this.secretToken, ...params] : params;

    const request: JsonRpcRequest = {
      jsonrpc: '2.0',
      id,
      method: `aria2.${method}`,
      params: fullParams,
    };

    const response = await fetch(this.rpcUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(request),
    });

    const body = jsonRpcResponseSchema.safeParse(await response.json().catch(() => null));

    if (body.success && body.data.error) {
      throw new Aria2RpcError(
        `aria2 error ${body.data.error.code}: ${body.data.error.message}`,
        body.data.error.code
      );
    }

    if (!response.ok) {
      throw new Aria2RpcError(`aria2 RPC error: ${response.status} ${response.statusText}`);
    }

    if (!body.success) {
      throw new Aria2RpcError(`aria2 RPC returned a malformed response to ${method}`);
    }

    const result = schema.safeParse(body.data.result);
    if (!result.success) {
      throw new Aria2RpcError(`aria2 RPC returned an unexpected result for ${method}`);
    }
    return result.data;
  }

  /**
   * Check if aria2 is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const { version } = await this.getVersion();
      log.debug({ version }, 'aria2 reachable');
      return true;
    } catch (error) {
      log.warn({ error: errorMessage(error) }, 'aria2 not available');
      return false;
    }
  }

  /**
   * aria2 only tunnels through HTTP proxies
   */
  supportsProxy(proxy: ProxyEndpoint): boolean {
    return proxy.scheme === 'http' || proxy.scheme === 'https';
  }

  /**
   * Get aria2 version
   */
  async getVersion(): Promise<{ version: string; enabledFeatures: string[] }> {
    return this.rpc('getVersion', [], versionSchema);
  }

  /**
   * Add a URI for download
   */
  async addUri(uris: string | string[], options: Aria2DownloadOptions = {}): Promise<string> {
    const uriList = Array.isArray(uris) ? uris : [uris];

    const downloadOptions: Aria2DownloadOptions = {
      'max-connection-per-server': String(this.config.maxConnectionsPerServer),
      ...options,
    };

    const gid = await this.rpc('addUri', [uriList, downloadOptions], z.string());

    log.debug({ gid, uri: uriList[0] }, 'URI added to aria2');
    return gid;
  }

  /**
   * Get download status
   */
  async tellStatus(gid: string): Promise<Aria2Status> {
    return this.rpc('tellStatus', [gid, STATUS_KEYS], statusSchema);
  }

  /**
   * Force remove (don't wait for the current piece)
   */
  async forceRemove(gid: string): Promise<string> {
    const result = await this.rpc('forceRemove', [gid], z.string());
    log.info({ gid }, 'Download force removed');
    return result;
  }

  /**
   * Remove download result from memory
   */
  async removeDownloadResult(gid: string): Promise<string> {
    return this.rpc('removeDownloadResult', [gid], z.string());
  }

  /**
   * Change global options
   */
  async changeGlobalOption(options: Record<string, string>): Promise<string> {
    return this.rpc('changeGlobalOption', [options], z.string());
  }

  /**
   * Poll until every gid has stopped, or until the signal fires.
   * Returns the final status of each settled gid.
   */
  async waitForCompletion(
    gids: readonly string[],
    signal?: AbortSignal
  ): Promise<Map<string, Aria2Status>> {
    const settled = new Map<string, Aria2Status>();
    let pending = [...gids];

    while (pending.length > 0 && !signal?.aborted) {
      const stillRunning: string[] = [];

      for (const gid of pending) {
        const status = await this.tellStatus(gid);
        if (status.status === 'complete' || status.status === 'error' || status.status === 'removed') {
          settled.set(gid, status);
        } else {
          stillRunning.push(gid);
        }
      }

      pending = stillRunning;
      if (pending.length === 0) {
        break;
      }

      try {
        await this.config.sleep(this.config.pollIntervalMs, signal);
      } catch (error) {
        if (!(error instanceof AbortError)) {
          throw error;
        }
      }
    }

    return settled;
  }

  /**
   * Submit a batch, wait for it, and report the outcome of each item.
   * Items still running when the signal fires are force-removed and
   * reported as cancelled. If polling fails, every submitted download is
   * force-removed before the error propagates.
   */
  async transferBatch(
    items: readonly AssetDescriptor[],
    options: BatchTransferOptions
  ): Promise<ItemTransferResult[]> {
    const { concurrency, proxy, signal } = options;

    await this.changeGlobalOption({ 'max-concurrent-downloads': String(concurrency) });

    const results = new Map<string, ItemTransferResult>();
    const gidToItem = new Map<string, AssetDescriptor>();

    for (const item of items) {
      if (signal?.aborted) {
        results.set(item.id, { id: item.id, status: 'cancelled' });
        continue;
      }

      const downloadOptions: Aria2DownloadOptions = {
        dir: dirname(item.destination),
        out: basename(item.destination),
        'user-agent': DEFAULT_USER_AGENT,
        continue: 'true',
        'auto-file-renaming': 'false',
        'allow-overwrite': 'false',
        'conditional-get': 'true',
      };
      if (proxy && this.supportsProxy(proxy)) {
        downloadOptions['all-proxy'] = proxy.url;
      }

      try {
        const gid = await this.addUri(item.url, downloadOptions);
        gidToItem.set(gid, item);
      } catch (error) {
        results.set(item.id, { id: item.id, status: 'failed', reason: errorMessage(error) });
      }
    }

    let settled: Map<string, Aria2Status>;
    try {
      settled = await this.waitForCompletion([...gidToItem.keys()], signal);
    } catch (error) {
      // nothing submitted may keep writing once the caller moves on
      for (const gid of gidToItem.keys()) {
        await this.cancel(gid);
      }
      throw error;
    }

    for (const [gid, item] of gidToItem) {
      const status = settled.get(gid);

      if (!status) {
        await this.cancel(gid);
        results.set(item.id, { id: item.id, status: 'cancelled' });
        continue;
      }

      if (status.status === 'complete') {
        results.set(item.id, { id: item.id, status: 'completed' });
      } else {
        const reason = status.status === 'removed'
          ? 'Download was removed'
          : status.errorMessage || `aria2 error code ${status.errorCode ?? 'unknown'}`;
        results.set(item.id, { id: item.id, status: 'failed', reason });
      }

      await this.forget(gid);
    }

    return items.map(item => results.get(item.id) ?? { id: item.id, status: 'cancelled' });
  }

  private async cancel(gid: string): Promise<void> {
    try {
      await this.forceRemove(gid);
    } catch (error) {
      log.warn({ gid, error: errorMessage(error) }, 'Failed to cancel aria2 download');
    }
  }

  private async forget(gid: string): Promise<void> {
    try {
      await this.removeDownloadResult(gid);
    } catch (error) {
      log.debug({ gid, error: errorMessage(error) }, 'Could not clear aria2 download result');
    }
  }
}
