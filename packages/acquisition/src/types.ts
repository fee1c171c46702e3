/**
 * Transfer collaborator contracts
 */

import type { AssetDescriptor, ProxyEndpoint } from '@mediafetch/core';

export interface TransferOptions {
  /** Egress to use; null means a direct connection */
  proxy: ProxyEndpoint | null;
  signal?: AbortSignal;
}

export interface BatchTransferOptions extends TransferOptions {
  concurrency: number;
}

export type ItemTransferResult =
  | { id: string; status: 'completed' }
  | { id: string; status: 'failed'; reason: string }
  | { id: string; status: 'cancelled' };

/**
 * External downloader that fetches a whole batch of URLs in parallel
 */
export interface ParallelTransferAgent {
  readonly name: string;
  isAvailable(): Promise<boolean>;
  supportsProxy(proxy: ProxyEndpoint): boolean;
  transferBatch(
    items: readonly AssetDescriptor[],
    options: BatchTransferOptions
  ): Promise<ItemTransferResult[]>;
}

/**
 * Fallback that fetches one URL at a time. Throws on failure.
 */
export interface SingleTransferClient {
  transfer(item: AssetDescriptor, options: TransferOptions): Promise<void>;
}
