import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { AssetDescriptor } from '@mediafetch/core';
import type { SingleTransferClient, TransferOptions } from '../types.js';

export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'mediafetch-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function makeDescriptors(count: number, dir: string, prefix = 'item'): AssetDescriptor[] {
  return Array.from({ length: count }, (_, i) => ({
    id: `${prefix}-${i + 1}`,
    url: `https://cdn.test/${prefix}-${i + 1}.jpg`,
    destination: join(dir, `${prefix}-${i + 1}.jpg`),
    kind: 'image' as const,
  }));
}

/**
 * Writes a small file for each item instead of touching the network
 */
export class FakeDirectClient implements SingleTransferClient {
  readonly transferred: string[] = [];
  readonly failIds = new Set<string>();
  readonly emptyIds = new Set<string>();
  onTransfer?: (item: AssetDescriptor, options: TransferOptions) => void;

  async transfer(item: AssetDescriptor, options: TransferOptions): Promise<void> {
    this.transferred.push(item.id);
    this.onTransfer?.(item, options);
    if (this.failIds.has(item.id)) {
      throw new Error(`boom ${item.id}`);
    }
    await writeFile(item.destination, this.emptyIds.has(item.id) ? '' : `content of ${item.id}`);
  }
}
