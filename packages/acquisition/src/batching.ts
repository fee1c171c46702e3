/**
 * Batch partitioning
 */

import type { AssetDescriptor, TransferBatch } from '@mediafetch/core';

/**
 * Split descriptors into consecutive batches of at most `size`, keeping order
 */
export function partition(items: readonly AssetDescriptor[], size: number): TransferBatch[] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }

  const batches: TransferBatch[] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push({ index: batches.length, items: items.slice(start, start + size) });
  }
  return batches;
}
