/**
 * Batch Transfer Orchestrator
 *
 * Turns a list of asset descriptors into files on disk:
 * - Ids that cannot be archived fail up front
 * - Archived ids and in-list duplicates are skipped
 * - The rest is split into fixed-size batches, processed in order
 * - Each batch goes to the parallel agent when it is reachable,
 *   otherwise to the direct client one item at a time
 * - Every success is confirmed on disk and archived before the next batch
 *
 * Per-item failures end up in the report and never abort the run.
 */

import { EventEmitter } from 'node:events';
import {
  emptyReport,
  type AssetDescriptor,
  type ProxyEndpoint,
  type TransferBatch,
  type TransferFailure,
  type TransferReport,
} from '@mediafetch/core';
import type { ProxyRotator } from '@mediafetch/network';
import { AbortError, createLogger, errorMessage, getFileSizeBytes } from '@mediafetch/utils';
import { normalizeArchiveId, type DownloadArchive } from './archive.js';
import { partition } from './batching.js';
import type {
  ItemTransferResult,
  ParallelTransferAgent,
  SingleTransferClient,
} from './types.js';

const log = createLogger({ component: 'orchestrator' });

export interface BatchSummary {
  batch: TransferBatch;
  succeeded: number;
  failed: number;
  pending: number;
  via: 'agent' | 'direct';
}

export interface OrchestratorEvents {
  'batch:start': [batch: TransferBatch];
  'batch:complete': [summary: BatchSummary];
  'item:success': [item: AssetDescriptor];
  'item:failed': [failure: TransferFailure];
  'item:skipped': [item: AssetDescriptor];
}

export interface OrchestratorOptions {
  archive: DownloadArchive;
  direct: SingleTransferClient;
  agent?: ParallelTransferAgent | null;
  /** Source of the current egress; direct connection when absent */
  proxies?: ProxyRotator;
  batchSize?: number;
  concurrency?: number;
}

export class BatchTransferOrchestrator extends EventEmitter<OrchestratorEvents> {
  private readonly archive: DownloadArchive;
  private readonly direct: SingleTransferClient;
  private readonly agent: ParallelTransferAgent | null;
  private readonly proxies?: ProxyRotator;
  private readonly batchSize: number;
  private readonly concurrency: number;

  constructor(options: OrchestratorOptions) {
    super();
    this.archive = options.archive;
    this.direct = options.direct;
    this.agent = options.agent ?? null;
    this.proxies = options.proxies;
    this.batchSize = options.batchSize ?? 50;
    this.concurrency = options.concurrency ?? 16;
  }

  async transfer(
    descriptors: readonly AssetDescriptor[],
    signal?: AbortSignal
  ): Promise<TransferReport> {
    const report = emptyReport();
    const queued = new Set<string>();
    const work: AssetDescriptor[] = [];

    for (const item of descriptors) {
      const key = normalizeArchiveId(item.id);
      if (key === null) {
        this.recordFailure(report, item, 'Invalid asset id');
        continue;
      }
      if (this.archive.contains(key) || queued.has(key)) {
        report.skipped++;
        this.emit('item:skipped', item);
        continue;
      }
      queued.add(key);
      work.push(item);
    }

    if (report.skipped > 0) {
      log.info({ skipped: report.skipped }, 'Skipping already archived items');
    }

    for (const batch of partition(work, this.batchSize)) {
      if (signal?.aborted) {
        report.pending += batch.items.length;
        continue;
      }

      this.emit('batch:start', batch);
      const { results, via } = await this.runBatch(batch, signal);
      const summary: BatchSummary = { batch, succeeded: 0, failed: 0, pending: 0, via };
      const byId = new Map(batch.items.map(item => [item.id, item]));

      for (const result of results) {
        const item = byId.get(result.id);
        if (!item) {
          continue;
        }

        if (result.status === 'cancelled') {
          summary.pending++;
          continue;
        }

        let reason = result.status === 'failed' ? result.reason : await this.confirm(item);
        if (reason === null) {
          // Archived before the next batch starts
          reason = await this.record(item);
        }
        if (reason === null) {
          summary.succeeded++;
          this.emit('item:success', item);
        } else {
          summary.failed++;
          this.recordFailure(report, item, reason);
        }
      }

      report.succeeded += summary.succeeded;
      report.pending += summary.pending;

      log.info(
        {
          batch: batch.index + 1,
          size: batch.items.length,
          succeeded: summary.succeeded,
          failed: summary.failed,
          via,
        },
        'Batch complete'
      );
      this.emit('batch:complete', summary);
    }

    report.interrupted = report.pending > 0 || (signal?.aborted ?? false);
    return report;
  }

  private recordFailure(report: TransferReport, item: AssetDescriptor, reason: string): void {
    const failure: TransferFailure = { id: item.id, url: item.url, reason };
    report.failed++;
    report.failures.push(failure);
    log.warn({ id: item.id, reason }, 'Transfer failed');
    this.emit('item:failed', failure);
  }

  /**
   * Null once the id is in the archive, otherwise why it could not be written
   */
  private async record(item: AssetDescriptor): Promise<string | null> {
    try {
      await this.archive.add(item.id);
      return null;
    } catch (error) {
      return `Could not record in archive: ${errorMessage(error)}`;
    }
  }

  /**
   * Null when the file is on disk and non-empty, otherwise the reason it is not
   */
  private async confirm(item: AssetDescriptor): Promise<string | null> {
    const size = await getFileSizeBytes(item.destination);
    if (size === null) {
      return 'File missing after transfer';
    }
    if (size === 0) {
      return 'File empty after transfer';
    }
    return null;
  }

  private async runBatch(
    batch: TransferBatch,
    signal?: AbortSignal
  ): Promise<{ results: ItemTransferResult[]; via: 'agent' | 'direct' }> {
    const proxy = this.proxies?.current() ?? null;

    if (this.agent && (!proxy || this.agent.supportsProxy(proxy)) && (await this.agent.isAvailable())) {
      log.info({ batch: batch.index + 1, size: batch.items.length, agent: this.agent.name }, 'Starting batch');
      try {
        const results = await this.agent.transferBatch(batch.items, {
          concurrency: this.concurrency,
          proxy,
          signal,
        });
        return { results, via: 'agent' };
      } catch (error) {
        log.warn({ batch: batch.index + 1, error: errorMessage(error) }, 'Agent failed, falling back to direct transfer');
      }
    } else {
      log.info({ batch: batch.index + 1, size: batch.items.length }, 'Starting batch (direct)');
    }

    return { results: await this.transferDirect(batch.items, proxy, signal), via: 'direct' };
  }

  private async transferDirect(
    items: readonly AssetDescriptor[],
    proxy: ProxyEndpoint | null,
    signal?: AbortSignal
  ): Promise<ItemTransferResult[]> {
    const results: ItemTransferResult[] = [];

    for (const item of items) {
      if (signal?.aborted) {
        results.push({ id: item.id, status: 'cancelled' });
        continue;
      }
      try {
        await this.direct.transfer(item, { proxy, signal });
        results.push({ id: item.id, status: 'completed' });
      } catch (error) {
        if (error instanceof AbortError) {
          results.push({ id: item.id, status: 'cancelled' });
        } else {
          results.push({ id: item.id, status: 'failed', reason: errorMessage(error) });
        }
      }
    }

    return results;
  }
}
