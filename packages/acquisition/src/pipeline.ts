/**
 * Feed Pipeline
 *
 * Pages through a metadata source and hands descriptors to the
 * orchestrator every `batchSize` items, so content URLs are fetched
 * shortly after the API issued them.
 */

import {
  emptyReport,
  mergeReports,
  type AssetDescriptor,
  type MetadataSource,
  type TransferReport,
} from '@mediafetch/core';
import { paginate, type PacingPolicy, type RetryingApiCaller } from '@mediafetch/network';
import { AbortError, createLogger, errorMessage } from '@mediafetch/utils';
import type { BatchTransferOrchestrator } from './orchestrator.js';

const log = createLogger({ component: 'pipeline' });

export interface PipelineOptions {
  /** Stop after this many feed items */
  limit?: number;
  /** Descriptors to collect before each hand-off */
  batchSize?: number;
  pacing?: PacingPolicy;
  signal?: AbortSignal;
}

export interface PipelineResult {
  report: TransferReport;
  itemsSeen: number;
  /** Error that ended paging early, if any */
  error: Error | null;
}

export async function runPipeline<TItem>(
  source: MetadataSource<TItem>,
  caller: RetryingApiCaller,
  orchestrator: BatchTransferOrchestrator,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const { limit, pacing, signal } = options;
  const batchSize = options.batchSize ?? 50;

  let report = emptyReport();
  let itemsSeen = 0;
  let error: Error | null = null;
  const buffer: AssetDescriptor[] = [];

  const flush = async (): Promise<void> => {
    const descriptors = buffer.splice(0, buffer.length);
    if (descriptors.length > 0) {
      report = mergeReports(report, await orchestrator.transfer(descriptors, signal));
    }
  };

  try {
    for await (const item of paginate(source, caller, { limit, pacing, signal })) {
      itemsSeen++;
      buffer.push(...source.toDescriptors(item));
      if (buffer.length >= batchSize) {
        await flush();
      }
    }
  } catch (caught) {
    if (caught instanceof AbortError || signal?.aborted) {
      log.info({ itemsSeen }, 'Paging interrupted');
    } else {
      error = caught instanceof Error ? caught : new Error(errorMessage(caught));
      log.error({ itemsSeen, error: error.message }, 'Paging stopped early');
    }
  }

  // Whatever was collected still goes through, or is counted as pending
  try {
    await flush();
  } catch (caught) {
    const flushError = caught instanceof Error ? caught : new Error(errorMessage(caught));
    log.error({ itemsSeen, error: flushError.message }, 'Final hand-off failed');
    error ??= flushError;
  }

  if (signal?.aborted) {
    report.interrupted = true;
  }

  log.info(
    {
      itemsSeen,
      succeeded: report.succeeded,
      skipped: report.skipped,
      failed: report.failed,
      pending: report.pending,
    },
    'Pipeline finished'
  );

  return { report, itemsSeen, error };
}
