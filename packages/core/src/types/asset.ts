/**
 * Asset transfer types
 */

export type AssetKind = 'image' | 'video';

/**
 * One fetchable binary object. `id` doubles as the archive key.
 */
export interface AssetDescriptor {
  id: string;
  url: string;
  destination: string;
  kind: AssetKind;
}

export interface TransferBatch {
  index: number;
  items: AssetDescriptor[];
}

export interface TransferFailure {
  id: string;
  url: string;
  reason: string;
}

export interface TransferReport {
  succeeded: number;
  skipped: number;
  failed: number;
  /** Items never attempted because the run was interrupted */
  pending: number;
  interrupted: boolean;
  failures: TransferFailure[];
}

export function emptyReport(): TransferReport {
  return { succeeded: 0, skipped: 0, failed: 0, pending: 0, interrupted: false, failures: [] };
}

export function mergeReports(a: TransferReport, b: TransferReport): TransferReport {
  return {
    succeeded: a.succeeded + b.succeeded,
    skipped: a.skipped + b.skipped,
    failed: a.failed + b.failed,
    pending: a.pending + b.pending,
    interrupted: a.interrupted || b.interrupted,
    failures: [...a.failures, ...b.failures],
  };
}
