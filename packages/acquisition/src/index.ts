/**
 * @mediafetch/acquisition
 * 
 * Delivery layer: gets referenced assets onto disk exactly once.
 * 
 * Responsibilities:
 * - Remember delivered ids across runs (download archive)
 * - Batch transfers through aria2 or direct HTTP
 * - Confirm each file before archiving it
 * - Drive a paginated source end to end
 */

// Archive
export { DownloadArchive } from './archive.js';

// Transfer contracts
export type {
  TransferOptions,
  BatchTransferOptions,
  ItemTransferResult,
  ParallelTransferAgent,
  SingleTransferClient,
} from './types.js';

// Transfer clients
export {
  Aria2Client,
  Aria2RpcError,
  type Aria2Config,
  type Aria2Status,
  type Aria2DownloadOptions,
} from './clients/aria2.js';

export { DirectTransferClient, type DirectTransferOptions } from './clients/direct.js';

// Orchestration
export { partition } from './batching.js';
export {
  BatchTransferOrchestrator,
  type BatchSummary,
  type OrchestratorEvents,
  type OrchestratorOptions,
} from './orchestrator.js';
export { runPipeline, type PipelineOptions, type PipelineResult } from './pipeline.js';
