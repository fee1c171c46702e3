/**
 * @mediafetch/core
 * 
 * Shared vocabulary of the fetch-and-delivery layer:
 * - Error taxonomy
 * - Asset, proxy and API boundary types
 * - Settings schema
 */

// Errors
export { 
  MediaFetchError,
  RateLimitedError,
  TransientError,
  AuthenticationError,
  NotFoundError,
  PrivateResourceError,
  ApiError,
  ExhaustedRetriesError,
  TransferError,
  ValidationError,
} from './errors/index.js';

// Types
export {
  emptyReport,
  mergeReports,
  type AssetKind,
  type AssetDescriptor,
  type TransferBatch,
  type TransferFailure,
  type TransferReport,
} from './types/asset.js';

export type {
  ProxyScheme,
  ProxyEndpoint,
  ProxyMode,
  RotationReason,
} from './types/proxy.js';

export {
  outcome,
  type CallOutcome,
  type AttemptContext,
  type Page,
  type MetadataSource,
} from './types/api.js';

// Settings
export {
  settingsSchema,
  resolveSettings,
  defaultSettings,
  type Settings,
  type SettingsInput,
} from './config/settings.js';
