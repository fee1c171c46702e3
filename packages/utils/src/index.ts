/**
 * @mediafetch/utils
 * 
 * Shared utilities package containing:
 * - Structured logging
 * - Retry logic
 * - Sleep, jitter and duration helpers
 * - File operations
 * - Concurrency limiting
 * - Type guards
 */

// File operations
export {
  ensureDir,
  safeWriteFile,
  safeReadFile,
  appendLineDurable,
  getFileSizeBytes,
  moveFile,
  removeFile,
} from './file.js';

// Retry logic
export { retry, exponentialBackoff, type RetryOptions } from './retry.js';

// Concurrency
export { ConcurrencyLimiter } from './limiter.js';

// Path utilities
export {
  sanitizeFilename,
  getExtension,
  getUrlExtension,
} from './path.js';

// Type guards
export { isErrnoException, errorMessage } from './guards.js';

// Time utilities
export {
  sleep,
  randomBetween,
  randomIntBetween,
  formatDuration,
  AbortError,
  type SleepFn,
} from './time.js';

// Logger
export { logger, createLogger, setLogLevel, type Logger } from './logger.js';
