/**
 * @packpub/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Retry and bounded concurrency
 * - Type guards
 * - Logger
 */

// Command execution
export {
  executeCommand,
  executeShell,
  commandOutput,
  type CommandResult,
  type CommandOptions,
} from './command.js';

// File operations
export {
  ensureDir,
  safeWriteFile,
  safeReadFile,
  getFileSizeBytes,
  pathKind,
  formatBytes,
} from './file.js';

// Retry logic
export { retry, mapWithConcurrency, type RetryOptions } from './retry.js';

// Type guards
export {
  isObject,
  isNonEmptyString,
  isErrnoException,
  splitList,
} from './guards.js';

// Time utilities
export { sleep, formatDuration } from './time.js';

// Logger
export { logger, createLogger, setLogLevel, REDACTED_PATHS, type Logger } from './logger.js';
