/**
 * @tg-relay/utils
 *
 * Shared utilities package containing:
 * - Structured logging
 * - Retry logic
 * - Staging file helpers
 * - Type guards
 * - Time and size formatting
 */

// Logger
export { logger, buildLogger, createLogger, redactedPaths, type Logger, type LoggerSettings } from './logger.js';

// Retry logic
export { retry, backoffDelay, type RetryOptions } from './retry.js';

// File operations
export {
  ensureDir,
  createTempDir,
  removePath,
  pathExists,
  sanitizeSegment,
} from './file.js';

// Type guards
export { isPositiveInteger } from './guards.js';

// Time utilities
export {
  sleep,
  formatDuration,
  formatBytes,
} from './time.js';
