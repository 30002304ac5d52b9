/**
 * Shared utilities
 */

export { sleep, systemClock, withRetry, type TimeSource, type RetryOptions } from './retry';
export {
  BoundedPool,
  type BoundedPoolOptions,
  type BatchProgress,
  type PoolRunHooks,
  type PoolRunResult,
} from './boundedPool';
export {
  cleanMessage,
  formatDate,
  shortSha,
  safeLower,
  fileTimestamp,
  formatDuration,
  MAX_MESSAGE_LENGTH,
  SHORT_SHA_LENGTH,
} from './format';
