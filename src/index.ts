/**
 * windowed-row-cache
 *
 * Windowed record loading for virtual lists: a sparse row cache that turns
 * "rows N..M are visible" into a minimal set of coalesced store fetches
 * executed one at a time on a background worker.
 */

export { VirtualCache } from './cache/virtual-cache.js';
export type { VirtualCacheOptions, VirtualCacheStats } from './cache/virtual-cache.js';
export { RequestCoalescer } from './cache/request-coalescer.js';
export type { RequestCoalescerOptions } from './cache/request-coalescer.js';
export { SparseRows } from './cache/sparse-rows.js';
export {
  beginLoading,
  completeLoading,
  failLoading,
  identityKey,
  isLoaded,
  isLoadingFor,
  needsFetch,
  rowDisplayText,
  stubRow,
  supersedeLoading,
} from './cache/row.js';

export { WorkerChannel, WorkItem, DEFAULT_CATEGORY } from './worker/worker-channel.js';
export type {
  WorkItemSpec,
  WorkerChannelOptions,
  WorkerDebugSnapshot,
} from './worker/worker-channel.js';
export { WorkQueue } from './worker/work-queue.js';
export type { QueueEntry } from './worker/work-queue.js';
export { WorkerStats } from './worker/worker-stats.js';
export type {
  CompletedOperation,
  OperationInfo,
  OperationStatus,
  WorkerStatsSnapshot,
} from './worker/worker-stats.js';

export { CacheEventEmitter } from './events/cache-event-emitter.js';
export type {
  CacheEventListener,
  WaitOptions,
  WaitPredicate,
} from './events/cache-event-emitter.js';

export {
  VirtualCacheOptionsSchema,
  WorkerChannelOptionsSchema,
  parseVirtualCacheOptions,
  parseWorkerChannelOptions,
} from './validation/schemas.js';

export * from './core/errors.js';
export * from './core/result.js';
export { config, Config } from './core/config.js';
export type { AppConfig, CacheConfig, WorkerConfig, LogLevel, NodeEnv } from './core/config.js';
export { logger, createChildLogger, createCacheLogger, createWorkerLogger } from './core/logger.js';
export type { Logger } from './core/logger.js';

export type * from './types.js';
