/**
 * @tg-relay/retrieval
 *
 * Fetch-and-deliver pipeline:
 * - Client pool with capability-based leasing and reconnects
 * - Adaptive token-bucket rate limiter
 * - Bounded task queue with a worker pool
 * - Per-task orchestrator
 * - Batch controller with checkpoints and cancellation
 * - Redis progress tracker
 */

export {
  AdaptiveRateLimiter,
  defaultRateLimiterOptions,
  type RateLimiterOptions,
  type RateLimiterSnapshot,
} from './rateLimiter.js';

export {
  ClientPool,
  defaultClientPoolOptions,
  type ClientPoolOptions,
  type AcquireResult,
} from './clientPool.js';

export {
  TaskQueue,
  defaultTaskQueueOptions,
  type TaskQueueOptions,
  type TaskQueueStats,
  type TaskExecutor,
  type ExecutionContext,
  type ExecutionOutcome,
  type RequeueCause,
  type CancelResult,
} from './taskQueue.js';

export {
  DownloadOrchestrator,
  defaultOrchestratorOptions,
  type OrchestratorOptions,
  type OrchestratorDeps,
} from './orchestrator.js';

export {
  BatchController,
  defaultBatchControllerOptions,
  type BatchControllerOptions,
  type BatchControllerDeps,
} from './batchController.js';

export { FileStagingArea, type StagingArea, type StagedArtifact } from './staging.js';

export { RedisProgressTracker, type ProgressStoreClient } from './progress.js';

export { callWithTimeout, type TimedResult } from './timeout.js';
