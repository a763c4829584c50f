/**
 * Relay Runtime
 *
 * Composition root: wires one client pool, rate limiter, task queue,
 * orchestrator and batch controller from a RelayConfig and the
 * collaborators supplied by the host (network client, session connector,
 * optional stores).
 */

import {
  expandReferenceRange,
  createTask,
  parseSourceLink,
  type BatchJob,
  type BatchProgress,
  type BatchStore,
  type Capability,
  type ConnectivityState,
  type HistoryStore,
  type ProgressReporter,
  type SessionConnector,
  type SourceNetworkClient,
  type Task,
  type TaskOutcomeRecord,
  type TrafficLedger,
} from '@tg-relay/core';
import {
  AdaptiveRateLimiter,
  BatchController,
  ClientPool,
  DownloadOrchestrator,
  FileStagingArea,
  RedisProgressTracker,
  TaskQueue,
  type CancelResult,
  type RateLimiterSnapshot,
  type StagingArea,
  type TaskQueueStats,
} from '@tg-relay/retrieval';
import { InMemoryBatchStore, InMemoryHistoryStore, InMemoryTrafficLedger } from '@tg-relay/storage';
import { createLogger, formatDuration, type Logger } from '@tg-relay/utils';
import type { RelayConfig } from './config/index.js';

export interface RelaySessions<TSession> {
  general: Array<{ identity: string; session: TSession }>;
  privileged?: Array<{ ownerId: string; identity: string; session: TSession }>;
}

export interface RelayRuntimeDeps<TSession> {
  network: SourceNetworkClient<TSession>;
  connector: SessionConnector<TSession>;
  sessions: RelaySessions<TSession>;
  ledger?: TrafficLedger;
  history?: HistoryStore;
  batchStore?: BatchStore;
  staging?: StagingArea;
  /** Replaces the Redis tracker that REDIS_URL would create */
  progress?: ProgressReporter;
  logger?: Logger;
}

export interface RuntimeStatus {
  uptime: string;
  queue: TaskQueueStats;
  limiter: RateLimiterSnapshot;
  handles: Array<{ id: string; kind: Capability; identity: string; ownerId?: string; state: ConnectivityState }>;
  batches: BatchProgress[];
}

export class RelayRuntime<TSession = unknown> {
  readonly pool: ClientPool<TSession>;
  readonly limiter: AdaptiveRateLimiter;
  readonly queue: TaskQueue;
  readonly orchestrator: DownloadOrchestrator<TSession>;
  readonly batches: BatchController;
  readonly history: HistoryStore;

  private readonly tracker?: RedisProgressTracker;
  private readonly log: Logger;
  private startedAt?: number;
  private stopping?: Promise<Task[]>;

  constructor(
    readonly config: RelayConfig,
    private readonly deps: RelayRuntimeDeps<TSession>
  ) {
    this.log = deps.logger ?? createLogger({ component: 'runtime' });

    this.pool = new ClientPool<TSession>(deps.connector, {}, this.log.child({ component: 'client-pool' }));
    for (const { identity, session } of deps.sessions.general) {
      this.pool.addGeneral(identity, session);
    }

    this.limiter = new AdaptiveRateLimiter(config.rateLimiter);
    this.history = deps.history ?? new InMemoryHistoryStore();

    this.orchestrator = new DownloadOrchestrator<TSession>(
      {
        pool: this.pool,
        limiter: this.limiter,
        network: deps.network,
        ledger: deps.ledger ?? new InMemoryTrafficLedger(config.traffic),
        staging: deps.staging ?? new FileStagingArea(config.stagingDir),
        logger: this.log.child({ component: 'orchestrator' }),
      },
      config.orchestrator
    );

    this.queue = new TaskQueue(this.orchestrator, config.queue, {
      history: this.history,
      logger: this.log.child({ component: 'task-queue' }),
    });

    let reporter = deps.progress;
    if (!reporter && config.redisUrl) {
      this.tracker = RedisProgressTracker.fromUrl(config.redisUrl);
      reporter = this.tracker;
    }

    this.batches = new BatchController(
      {
        queue: this.queue,
        store: deps.batchStore ?? new InMemoryBatchStore(),
        history: this.history,
        reporter,
        logger: this.log.child({ component: 'batch-controller' }),
      },
      { windowSize: config.batch.windowSize, maxBatchSize: config.batch.maxSize }
    );
  }

  /**
   * Connect sessions, start the workers and resume interrupted batches
   */
  async start(): Promise<BatchJob[]> {
    this.startedAt = Date.now();
    await this.pool.start();
    for (const { ownerId, identity, session } of this.deps.sessions.privileged ?? []) {
      await this.pool.setPrivileged(ownerId, identity, session);
    }

    this.queue.start();
    const resumed = await this.batches.resumeInterrupted();
    if (resumed.length > 0) {
      this.log.info({ jobs: resumed.map((job) => job.id) }, 'Resumed interrupted batches');
    }
    return resumed;
  }

  /**
   * Queue a single message link for the requester
   */
  submitLink(requesterId: string, link: string): Task {
    const reference = parseSourceLink(link);
    return this.queue.submit(createTask({ reference, requesterId }));
  }

  /**
   * Queue `count` consecutive messages starting at the linked one
   */
  async startBatch(ownerId: string, link: string, count: number): Promise<BatchJob> {
    const start = parseSourceLink(link);
    const references = expandReferenceRange(start, count, this.config.batch.maxSize);
    return this.batches.start({ ownerId, references });
  }

  /**
   * Resolve with the settled task, or null when it is unknown, abandoned
   * by shutdown, or still unsettled after `timeoutMs`
   */
  waitForTask(taskId: string, timeoutMs?: number): Promise<Task | null> {
    return this.queue.waitFor(taskId, timeoutMs);
  }

  cancelTask(taskId: string): CancelResult {
    return this.queue.cancel(taskId);
  }

  cancelBatch(jobId: string): BatchJob {
    return this.batches.cancel(jobId);
  }

  recentHistory(requesterId: string, limit?: number): Promise<TaskOutcomeRecord[]> {
    return this.history.listByRequester(requesterId, limit);
  }

  status(): RuntimeStatus {
    return {
      uptime: formatDuration(this.startedAt === undefined ? 0 : Date.now() - this.startedAt),
      queue: this.queue.stats(),
      limiter: this.limiter.snapshot(),
      handles: this.pool.getHandles().map((handle) => ({
        id: handle.id,
        kind: handle.kind,
        identity: handle.identity,
        ownerId: handle.ownerId,
        state: handle.state,
      })),
      batches: this.batches.list().map((job) => this.batches.progress(job.id)),
    };
  }

  /**
   * Drain running tasks, persist batch checkpoints and close every
   * connection. Returns the tasks left Pending. Safe to call twice.
   */
  shutdown(): Promise<Task[]> {
    this.stopping ??= this.stop();
    return this.stopping;
  }

  private async stop(): Promise<Task[]> {
    this.log.info('Stopping task queue...');
    const abandoned = await this.queue.shutdown();

    this.log.info('Flushing batch checkpoints...');
    await this.batches.flush();
    this.batches.dispose();

    if (this.tracker) {
      this.log.info('Closing progress tracker...');
      await this.tracker.close();
    }

    this.log.info('Disconnecting sessions...');
    await this.pool.stop();

    this.log.info({ abandoned: abandoned.length }, 'Runtime stopped');
    return abandoned;
  }
}
