/**
 * Batch Controller
 *
 * Feeds a batch job's references into the task queue through a sliding
 * window, counts outcomes, checkpoints progress and handles cancellation.
 *
 * A job's cursor only moves forward. Checkpoints of one job are written in
 * order, so a stored cursor never goes backwards either.
 *
 * Events:
 * - batch:progress (BatchProgress)
 * - batch:completed (BatchJob)
 * - batch:cancelled (BatchJob)
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'node:crypto';
import {
  NotFoundError,
  QueueClosedError,
  QueueFullError,
  ValidationError,
  createTask,
  isTerminalBatchState,
  transitionBatch,
  type BatchJob,
  type BatchProgress,
  type BatchRequest,
  type BatchStore,
  type HistoryStore,
  type ProgressReporter,
  type Task,
  type TaskOutcomeRecord,
} from '@tg-relay/core';
import { createLogger, isPositiveInteger, retry, type Logger } from '@tg-relay/utils';
import type { TaskQueue } from './taskQueue.js';

export interface BatchControllerOptions {
  /** Tasks of one job allowed in the queue at once */
  windowSize: number;
  maxBatchSize: number;
  /** Delay before trying again after the queue rejected a submission */
  queueFullRetryMs: number;
}

export const defaultBatchControllerOptions: BatchControllerOptions = {
  windowSize: 5,
  maxBatchSize: 100,
  queueFullRetryMs: 1000,
};

export interface BatchControllerDeps {
  queue: TaskQueue;
  store: BatchStore;
  history: HistoryStore;
  reporter?: ProgressReporter;
  logger?: Logger;
}

interface ActiveJob {
  job: BatchJob;
  inFlight: Set<string>;
  /** Indexes below the cursor that must be submitted again after a restart */
  resubmit: number[];
  retryTimer?: NodeJS.Timeout;
  checkpoint: Promise<void>;
}

function copyJob(job: BatchJob): BatchJob {
  return {
    ...job,
    references: job.references.map((reference) => ({ ...reference })),
    createdAt: new Date(job.createdAt),
    updatedAt: new Date(job.updatedAt),
  };
}

/**
 * Latest outcome per batch index
 */
function latestOutcomes(records: TaskOutcomeRecord[]): Map<number, TaskOutcomeRecord> {
  const byIndex = new Map<number, TaskOutcomeRecord>();
  for (const record of records) {
    if (record.batchIndex === undefined) {
      continue;
    }
    const existing = byIndex.get(record.batchIndex);
    if (!existing || existing.finishedAt.getTime() <= record.finishedAt.getTime()) {
      byIndex.set(record.batchIndex, record);
    }
  }
  return byIndex;
}

export class BatchController extends EventEmitter {
  private readonly options: BatchControllerOptions;
  private readonly queue: TaskQueue;
  private readonly store: BatchStore;
  private readonly history: HistoryStore;
  private readonly reporter?: ProgressReporter;
  private readonly log: Logger;
  private readonly jobs: Map<string, ActiveJob> = new Map();
  private readonly onSettled = (task: Task): void => this.handleSettled(task);

  constructor(deps: BatchControllerDeps, options: Partial<BatchControllerOptions> = {}) {
    super();
    this.options = { ...defaultBatchControllerOptions, ...options };
    if (!isPositiveInteger(this.options.windowSize)) {
      throw new ValidationError('windowSize', 'must be a positive integer');
    }
    this.queue = deps.queue;
    this.store = deps.store;
    this.history = deps.history;
    this.reporter = deps.reporter;
    this.log = deps.logger ?? createLogger({ component: 'batch-controller' });

    this.queue.on('task:settled', this.onSettled);
  }

  /**
   * Create a job and begin submitting its references
   */
  async start(request: BatchRequest): Promise<BatchJob> {
    const total = request.references.length;
    if (total < 1 || total > this.options.maxBatchSize) {
      throw new ValidationError('references', `must contain between 1 and ${this.options.maxBatchSize} entries`);
    }

    const now = new Date();
    const job: BatchJob = {
      id: randomUUID(),
      ownerId: request.ownerId,
      references: request.references.map((reference) => ({ ...reference })),
      cursor: 0,
      succeeded: 0,
      failed: 0,
      cancelRequested: false,
      state: 'ACTIVE',
      createdAt: now,
      updatedAt: now,
    };

    const active: ActiveJob = { job, inFlight: new Set(), resubmit: [], checkpoint: Promise.resolve() };
    this.jobs.set(job.id, active);
    this.log.info({ jobId: job.id, ownerId: job.ownerId, total }, 'Batch started');

    await this.store.save(copyJob(job));
    this.pump(active);
    this.checkpoint(active);
    return copyJob(job);
  }

  /**
   * Reload unfinished jobs after a restart. Counts are rebuilt from the
   * outcome history; indexes below the cursor without an outcome are
   * submitted again before the cursor advances.
   */
  async resumeInterrupted(): Promise<BatchJob[]> {
    const unfinished = await this.store.listUnfinished();
    const resumed: BatchJob[] = [];

    for (const stored of unfinished) {
      if (this.jobs.has(stored.id)) {
        continue;
      }

      const job = copyJob(stored);
      const outcomes = latestOutcomes(await this.history.listByJob(job.id));
      const resubmit: number[] = [];
      for (let index = 0; index < job.cursor; index++) {
        if (!outcomes.has(index)) {
          resubmit.push(index);
        }
      }
      job.succeeded = 0;
      job.failed = 0;
      for (const outcome of outcomes.values()) {
        if (outcome.state === 'SUCCEEDED') {
          job.succeeded += 1;
        } else {
          job.failed += 1;
        }
      }

      const active: ActiveJob = { job, inFlight: new Set(), resubmit, checkpoint: Promise.resolve() };
      this.jobs.set(job.id, active);

      if (job.state === 'CANCELLING') {
        active.resubmit = [];
        transitionBatch(job, 'CANCELLED');
        this.emit('batch:cancelled', copyJob(job));
      } else {
        this.pump(active);
        this.completeIfDone(active);
      }

      this.log.info(
        { jobId: job.id, cursor: job.cursor, resubmitted: resubmit.length, state: job.state },
        'Batch resumed'
      );
      this.checkpoint(active);
      resumed.push(copyJob(job));
    }

    return resumed;
  }

  /**
   * Stop submitting, cancel queued tasks and flag running ones. The job
   * becomes CANCELLED once its last running task settles.
   */
  cancel(jobId: string): BatchJob {
    const active = this.requireJob(jobId);
    const { job } = active;

    if (job.state === 'CANCELLING' || job.state === 'CANCELLED') {
      return copyJob(job);
    }

    transitionBatch(job, 'CANCELLING');
    active.resubmit = [];
    this.clearRetry(active);

    for (const taskId of [...active.inFlight]) {
      const result = this.queue.cancel(taskId);
      this.log.debug({ jobId, taskId, result }, 'Cancelling batch task');
    }

    this.log.info({ jobId, inFlight: active.inFlight.size }, 'Batch cancellation requested');
    this.cancelIfDrained(active);
    this.checkpoint(active);
    return copyJob(job);
  }

  get(jobId: string): BatchJob | undefined {
    const active = this.jobs.get(jobId);
    return active ? copyJob(active.job) : undefined;
  }

  progress(jobId: string): BatchProgress {
    return this.toProgress(this.requireJob(jobId));
  }

  list(ownerId?: string): BatchJob[] {
    return [...this.jobs.values()]
      .filter((active) => ownerId === undefined || active.job.ownerId === ownerId)
      .map((active) => copyJob(active.job));
  }

  /**
   * Archive a finished job and forget it
   */
  async acknowledge(jobId: string): Promise<void> {
    const active = this.requireJob(jobId);
    if (!isTerminalBatchState(active.job.state)) {
      throw new ValidationError('jobId', `batch ${jobId} is still ${active.job.state}`);
    }
    await active.checkpoint;
    await this.store.archive(jobId);
    this.jobs.delete(jobId);
  }

  /**
   * Wait for every queued checkpoint to be written
   */
  async flush(): Promise<void> {
    await Promise.all([...this.jobs.values()].map((active) => active.checkpoint));
  }

  dispose(): void {
    this.queue.off('task:settled', this.onSettled);
    for (const active of this.jobs.values()) {
      this.clearRetry(active);
    }
  }

  private requireJob(jobId: string): ActiveJob {
    const active = this.jobs.get(jobId);
    if (!active) {
      throw new NotFoundError('Batch job', jobId);
    }
    return active;
  }

  /**
   * Submit references while the window has room
   */
  private pump(active: ActiveJob): void {
    const { job } = active;

    while (job.state === 'ACTIVE' && active.inFlight.size < this.options.windowSize) {
      const fromResubmit = active.resubmit.length > 0;
      const index = fromResubmit ? active.resubmit[0] : job.cursor;
      if (index === undefined || index >= job.references.length) {
        return;
      }
      const reference = job.references[index];
      if (!reference) {
        return;
      }

      const task = createTask({ reference, requesterId: job.ownerId, batchId: job.id, batchIndex: index });
      try {
        this.queue.submit(task);
      } catch (error) {
        if (error instanceof QueueFullError) {
          this.scheduleRetry(active);
          return;
        }
        if (error instanceof QueueClosedError) {
          return;
        }
        throw error;
      }

      if (fromResubmit) {
        active.resubmit.shift();
      } else {
        job.cursor += 1;
      }
      job.updatedAt = new Date();
      active.inFlight.add(task.id);
    }
  }

  private scheduleRetry(active: ActiveJob): void {
    if (active.retryTimer) {
      return;
    }
    this.log.debug({ jobId: active.job.id }, 'Queue full, retrying batch submission later');
    active.retryTimer = setTimeout(() => {
      active.retryTimer = undefined;
      this.pump(active);
      this.checkpoint(active);
    }, this.options.queueFullRetryMs);
  }

  private clearRetry(active: ActiveJob): void {
    if (active.retryTimer) {
      clearTimeout(active.retryTimer);
      active.retryTimer = undefined;
    }
  }

  private handleSettled(task: Task): void {
    if (task.batchId === undefined) {
      return;
    }
    const active = this.jobs.get(task.batchId);
    if (!active || !active.inFlight.delete(task.id)) {
      return;
    }

    const { job } = active;
    if (task.state === 'SUCCEEDED') {
      job.succeeded += 1;
    } else {
      job.failed += 1;
    }
    job.updatedAt = new Date();

    if (job.state === 'ACTIVE') {
      this.pump(active);
      this.completeIfDone(active);
    } else {
      this.cancelIfDrained(active);
    }
    this.checkpoint(active);
  }

  private completeIfDone(active: ActiveJob): void {
    const { job } = active;
    if (job.state !== 'ACTIVE' || job.succeeded + job.failed < job.references.length) {
      return;
    }
    if (active.inFlight.size > 0 || active.resubmit.length > 0 || job.cursor < job.references.length) {
      return;
    }

    transitionBatch(job, 'COMPLETED');
    this.log.info({ jobId: job.id, succeeded: job.succeeded, failed: job.failed }, 'Batch completed');
    this.emit('batch:completed', copyJob(job));
  }

  private cancelIfDrained(active: ActiveJob): void {
    const { job } = active;
    if (job.state !== 'CANCELLING' || active.inFlight.size > 0) {
      return;
    }

    transitionBatch(job, 'CANCELLED');
    this.log.info({ jobId: job.id, succeeded: job.succeeded, failed: job.failed }, 'Batch cancelled');
    this.emit('batch:cancelled', copyJob(job));
  }

  private toProgress(active: ActiveJob): BatchProgress {
    const { job } = active;
    return {
      jobId: job.id,
      ownerId: job.ownerId,
      state: job.state,
      total: job.references.length,
      cursor: job.cursor,
      succeeded: job.succeeded,
      failed: job.failed,
      inFlight: active.inFlight.size,
      updatedAt: new Date(job.updatedAt),
    };
  }

  /**
   * Queue a checkpoint write behind the previous one for this job
   */
  private checkpoint(active: ActiveJob): void {
    const snapshot = copyJob(active.job);
    const progress = this.toProgress(active);
    this.emit('batch:progress', progress);

    active.checkpoint = active.checkpoint.then(async () => {
      try {
        await retry(() => this.store.save(snapshot), { maxAttempts: 3, initialDelay: 200, maxDelay: 2000 });
      } catch (error) {
        this.log.error({ jobId: snapshot.id, cursor: snapshot.cursor, error }, 'Failed to checkpoint batch');
      }

      if (this.reporter) {
        try {
          await this.reporter.report(progress);
        } catch (error) {
          this.log.warn({ jobId: snapshot.id, error }, 'Failed to publish batch progress');
        }
      }
    });
  }
}
