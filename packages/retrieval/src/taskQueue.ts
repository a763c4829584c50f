/**
 * Task Queue
 *
 * Bounded FIFO of Pending tasks drained by a fixed pool of worker loops.
 * A worker hands each task to the executor and applies the outcome it
 * returns: a terminal state, or a delayed re-enqueue.
 *
 * A task refused by the rate gate goes back to the head of the queue and
 * holds every worker until the gate's wait has passed, so the queue keeps
 * its order while it waits for tokens. Such deferrals do not count
 * against `maxRequeues`.
 *
 * Events:
 * - task:started (Task)
 * - task:requeued (Task, { delayMs, cause })
 * - task:settled (Task)
 */

import { EventEmitter } from 'events';
import {
  CancelledError,
  QueueClosedError,
  QueueFullError,
  RetriesExhaustedError,
  ValidationError,
  toFailureReason,
  toOutcomeRecord,
  transitionTask,
  type FailureReason,
  type HistoryStore,
  type Task,
} from '@tg-relay/core';
import { createLogger, isPositiveInteger, type Logger } from '@tg-relay/utils';

export type RequeueCause = 'rate_limited' | 'handle_unavailable' | 'throttled' | 'timeout' | 'connection';

export type ExecutionOutcome =
  | { status: 'succeeded'; byteSize?: number }
  | { status: 'failed'; reason: FailureReason }
  | { status: 'requeue'; delayMs: number; cause: RequeueCause; consumesRetry: boolean };

export interface ExecutionContext {
  /** True once cancellation was requested for the running task */
  isCancelled(): boolean;
}

export interface TaskExecutor {
  execute(task: Task, context: ExecutionContext): Promise<ExecutionOutcome>;
}

export interface TaskQueueOptions {
  /** Maximum Pending tasks; re-enqueues are exempt */
  capacity: number;
  workers: number;
  /** Re-enqueues before a task fails with RETRIES_EXHAUSTED; rate-gate deferrals are exempt */
  maxRequeues: number;
  /** Settled tasks kept for lookups */
  retainSettled: number;
}

export const defaultTaskQueueOptions: TaskQueueOptions = {
  capacity: 200,
  workers: 3,
  maxRequeues: 50,
  retainSettled: 1000,
};

export type CancelResult = 'cancelled' | 'cancelling' | 'already_settled' | 'not_found';

export interface TaskQueueStats {
  pending: number;
  delayed: number;
  running: number;
  workers: number;
  submitted: number;
  succeeded: number;
  failed: number;
  requeued: number;
}

interface DelayedEntry {
  task: Task;
  timer: NodeJS.Timeout;
}

export class TaskQueue extends EventEmitter {
  private readonly options: TaskQueueOptions;
  private readonly history?: HistoryStore;
  private readonly log: Logger;

  private readonly ready: Task[] = [];
  private readonly delayed: Map<string, DelayedEntry> = new Map();
  private readonly running: Map<string, Task> = new Map();
  private readonly settled: Map<string, Task> = new Map();
  private readonly waiters: Array<() => void> = [];
  private readonly idleWaiters: Array<() => void> = [];
  private readonly settleWaiters: Map<string, Array<(task: Task | null) => void>> = new Map();
  private gateTimer?: NodeJS.Timeout;
  private workerLoops: Promise<void>[] = [];
  private settling = 0;
  private closing = false;

  private totals = { submitted: 0, succeeded: 0, failed: 0, requeued: 0 };

  constructor(
    private readonly executor: TaskExecutor,
    options: Partial<TaskQueueOptions> = {},
    deps: { history?: HistoryStore; logger?: Logger } = {}
  ) {
    super();
    this.options = { ...defaultTaskQueueOptions, ...options };
    if (!isPositiveInteger(this.options.workers)) {
      throw new ValidationError('workers', 'must be a positive integer');
    }
    if (!isPositiveInteger(this.options.capacity)) {
      throw new ValidationError('capacity', 'must be a positive integer');
    }
    this.history = deps.history;
    this.log = deps.logger ?? createLogger({ component: 'task-queue' });
  }

  /**
   * Spawn the worker loops. Tasks submitted earlier wait until now.
   */
  start(): void {
    if (this.workerLoops.length > 0 || this.closing) {
      return;
    }
    for (let index = 0; index < this.options.workers; index++) {
      this.workerLoops.push(this.runWorker(index));
    }
    this.log.info({ workers: this.options.workers, capacity: this.options.capacity }, 'Task queue started');
  }

  /**
   * Enqueue a Pending task. Throws QueueFullError at capacity.
   */
  submit(task: Task): Task {
    if (this.closing) {
      throw new QueueClosedError();
    }
    if (task.state !== 'PENDING') {
      throw new ValidationError('task', `must be PENDING to submit, got ${task.state}`);
    }
    if (this.get(task.id)) {
      throw new ValidationError('task', `duplicate task id ${task.id}`);
    }
    if (this.ready.length + this.delayed.size >= this.options.capacity) {
      throw new QueueFullError(this.options.capacity);
    }

    this.totals.submitted += 1;
    this.enqueue(task);
    this.log.debug({ taskId: task.id, batchId: task.batchId }, 'Task submitted');
    return task;
  }

  /**
   * Pending tasks fail immediately with CANCELLED; running tasks are flagged
   * and stop at the next stage boundary.
   */
  cancel(taskId: string): CancelResult {
    const running = this.running.get(taskId);
    if (running) {
      running.cancelRequested = true;
      return 'cancelling';
    }

    const pending = this.removePending(taskId);
    if (pending) {
      pending.cancelRequested = true;
      transitionTask(pending, 'FAILED', { failureReason: toFailureReason(new CancelledError(taskId)) });
      void this.settle(pending);
      return 'cancelled';
    }

    return this.settled.has(taskId) ? 'already_settled' : 'not_found';
  }

  get(taskId: string): Task | undefined {
    return (
      this.running.get(taskId) ??
      this.delayed.get(taskId)?.task ??
      this.ready.find((task) => task.id === taskId) ??
      this.settled.get(taskId)
    );
  }

  stats(): TaskQueueStats {
    return {
      pending: this.ready.length,
      delayed: this.delayed.size,
      running: this.running.size,
      workers: this.workerLoops.length,
      ...this.totals,
    };
  }

  /**
   * Resolves once nothing is pending, delayed, running or settling
   */
  whenIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Resolves with the task once it is terminal. Resolves null for an
   * unknown id, when `timeoutMs` passes first, or when shutdown abandons
   * the task.
   */
  waitFor(taskId: string, timeoutMs?: number): Promise<Task | null> {
    const known = this.get(taskId);
    if (!known) {
      return Promise.resolve(null);
    }
    if (known.state === 'SUCCEEDED' || known.state === 'FAILED') {
      return Promise.resolve(known);
    }

    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const waiter = (task: Task | null): void => {
        clearTimeout(timer);
        resolve(task);
      };
      const list = this.settleWaiters.get(taskId) ?? [];
      list.push(waiter);
      this.settleWaiters.set(taskId, list);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          const remaining = (this.settleWaiters.get(taskId) ?? []).filter((entry) => entry !== waiter);
          if (remaining.length > 0) {
            this.settleWaiters.set(taskId, remaining);
          } else {
            this.settleWaiters.delete(taskId);
          }
          resolve(null);
        }, timeoutMs);
      }
    });
  }

  /**
   * Stop taking tasks, let running ones finish and return the tasks left
   * Pending. Delayed re-enqueues are cancelled and returned with them.
   */
  async shutdown(): Promise<Task[]> {
    this.closing = true;
    clearTimeout(this.gateTimer);
    this.gateTimer = undefined;
    this.wakeAll();

    const abandoned: Task[] = [];
    for (const entry of this.delayed.values()) {
      clearTimeout(entry.timer);
      abandoned.push(entry.task);
    }
    this.delayed.clear();

    await Promise.all(this.workerLoops);
    this.workerLoops = [];

    abandoned.push(...this.ready.splice(0));
    for (const task of abandoned) {
      this.resolveSettleWaiters(task.id, null);
    }
    this.log.info({ abandoned: abandoned.length }, 'Task queue stopped');
    this.notifyIdle();
    return abandoned;
  }

  private isIdle(): boolean {
    return (
      this.ready.length === 0 &&
      this.delayed.size === 0 &&
      this.running.size === 0 &&
      this.settling === 0
    );
  }

  private notifyIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }

  /**
   * Append to the ready list and wake one idle worker. The task stays in
   * `ready` until a worker claims it, so it can still be found and
   * cancelled.
   */
  private enqueue(task: Task): void {
    this.ready.push(task);
    this.waiters.shift()?.();
  }

  private wakeAll(): void {
    for (const wake of this.waiters.splice(0)) {
      wake();
    }
  }

  /**
   * Hold every worker until the rate gate's wait has passed
   */
  private holdGate(delayMs: number): void {
    clearTimeout(this.gateTimer);
    this.gateTimer = setTimeout(() => {
      this.gateTimer = undefined;
      this.wakeAll();
    }, delayMs);
  }

  private resolveSettleWaiters(taskId: string, task: Task | null): void {
    const list = this.settleWaiters.get(taskId);
    if (!list) {
      return;
    }
    this.settleWaiters.delete(taskId);
    for (const waiter of list) {
      waiter(task);
    }
  }

  private removePending(taskId: string): Task | undefined {
    const delayed = this.delayed.get(taskId);
    if (delayed) {
      clearTimeout(delayed.timer);
      this.delayed.delete(taskId);
      return delayed.task;
    }

    const index = this.ready.findIndex((task) => task.id === taskId);
    if (index === -1) {
      return undefined;
    }
    return this.ready.splice(index, 1)[0];
  }

  /**
   * Claim the next ready task, waiting while the queue is empty or the
   * rate gate is held. The claimed task is Running before this returns.
   */
  private async take(): Promise<Task | null> {
    for (;;) {
      if (this.closing) {
        return null;
      }
      const next = this.gateTimer ? undefined : this.ready.shift();
      if (next) {
        transitionTask(next, 'RUNNING');
        this.running.set(next.id, next);
        this.emit('task:started', next);
        return next;
      }
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  private async runWorker(workerId: number): Promise<void> {
    for (;;) {
      const task = await this.take();
      if (!task) {
        return;
      }
      await this.process(task, workerId);
    }
  }

  private async process(task: Task, workerId: number): Promise<void> {
    let outcome: ExecutionOutcome;
    try {
      outcome = await this.executor.execute(task, { isCancelled: () => task.cancelRequested });
    } catch (error) {
      this.log.error({ taskId: task.id, workerId, error }, 'Executor threw');
      outcome = { status: 'failed', reason: toFailureReason(error) };
    }

    this.running.delete(task.id);
    await this.apply(task, outcome);
  }

  private async apply(task: Task, outcome: ExecutionOutcome): Promise<void> {
    switch (outcome.status) {
      case 'succeeded':
        if (outcome.byteSize !== undefined) {
          task.byteSize = outcome.byteSize;
        }
        transitionTask(task, 'SUCCEEDED');
        await this.settle(task);
        return;

      case 'failed':
        transitionTask(task, 'FAILED', { failureReason: outcome.reason });
        await this.settle(task);
        return;

      case 'requeue':
        await this.requeue(task, outcome.delayMs, outcome.cause, outcome.consumesRetry);
        return;
    }
  }

  private async requeue(task: Task, delayMs: number, cause: RequeueCause, consumesRetry: boolean): Promise<void> {
    if (task.cancelRequested) {
      transitionTask(task, 'FAILED', { failureReason: toFailureReason(new CancelledError(task.id)) });
      await this.settle(task);
      return;
    }

    if (cause === 'rate_limited') {
      transitionTask(task, 'PENDING', { deferral: true });
      this.totals.requeued += 1;
      this.emit('task:requeued', task, { delayMs, cause });
      this.log.debug({ taskId: task.id, delayMs, deferrals: task.deferrals }, 'Task deferred by rate gate');
      this.ready.unshift(task);
      if (!this.closing && delayMs > 0) {
        this.holdGate(delayMs);
      } else {
        this.waiters.shift()?.();
      }
      return;
    }

    if (task.requeues >= this.options.maxRequeues) {
      transitionTask(task, 'FAILED', {
        failureReason: toFailureReason(new RetriesExhaustedError(task.retries, cause)),
      });
      await this.settle(task);
      return;
    }

    if (consumesRetry) {
      task.retries += 1;
    }
    transitionTask(task, 'PENDING');
    this.totals.requeued += 1;
    this.emit('task:requeued', task, { delayMs, cause });
    this.log.debug({ taskId: task.id, delayMs, cause, retries: task.retries }, 'Task re-enqueued');

    if (this.closing) {
      this.ready.push(task);
      return;
    }
    if (delayMs <= 0) {
      this.enqueue(task);
      return;
    }

    const timer = setTimeout(() => {
      this.delayed.delete(task.id);
      this.enqueue(task);
    }, delayMs);
    this.delayed.set(task.id, { task, timer });
  }

  /**
   * Record a terminal task: history first, then listeners
   */
  private async settle(task: Task): Promise<void> {
    this.settling += 1;
    try {
      if (task.state === 'SUCCEEDED') {
        this.totals.succeeded += 1;
      } else {
        this.totals.failed += 1;
      }

      this.settled.set(task.id, task);
      if (this.settled.size > this.options.retainSettled) {
        const oldest = this.settled.keys().next();
        if (!oldest.done) {
          this.settled.delete(oldest.value);
        }
      }

      const record = toOutcomeRecord(task);
      if (this.history && record) {
        try {
          await this.history.append(record);
        } catch (error) {
          this.log.error({ taskId: task.id, error }, 'Failed to append task outcome to history');
        }
      }

      this.log.info(
        { taskId: task.id, state: task.state, reason: task.failureReason?.code, attempts: task.attempts },
        'Task settled'
      );

      this.resolveSettleWaiters(task.id, task);
      try {
        this.emit('task:settled', task);
      } catch (error) {
        this.log.error({ taskId: task.id, error }, 'task:settled listener threw');
      }
    } finally {
      this.settling -= 1;
      this.notifyIdle();
    }
  }
}
