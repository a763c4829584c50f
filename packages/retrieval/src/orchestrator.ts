/**
 * Download Orchestrator
 *
 * Runs one task through the relay pipeline:
 *
 *   resolve → acquire handle → rate gate → fetch → quota → deliver
 *
 * Throttling, fetch or delivery timeouts and lost connections become
 * re-enqueues that consume a retry. Permanent problems become a terminal failure with a
 * specific reason. Staged files and leased handles are released on every
 * exit path.
 */

import {
  AccessDeniedError,
  CancelledError,
  DeliveryFailedError,
  NotFoundError,
  QuotaExceededError,
  RetriesExhaustedError,
  ThrottledError,
  resolveReference,
  toFailureReason,
  type ClientHandle,
  type DeliveryMode,
  type FetchedContent,
  type FetchError,
  type FetchResult,
  type RelayError,
  type ResolvedReference,
  type SourceNetworkClient,
  type Task,
  type TrafficLedger,
} from '@tg-relay/core';
import { createLogger, formatBytes, type Logger } from '@tg-relay/utils';
import type { ClientPool } from './clientPool.js';
import type { AdaptiveRateLimiter } from './rateLimiter.js';
import type { StagedArtifact, StagingArea } from './staging.js';
import type { ExecutionContext, ExecutionOutcome, RequeueCause, TaskExecutor } from './taskQueue.js';
import { callWithTimeout } from './timeout.js';

export interface OrchestratorOptions {
  /** Throttle, timeout and connection retries before RETRIES_EXHAUSTED */
  maxRetries: number;
  fetchTimeoutMs: number;
  deliverTimeoutMs: number;
  /** Floor for rate-limited re-enqueue delays */
  minRequeueDelayMs: number;
  /** Delay before retrying when no handle is Ready or one just dropped */
  handleRetryDelayMs: number;
  /** Backoff fed to the limiter when a fetch times out */
  timeoutBackoffMs: number;
}

export const defaultOrchestratorOptions: OrchestratorOptions = {
  maxRetries: 3,
  fetchTimeoutMs: 60000,
  deliverTimeoutMs: 120000,
  minRequeueDelayMs: 250,
  handleRetryDelayMs: 5000,
  timeoutBackoffMs: 5000,
};

export interface OrchestratorDeps<TSession> {
  pool: ClientPool<TSession>;
  limiter: AdaptiveRateLimiter;
  network: SourceNetworkClient<TSession>;
  ledger: TrafficLedger;
  staging: StagingArea;
  logger?: Logger;
}

/** Delivery attempts in order; later modes are only tried after a recoverable error */
const DELIVERY_PLAN: readonly DeliveryMode[] = ['media', 'document'];

type FetchFailure = FetchError | { kind: 'timeout' };

type DeliveryAttempt =
  | { status: 'delivered'; mode: DeliveryMode }
  | { status: 'timeout'; mode: DeliveryMode }
  | { status: 'failed'; modes: DeliveryMode[]; message: string };

function failed(error: RelayError): ExecutionOutcome {
  return { status: 'failed', reason: toFailureReason(error) };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class DownloadOrchestrator<TSession = unknown> implements TaskExecutor {
  private readonly options: OrchestratorOptions;
  private readonly pool: ClientPool<TSession>;
  private readonly limiter: AdaptiveRateLimiter;
  private readonly network: SourceNetworkClient<TSession>;
  private readonly ledger: TrafficLedger;
  private readonly staging: StagingArea;
  private readonly log: Logger;

  constructor(deps: OrchestratorDeps<TSession>, options: Partial<OrchestratorOptions> = {}) {
    this.options = { ...defaultOrchestratorOptions, ...options };
    this.pool = deps.pool;
    this.limiter = deps.limiter;
    this.network = deps.network;
    this.ledger = deps.ledger;
    this.staging = deps.staging;
    this.log = deps.logger ?? createLogger({ component: 'orchestrator' });
  }

  async execute(task: Task, context: ExecutionContext): Promise<ExecutionOutcome> {
    const log = this.log.child({ taskId: task.id, batchId: task.batchId });

    let reference: ResolvedReference;
    try {
      reference = resolveReference(task.reference);
    } catch (error) {
      log.info({ error: errorMessage(error) }, 'Rejected invalid reference');
      return { status: 'failed', reason: toFailureReason(error) };
    }

    if (context.isCancelled()) {
      return failed(new CancelledError(task.id));
    }

    const capability = task.capability === 'privileged' ? 'privileged' : reference.capability;
    const acquired = this.pool.acquire(capability, task.requesterId);
    if (!acquired.ok) {
      if (acquired.error.kind === 'NO_PRIVILEGED_SESSION') {
        return failed(
          new AccessDeniedError(task.requesterId, `${reference.key} needs a privileged session the requester has not provided`)
        );
      }
      log.debug({ capability }, 'No ready handle, re-enqueueing');
      return this.requeue(this.options.handleRetryDelayMs, 'handle_unavailable', false);
    }

    const handle = acquired.handle;
    let artifact: StagedArtifact | undefined;

    try {
      if (!this.limiter.tryAcquire()) {
        const wait = Math.max(this.options.minRequeueDelayMs, this.limiter.msUntilAvailable());
        return this.requeue(wait, 'rate_limited', false);
      }

      artifact = await this.staging.create(task.id);
      const fetched = await this.fetch(reference, artifact.dir, handle);
      if (!fetched.ok) {
        return this.onFetchFailure(task, handle, reference, fetched.error, log);
      }

      const content = fetched.content;
      task.byteSize = content.byteSize;

      if (context.isCancelled()) {
        return failed(new CancelledError(task.id));
      }

      const reservation = await this.ledger.checkAndReserve(task.requesterId, content.byteSize);
      if (!reservation.allowed) {
        log.info({ limitKind: reservation.limitKind, size: formatBytes(content.byteSize) }, 'Traffic limit reached');
        return failed(
          new QuotaExceededError(reservation.limitKind, reservation.limitBytes, reservation.usedBytes, content.byteSize)
        );
      }

      const delivery = await this.deliver(task, reference, content, handle);
      if (delivery.status === 'timeout') {
        await this.ledger.record(task.requesterId, content.byteSize, 'failed');
        const wait = this.limiter.onThrottled(this.options.timeoutBackoffMs);
        log.warn({ mode: delivery.mode, timeoutMs: this.options.deliverTimeoutMs }, 'Delivery timed out');
        return this.retryOrGiveUp(task, wait, 'timeout');
      }
      if (delivery.status === 'failed') {
        await this.ledger.record(task.requesterId, content.byteSize, 'failed');
        log.warn({ modes: delivery.modes, error: delivery.message }, 'Delivery failed');
        return failed(new DeliveryFailedError(delivery.message, delivery.modes));
      }

      await this.ledger.record(task.requesterId, content.byteSize, 'delivered');
      this.limiter.onSuccess();
      log.info({ key: reference.key, mode: delivery.mode, size: formatBytes(content.byteSize) }, 'Relayed');
      return { status: 'succeeded', byteSize: content.byteSize };
    } finally {
      this.pool.release(handle);
      if (artifact) {
        await this.dispose(artifact, log);
      }
    }
  }

  private requeue(delayMs: number, cause: RequeueCause, consumesRetry: boolean): ExecutionOutcome {
    return { status: 'requeue', delayMs, cause, consumesRetry };
  }

  private retryOrGiveUp(task: Task, delayMs: number, cause: RequeueCause): ExecutionOutcome {
    if (task.retries >= this.options.maxRetries) {
      return failed(new RetriesExhaustedError(task.retries, cause));
    }
    return this.requeue(delayMs, cause, true);
  }

  private async fetch(
    reference: ResolvedReference,
    stagingDir: string,
    handle: ClientHandle<TSession>
  ): Promise<{ ok: true; content: FetchedContent } | { ok: false; error: FetchFailure }> {
    const result = await callWithTimeout<FetchResult>(this.options.fetchTimeoutMs, (signal) =>
      this.network.fetch({ reference, stagingDir, signal }, handle)
    );

    switch (result.status) {
      case 'done':
        return result.value;
      case 'timeout':
        return { ok: false, error: { kind: 'timeout' } };
      case 'error':
        if (result.error instanceof ThrottledError) {
          return { ok: false, error: { kind: 'throttled', waitMs: result.error.waitMs } };
        }
        return { ok: false, error: { kind: 'other', message: errorMessage(result.error) } };
    }
  }

  private onFetchFailure(
    task: Task,
    handle: ClientHandle<TSession>,
    reference: ResolvedReference,
    error: FetchFailure,
    log: Logger
  ): ExecutionOutcome {
    switch (error.kind) {
      case 'throttled': {
        const wait = this.limiter.onThrottled(error.waitMs);
        log.warn({ waitMs: wait, rate: this.limiter.getRate() }, 'Upstream throttled fetch');
        return this.retryOrGiveUp(task, wait, 'throttled');
      }
      case 'timeout': {
        const wait = this.limiter.onThrottled(this.options.timeoutBackoffMs);
        log.warn({ timeoutMs: this.options.fetchTimeoutMs }, 'Fetch timed out');
        return this.retryOrGiveUp(task, wait, 'timeout');
      }
      case 'connection':
        this.pool.markDegraded(handle, error.message);
        log.warn({ handleId: handle.id, error: error.message }, 'Connection lost during fetch');
        return this.retryOrGiveUp(task, this.options.handleRetryDelayMs, 'connection');
      case 'not_found':
        return failed(new NotFoundError('Message', reference.key));
      case 'access_denied':
        return failed(
          new AccessDeniedError(task.requesterId, error.message ?? `No access to ${reference.key}`)
        );
      case 'other':
        return {
          status: 'failed',
          reason: { code: 'FETCH_FAILED', message: error.message, details: { key: reference.key } },
        };
    }
  }

  /**
   * Deliver through a general handle when one is Ready, else through the
   * handle that fetched. Falls back to the next mode only when the previous
   * attempt failed for a recoverable reason. A timeout ends the attempt so
   * the task can be retried.
   */
  private async deliver(
    task: Task,
    reference: ResolvedReference,
    content: FetchedContent,
    fetchHandle: ClientHandle<TSession>
  ): Promise<DeliveryAttempt> {
    let handle = fetchHandle;
    let leased: ClientHandle<TSession> | undefined;
    if (fetchHandle.kind === 'privileged') {
      const general = this.pool.acquire('general', task.requesterId);
      if (general.ok && general.handle.id !== fetchHandle.id) {
        handle = general.handle;
        leased = general.handle;
      } else if (general.ok) {
        this.pool.release(general.handle);
      }
    }

    const attempted: DeliveryMode[] = [];
    let lastMessage = 'no delivery attempted';

    try {
      for (const mode of DELIVERY_PLAN) {
        attempted.push(mode);
        const result = await callWithTimeout(this.options.deliverTimeoutMs, (signal) =>
          this.network.deliver({ content, reference, targetId: task.requesterId, mode, signal }, handle)
        );

        let recoverable: boolean;
        if (result.status === 'timeout') {
          return { status: 'timeout', mode };
        } else if (result.status === 'error') {
          lastMessage = errorMessage(result.error);
          recoverable = true;
        } else if (result.value.ok) {
          return { status: 'delivered', mode };
        } else {
          lastMessage = result.value.error.message;
          recoverable = result.value.error.kind !== 'fatal';
        }

        if (!recoverable) {
          break;
        }
      }
    } finally {
      if (leased) {
        this.pool.release(leased);
      }
    }

    return { status: 'failed', modes: attempted, message: lastMessage };
  }

  private async dispose(artifact: StagedArtifact, log: Logger): Promise<void> {
    try {
      await artifact.dispose();
    } catch (error) {
      log.error({ dir: artifact.dir, error: errorMessage(error) }, 'Failed to remove staged files');
    }
  }
}
