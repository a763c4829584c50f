/**
 * Client Pool
 *
 * Owns the general-purpose sessions and one optional privileged session per
 * requester. Hands out Ready handles by capability, tracks connectivity and
 * reconnects degraded handles in the background with exponential backoff.
 *
 * Events:
 * - handle:state (HandleStateChange)
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'node:crypto';
import {
  CapabilityError,
  type Capability,
  type ClientHandle,
  type ConnectivityState,
  type HandleStateChange,
  type SessionConnector,
} from '@tg-relay/core';
import { backoffDelay, createLogger, type Logger, type RetryOptions } from '@tg-relay/utils';

export interface ClientPoolOptions {
  /** Reconnect attempts before a handle is left Disconnected; 0 retries forever */
  maxReconnectAttempts: number;
  reconnectBackoff: Pick<RetryOptions, 'initialDelay' | 'maxDelay' | 'backoffMultiplier'>;
}

export const defaultClientPoolOptions: ClientPoolOptions = {
  maxReconnectAttempts: 0,
  reconnectBackoff: {
    initialDelay: 1000,
    maxDelay: 60000,
    backoffMultiplier: 2,
  },
};

export type AcquireResult<TSession> =
  | { ok: true; handle: ClientHandle<TSession> }
  | { ok: false; error: CapabilityError };

class PooledHandle<TSession> implements ClientHandle<TSession> {
  state: ConnectivityState = 'DISCONNECTED';
  leases = 0;
  reconnectAttempts = 0;
  reconnectTimer?: NodeJS.Timeout;

  constructor(
    readonly id: string,
    readonly kind: Capability,
    readonly identity: string,
    readonly session: TSession,
    readonly ownerId?: string
  ) {}
}

export class ClientPool<TSession = unknown> extends EventEmitter {
  private readonly options: ClientPoolOptions;
  private readonly general: PooledHandle<TSession>[] = [];
  private readonly privileged: Map<string, PooledHandle<TSession>> = new Map();
  private readonly log: Logger;
  private stopped = false;

  constructor(
    private readonly connector: SessionConnector<TSession>,
    options: Partial<ClientPoolOptions> = {},
    log: Logger = createLogger({ component: 'client-pool' })
  ) {
    super();
    this.options = { ...defaultClientPoolOptions, ...options };
    this.log = log;
  }

  /**
   * Register a general-purpose session. It is connected by `start()`.
   */
  addGeneral(identity: string, session: TSession): ClientHandle<TSession> {
    const handle = new PooledHandle(randomUUID(), 'general', identity, session);
    this.general.push(handle);
    return handle;
  }

  /**
   * Register or replace the privileged session of a requester and connect it.
   * A replaced session is disconnected first.
   */
  async setPrivileged(ownerId: string, identity: string, session: TSession): Promise<ClientHandle<TSession>> {
    const previous = this.privileged.get(ownerId);
    if (previous) {
      await this.retire(previous);
    }

    const handle = new PooledHandle(randomUUID(), 'privileged', identity, session, ownerId);
    this.privileged.set(ownerId, handle);
    this.log.info({ handleId: handle.id, ownerId, identity }, 'Privileged session registered');

    if (!this.stopped) {
      await this.connect(handle);
    }
    return handle;
  }

  async removePrivileged(ownerId: string): Promise<boolean> {
    const handle = this.privileged.get(ownerId);
    if (!handle) {
      return false;
    }
    this.privileged.delete(ownerId);
    await this.retire(handle);
    this.log.info({ handleId: handle.id, ownerId }, 'Privileged session removed');
    return true;
  }

  hasPrivileged(ownerId: string): boolean {
    return this.privileged.has(ownerId);
  }

  /**
   * Connect every registered handle that is not connected yet
   */
  async start(): Promise<void> {
    this.stopped = false;
    const pending = this.allHandles().filter((handle) => handle.state === 'DISCONNECTED');
    await Promise.all(pending.map((handle) => this.connect(handle)));

    const ready = this.allHandles().filter((handle) => handle.state === 'READY').length;
    this.log.info({ ready, total: this.allHandles().length }, 'Client pool started');
  }

  /**
   * Lease a Ready handle for the capability.
   *
   * General requests prefer the least-leased general handle and fall back to
   * the requester's own privileged handle. Privileged requests only ever get
   * the requester's handle.
   */
  acquire(capability: Capability, requesterId: string): AcquireResult<TSession> {
    const own = this.privileged.get(requesterId);

    if (capability === 'privileged') {
      if (!own) {
        return { ok: false, error: new CapabilityError('NO_PRIVILEGED_SESSION', capability, requesterId) };
      }
      if (own.state !== 'READY') {
        return { ok: false, error: new CapabilityError('UNAVAILABLE', capability, requesterId) };
      }
      own.leases += 1;
      return { ok: true, handle: own };
    }

    let chosen: PooledHandle<TSession> | undefined;
    for (const handle of this.general) {
      if (handle.state === 'READY' && (!chosen || handle.leases < chosen.leases)) {
        chosen = handle;
      }
    }
    if (!chosen && own?.state === 'READY') {
      chosen = own;
    }
    if (!chosen) {
      return { ok: false, error: new CapabilityError('UNAVAILABLE', capability, requesterId) };
    }

    chosen.leases += 1;
    return { ok: true, handle: chosen };
  }

  release(handle: ClientHandle<TSession>): void {
    const entry = this.find(handle.id);
    if (entry && entry.leases > 0) {
      entry.leases -= 1;
    }
  }

  /**
   * Report a connection-level failure on a handle. The handle stops being
   * handed out and a reconnect is scheduled.
   */
  markDegraded(handle: ClientHandle<TSession>, reason: string): void {
    const entry = this.find(handle.id);
    if (!entry) {
      this.log.debug({ handleId: handle.id }, 'Ignoring degrade report for unknown handle');
      return;
    }
    if (entry.state !== 'READY') {
      return;
    }

    this.setState(entry, 'DEGRADED', reason);
    this.scheduleReconnect(entry);
  }

  getHandles(): ClientHandle<TSession>[] {
    return this.allHandles();
  }

  async stop(): Promise<void> {
    this.stopped = true;
    const handles = this.allHandles();
    await Promise.all(handles.map((handle) => this.retire(handle)));
    this.log.info({ total: handles.length }, 'Client pool stopped');
  }

  private allHandles(): PooledHandle<TSession>[] {
    return [...this.general, ...this.privileged.values()];
  }

  private find(handleId: string): PooledHandle<TSession> | undefined {
    return this.allHandles().find((handle) => handle.id === handleId);
  }

  private isRegistered(handle: PooledHandle<TSession>): boolean {
    if (handle.kind === 'general') {
      return this.general.includes(handle);
    }
    return handle.ownerId !== undefined && this.privileged.get(handle.ownerId) === handle;
  }

  private setState(handle: PooledHandle<TSession>, to: ConnectivityState, reason?: string): void {
    const from = handle.state;
    if (from === to) {
      return;
    }
    handle.state = to;

    const change: HandleStateChange = {
      handleId: handle.id,
      kind: handle.kind,
      ownerId: handle.ownerId,
      from,
      to,
      reason,
      at: new Date(),
    };
    this.log.info({ ...change }, 'Handle state changed');
    this.emit('handle:state', change);
  }

  /**
   * Resolves true once Ready. Failures are logged and rescheduled, never thrown.
   */
  private async connect(handle: PooledHandle<TSession>): Promise<boolean> {
    this.setState(handle, 'CONNECTING');
    try {
      await this.connector.connect(handle);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.log.warn({ handleId: handle.id, error: reason }, 'Session connect failed');
      this.setState(handle, 'DEGRADED', reason);
      this.scheduleReconnect(handle);
      return false;
    }

    if (this.stopped || !this.isRegistered(handle)) {
      await this.disconnect(handle);
      return false;
    }

    handle.reconnectAttempts = 0;
    this.setState(handle, 'READY');
    return true;
  }

  private scheduleReconnect(handle: PooledHandle<TSession>): void {
    if (this.stopped || handle.reconnectTimer || !this.isRegistered(handle)) {
      return;
    }

    const attempt = handle.reconnectAttempts + 1;
    const max = this.options.maxReconnectAttempts;
    if (max > 0 && attempt > max) {
      this.log.error({ handleId: handle.id, attempts: handle.reconnectAttempts }, 'Giving up on session');
      this.setState(handle, 'DISCONNECTED', 'reconnect attempts exhausted');
      return;
    }

    handle.reconnectAttempts = attempt;
    const delay = backoffDelay(attempt, this.options.reconnectBackoff);
    this.log.debug({ handleId: handle.id, attempt, delay }, 'Reconnect scheduled');

    handle.reconnectTimer = setTimeout(() => {
      handle.reconnectTimer = undefined;
      if (!this.stopped && this.isRegistered(handle)) {
        void this.connect(handle);
      }
    }, delay);
    handle.reconnectTimer.unref();
  }

  private async retire(handle: PooledHandle<TSession>): Promise<void> {
    if (handle.reconnectTimer) {
      clearTimeout(handle.reconnectTimer);
      handle.reconnectTimer = undefined;
    }
    if (handle.state !== 'DISCONNECTED') {
      await this.disconnect(handle);
    }
  }

  private async disconnect(handle: PooledHandle<TSession>): Promise<void> {
    try {
      await this.connector.disconnect(handle);
    } catch (error) {
      this.log.warn(
        { handleId: handle.id, error: error instanceof Error ? error.message : String(error) },
        'Session disconnect failed'
      );
    }
    this.setState(handle, 'DISCONNECTED');
  }
}
