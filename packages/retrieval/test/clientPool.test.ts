import { describe, it, expect, vi, afterEach } from 'vitest';
import type { HandleStateChange } from '@tg-relay/core';
import { ClientPool } from '../src/index.js';
import { FakeConnector, testLogger, type FakeSession } from './helpers.js';

function makePool(connector = new FakeConnector(), maxReconnectAttempts = 0): ClientPool<FakeSession> {
  return new ClientPool<FakeSession>(
    connector,
    {
      maxReconnectAttempts,
      reconnectBackoff: { initialDelay: 100, maxDelay: 1000, backoffMultiplier: 2 },
    },
    testLogger
  );
}

describe('ClientPool', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('hands out a ready general handle to anyone', async () => {
    const pool = makePool();
    pool.addGeneral('relay-bot', { name: 'bot' });
    await pool.start();

    const result = pool.acquire('general', 'u1');
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.handle.identity).toBe('relay-bot');
      expect(result.handle.state).toBe('READY');
    }
  });

  it('spreads general leases across handles', async () => {
    const pool = makePool();
    pool.addGeneral('bot-a', { name: 'a' });
    pool.addGeneral('bot-b', { name: 'b' });
    await pool.start();

    const first = pool.acquire('general', 'u1');
    const second = pool.acquire('general', 'u2');
    const identities = [first, second].map((result) => (result.ok ? result.handle.identity : 'none'));
    expect(identities.sort()).toEqual(['bot-a', 'bot-b']);
  });

  it('reports NO_PRIVILEGED_SESSION for a requester without a session', async () => {
    const pool = makePool();
    pool.addGeneral('relay-bot', { name: 'bot' });
    await pool.start();

    const result = pool.acquire('privileged', 'u1');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('NO_PRIVILEGED_SESSION');
    }
  });

  it('only gives a privileged handle to its owner', async () => {
    const pool = makePool();
    await pool.setPrivileged('u1', 'alice-session', { name: 'alice' });

    const own = pool.acquire('privileged', 'u1');
    const other = pool.acquire('privileged', 'u2');
    expect(own.ok && own.handle.ownerId).toBe('u1');
    expect(other.ok).toBe(false);
  });

  it('falls back to the requester’s own handle for general content', async () => {
    const pool = makePool();
    await pool.setPrivileged('u1', 'alice-session', { name: 'alice' });

    const result = pool.acquire('general', 'u1');
    expect(result.ok && result.handle.identity).toBe('alice-session');
    expect(pool.acquire('general', 'u2').ok).toBe(false);
  });

  it('reports UNAVAILABLE while a privileged handle is degraded', async () => {
    vi.useFakeTimers();
    const pool = makePool();
    const handle = await pool.setPrivileged('u1', 'alice-session', { name: 'alice' });

    pool.markDegraded(handle, 'socket closed');
    const result = pool.acquire('privileged', 'u1');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('UNAVAILABLE');
    }
  });

  it('reconnects a degraded handle with backoff and emits state changes', async () => {
    vi.useFakeTimers();
    const connector = new FakeConnector();
    const pool = makePool(connector);
    const changes: HandleStateChange[] = [];
    pool.on('handle:state', (change: HandleStateChange) => changes.push(change));

    const handle = pool.addGeneral('relay-bot', { name: 'bot' });
    await pool.start();

    connector.failures.set('relay-bot', 1);
    pool.markDegraded(handle, 'socket closed');
    expect(handle.state).toBe('DEGRADED');

    // first reconnect after 100ms fails, second after a further 200ms succeeds
    await vi.advanceTimersByTimeAsync(100);
    expect(handle.state).toBe('DEGRADED');
    await vi.advanceTimersByTimeAsync(200);
    expect(handle.state).toBe('READY');

    expect(changes.map((change) => `${change.from}>${change.to}`)).toEqual([
      'DISCONNECTED>CONNECTING',
      'CONNECTING>READY',
      'READY>DEGRADED',
      'DEGRADED>CONNECTING',
      'CONNECTING>DEGRADED',
      'DEGRADED>CONNECTING',
      'CONNECTING>READY',
    ]);
    expect(changes[2]?.reason).toBe('socket closed');
  });

  it('gives up after the configured reconnect attempts', async () => {
    vi.useFakeTimers();
    const connector = new FakeConnector();
    const pool = makePool(connector, 1);
    const handle = pool.addGeneral('relay-bot', { name: 'bot' });
    await pool.start();

    connector.failures.set('relay-bot', 5);
    pool.markDegraded(handle, 'socket closed');
    await vi.advanceTimersByTimeAsync(100);

    expect(handle.state).toBe('DISCONNECTED');
  });

  it('disconnects a replaced privileged session', async () => {
    const connector = new FakeConnector();
    const pool = makePool(connector);
    await pool.setPrivileged('u1', 'old-session', { name: 'old' });
    await pool.setPrivileged('u1', 'new-session', { name: 'new' });

    expect(connector.disconnected).toEqual(['old-session']);
    const result = pool.acquire('privileged', 'u1');
    expect(result.ok && result.handle.identity).toBe('new-session');
  });

  it('removes privileged sessions', async () => {
    const pool = makePool();
    await pool.setPrivileged('u1', 'alice-session', { name: 'alice' });

    await expect(pool.removePrivileged('u1')).resolves.toBe(true);
    await expect(pool.removePrivileged('u1')).resolves.toBe(false);
    expect(pool.hasPrivileged('u1')).toBe(false);
  });

  it('disconnects everything on stop', async () => {
    const connector = new FakeConnector();
    const pool = makePool(connector);
    pool.addGeneral('relay-bot', { name: 'bot' });
    await pool.setPrivileged('u1', 'alice-session', { name: 'alice' });
    await pool.start();

    await pool.stop();
    expect(connector.disconnected.sort()).toEqual(['alice-session', 'relay-bot']);
    expect(pool.getHandles().every((handle) => handle.state === 'DISCONNECTED')).toBe(true);
  });
});
