import { describe, it, expect, vi, afterEach } from 'vitest';
import { ThrottledError, createTask, type Task } from '@tg-relay/core';
import { InMemoryTrafficLedger, type TrafficLimits } from '@tg-relay/storage';
import {
  AdaptiveRateLimiter,
  ClientPool,
  DownloadOrchestrator,
  type OrchestratorOptions,
  type RateLimiterOptions,
} from '../src/index.js';
import {
  FakeConnector,
  RecordingStaging,
  ScriptedNetwork,
  mediaOf,
  testLogger,
  type FakeSession,
} from './helpers.js';

interface HarnessOptions {
  limiter?: Partial<RateLimiterOptions>;
  limits?: Partial<TrafficLimits>;
  orchestrator?: Partial<OrchestratorOptions>;
  withGeneral?: boolean;
}

async function harness(options: HarnessOptions = {}) {
  const connector = new FakeConnector();
  const pool = new ClientPool<FakeSession>(connector, {}, testLogger);
  if (options.withGeneral !== false) {
    pool.addGeneral('relay-bot', { name: 'bot' });
  }
  await pool.start();

  const limiter = new AdaptiveRateLimiter(options.limiter ?? {}, () => 0);
  const network = new ScriptedNetwork();
  const ledger = new InMemoryTrafficLedger(options.limits ?? {});
  const staging = new RecordingStaging();
  const orchestrator = new DownloadOrchestrator<FakeSession>(
    { pool, limiter, network, ledger, staging, logger: testLogger },
    options.orchestrator ?? {}
  );

  return { pool, limiter, network, ledger, staging, orchestrator };
}

const running = { isCancelled: () => false };

function publicTask(): Task {
  return createTask({ reference: { chat: 'relaynews', messageId: 42 }, requesterId: 'u1' });
}

function privateTask(): Task {
  return createTask({ reference: { chat: '-1001234567890', messageId: 7 }, requesterId: 'u1' });
}

describe('DownloadOrchestrator', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('fetches, reserves, delivers and cleans up', async () => {
    const { orchestrator, network, ledger, staging } = await harness();

    const outcome = await orchestrator.execute(publicTask(), running);

    expect(outcome).toEqual({ status: 'succeeded', byteSize: 1024 });
    expect(network.fetches).toEqual([{ key: '@relaynews/42', handle: 'relay-bot', stagingDir: staging.created[0] }]);
    expect(network.deliveries).toEqual([{ key: '@relaynews/42', mode: 'media', handle: 'relay-bot', targetId: 'u1' }]);
    expect(ledger.getUsage('u1')).toMatchObject({ dailyBytes: 1024, reservedBytes: 0 });
    expect(staging.created).toHaveLength(1);
    expect(staging.live()).toEqual([]);
  });

  it('fails invalid references without touching the network', async () => {
    const { orchestrator, network } = await harness();
    const task = createTask({ reference: { chat: '??', messageId: 1 }, requesterId: 'u1' });

    const outcome = await orchestrator.execute(task, running);

    expect(outcome.status === 'failed' && outcome.reason.code).toBe('INVALID_REFERENCE');
    expect(network.fetches).toEqual([]);
  });

  it('denies private references to requesters without a privileged session', async () => {
    const { orchestrator, network } = await harness();

    const outcome = await orchestrator.execute(privateTask(), running);

    expect(outcome.status === 'failed' && outcome.reason.code).toBe('ACCESS_DENIED');
    expect(network.fetches).toEqual([]);
  });

  it('fetches private content through the requester’s session and delivers through the general one', async () => {
    const { orchestrator, network, pool } = await harness();
    await pool.setPrivileged('u1', 'alice-session', { name: 'alice' });

    const outcome = await orchestrator.execute(privateTask(), running);

    expect(outcome.status).toBe('succeeded');
    expect(network.fetches[0]?.handle).toBe('alice-session');
    expect(network.fetches[0]?.key).toBe('-1001234567890/7');
    expect(network.deliveries[0]?.handle).toBe('relay-bot');
  });

  it('re-enqueues without consuming a retry when no handle is ready', async () => {
    const { orchestrator } = await harness({ withGeneral: false });

    const outcome = await orchestrator.execute(publicTask(), running);

    expect(outcome).toEqual({ status: 'requeue', delayMs: 5000, cause: 'handle_unavailable', consumesRetry: false });
  });

  it('re-enqueues until a token is available when the bucket is empty', async () => {
    const { orchestrator, network, staging } = await harness({ limiter: { initialTokens: 0 } });

    const outcome = await orchestrator.execute(publicTask(), running);

    expect(outcome).toEqual({ status: 'requeue', delayMs: 2000, cause: 'rate_limited', consumesRetry: false });
    expect(network.fetches).toEqual([]);
    expect(staging.created).toEqual([]);
  });

  it('backs off and retries after upstream throttling', async () => {
    const { orchestrator, network, limiter, staging } = await harness();
    network.onFetch(async () => ({ ok: false, error: { kind: 'throttled', waitMs: 2000 } }));

    const outcome = await orchestrator.execute(publicTask(), running);

    expect(outcome).toEqual({ status: 'requeue', delayMs: 2000, cause: 'throttled', consumesRetry: true });
    expect(limiter.getRate()).toBe(0.25);
    expect(network.deliveries).toEqual([]);
    expect(staging.live()).toEqual([]);
  });

  it('treats a thrown ThrottledError like a throttled result', async () => {
    const { orchestrator, network } = await harness();
    network.onFetch(async () => {
      throw new ThrottledError(3000);
    });

    const outcome = await orchestrator.execute(publicTask(), running);

    expect(outcome).toEqual({ status: 'requeue', delayMs: 3000, cause: 'throttled', consumesRetry: true });
  });

  it('gives up once the retries are used', async () => {
    const { orchestrator, network } = await harness();
    network.onFetch(async () => ({ ok: false, error: { kind: 'throttled', waitMs: 2000 } }));
    const task = publicTask();
    task.retries = 3;

    const outcome = await orchestrator.execute(task, running);

    expect(outcome.status === 'failed' && outcome.reason.code).toBe('RETRIES_EXHAUSTED');
  });

  it('maps permanent fetch errors to their failure codes', async () => {
    const { orchestrator, network } = await harness();
    network.onFetch(
      async () => ({ ok: false, error: { kind: 'not_found' } }),
      async () => ({ ok: false, error: { kind: 'access_denied', message: 'banned from chat' } }),
      async () => ({ ok: false, error: { kind: 'other', message: 'unsupported media' } })
    );

    const notFound = await orchestrator.execute(publicTask(), running);
    const denied = await orchestrator.execute(publicTask(), running);
    const other = await orchestrator.execute(publicTask(), running);

    expect(notFound.status === 'failed' && notFound.reason.code).toBe('NOT_FOUND');
    expect(denied.status === 'failed' && denied.reason).toMatchObject({ code: 'ACCESS_DENIED', message: 'banned from chat' });
    expect(other.status === 'failed' && other.reason).toMatchObject({ code: 'FETCH_FAILED', message: 'unsupported media' });
  });

  it('marks the handle degraded after a connection error', async () => {
    vi.useFakeTimers();
    const { orchestrator, network, pool } = await harness();
    network.onFetch(async () => ({ ok: false, error: { kind: 'connection', message: 'socket reset' } }));

    const outcome = await orchestrator.execute(publicTask(), running);

    expect(outcome).toEqual({ status: 'requeue', delayMs: 5000, cause: 'connection', consumesRetry: true });
    expect(pool.getHandles()[0]?.state).toBe('DEGRADED');
  });

  it('aborts a fetch that exceeds its deadline', async () => {
    vi.useFakeTimers();
    const { orchestrator, network, limiter } = await harness({ orchestrator: { fetchTimeoutMs: 1000 } });
    let signal: AbortSignal | undefined;
    network.onFetch((request) => {
      signal = request.signal;
      return new Promise(() => undefined);
    });

    const pending = orchestrator.execute(publicTask(), running);
    await vi.advanceTimersByTimeAsync(1000);
    const outcome = await pending;

    expect(outcome).toEqual({ status: 'requeue', delayMs: 5000, cause: 'timeout', consumesRetry: true });
    expect(signal?.aborted).toBe(true);
    expect(limiter.getRate()).toBe(0.25);
  });

  it('backs off, releases the reservation and retries when delivery times out', async () => {
    vi.useFakeTimers();
    const { orchestrator, network, limiter, ledger, staging } = await harness({
      orchestrator: { deliverTimeoutMs: 1000 },
    });
    let signal: AbortSignal | undefined;
    network.onDeliver((request) => {
      signal = request.signal;
      return new Promise(() => undefined);
    });

    const pending = orchestrator.execute(publicTask(), running);
    await vi.advanceTimersByTimeAsync(1000);
    const outcome = await pending;

    expect(outcome).toEqual({ status: 'requeue', delayMs: 5000, cause: 'timeout', consumesRetry: true });
    expect(signal?.aborted).toBe(true);
    expect(network.deliveries.map((delivery) => delivery.mode)).toEqual(['media']);
    expect(limiter.getRate()).toBe(0.25);
    expect(limiter.snapshot().throttleCount).toBe(1);
    expect(ledger.getUsage('u1')).toMatchObject({ dailyBytes: 0, reservedBytes: 0 });
    expect(staging.live()).toEqual([]);
  });

  it('gives up on delivery timeouts once the retries are used', async () => {
    vi.useFakeTimers();
    const { orchestrator, network } = await harness({ orchestrator: { deliverTimeoutMs: 1000, maxRetries: 1 } });
    network.onDeliver(() => new Promise(() => undefined));
    const task = publicTask();
    task.retries = 1;

    const pending = orchestrator.execute(task, running);
    await vi.advanceTimersByTimeAsync(1000);
    const outcome = await pending;

    expect(outcome.status === 'failed' && outcome.reason.code).toBe('RETRIES_EXHAUSTED');
  });

  it('stops before delivery when the traffic limit is reached', async () => {
    const { orchestrator, network, ledger } = await harness({ limits: { perFileBytes: 100 } });

    const outcome = await orchestrator.execute(publicTask(), running);

    expect(outcome.status === 'failed' && outcome.reason).toMatchObject({
      code: 'QUOTA_EXCEEDED',
      details: { limitKind: 'per_file', limitBytes: 100, requestedBytes: 1024 },
    });
    expect(network.deliveries).toEqual([]);
    expect(ledger.getUsage('u1').dailyBytes).toBe(0);
  });

  it('falls back to document delivery when media is too large', async () => {
    const { orchestrator, network } = await harness();
    network.onDeliver(async () => ({ ok: false, error: { kind: 'too_large', message: 'photo too big' } }));

    const outcome = await orchestrator.execute(publicTask(), running);

    expect(outcome.status).toBe('succeeded');
    expect(network.deliveries.map((delivery) => delivery.mode)).toEqual(['media', 'document']);
  });

  it('does not fall back after a fatal delivery error and releases the reservation', async () => {
    const { orchestrator, network, ledger } = await harness();
    network.onDeliver(async () => ({ ok: false, error: { kind: 'fatal', message: 'chat write forbidden' } }));

    const outcome = await orchestrator.execute(publicTask(), running);

    expect(outcome.status === 'failed' && outcome.reason).toMatchObject({
      code: 'DELIVERY_FAILED',
      message: 'chat write forbidden',
      details: { modes: ['media'] },
    });
    expect(ledger.getUsage('u1')).toMatchObject({ dailyBytes: 0, reservedBytes: 0 });
  });

  it('fails delivery after both modes fail', async () => {
    const { orchestrator, network } = await harness();
    network.onDeliver(
      async () => ({ ok: false, error: { kind: 'transient', message: 'flood wait' } }),
      async () => {
        throw new Error('upload interrupted');
      }
    );

    const outcome = await orchestrator.execute(publicTask(), running);

    expect(outcome.status === 'failed' && outcome.reason).toMatchObject({
      code: 'DELIVERY_FAILED',
      message: 'upload interrupted',
      details: { modes: ['media', 'document'] },
    });
  });

  it('stops between fetch and delivery once cancelled', async () => {
    const { orchestrator, network, staging, ledger } = await harness();
    let checks = 0;
    const context = { isCancelled: () => ++checks > 1 };

    const outcome = await orchestrator.execute(publicTask(), context);

    expect(outcome.status === 'failed' && outcome.reason.code).toBe('CANCELLED');
    expect(network.fetches).toHaveLength(1);
    expect(network.deliveries).toEqual([]);
    expect(staging.live()).toEqual([]);
    expect(ledger.getUsage('u1').reservedBytes).toBe(0);
  });

  it('uses the fetched size for the reservation', async () => {
    const { orchestrator, network, ledger } = await harness();
    network.onFetch(async () => mediaOf(4096));

    await orchestrator.execute(publicTask(), running);
    expect(ledger.getUsage('u1').dailyBytes).toBe(4096);
  });
});
