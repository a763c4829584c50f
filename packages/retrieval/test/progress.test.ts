import { describe, it, expect } from 'vitest';
import type { BatchProgress } from '@tg-relay/core';
import { RedisProgressTracker, type ProgressStoreClient } from '../src/index.js';

class MemoryRedis implements ProgressStoreClient {
  readonly values: Map<string, { value: string; ttl: number }> = new Map();
  closed = false;

  async set(key: string, value: string, _mode: 'EX', seconds: number): Promise<'OK'> {
    this.values.set(key, { value, ttl: seconds });
    return 'OK';
  }

  async get(key: string): Promise<string | null> {
    return this.values.get(key)?.value ?? null;
  }

  async del(key: string): Promise<number> {
    return this.values.delete(key) ? 1 : 0;
  }

  async quit(): Promise<'OK'> {
    this.closed = true;
    return 'OK';
  }
}

const progress: BatchProgress = {
  jobId: 'job-1',
  ownerId: 'u1',
  state: 'ACTIVE',
  total: 10,
  cursor: 5,
  succeeded: 2,
  failed: 1,
  inFlight: 2,
  updatedAt: new Date('2026-01-01T00:00:00Z'),
};

describe('RedisProgressTracker', () => {
  it('stores progress under a prefixed key with a one hour expiry', async () => {
    const redis = new MemoryRedis();
    const tracker = new RedisProgressTracker(redis);

    await tracker.report(progress);

    expect(redis.values.get('tg-relay:progress:job-1')?.ttl).toBe(3600);
  });

  it('reads progress back with its timestamp restored', async () => {
    const tracker = new RedisProgressTracker(new MemoryRedis());
    await tracker.report(progress);

    await expect(tracker.get('job-1')).resolves.toEqual(progress);
    await expect(tracker.get('job-2')).resolves.toBeNull();
  });

  it('ignores entries that are not progress records', async () => {
    const redis = new MemoryRedis();
    const tracker = new RedisProgressTracker(redis);
    await redis.set('tg-relay:progress:bad', '{"jobId":1}', 'EX', 60);
    await redis.set('tg-relay:progress:garbage', 'not json', 'EX', 60);

    await expect(tracker.get('bad')).resolves.toBeNull();
    await expect(tracker.get('garbage')).resolves.toBeNull();
  });

  it('deletes entries and closes the connection', async () => {
    const redis = new MemoryRedis();
    const tracker = new RedisProgressTracker(redis);
    await tracker.report(progress);

    await tracker.delete('job-1');
    await tracker.close();

    expect(redis.values.size).toBe(0);
    expect(redis.closed).toBe(true);
  });
});
