/**
 * Progress Tracker
 *
 * Publishes batch progress to Redis so other processes can read it.
 */

import { Redis } from 'ioredis';
import { z } from 'zod';
import type { BatchProgress, ProgressReporter } from '@tg-relay/core';

/**
 * The subset of the ioredis client the tracker uses
 */
export interface ProgressStoreClient {
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
  get(key: string): Promise<string | null>;
  del(key: string): Promise<number>;
  quit(): Promise<unknown>;
}

const progressSchema = z.object({
  jobId: z.string(),
  ownerId: z.string(),
  state: z.enum(['ACTIVE', 'CANCELLING', 'COMPLETED', 'CANCELLED']),
  total: z.number().int().nonnegative(),
  cursor: z.number().int().nonnegative(),
  succeeded: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  inFlight: z.number().int().nonnegative(),
  updatedAt: z.coerce.date(),
});

export class RedisProgressTracker implements ProgressReporter {
  private keyPrefix = 'tg-relay:progress:';

  constructor(
    private readonly redis: ProgressStoreClient,
    private readonly ttlSeconds = 3600
  ) {}

  static fromUrl(redisUrl: string): RedisProgressTracker {
    return new RedisProgressTracker(new Redis(redisUrl));
  }

  async report(progress: BatchProgress): Promise<void> {
    await this.redis.set(
      `${this.keyPrefix}${progress.jobId}`,
      JSON.stringify(progress),
      'EX',
      this.ttlSeconds
    );
  }

  /**
   * Last published progress, or null when missing, expired or unreadable
   */
  async get(jobId: string): Promise<BatchProgress | null> {
    const data = await this.redis.get(`${this.keyPrefix}${jobId}`);
    if (!data) {
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch {
      return null;
    }
    const parsed = progressSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  }

  async delete(jobId: string): Promise<void> {
    await this.redis.del(`${this.keyPrefix}${jobId}`);
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
