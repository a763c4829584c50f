/**
 * Worker Configuration
 *
 * Reads the process environment (plus the repository's .env file) into an
 * immutable RelayConfig. The retrieval packages never look at the
 * environment themselves.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ValidationError } from '@tg-relay/core';

// Get monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../..');

const MiB = 1024 * 1024;
const GiB = 1024 * MiB;

/**
 * Load .env from the monorepo root into process.env
 */
export function loadEnvFile(path: string = resolve(monorepoRoot, '.env')): void {
  dotenvConfig({ path });
}

// Helper to resolve relative paths from monorepo root
function resolvePath(p: string): string {
  if (p.startsWith('./') || p.startsWith('../')) {
    return resolve(monorepoRoot, p);
  }
  return p;
}

const optionalUrl = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().url().optional()
);

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

    // Workers and queue
    WORKER_COUNT: z.coerce.number().int().min(1).max(20).default(3),
    QUEUE_CAPACITY: z.coerce.number().int().positive().default(200),
    MAX_REQUEUES: z.coerce.number().int().positive().default(50),

    // Rate limiter (tokens per second)
    RATE_CAPACITY: z.coerce.number().positive().default(3),
    RATE_INITIAL: z.coerce.number().positive().default(0.5),
    RATE_MIN: z.coerce.number().positive().default(0.1),
    RATE_MAX: z.coerce.number().positive().default(10),
    RATE_SUCCESS_THRESHOLD: z.coerce.number().int().positive().default(10),

    // Pipeline
    MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
    FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
    DELIVER_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
    STAGING_DIR: z.string().min(1).default('./storage/staging'),

    // Batches
    BATCH_MAX_SIZE: z.coerce.number().int().min(1).max(1000).default(100),
    BATCH_WINDOW: z.coerce.number().int().positive().default(5),

    // Traffic limits in bytes, 0 disables
    DEFAULT_DAILY_LIMIT: z.coerce.number().int().nonnegative().default(GiB),
    DEFAULT_MONTHLY_LIMIT: z.coerce.number().int().nonnegative().default(10 * GiB),
    DEFAULT_PER_FILE_LIMIT: z.coerce.number().int().nonnegative().default(100 * MiB),

    // Progress publishing
    REDIS_URL: optionalUrl,
  })
  .superRefine((env, ctx) => {
    if (env.RATE_MIN > env.RATE_MAX) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['RATE_MIN'], message: 'must not exceed RATE_MAX' });
    }
    if (env.RATE_INITIAL < env.RATE_MIN || env.RATE_INITIAL > env.RATE_MAX) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RATE_INITIAL'],
        message: 'must be between RATE_MIN and RATE_MAX',
      });
    }
  });

export interface RelayConfig {
  readonly nodeEnv: 'development' | 'production' | 'test';
  readonly logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
  readonly queue: {
    readonly workers: number;
    readonly capacity: number;
    readonly maxRequeues: number;
  };
  readonly rateLimiter: {
    readonly capacity: number;
    readonly initialRate: number;
    readonly minRate: number;
    readonly maxRate: number;
    readonly successThreshold: number;
  };
  readonly orchestrator: {
    readonly maxRetries: number;
    readonly fetchTimeoutMs: number;
    readonly deliverTimeoutMs: number;
  };
  readonly batch: {
    readonly maxSize: number;
    readonly windowSize: number;
  };
  readonly stagingDir: string;
  readonly traffic: {
    readonly perFileBytes: number;
    readonly dailyBytes: number;
    readonly monthlyBytes: number;
  };
  readonly redisUrl?: string;
}

/**
 * Validate an environment into a RelayConfig.
 * Throws ValidationError naming every offending key.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): RelayConfig {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const issues = parseResult.error.issues;
    const keys = [...new Set(issues.map((issue) => issue.path.join('.')))];
    throw new ValidationError(
      keys.join(', '),
      issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    );
  }

  const env = parseResult.data;

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    queue: {
      workers: env.WORKER_COUNT,
      capacity: env.QUEUE_CAPACITY,
      maxRequeues: env.MAX_REQUEUES,
    },
    rateLimiter: {
      capacity: env.RATE_CAPACITY,
      initialRate: env.RATE_INITIAL,
      minRate: env.RATE_MIN,
      maxRate: env.RATE_MAX,
      successThreshold: env.RATE_SUCCESS_THRESHOLD,
    },
    orchestrator: {
      maxRetries: env.MAX_RETRIES,
      fetchTimeoutMs: env.FETCH_TIMEOUT_MS,
      deliverTimeoutMs: env.DELIVER_TIMEOUT_MS,
    },
    batch: {
      maxSize: env.BATCH_MAX_SIZE,
      windowSize: env.BATCH_WINDOW,
    },
    stagingDir: resolvePath(env.STAGING_DIR),
    traffic: {
      perFileBytes: env.DEFAULT_PER_FILE_LIMIT,
      dailyBytes: env.DEFAULT_DAILY_LIMIT,
      monthlyBytes: env.DEFAULT_MONTHLY_LIMIT,
    },
    redisUrl: env.REDIS_URL,
  };
}
