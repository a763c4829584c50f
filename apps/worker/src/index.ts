/**
 * Worker Entry Point
 *
 * Hosts one relay runtime in a long-running process:
 * - Loads and validates configuration from the environment
 * - Connects the session pool and starts the task workers
 * - Resumes batches interrupted by the previous run
 * - Drains running tasks and checkpoints batches on shutdown
 *
 * The network client and session connector are supplied by the host
 * process; this package ships no protocol implementation.
 */

import { loadConfig, loadEnvFile, type RelayConfig } from './config/index.js';
import { createWorkerLogger } from './lib/logger.js';
import { RelayRuntime, type RelayRuntimeDeps } from './runtime.js';

export interface WorkerHandle<TSession> {
  config: RelayConfig;
  runtime: RelayRuntime<TSession>;
  shutdown: (signal: string) => Promise<void>;
}

/**
 * Start a runtime and install process signal handlers.
 * Exits the process once shutdown completes.
 */
export async function startWorker<TSession>(
  deps: Omit<RelayRuntimeDeps<TSession>, 'logger'>,
  env: NodeJS.ProcessEnv = process.env
): Promise<WorkerHandle<TSession>> {
  loadEnvFile();
  const config = loadConfig(env);
  const logger = createWorkerLogger(config);
  const runtime = new RelayRuntime<TSession>(config, { ...deps, logger });

  // Track shutdown state
  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.warn({ signal }, 'Shutdown already in progress');
      return;
    }
    isShuttingDown = true;
    logger.info({ signal }, 'Shutdown signal received');

    // Set a hard timeout for shutdown
    const forceExitTimeout = setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 30000);

    try {
      const abandoned = await runtime.shutdown();
      if (abandoned.length > 0) {
        logger.warn({ tasks: abandoned.map((task) => task.id) }, 'Pending tasks abandoned');
      }
      clearTimeout(forceExitTimeout);
      logger.info('Graceful shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      clearTimeout(forceExitTimeout);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.fatal({ error }, 'Uncaught exception');
    void shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason }, 'Unhandled rejection');
    void shutdown('unhandledRejection');
  });

  await runtime.start();

  logger.info(
    {
      workers: config.queue.workers,
      capacity: config.queue.capacity,
      handles: runtime.pool.getHandles().length,
      progress: config.redisUrl ? 'redis' : 'none',
    },
    'Worker started'
  );

  return { config, runtime, shutdown };
}

export { loadConfig, loadEnvFile, type RelayConfig } from './config/index.js';
export { createWorkerLogger } from './lib/logger.js';
export { RelayRuntime, type RelayRuntimeDeps, type RelaySessions, type RuntimeStatus } from './runtime.js';
