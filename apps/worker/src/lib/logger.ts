/**
 * Worker Logger
 */

import { buildLogger, type Logger } from '@tg-relay/utils';
import type { RelayConfig } from '../config/index.js';

/**
 * Root logger for one worker process, built from its validated config
 */
export function createWorkerLogger(config: Pick<RelayConfig, 'logLevel' | 'nodeEnv'>): Logger {
  return buildLogger({ level: config.logLevel, env: config.nodeEnv }).child({ component: 'worker' });
}
