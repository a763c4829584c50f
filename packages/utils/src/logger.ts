/**
 * Logger
 *
 * Pino-based structured logger shared by every workspace.
 * Session strings and tokens are censored before a line is written.
 */

import pino from 'pino';

export type Logger = pino.Logger;

export const redactedPaths = [
  'session',
  'sessionString',
  'token',
  'apiHash',
  '*.session',
  '*.sessionString',
  '*.token',
  '*.apiHash',
];

export interface LoggerSettings {
  level: string;
  env: string;
  /** Write here instead of stdout; disables the pretty transport */
  destination?: pino.DestinationStream;
}

/**
 * Build a root logger. Development output goes through pino-pretty.
 */
export function buildLogger(settings: LoggerSettings): Logger {
  const options: pino.LoggerOptions = {
    level: settings.level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'tg-relay',
      env: settings.env,
    },
    redact: {
      paths: redactedPaths,
      censor: '[redacted]',
    },
  };

  if (settings.destination) {
    return pino(options, settings.destination);
  }

  return pino({
    ...options,
    transport: settings.env === 'development' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
      },
    } : undefined,
  });
}

export const logger = buildLogger({
  level: process.env['LOG_LEVEL'] ?? 'info',
  env: process.env['NODE_ENV'] ?? 'development',
});

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
