/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Logger Utility
 *
 * pino with pretty-print in development, silent under test.
 */

import pino from 'pino';

const env = process.env.NODE_ENV;
const isDev = env !== 'production' && env !== 'test';

function defaultLevel(): string {
  if (env === 'test') return 'silent';
  return isDev ? 'debug' : 'info';
}

const baseLogger = pino({
  name: 'restmap',
  level: process.env.LOG_LEVEL ?? defaultLevel(),
  transport: isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

/** Create a child logger with a component name. */
export function createLogger(component: string): pino.Logger {
  return baseLogger.child({ component });
}

