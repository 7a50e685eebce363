/**
 * Logger factory
 *
 * Diagnostics go to stderr so they never interleave with the transfer
 * messages printed on stdout.
 */

import pino from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from './types.js';

export interface LoggerOptions {
  level: LogLevel;
  /** Human-readable output through pino-pretty */
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions): Logger {
  if (options.pretty) {
    return pino({
      name: 'codedrop',
      level: options.level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
        },
      },
    });
  }
  return pino({ name: 'codedrop', level: options.level }, pino.destination(2));
}

/** Logger that discards everything */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
