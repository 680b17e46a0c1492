/**
 * Diagnostic logger.
 *
 * The feed itself goes to the renderer; this logger carries lifecycle
 * and fault details to stderr for troubleshooting.
 */

import pino from 'pino';
import pinoPretty from 'pino-pretty';
import type { Writable } from 'node:stream';
import type { LogLevel } from './config.js';

export type Logger = pino.Logger;

export interface LoggerOptions {
  readonly level: LogLevel;
  /** Colorize level labels. @default true when stderr is a TTY */
  readonly colorize?: boolean;
  /** Destination for formatted lines. @default process.stderr */
  readonly destination?: Writable;
}

/**
 * Creates the `exo-feed` logger, pretty-printed.
 */
export function createLogger(options: LoggerOptions): Logger {
  const stream = pinoPretty({
    colorize: options.colorize ?? process.stderr.isTTY,
    destination: options.destination ?? process.stderr,
    ignore: 'pid,hostname',
    sync: true,
  });
  return pino({ level: options.level, name: 'exo-feed' }, stream);
}

/**
 * Logger that discards everything.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
