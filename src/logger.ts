/**
 * Structured logging (pino). Output goes to stderr so it never mixes with
 * keys or ciphertext printed on stdout.
 */

import pino, { type Logger } from 'pino';
import type { LogLevel } from './config';

export type { Logger };

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: options.name ?? 'bb84',
      level: options.level ?? 'silent',
    },
    pino.destination(2)
  );
}
