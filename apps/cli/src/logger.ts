// apps/cli/src/logger.ts
//
// pino logger for the terminal front end. Logs go to stderr so they never
// interleave with the board printed on stdout.

import pino, { type Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger };

export function createLogger(level: LogLevel): Logger {
  return pino({ name: 'weaver', level }, pino.destination(2));
}
