/**
 * Structured logging with Pino.
 * Logs go to stderr so stdout stays free for command output.
 */

import pino, { type Logger } from 'pino';

export type { Logger };

export function createLogger(level = 'info'): Logger {
  return pino({ name: 'cartquery', level }, pino.destination(2));
}
