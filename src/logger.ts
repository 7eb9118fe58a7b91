/**
 * Logging
 *
 * JSON lines on stderr so that stdout stays clean for shares and phrases.
 * Only identifiers, counts and phase changes are ever logged.
 */

import { pino, destination as pinoDestination, type DestinationStream, type Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger } from 'pino';

export function createLogger(level: LogLevel = 'warn', destination?: DestinationStream): Logger {
  return pino({ name: 'sskr', level }, destination ?? pinoDestination(2));
}
