/**
 * Root logger factory.
 */

import { pino } from 'pino';
import type { Logger } from 'pino';

export function createLogger(level: string, name = 'speed-worker'): Logger {
  return pino({
    name,
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
