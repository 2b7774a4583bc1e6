import pino from 'pino';
import type { Logger } from 'pino';

/** Root logger shared by the engine and its backends. */
export function createLogger(level: string = process.env['LOG_LEVEL'] ?? 'info'): Logger {
  return pino({ name: 'timebucket', level });
}
