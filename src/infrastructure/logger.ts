import pino from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from './config.js';

export interface LoggerOptions {
  level?: LogLevel | undefined;
  name?: string | undefined;
}

/**
 * Creates the SDK's pino logger.
 *
 * Output goes to stdout as JSON lines; host applications that already
 * run pino should pass their own instance (or a child) through the
 * client's `logger` option instead.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'agent-beacon',
    level: options.level ?? process.env['BEACON_LOG_LEVEL'] ?? 'info',
  });
}
