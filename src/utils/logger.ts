/**
 * Logger utility using pino
 */

import pino from 'pino';
import type { Config } from '../config/index.js';

let _logger: pino.Logger | null = null;

export type LoggerOptions = Pick<Config, 'logLevel' | 'logFormat'>;

/**
 * Configure the process logger from loaded config
 * Called once by the CLI before any pipeline runs
 */
export function configureLogger(options: LoggerOptions): pino.Logger {
  const transport = options.logFormat === 'pretty'
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          destination: 2,
        },
      }
    : undefined;

  _logger = transport
    ? pino({ level: options.logLevel, transport })
    : pino({ level: options.logLevel }, pino.destination(2));
  return _logger;
}

/**
 * Get the logger instance
 * Falls back to plain JSON at info level when not configured
 */
export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = pino({ level: 'info' }, pino.destination(2));
  }
  return _logger;
}

/**
 * Create a child logger with context
 */
export function createLogger(context: Record<string, unknown>): pino.Logger {
  return getLogger().child(context);
}
