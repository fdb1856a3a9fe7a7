/**
 * Logger
 *
 * Pino-based structured logger for all packages.
 * Writes to stderr so the interactive terminal output on stdout stays readable.
 */

import { pino, destination, type LoggerOptions } from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'warn';
const NODE_ENV = process.env['NODE_ENV'] ?? 'production';

const options: LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'tubemux',
    env: NODE_ENV,
  },
};

export const logger = NODE_ENV === 'development'
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  : pino(options, destination(2));

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

/**
 * Change the level of the root logger (and every child created afterwards)
 */
export function setLogLevel(level: string): void {
  logger.level = level;
}
