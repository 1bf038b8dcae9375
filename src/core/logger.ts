/**
 * Centralized Logger Service
 *
 * Provides structured logging using pino. Uses pino-pretty for
 * development and JSON output for production and tests.
 *
 * Usage:
 *   import { createLogger } from './logger.js';
 *   const log = createLogger('schema-catalog');
 *   log.info({ objectCount: 10 }, 'Loaded objects');
 *   log.error({ err }, 'Describe failed');
 */

import pino from 'pino';
import { loadConfig } from '../config/app-config.js';

const config = loadConfig();
const env = process.env.NODE_ENV;
const isDev = env !== 'production' && env !== 'test';

/**
 * Root logger instance
 */
export const logger = pino({
  name: 'sobject-resolver',
  level: config.logLevel,
  // Pretty print in dev, structured JSON otherwise
  ...(isDev && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
});

/**
 * Create a child logger with a namespace
 *
 * @param namespace - The namespace for this logger (e.g., 'schema-catalog', 'salesforce')
 *
 * @example
 * const log = createLogger('salesforce');
 * log.info('Connection established');
 * log.error({ err }, 'Query failed');
 */
export function createLogger(namespace: string) {
  return logger.child({ namespace });
}

/**
 * Re-export pino types for convenience
 */
export type { Logger } from 'pino';
