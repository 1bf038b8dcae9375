/**
 * Core module exports
 */

export * from './types.js';
export * from './errors.js';
export * from './concurrency.js';
export { ApiService, type Collaborators, type SchemaLoadRequest } from './api-service.js';
export { logger, createLogger, type Logger } from './logger.js';
