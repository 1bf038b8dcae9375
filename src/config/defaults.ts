/**
 * Centralized Default Configuration Values
 *
 * All magic numbers and default values are defined here for consistency.
 * Users can override the connection-related ones through the config file
 * or environment variables (see app-config.ts).
 */

export const DEFAULTS = {
  /**
   * Salesforce REST API version used for every jsforce connection.
   */
  API_VERSION: '60.0',

  /**
   * Maximum number of attempts for a describe call that fails transiently.
   */
  RETRY_ATTEMPTS: 3,

  /**
   * Initial delay between retries in milliseconds.
   */
  RETRY_DELAY_MS: 1000,

  /**
   * Multiplier for exponential backoff between retries.
   */
  RETRY_BACKOFF_MULTIPLIER: 2,

  /**
   * Maximum delay between retries in milliseconds.
   */
  RETRY_MAX_DELAY_MS: 30000,

  /**
   * File extension of persisted object snapshots.
   */
  SNAPSHOT_EXTENSION: '.yaml',

  /**
   * Log level used when neither the config file nor LOG_LEVEL sets one.
   */
  LOG_LEVEL: 'warn',
} as const;

