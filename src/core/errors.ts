/**
 * Custom Error Classes
 *
 * All errors extend ResolverError for unified catching and logging.
 * Most of them never cross the public API: collaborator failures are caught
 * where they happen and turned into empty results.
 */

/**
 * Base error class. Includes error code and optional cause for error chaining.
 */
export class ResolverError extends Error {
  readonly code: string;

  constructor(message: string, code = 'RESOLVER_ERROR', cause?: Error) {
    super(message, { cause });
    this.name = 'ResolverError';
    this.code = code;

    // Maintains proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get the full error chain message including cause
   */
  getFullMessage(): string {
    let msg = `[${this.code}] ${this.message}`;
    if (this.cause instanceof Error) {
      msg += `\n  Caused by: ${this.cause.message}`;
    }
    return msg;
  }
}

/**
 * Error thrown when the Salesforce session cannot be established.
 * This is the one fatal error of the library.
 */
export class SalesforceConnectionError extends ResolverError {
  readonly orgAlias?: string;

  constructor(message: string, orgAlias?: string, cause?: Error) {
    super(message, 'SALESFORCE_CONNECTION_ERROR', cause);
    this.name = 'SalesforceConnectionError';
    this.orgAlias = orgAlias;
  }
}

/**
 * Error thrown when a Salesforce API call fails.
 */
export class SalesforceApiError extends ResolverError {
  readonly apiMethod?: string;

  constructor(message: string, apiMethod?: string, cause?: Error) {
    super(message, 'SALESFORCE_API_ERROR', cause);
    this.name = 'SalesforceApiError';
    this.apiMethod = apiMethod;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 */
export class ConfigurationError extends ResolverError {
  readonly configKey?: string;

  constructor(message: string, configKey?: string, cause?: Error) {
    super(message, 'CONFIGURATION_ERROR', cause);
    this.name = 'ConfigurationError';
    this.configKey = configKey;
  }
}

/**
 * Error describing a snapshot that could not be read or parsed.
 */
export class SnapshotError extends ResolverError {
  readonly objectApiName: string;

  constructor(message: string, objectApiName: string, cause?: Error) {
    super(message, 'SNAPSHOT_ERROR', cause);
    this.name = 'SnapshotError';
    this.objectApiName = objectApiName;
  }
}

/**
 * Type guard to check if an error is a ResolverError
 */
export function isResolverError(error: unknown): error is ResolverError {
  return error instanceof ResolverError;
}

/**
 * Wrap an unknown error in a ResolverError if it isn't one already
 */
export function wrapError(
  error: unknown,
  defaultMessage: string,
  defaultCode = 'RESOLVER_ERROR'
): ResolverError {
  if (error instanceof ResolverError) {
    return error;
  }

  if (error instanceof Error) {
    return new ResolverError(`${defaultMessage}: ${error.message}`, defaultCode, error);
  }

  return new ResolverError(`${defaultMessage}: ${String(error)}`, defaultCode);
}
