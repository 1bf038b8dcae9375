/**
 * Retry Utilities
 *
 * Exponential backoff for Salesforce calls that fail transiently.
 */

import { DEFAULTS } from '../config/defaults.js';

/**
 * Options for retry with backoff
 */
export interface RetryOptions {
  /** Maximum number of attempts (default: 3) */
  attempts?: number;
  /** Initial delay in milliseconds (default: 1000) */
  delayMs?: number;
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Function to determine if error is retryable (default: always retry) */
  shouldRetry?: (error: Error) => boolean;
  /** Callback when a retry occurs */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

/**
 * Wraps an async function with exponential backoff retry logic.
 *
 * @returns The result of the function, or throws after all retries exhausted
 *
 * @example
 * const result = await retryWithBackoff(
 *   () => connection.describe(objectName),
 *   { attempts: 3, shouldRetry: isRetryableError }
 * );
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    attempts = DEFAULTS.RETRY_ATTEMPTS,
    delayMs = DEFAULTS.RETRY_DELAY_MS,
    backoffMultiplier = DEFAULTS.RETRY_BACKOFF_MULTIPLIER,
    maxDelayMs = DEFAULTS.RETRY_MAX_DELAY_MS,
    shouldRetry = () => true,
    onRetry,
  } = options;

  let lastError: Error = new Error('retryWithBackoff called with no attempts');
  let currentDelay = delayMs;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === attempts || !shouldRetry(lastError)) {
        throw lastError;
      }

      onRetry?.(lastError, attempt, currentDelay);

      await sleep(currentDelay);

      currentDelay = Math.min(currentDelay * backoffMultiplier, maxDelayMs);
    }
  }

  throw lastError;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorCodeOf(error: Error): string | undefined {
  if ('errorCode' in error && typeof error.errorCode === 'string') {
    return error.errorCode;
  }
  return undefined;
}

/**
 * Check if an error is a Salesforce rate limit error
 */
export function isSalesforceRateLimitError(error: Error): boolean {
  const message = error.message || '';

  return (
    errorCodeOf(error) === 'REQUEST_LIMIT_EXCEEDED' ||
    message.includes('REQUEST_LIMIT_EXCEEDED') ||
    message.includes('TotalRequests Limit exceeded') ||
    message.includes('ConcurrentPerOrgLongTxn Limit exceeded')
  );
}

/**
 * Check if an error is retryable (network issues, rate limits, etc.)
 */
export function isRetryableError(error: Error): boolean {
  const message = error.message || '';

  if (isSalesforceRateLimitError(error)) {
    return true;
  }

  // Network errors
  if (
    message.includes('ETIMEDOUT') ||
    message.includes('ECONNRESET') ||
    message.includes('ECONNREFUSED') ||
    message.includes('socket hang up')
  ) {
    return true;
  }

  // Salesforce temporary errors
  if (message.includes('UNABLE_TO_LOCK_ROW') || message.includes('SERVER_UNAVAILABLE')) {
    return true;
  }

  return false;
}
