/**
 * Utility for executing operations with exponential backoff retry logic.
 */

import { debugLoad } from './debugLogger';

import type { Logger } from './logger';

export interface RetryOptions {
  baseDelayMs: number;
  maxRetries: number;
  log?: Logger;
  operationName?: string;
  /**
   * Return false for errors that retrying cannot fix. Defaults to retrying everything.
   */
  shouldRetry?: (error: Error) => boolean;
}

/**
 * Execute a function with exponential backoff retry logic.
 *
 * @param operation - The async function to execute
 * @param options - Retry configuration options
 * @returns The result of the operation
 * @throws The last error if all retries fail
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { baseDelayMs, log, maxRetries, operationName, shouldRetry = () => true } = options;
  const attempts = Math.max(1, maxRetries);
  let lastError: Error = new Error('Operation failed with no error details');

  debugLoad(log, 'Operation start', { maxRetries: attempts, operationName });

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      const result = await operation();

      debugLoad(log, 'Operation succeeded', {
        attempt: attempt + 1,
        operationName,
        success: true,
      });

      return result;
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!shouldRetry(lastError)) break;

      if (attempt < attempts - 1) {
        const delay = baseDelayMs * Math.pow(2, attempt);

        debugLoad(log, 'Retry scheduled', {
          attempt: attempt + 1,
          delay,
          error: lastError.message,
          maxRetries: attempts,
          operationName,
        });

        log?.warn(`${operationName ?? 'Operation'} failed, retrying in ${String(delay)}ms`, {
          attempt: attempt + 1,
          error: lastError.message,
          maxRetries: attempts,
        });
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }

  debugLoad(log, 'All retries exhausted', {
    error: lastError.message,
    maxRetries: attempts,
    operationName,
    success: false,
  });

  throw lastError;
}
