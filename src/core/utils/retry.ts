/**
 * Retry with exponential backoff for transient API failures
 */

import { isRetryableError } from '../kubernetes/errors.js';
import { getComponentLogger } from '../logging/index.js';
import { toError } from './error-helpers.js';
import { sleep } from './poll.js';

const logger = getComponentLogger('retry');

export interface RetryOptions {
  /**
   * Maximum number of attempts, including the first
   * @default 3
   */
  maxAttempts?: number;

  /**
   * Delay before the second attempt in milliseconds
   * @default 1000
   */
  baseDelay?: number;

  /**
   * @default 10000
   */
  maxDelay?: number;

  /**
   * @default 2
   */
  backoffFactor?: number;

  /**
   * Decides whether a failure is worth another attempt
   */
  retryableErrors?: (error: unknown) => boolean;

  /** Stops retrying once aborted */
  signal?: AbortSignal;
}

/**
 * Execute an operation, retrying transient failures. Non-retryable errors
 * and the error of the last attempt propagate unchanged.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  description: string,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    baseDelay = 1000,
    maxDelay = 10000,
    backoffFactor = 2,
    retryableErrors = isRetryableError,
    signal,
  } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await operation();
      if (attempt > 1) {
        logger.debug('Operation succeeded after retry', { operation: description, attempt });
      }
      return result;
    } catch (error) {
      if (attempt >= maxAttempts || !retryableErrors(error) || signal?.aborted) {
        throw error;
      }

      const delay = Math.min(baseDelay * backoffFactor ** (attempt - 1), maxDelay);
      logger.warn('Operation failed, retrying', {
        operation: description,
        error: toError(error).message,
        attempt,
        maxAttempts,
        retryDelay: delay,
      });
      await sleep(delay, signal);
    }
  }
}
