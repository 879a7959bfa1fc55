/**
 * Retry Utility with Exponential Backoff
 *
 * Retries transient upstream failures (TransientFetchError, RateLimitedError)
 * with bounded attempts. A rate-limit hint from the upstream takes precedence
 * over the computed backoff; a hint longer than `maxDelay` fails at once.
 */

import { isAppError, RateLimitedError } from '../types/errors.js';
import { logger } from './logger.js';

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retry attempts after the first try (default: 3) */
  maxAttempts?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelay?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelay?: number;
  /** Exponential backoff multiplier (default: 2) */
  multiplier?: number;
  /** Function to determine if an error is retryable (default: AppError.isRetryable) */
  isRetryable?: (error: unknown) => boolean;
  /** Called before waiting for a retry, with the delay about to be applied */
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  /** Sleep implementation, replaceable in tests */
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_RETRY_CONFIG = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  multiplier: 2,
} as const;

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function defaultIsRetryable(error: unknown): boolean {
  return isAppError(error) && error.isRetryable;
}

/**
 * Calculate exponential backoff delay
 *
 * @param attempt - Current attempt number (0-indexed)
 */
export function calculateExponentialBackoff(
  attempt: number,
  initialDelay: number,
  multiplier: number,
  maxDelay: number
): number {
  const delay = initialDelay * Math.pow(multiplier, attempt);
  return Math.min(delay, maxDelay);
}

/**
 * Retry-After hint of a rate-limit error in milliseconds, or null if absent
 */
export function getRetryAfterDelay(error: unknown): number | null {
  if (error instanceof RateLimitedError && error.retryAfterSeconds !== undefined) {
    return error.retryAfterSeconds * 1000;
  }
  return null;
}

/**
 * Retry an operation with exponential backoff
 *
 * @param operation - The operation to retry
 * @param config - Retry configuration
 * @param context - Optional context for logging (e.g. identifier, URL)
 * @throws The last error if all retries are exhausted, or the first non-retryable error
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  config: RetryConfig = {},
  context?: string
): Promise<T> {
  const {
    maxAttempts = DEFAULT_RETRY_CONFIG.maxAttempts,
    initialDelay = DEFAULT_RETRY_CONFIG.initialDelay,
    maxDelay = DEFAULT_RETRY_CONFIG.maxDelay,
    multiplier = DEFAULT_RETRY_CONFIG.multiplier,
    isRetryable = defaultIsRetryable,
    onRetry,
    sleep: wait = sleep,
  } = config;

  const contextStr = context ? ` (${context})` : '';

  for (let attempt = 0; ; attempt++) {
    try {
      const result = await operation();

      if (attempt > 0) {
        logger.info(
          { attempt: attempt + 1, maxAttempts: maxAttempts + 1, context },
          `Operation succeeded after ${attempt} retry attempts${contextStr}`
        );
      }

      return result;
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }

      if (attempt >= maxAttempts) {
        logger.error(
          {
            attempt: attempt + 1,
            maxAttempts: maxAttempts + 1,
            error: error instanceof Error ? error.message : String(error),
            context,
          },
          `Operation failed after ${maxAttempts + 1} attempts${contextStr}`
        );
        throw error;
      }

      const retryAfterDelay = getRetryAfterDelay(error);
      if (retryAfterDelay !== null && retryAfterDelay > maxDelay && error instanceof RateLimitedError) {
        logger.error(
          { attempt: attempt + 1, retryAfter: retryAfterDelay, maxDelay, context },
          `Rate limit wait exceeds the retry delay limit, giving up${contextStr}`
        );
        throw new RateLimitedError(
          `${error.message}; upstream asks to wait ${error.retryAfterSeconds}s, longer than the ${maxDelay}ms retry delay limit`,
          error.retryAfterSeconds,
          { ...error.context, maxDelay }
        );
      }
      const delay = retryAfterDelay !== null
        ? retryAfterDelay
        : calculateExponentialBackoff(attempt, initialDelay, multiplier, maxDelay);

      logger.warn(
        {
          attempt: attempt + 1,
          maxAttempts: maxAttempts + 1,
          delay,
          retryAfter: retryAfterDelay,
          error: error instanceof Error ? error.message : String(error),
          context,
        },
        `Retrying operation${contextStr} (attempt ${attempt + 1}/${maxAttempts + 1})`
      );

      onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }
}
