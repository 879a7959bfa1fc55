import { describe, it, expect, vi } from 'vitest';
import { calculateExponentialBackoff, getRetryAfterDelay, retryWithBackoff } from '../src/utils/retry.js';
import { NotFoundError, RateLimitedError, TransientFetchError } from '../src/types/errors.js';

function failingTimes(count: number, error: () => Error): () => Promise<string> {
  let calls = 0;
  return async () => {
    calls++;
    if (calls <= count) {
      throw error();
    }
    return 'ok';
  };
}

describe('calculateExponentialBackoff', () => {
  it('should grow by the multiplier and stop at the maximum', () => {
    expect([0, 1, 2, 3].map(attempt => calculateExponentialBackoff(attempt, 100, 2, 500))).toEqual([100, 200, 400, 500]);
  });
});

describe('getRetryAfterDelay', () => {
  it('should convert a rate-limit hint to milliseconds', () => {
    expect(getRetryAfterDelay(new RateLimitedError('slow down', 3))).toBe(3000);
    expect(getRetryAfterDelay(new RateLimitedError('slow down'))).toBeNull();
    expect(getRetryAfterDelay(new TransientFetchError('HTTP 503', 503))).toBeNull();
  });
});

describe('retryWithBackoff', () => {
  it('should retry transient failures with exponential delays', async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const operation = vi.fn(failingTimes(2, () => new TransientFetchError('HTTP 503', 503)));

    await expect(retryWithBackoff(operation, { initialDelay: 100, sleep })).resolves.toBe('ok');

    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it('should give up after maxAttempts retries', async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const operation = vi.fn(failingTimes(10, () => new TransientFetchError('HTTP 502', 502)));

    await expect(retryWithBackoff(operation, { maxAttempts: 2, initialDelay: 10, sleep })).rejects.toThrow('HTTP 502');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('should not retry errors that are not retryable', async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const operation = vi.fn(failingTimes(1, () => new NotFoundError('GitHub release', 'v1.0.0')));

    await expect(retryWithBackoff(operation, { sleep })).rejects.toBeInstanceOf(NotFoundError);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should wait as long as the rate-limit hint asks', async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const onRetry = vi.fn();
    const operation = failingTimes(2, () => new RateLimitedError('slow down', 3));

    await retryWithBackoff(operation, { initialDelay: 100, maxDelay: 4000, sleep, onRetry });

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([3000, 3000]);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[1][1]).toBe(1);
    expect(onRetry.mock.calls[1][2]).toBe(3000);
  });

  it('should give up at once when the rate-limit hint exceeds maxDelay', async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const operation = vi.fn(failingTimes(1, () => new RateLimitedError('slow down', 5)));

    const error = await retryWithBackoff(operation, { maxDelay: 4000, sleep }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error instanceof RateLimitedError ? error.message : '').toBe(
      'slow down; upstream asks to wait 5s, longer than the 4000ms retry delay limit'
    );
    expect(error instanceof RateLimitedError ? error.retryAfterSeconds : undefined).toBe(5);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should use a custom retry predicate', async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const operation = vi.fn(failingTimes(1, () => new Error('flaky')));

    await expect(retryWithBackoff(operation, { isRetryable: () => true, sleep })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
  });
});
