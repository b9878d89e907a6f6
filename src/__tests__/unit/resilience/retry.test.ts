/**
 * RetryExecutor Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { RateLimitExceededError } from '../../../core/errors.js';
import { HTTPError, HTTPTimeoutError } from '../../../core/http-client.js';
import { classifyError, RetryExecutor, RetryExhaustedError } from '../../../resilience/retry.js';

const POLICY = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 1000,
  backoffMultiplier: 2,
  jitterFactor: 0,
};

describe('classifyError', () => {
  it('should classify transient failures', () => {
    expect(classifyError(new RateLimitExceededError('slow down'))).toBe('rate_limit');
    expect(classifyError(new HTTPError('HTTP 429', 429, 'https://example.test'))).toBe('rate_limit');
    expect(classifyError(new HTTPError('HTTP 503', 503, 'https://example.test'))).toBe('server_error');
    expect(classifyError(new HTTPTimeoutError('https://example.test', 10))).toBe('network_timeout');
  });

  it('should not retry deterministic failures', () => {
    expect(classifyError(new HTTPError('HTTP 404', 404, 'https://example.test'))).toBeNull();
    expect(classifyError(new Error('boom'))).toBeNull();
  });
});

describe('RetryExecutor', () => {
  it('should back off exponentially up to the cap', () => {
    const executor = new RetryExecutor(POLICY);
    expect(executor.calculateDelay(1)).toBe(100);
    expect(executor.calculateDelay(2)).toBe(200);
    expect(executor.calculateDelay(5)).toBe(1000);
  });

  it('should apply jitter around the delay', () => {
    const low = new RetryExecutor({ ...POLICY, jitterFactor: 0.1 }, { random: () => 0 });
    const high = new RetryExecutor({ ...POLICY, jitterFactor: 0.1 }, { random: () => 1 });
    expect(low.calculateDelay(1)).toBe(90);
    expect(high.calculateDelay(1)).toBe(110);
  });

  it('should retry transient errors until success', async () => {
    const sleeps: number[] = [];
    const onRetry = vi.fn();
    const executor = new RetryExecutor(POLICY, {
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      onRetry,
    });

    let calls = 0;
    const result = await executor.execute(async (attempt) => {
      calls++;
      if (attempt < 3) throw new HTTPTimeoutError('https://example.test', 10);
      return 'ok';
    });

    expect(result).toBe('ok');
    expect(calls).toBe(3);
    expect(sleeps).toEqual([100, 200]);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0]?.[0]).toMatchObject({ attemptNumber: 1, delayMs: 100, errorType: 'network_timeout' });
  });

  it('should stop at once on a non-retryable error', async () => {
    const sleep = vi.fn(async () => undefined);
    const executor = new RetryExecutor(POLICY, { sleep });

    const error = await executor
      .execute(async () => {
        throw new HTTPError('HTTP 404: Not Found', 404, 'https://example.test');
      })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.attempts).toHaveLength(1);
      expect(error.lastError.message).toBe('HTTP 404: Not Found');
    }
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should give up after maxAttempts', async () => {
    const executor = new RetryExecutor(POLICY, { sleep: async () => undefined });

    await expect(
      executor.execute(async () => {
        throw new HTTPError('HTTP 503: Service Unavailable', 503, 'https://example.test');
      })
    ).rejects.toThrow('Retry exhausted after 3 attempt(s): HTTP 503: Service Unavailable');
  });
});
