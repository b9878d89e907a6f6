/**
 * Retry with Exponential Backoff
 *
 * delay = initialDelay * multiplier^(attempt - 1), capped, with +/- jitter.
 * Only transient failures are retried: timeouts, network errors, retryable
 * HTTP statuses and upstream rate-limit rejections.
 */

import { RateLimitExceededError, toError } from '../core/errors.js';
import {
  backoffDelay,
  HTTPError,
  HTTPNetworkError,
  HTTPTimeoutError,
  isRetryableStatus,
} from '../core/http-client.js';
import type { RetryPolicyConfig } from '../core/config.js';

export type RetryableErrorType = 'network_timeout' | 'network_error' | 'rate_limit' | 'server_error';

export interface RetryAttempt {
  readonly attemptNumber: number;
  /** Delay scheduled before the next attempt (0 when none follows) */
  readonly delayMs: number;
  readonly error: Error;
  readonly errorType: RetryableErrorType | null;
}

/**
 * Thrown after the final attempt, or at once for a non-retryable error
 */
export class RetryExhaustedError extends Error {
  readonly attempts: readonly RetryAttempt[];
  readonly lastError: Error;

  constructor(attempts: readonly RetryAttempt[], lastError: Error) {
    super(`Retry exhausted after ${attempts.length} attempt(s): ${lastError.message}`, {
      cause: lastError,
    });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export interface RetryDeps {
  readonly sleep?: (ms: number) => Promise<void>;
  readonly random?: () => number;
  /** Called before waiting for the next attempt */
  readonly onRetry?: (attempt: RetryAttempt) => void;
}

/**
 * Classify an error into a retry category, or null when it is not transient
 */
export function classifyError(error: Error): RetryableErrorType | null {
  if (error instanceof RateLimitExceededError) {
    return 'rate_limit';
  }
  if (error instanceof HTTPTimeoutError) {
    return 'network_timeout';
  }
  if (error instanceof HTTPNetworkError) {
    return 'network_error';
  }
  if (error instanceof HTTPError) {
    if (error.statusCode === 429) return 'rate_limit';
    return isRetryableStatus(error.statusCode) ? 'server_error' : null;
  }
  return null;
}

export class RetryExecutor {
  private readonly config: RetryPolicyConfig;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly onRetry?: (attempt: RetryAttempt) => void;

  constructor(config: RetryPolicyConfig, deps: RetryDeps = {}) {
    this.config = config;
    this.sleep = deps.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.random = deps.random ?? Math.random;
    this.onRetry = deps.onRetry;
  }

  /**
   * Run `fn` until it succeeds, a non-retryable error occurs, or attempts run out
   *
   * @param fn - receives the 1-based attempt number
   * @throws RetryExhaustedError carrying every attempt
   */
  async execute<T>(fn: (attempt: number) => Promise<T>): Promise<T> {
    const attempts: RetryAttempt[] = [];

    for (let attempt = 1; ; attempt++) {
      try {
        return await fn(attempt);
      } catch (error) {
        const lastError = toError(error);
        const errorType = classifyError(lastError);
        const isFinal = errorType === null || attempt >= this.config.maxAttempts;
        const delayMs = isFinal ? 0 : this.calculateDelay(attempt);

        const record: RetryAttempt = { attemptNumber: attempt, delayMs, error: lastError, errorType };
        attempts.push(record);

        if (isFinal) {
          throw new RetryExhaustedError(attempts, lastError);
        }

        this.onRetry?.(record);
        await this.sleep(delayMs);
      }
    }
  }

  calculateDelay(attempt: number): number {
    return backoffDelay(this.config, attempt, this.random);
  }
}
