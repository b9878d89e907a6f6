/**
 * Shared Request Budget (Token Bucket)
 *
 * One instance gates every request to the observation source, across all
 * concurrent workers.
 *
 * ALGORITHM:
 * - Bucket holds up to `requestsPerMinute` tokens, refilled continuously
 * - Each request consumes 1 token; requests are also spaced by `minIntervalMs`
 * - Upstream hints (remaining, reset, retry-after) can only tighten the budget
 *
 * `tryAcquire` is synchronous, so check-and-decrement cannot interleave
 * between workers on the event loop.
 */

import type { RateLimitConfig } from '../core/config.js';
import type { RateLimitInfo } from '../core/types/query.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'request-budget' });

/** Wait applied when upstream reports exhaustion without a reset time */
export const DEFAULT_EXHAUSTED_WAIT_MS = 60_000;

export interface RequestBudgetDeps {
  readonly now?: () => number;
  readonly sleep?: (ms: number) => Promise<void>;
}

export interface RequestBudgetStats {
  readonly granted: number;
  readonly waits: number;
  readonly totalWaitMs: number;
  readonly tokens: number;
  readonly blockedUntil: number | null;
}

export class RequestBudget {
  private readonly capacity: number;
  private readonly refillPerMs: number;
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  private tokens: number;
  private lastRefill: number;
  private nextAllowedAt = 0;
  private blockedUntil = 0;

  private granted = 0;
  private waits = 0;
  private totalWaitMs = 0;

  constructor(config: RateLimitConfig, deps: RequestBudgetDeps = {}) {
    this.capacity = Math.max(1, config.requestsPerMinute);
    this.refillPerMs = config.requestsPerMinute / 60_000;
    this.minIntervalMs = config.minIntervalMs;
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.tokens = this.capacity;
    this.lastRefill = this.now();
  }

  /**
   * Take a token if one is available right now
   *
   * @returns 0 when granted, otherwise the milliseconds to wait before retrying
   */
  tryAcquire(): number {
    const now = this.now();
    this.refill(now);

    const blockedWait = this.blockedUntil - now;
    if (blockedWait > 0) return blockedWait;

    const spacingWait = this.nextAllowedAt - now;
    if (spacingWait > 0) return spacingWait;

    if (this.tokens < 1) {
      return Math.max(1, Math.ceil((1 - this.tokens) / this.refillPerMs));
    }

    this.tokens -= 1;
    this.nextAllowedAt = now + this.minIntervalMs;
    this.granted++;
    return 0;
  }

  /**
   * Wait until a token is granted
   */
  async acquire(): Promise<void> {
    for (;;) {
      const wait = this.tryAcquire();
      if (wait <= 0) return;

      this.waits++;
      this.totalWaitMs += wait;
      await this.sleep(wait);
    }
  }

  /**
   * Fold upstream rate-limit indicators into the local budget
   */
  reconcile(info: RateLimitInfo): void {
    const now = this.now();
    this.refill(now);

    if (info.remaining !== undefined) {
      this.tokens = Math.min(this.tokens, Math.max(0, info.remaining));
      if (info.remaining <= 0) {
        const until = info.resetAt !== undefined && info.resetAt > now
          ? info.resetAt
          : now + DEFAULT_EXHAUSTED_WAIT_MS;
        this.blockUntil(until);
      }
    }

    if (info.retryAfterMs !== undefined) {
      this.blockFor(info.retryAfterMs);
    }
  }

  /**
   * Hold every caller for `ms`, e.g. after an explicit rate-limit rejection
   */
  blockFor(ms: number): void {
    this.blockUntil(this.now() + Math.max(0, ms));
  }

  getStats(): RequestBudgetStats {
    this.refill(this.now());
    return {
      granted: this.granted,
      waits: this.waits,
      totalWaitMs: this.totalWaitMs,
      tokens: this.tokens,
      blockedUntil: this.blockedUntil > this.now() ? this.blockedUntil : null,
    };
  }

  private blockUntil(until: number): void {
    if (until > this.blockedUntil) {
      this.blockedUntil = until;
      log.warn('Request budget exhausted, holding requests', {
        until: new Date(until).toISOString(),
      });
    }
  }

  private refill(now: number): void {
    const elapsed = now - this.lastRefill;
    if (elapsed > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.refillPerMs);
      this.lastRefill = now;
    }
  }
}
