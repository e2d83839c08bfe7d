/**
 * Provider Rate Limiters
 *
 * Blocking limiters: `acquire()` waits until the next request is allowed
 * instead of rejecting it. The engine has a single worker per run, so a wait
 * here simply paces the batch to the provider's ceiling.
 *
 * POLICIES:
 * - Fixed interval: at least `minIntervalMs` between consecutive permits,
 *   measured from the previous `acquire()` completion (independent of how
 *   long the HTTP call takes).
 * - Sliding window: at most N permits within any rolling window W; when the
 *   budget is spent, wait until the oldest permit leaves the window.
 *
 * State lives only in memory and starts empty in every process.
 */

import { systemClock, type Clock } from '../core/clock.js';
import type { RateLimiter, RateLimitPolicy } from './types.js';

/**
 * Fixed-interval limiter
 *
 * @example
 * ```typescript
 * const limiter = new FixedIntervalRateLimiter(1000); // 1 request per second
 * await limiter.acquire();
 * ```
 */
export class FixedIntervalRateLimiter implements RateLimiter {
  private lastPermitAt: number | null = null;

  constructor(
    readonly minIntervalMs: number,
    private readonly clock: Clock = systemClock
  ) {
    if (!Number.isFinite(minIntervalMs) || minIntervalMs < 0) {
      throw new RangeError(`minIntervalMs must be a non-negative number, got ${minIntervalMs}`);
    }
  }

  async acquire(): Promise<void> {
    if (this.lastPermitAt !== null) {
      const waitMs = this.lastPermitAt + this.minIntervalMs - this.clock.now();
      if (waitMs > 0) {
        await this.clock.sleep(waitMs);
      }
    }

    this.lastPermitAt = this.clock.now();
  }
}

/**
 * Sliding-window limiter
 *
 * @example
 * ```typescript
 * const limiter = new SlidingWindowRateLimiter(600, 60_000); // 600 per minute
 * await limiter.acquire();
 * ```
 */
export class SlidingWindowRateLimiter implements RateLimiter {
  /** Permit timestamps inside the current window, oldest first */
  private readonly permits: number[] = [];

  constructor(
    readonly maxRequests: number,
    readonly windowMs: number,
    private readonly clock: Clock = systemClock
  ) {
    if (!Number.isInteger(maxRequests) || maxRequests < 1) {
      throw new RangeError(`maxRequests must be a positive integer, got ${maxRequests}`);
    }
    if (!Number.isFinite(windowMs) || windowMs <= 0) {
      throw new RangeError(`windowMs must be a positive number, got ${windowMs}`);
    }
  }

  async acquire(): Promise<void> {
    for (;;) {
      const now = this.clock.now();
      this.evictExpired(now);

      if (this.permits.length < this.maxRequests) {
        this.permits.push(now);
        return;
      }

      const oldest = this.permits[0] ?? now;
      await this.clock.sleep(oldest + this.windowMs - now);
    }
  }

  private evictExpired(now: number): void {
    while (this.permits.length > 0) {
      const oldest = this.permits[0];
      if (oldest === undefined || now - oldest < this.windowMs) {
        break;
      }
      this.permits.shift();
    }
  }
}

/**
 * Build a limiter for a provider policy
 */
export function createRateLimiter(
  policy: RateLimitPolicy,
  clock: Clock = systemClock
): RateLimiter {
  switch (policy.kind) {
    case 'fixed-interval':
      return new FixedIntervalRateLimiter(policy.minIntervalMs, clock);
    case 'sliding-window':
      return new SlidingWindowRateLimiter(policy.maxRequests, policy.windowMs, clock);
  }
}

/**
 * Human-readable policy summary for logs
 */
export function describePolicy(policy: RateLimitPolicy): string {
  switch (policy.kind) {
    case 'fixed-interval':
      return `1 request / ${policy.minIntervalMs}ms`;
    case 'sliding-window':
      return `${policy.maxRequests} requests / ${policy.windowMs}ms window`;
  }
}
