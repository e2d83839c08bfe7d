/**
 * Resilience Types
 *
 * Configuration for provider rate limiting and retry.
 */

// ============================================================================
// Rate Limiting
// ============================================================================

/**
 * Gate in front of every outbound provider request
 */
export interface RateLimiter {
  /**
   * Resolve once the next request may be sent.
   * Each resolved call consumes one permit.
   */
  acquire(): Promise<void>;
}

/**
 * Rate limit policy, one per provider
 */
export type RateLimitPolicy =
  | {
      /** At least `minIntervalMs` between consecutive permits */
      readonly kind: 'fixed-interval';
      readonly minIntervalMs: number;
    }
  | {
      /** At most `maxRequests` permits in any rolling `windowMs` */
      readonly kind: 'sliding-window';
      readonly maxRequests: number;
      readonly windowMs: number;
    };

// ============================================================================
// Retry
// ============================================================================

export interface RetryConfig {
  /** Total attempts including the first (>= 1) */
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffMultiplier: number;
  /** Jitter as a fraction of the delay (0-1) */
  readonly jitterFactor: number;
}

export interface RetryAttempt {
  readonly attemptNumber: number;
  /** Delay before the next attempt (0 when none follows) */
  readonly delayMs: number;
  readonly error: Error;
  readonly retryable: boolean;
}
