/**
 * Retry with Exponential Backoff
 *
 * Retries transient provider failures with exponential backoff and jitter.
 *
 * DESIGN:
 * - Exponential backoff: delay = base * (multiplier ^ (attempt - 1)), capped
 * - Jitter: randomness prevents synchronized retries across parallel runs
 * - Retry predicate: only ProviderTransientError is retried; anything else
 *   is rethrown untouched on the first occurrence
 *
 * Retry state is per call and never persisted.
 */

import { ProviderTransientError, toError } from '../core/errors.js';
import { systemClock, type Clock } from '../core/clock.js';
import type { RetryAttempt, RetryConfig } from './types.js';

/**
 * Retry exhausted error (thrown after max attempts of a retryable failure)
 */
export class RetryExhaustedError extends Error {
  readonly attempts: readonly RetryAttempt[];
  readonly lastError: Error;

  constructor(attempts: readonly RetryAttempt[], lastError: Error) {
    super(`Retry exhausted after ${attempts.length} attempts: ${lastError.message}`, {
      cause: lastError,
    });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export interface RetryHooks {
  /** Called after a failed attempt that will be retried */
  readonly onRetry?: (attempt: RetryAttempt) => void;
}

/**
 * Retry executor with exponential backoff
 *
 * @example
 * ```typescript
 * const retry = createRetryExecutor({ maxAttempts: 3 });
 * const result = await retry.execute(() => provider.lookup(query));
 * ```
 */
export class RetryExecutor {
  constructor(
    private readonly config: RetryConfig,
    private readonly clock: Clock = systemClock,
    private readonly random: () => number = Math.random
  ) {
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${config.maxAttempts}`);
    }
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  /**
   * Execute function with retry logic
   *
   * @throws {RetryExhaustedError} when every attempt failed transiently
   * @throws the original error for non-retryable failures
   */
  async execute<T>(fn: (attemptNumber: number) => Promise<T>, hooks?: RetryHooks): Promise<T> {
    const attempts: RetryAttempt[] = [];

    for (let attempt = 1; ; attempt++) {
      try {
        return await fn(attempt);
      } catch (error) {
        const lastError = toError(error);
        const retryable = this.isRetryable(lastError);
        const isLastAttempt = attempt >= this.config.maxAttempts;

        if (!retryable) {
          throw lastError;
        }

        const delayMs = isLastAttempt ? 0 : this.calculateDelay(attempt);
        const record: RetryAttempt = { attemptNumber: attempt, delayMs, error: lastError, retryable };
        attempts.push(record);

        if (isLastAttempt) {
          throw new RetryExhaustedError(attempts, lastError);
        }

        hooks?.onRetry?.(record);
        await this.clock.sleep(delayMs);
      }
    }
  }

  /**
   * Calculate exponential backoff delay with jitter
   */
  calculateDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);

    // Jitter range: [delay * (1 - jitterFactor), delay * (1 + jitterFactor)]
    const jitterRange = cappedDelay * this.config.jitterFactor;
    const jitter = this.random() * 2 * jitterRange - jitterRange;

    return Math.max(0, Math.floor(cappedDelay + jitter));
  }

  private isRetryable(error: Error): boolean {
    return error instanceof ProviderTransientError;
  }
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
};

/**
 * Create retry executor with engine defaults
 */
export function createRetryExecutor(
  overrides?: Partial<RetryConfig>,
  clock: Clock = systemClock
): RetryExecutor {
  return new RetryExecutor({ ...DEFAULT_RETRY_CONFIG, ...overrides }, clock);
}
