/**
 * Provider Client
 *
 * Uniform `geocode(query)` over any provider adapter. Every attempt, retries
 * included, first acquires the provider's rate limiter.
 *
 * ERROR CONTRACT:
 * - transient failures are retried with backoff, then become 'failed'
 * - permanent failures become 'failed' immediately
 * - fatal errors (rejected credentials) propagate and end the run
 */

import { GeocoderError, toError } from '../core/errors.js';
import { failedResult, type GeocodeResult } from '../core/types.js';
import type { EngineLogger } from '../core/utils/logger.js';
import { RetryExhaustedError, type RetryExecutor } from '../resilience/retry.js';
import type { RateLimiter } from '../resilience/types.js';
import type { GeocodingProvider, ProviderId } from './types.js';

/**
 * What the batch loop needs from a provider client
 */
export interface GeocodeClient {
  readonly providerId: ProviderId;
  readonly callCount: number;
  geocode(query: string): Promise<GeocodeResult>;
}

export class ProviderClient implements GeocodeClient {
  private calls = 0;

  constructor(
    private readonly provider: GeocodingProvider,
    private readonly limiter: RateLimiter,
    private readonly retry: RetryExecutor,
    private readonly logger: EngineLogger
  ) {}

  get providerId(): ProviderId {
    return this.provider.id;
  }

  /** Requests sent so far, retries included */
  get callCount(): number {
    return this.calls;
  }

  /**
   * Geocode one address
   *
   * @throws {GeocoderError} only for fatal provider errors
   */
  async geocode(query: string): Promise<GeocodeResult> {
    try {
      return await this.retry.execute(
        async () => {
          await this.limiter.acquire();
          this.calls++;
          return this.provider.lookup(query);
        },
        {
          onRetry: (attempt) => {
            this.logger.debug('Retrying provider lookup', {
              provider: this.provider.id,
              attempt: attempt.attemptNumber,
              delayMs: attempt.delayMs,
              error: attempt.error.message,
            });
          },
        }
      );
    } catch (error) {
      if (error instanceof GeocoderError && error.fatal) {
        throw error;
      }

      if (error instanceof RetryExhaustedError) {
        return failedResult(
          `${error.lastError.message} (gave up after ${error.attempts.length} attempts)`
        );
      }

      return failedResult(toError(error).message);
    }
  }
}
