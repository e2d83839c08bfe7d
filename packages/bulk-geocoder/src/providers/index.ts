/**
 * Geocoding Provider Registry
 *
 * Maps a provider config variant to a ready ProviderClient with its own
 * rate limiter. Configuration problems surface here, before the first
 * request, as ConfigurationError.
 */

import { ConfigurationError } from '../core/errors.js';
import { systemClock, type Clock } from '../core/clock.js';
import { DEFAULT_USER_AGENT, HTTPClient } from '../core/http-client.js';
import { logger as defaultLogger, type EngineLogger } from '../core/utils/logger.js';
import { createRateLimiter, describePolicy } from '../resilience/rate-limiter.js';
import { createRetryExecutor } from '../resilience/retry.js';
import type { RateLimitPolicy, RetryConfig } from '../resilience/types.js';
import { GoogleProvider, GOOGLE_BASE_URL } from './google.js';
import { MapboxProvider, MAPBOX_BASE_URL } from './mapbox.js';
import { NominatimProvider, NOMINATIM_BASE_URL } from './nominatim.js';
import { ProviderClient } from './provider-client.js';
import type {
  GeocodingProvider,
  ProviderConfig,
  ProviderDefinition,
  ProviderId,
} from './types.js';

export { ProviderClient, type GeocodeClient } from './provider-client.js';
export { NominatimProvider } from './nominatim.js';
export { GoogleProvider } from './google.js';
export { MapboxProvider } from './mapbox.js';
export * from './types.js';

export { DEFAULT_USER_AGENT };

export const PROVIDER_DEFINITIONS: Readonly<Record<ProviderId, ProviderDefinition>> = {
  nominatim: {
    id: 'nominatim',
    displayName: 'OpenStreetMap Nominatim',
    requiresKey: false,
    defaultBaseUrl: NOMINATIM_BASE_URL,
    // Public instance usage policy: absolute maximum of 1 request per second
    defaultRateLimit: { kind: 'fixed-interval', minIntervalMs: 1000 },
  },
  google: {
    id: 'google',
    displayName: 'Google Maps',
    requiresKey: true,
    defaultBaseUrl: GOOGLE_BASE_URL,
    defaultRateLimit: { kind: 'fixed-interval', minIntervalMs: 20 },
  },
  mapbox: {
    id: 'mapbox',
    displayName: 'Mapbox',
    requiresKey: true,
    defaultBaseUrl: MAPBOX_BASE_URL,
    defaultRateLimit: { kind: 'sliding-window', maxRequests: 600, windowMs: 60_000 },
  },
};

export interface ProviderClientOptions {
  /** Request timeout in milliseconds (default: 10000) */
  readonly timeoutMs?: number;
  /** Replaces the provider's default rate limit */
  readonly rateLimit?: RateLimitPolicy;
  readonly retry?: Partial<RetryConfig>;
  readonly clock?: Clock;
  readonly logger?: EngineLogger;
}

/**
 * Build the provider adapter for a config variant
 *
 * @throws {ConfigurationError} when a required key is missing
 */
export function createProvider(config: ProviderConfig, http: HTTPClient): GeocodingProvider {
  switch (config.id) {
    case 'nominatim':
      return new NominatimProvider(config, http);
    case 'google':
      return new GoogleProvider(config, http);
    case 'mapbox':
      return new MapboxProvider(config, http);
  }
}

/**
 * Build a rate-limited, retrying client for a provider
 *
 * @throws {ConfigurationError} for missing keys or a rate limit above the
 *   public Nominatim ceiling
 */
export function createProviderClient(
  config: ProviderConfig,
  options: ProviderClientOptions = {}
): ProviderClient {
  const definition = PROVIDER_DEFINITIONS[config.id];
  const log = options.logger ?? defaultLogger;
  const clock = options.clock ?? systemClock;
  const policy = options.rateLimit ?? definition.defaultRateLimit;

  if (config.id === 'nominatim') {
    checkNominatimPolicy(config.baseUrl, policy);
    if (!config.userAgent) {
      log.warn(
        'Nominatim requires an identifying User-Agent; using the generic default. ' +
          'Set --user-agent (and --email) to avoid being blocked.',
        { userAgent: DEFAULT_USER_AGENT }
      );
    }
  }

  const http = new HTTPClient({
    ...(options.timeoutMs !== undefined && { timeoutMs: options.timeoutMs }),
    userAgent: (config.id === 'nominatim' ? config.userAgent : undefined) ?? DEFAULT_USER_AGENT,
  });

  const provider = createProvider(config, http);

  log.info('Provider configured', {
    provider: definition.displayName,
    endpoint: config.baseUrl ?? definition.defaultBaseUrl,
    rateLimit: describePolicy(policy),
  });

  return new ProviderClient(
    provider,
    createRateLimiter(policy, clock),
    createRetryExecutor(options.retry, clock),
    log
  );
}

/**
 * The public Nominatim instance allows at most 1 request per second;
 * faster policies are only accepted for self-hosted endpoints.
 */
function checkNominatimPolicy(baseUrl: string | undefined, policy: RateLimitPolicy): void {
  const isPublic =
    baseUrl === undefined || baseUrl.replace(/\/+$/, '') === NOMINATIM_BASE_URL;
  if (!isPublic) {
    return;
  }

  const requestsPerSecond =
    policy.kind === 'fixed-interval'
      ? policy.minIntervalMs > 0
        ? 1000 / policy.minIntervalMs
        : Infinity
      : (policy.maxRequests * 1000) / policy.windowMs;

  if (requestsPerSecond > 1) {
    throw new ConfigurationError(
      `The public Nominatim instance allows at most 1 request per second (requested ${describePolicy(policy)})`
    );
  }
}
