/**
 * Geocoding Provider Abstraction
 *
 * DESIGN PRINCIPLE: Provider-agnostic geocoding interface
 *
 * Providers are a closed, tagged set. Adding one means adding a config
 * variant, a definition (rate policy, key requirement) and an adapter;
 * the batch loop never changes.
 */

import type { GeocodeResult } from '../core/types.js';
import type { RateLimitPolicy } from '../resilience/types.js';

export const PROVIDER_IDS = ['nominatim', 'google', 'mapbox'] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

export function isProviderId(value: string): value is ProviderId {
  return PROVIDER_IDS.some((id) => id === value);
}

// ============================================================================
// Configuration
// ============================================================================

interface CommonProviderConfig {
  /** Endpoint override (self-hosted instance, proxy, tests) */
  readonly baseUrl?: string;
}

/**
 * OpenStreetMap Nominatim: free, no key, 1 request/second on the public
 * instance. The usage policy requires an identifying User-Agent.
 */
export interface NominatimConfig extends CommonProviderConfig {
  readonly id: 'nominatim';
  readonly userAgent?: string;
  /** Contact address sent with each request, recommended for bulk use */
  readonly email?: string;
}

/**
 * Google Maps Geocoding API: API key, high accuracy, billed per request
 */
export interface GoogleConfig extends CommonProviderConfig {
  readonly id: 'google';
  readonly apiKey?: string;
}

/**
 * Mapbox Geocoding API: access token, limit expressed per minute
 */
export interface MapboxConfig extends CommonProviderConfig {
  readonly id: 'mapbox';
  readonly accessToken?: string;
}

export type ProviderConfig = NominatimConfig | GoogleConfig | MapboxConfig;

/**
 * Static facts about a provider
 */
export interface ProviderDefinition {
  readonly id: ProviderId;
  readonly displayName: string;
  readonly requiresKey: boolean;
  readonly defaultBaseUrl: string;
  readonly defaultRateLimit: RateLimitPolicy;
}

// ============================================================================
// Provider Adapter
// ============================================================================

/**
 * One provider's protocol: a single lookup, normalized.
 *
 * Resolves with a success or 'failed' (zero matches) result. Rejects with
 * ProviderTransientError, ProviderPermanentError or ProviderAuthError.
 * Rate limiting and retry live in ProviderClient, not here.
 */
export interface GeocodingProvider {
  readonly id: ProviderId;
  lookup(query: string): Promise<GeocodeResult>;
}
