/**
 * Google Maps Geocoding Provider
 *
 * ACCURACY: rooftop for most US addresses
 * COST: billed per request, API key required
 *
 * The API answers HTTP 200 for most outcomes and reports the real outcome in
 * `status`; that field drives classification, not the HTTP code.
 */

import { z } from 'zod';
import { failedResult, successResult, type GeocodeResult } from '../core/types.js';
import {
  ConfigurationError,
  ProviderAuthError,
  ProviderPermanentError,
  ProviderTransientError,
} from '../core/errors.js';
import type { HTTPClient } from '../core/http-client.js';
import { classifyHttpFailure } from './http-failure.js';
import type { GeocodingProvider, GoogleConfig } from './types.js';

export const GOOGLE_BASE_URL = 'https://maps.googleapis.com/maps/api/geocode/json';

const GoogleGeocodeSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z
    .array(
      z.object({
        formatted_address: z.string().optional(),
        geometry: z.object({
          location: z.object({ lat: z.number(), lng: z.number() }),
        }),
      })
    )
    .default([]),
});

export class GoogleProvider implements GeocodingProvider {
  readonly id = 'google' as const;
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(
    config: GoogleConfig,
    private readonly http: HTTPClient
  ) {
    if (!config.apiKey) {
      throw new ConfigurationError('Google Maps requires an API key (--api-key or GOOGLE_MAPS_API_KEY)');
    }
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl ?? GOOGLE_BASE_URL;
  }

  async lookup(query: string): Promise<GeocodeResult> {
    const params = new URLSearchParams({ address: query, key: this.apiKey });

    let data: z.infer<typeof GoogleGeocodeSchema>;
    try {
      data = GoogleGeocodeSchema.parse(await this.http.fetchJSON(`${this.baseUrl}?${params}`));
    } catch (error) {
      throw classifyHttpFailure(error, this.id);
    }

    const detail = data.error_message ? `${data.status}: ${data.error_message}` : data.status;

    switch (data.status) {
      case 'OK': {
        const best = data.results[0];
        if (!best) {
          return failedResult('address not found');
        }
        const { lat, lng } = best.geometry.location;
        return successResult(lat, lng, best.formatted_address ?? null);
      }

      case 'ZERO_RESULTS':
        return failedResult('address not found');

      case 'OVER_QUERY_LIMIT':
      case 'UNKNOWN_ERROR':
        throw new ProviderTransientError(detail, this.id);

      case 'REQUEST_DENIED':
      case 'OVER_DAILY_LIMIT':
        throw new ProviderAuthError(`Google rejected the request (${detail})`, this.id);

      default:
        // INVALID_REQUEST and anything undocumented
        throw new ProviderPermanentError(detail, this.id);
    }
  }
}
