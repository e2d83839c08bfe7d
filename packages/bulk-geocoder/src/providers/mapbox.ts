/**
 * Mapbox Geocoding Provider
 *
 * COST: billed per request, access token required
 * LIMIT: expressed in requests per minute (600 on the default plan)
 */

import { z } from 'zod';
import { failedResult, successResult, type GeocodeResult } from '../core/types.js';
import { ConfigurationError } from '../core/errors.js';
import type { HTTPClient } from '../core/http-client.js';
import { classifyHttpFailure } from './http-failure.js';
import type { GeocodingProvider, MapboxConfig } from './types.js';

export const MAPBOX_BASE_URL = 'https://api.mapbox.com/geocoding/v5/mapbox.places';

const MapboxPlacesSchema = z.object({
  features: z.array(
    z.object({
      // [longitude, latitude]
      center: z.tuple([z.number(), z.number()]),
      place_name: z.string().optional(),
    })
  ),
});

export class MapboxProvider implements GeocodingProvider {
  readonly id = 'mapbox' as const;
  private readonly accessToken: string;
  private readonly baseUrl: string;

  constructor(
    config: MapboxConfig,
    private readonly http: HTTPClient
  ) {
    if (!config.accessToken) {
      throw new ConfigurationError(
        'Mapbox requires an access token (--api-key or MAPBOX_ACCESS_TOKEN)'
      );
    }
    this.accessToken = config.accessToken;
    this.baseUrl = (config.baseUrl ?? MAPBOX_BASE_URL).replace(/\/+$/, '');
  }

  async lookup(query: string): Promise<GeocodeResult> {
    const params = new URLSearchParams({ access_token: this.accessToken, limit: '1' });
    const url = `${this.baseUrl}/${encodeURIComponent(query)}.json?${params}`;

    let data: z.infer<typeof MapboxPlacesSchema>;
    try {
      data = MapboxPlacesSchema.parse(await this.http.fetchJSON(url));
    } catch (error) {
      throw classifyHttpFailure(error, this.id);
    }

    const best = data.features[0];
    if (!best) {
      return failedResult('address not found');
    }

    const [longitude, latitude] = best.center;
    return successResult(latitude, longitude, best.place_name ?? null);
  }
}
