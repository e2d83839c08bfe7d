/**
 * Nominatim Provider (OpenStreetMap, Global)
 *
 * COVERAGE: worldwide OSM data
 * COST: free on the public instance, which allows 1 request per second
 * POLICY: every request must identify the application (User-Agent); bulk
 * users should also send a contact email. Anonymous traffic gets blocked.
 *
 * https://operations.osmfoundation.org/policies/nominatim/
 */

import { z } from 'zod';
import { failedResult, successResult, type GeocodeResult } from '../core/types.js';
import { ProviderPermanentError } from '../core/errors.js';
import type { HTTPClient } from '../core/http-client.js';
import { classifyHttpFailure } from './http-failure.js';
import type { GeocodingProvider, NominatimConfig } from './types.js';

export const NOMINATIM_BASE_URL = 'https://nominatim.openstreetmap.org';

const NominatimSearchSchema = z.array(
  z.object({
    lat: z.string(),
    lon: z.string(),
    display_name: z.string().optional(),
  })
);

export class NominatimProvider implements GeocodingProvider {
  readonly id = 'nominatim' as const;
  private readonly baseUrl: string;
  private readonly email?: string;

  constructor(
    config: NominatimConfig,
    private readonly http: HTTPClient
  ) {
    this.baseUrl = (config.baseUrl ?? NOMINATIM_BASE_URL).replace(/\/+$/, '');
    this.email = config.email;
  }

  async lookup(query: string): Promise<GeocodeResult> {
    const params = new URLSearchParams({
      q: query,
      format: 'json',
      limit: '1',
    });
    if (this.email) {
      params.set('email', this.email);
    }

    let data: z.infer<typeof NominatimSearchSchema>;
    try {
      data = NominatimSearchSchema.parse(await this.http.fetchJSON(`${this.baseUrl}/search?${params}`));
    } catch (error) {
      throw classifyHttpFailure(error, this.id);
    }

    const best = data[0];
    if (!best) {
      return failedResult('address not found');
    }

    const latitude = Number.parseFloat(best.lat);
    const longitude = Number.parseFloat(best.lon);
    if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
      throw new ProviderPermanentError(
        `non-numeric coordinates "${best.lat}", "${best.lon}"`,
        this.id
      );
    }

    return successResult(latitude, longitude, best.display_name ?? null);
  }
}
