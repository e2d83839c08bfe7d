/**
 * Mapbox Provider Tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError, ProviderAuthError, ProviderTransientError } from '../../../core/errors.js';
import { HTTPClient } from '../../../core/http-client.js';
import { MapboxProvider } from '../../../providers/mapbox.js';
import { jsonResponse, requestedUrl, stubFetch } from '../../utils/mocks.js';

function createProvider(): MapboxProvider {
  return new MapboxProvider(
    { id: 'mapbox', accessToken: 'test-secret', baseUrl: 'https://mapbox.test/places/' },
    new HTTPClient()
  );
}

describe('MapboxProvider', () => {
  it('should fail fast without an access token', () => {
    expect(() => new MapboxProvider({ id: 'mapbox' }, new HTTPClient())).toThrow(ConfigurationError);
  });

  it('should put the encoded query in the path', async () => {
    const fetchMock = stubFetch(jsonResponse({ features: [] }));

    await createProvider().lookup('1 Main St, Springfield');

    const url = requestedUrl(fetchMock);
    expect(url.pathname).toBe('/places/1%20Main%20St%2C%20Springfield.json');
    expect(url.searchParams.get('access_token')).toBe('test-secret');
    expect(url.searchParams.get('limit')).toBe('1');
  });

  it('should read center as [longitude, latitude]', async () => {
    stubFetch(
      jsonResponse({
        features: [{ center: [-89.6501, 39.7817], place_name: 'Springfield, Illinois, United States' }],
      })
    );

    await expect(createProvider().lookup('Springfield IL')).resolves.toEqual({
      status: 'success',
      latitude: 39.7817,
      longitude: -89.6501,
      formattedAddress: 'Springfield, Illinois, United States',
    });
  });

  it('should return failed when there are no features', async () => {
    stubFetch(jsonResponse({ features: [] }));

    await expect(createProvider().lookup('x')).resolves.toMatchObject({ status: 'failed' });
  });

  it('should classify 401 as an authentication rejection', async () => {
    stubFetch(jsonResponse({ message: 'Not Authorized - Invalid Token' }, 401));

    await expect(createProvider().lookup('x')).rejects.toBeInstanceOf(ProviderAuthError);
  });

  it('should classify 429 as transient', async () => {
    stubFetch(jsonResponse({ message: 'Too Many Requests' }, 429));

    await expect(createProvider().lookup('x')).rejects.toBeInstanceOf(ProviderTransientError);
  });
});
