/**
 * Google Maps Provider Tests
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  ProviderAuthError,
  ProviderPermanentError,
  ProviderTransientError,
} from '../../../core/errors.js';
import { HTTPClient } from '../../../core/http-client.js';
import { GoogleProvider } from '../../../providers/google.js';
import { jsonResponse, requestedUrl, stubFetch } from '../../utils/mocks.js';

function createProvider(): GoogleProvider {
  return new GoogleProvider({ id: 'google', apiKey: 'test-secret' }, new HTTPClient());
}

const OK_BODY = {
  status: 'OK',
  results: [
    {
      formatted_address: '1600 Amphitheatre Pkwy, Mountain View, CA 94043, USA',
      geometry: { location: { lat: 37.4224, lng: -122.0842 } },
    },
  ],
};

describe('GoogleProvider', () => {
  it('should fail fast without an API key', () => {
    expect(() => new GoogleProvider({ id: 'google' }, new HTTPClient())).toThrow(ConfigurationError);
  });

  it('should send the address and key', async () => {
    const fetchMock = stubFetch(jsonResponse(OK_BODY));

    await createProvider().lookup('1600 Amphitheatre Pkwy');

    const url = requestedUrl(fetchMock);
    expect(url.origin + url.pathname).toBe('https://maps.googleapis.com/maps/api/geocode/json');
    expect(url.searchParams.get('address')).toBe('1600 Amphitheatre Pkwy');
    expect(url.searchParams.get('key')).toBe('test-secret');
  });

  it('should normalize the first result', async () => {
    stubFetch(jsonResponse(OK_BODY));

    await expect(createProvider().lookup('x')).resolves.toEqual({
      status: 'success',
      latitude: 37.4224,
      longitude: -122.0842,
      formattedAddress: '1600 Amphitheatre Pkwy, Mountain View, CA 94043, USA',
    });
  });

  it('should return failed for ZERO_RESULTS', async () => {
    stubFetch(jsonResponse({ status: 'ZERO_RESULTS', results: [] }));

    await expect(createProvider().lookup('x')).resolves.toMatchObject({
      status: 'failed',
      latitude: null,
      longitude: null,
      formattedAddress: null,
    });
  });

  it('should return failed for OK without results', async () => {
    stubFetch(jsonResponse({ status: 'OK' }));

    await expect(createProvider().lookup('x')).resolves.toMatchObject({ status: 'failed' });
  });

  it.each(['OVER_QUERY_LIMIT', 'UNKNOWN_ERROR'])('should treat %s as transient', async (status) => {
    stubFetch(jsonResponse({ status, results: [] }));

    await expect(createProvider().lookup('x')).rejects.toBeInstanceOf(ProviderTransientError);
  });

  it.each(['REQUEST_DENIED', 'OVER_DAILY_LIMIT'])('should treat %s as an auth rejection', async (status) => {
    stubFetch(jsonResponse({ status, error_message: 'The provided API key is invalid.' }));

    await expect(createProvider().lookup('x')).rejects.toBeInstanceOf(ProviderAuthError);
  });

  it('should treat INVALID_REQUEST as permanent', async () => {
    stubFetch(jsonResponse({ status: 'INVALID_REQUEST', results: [] }));

    await expect(createProvider().lookup('x')).rejects.toThrow(
      new ProviderPermanentError('INVALID_REQUEST', 'google')
    );
  });

  it('should not leak the key into error messages', async () => {
    stubFetch(jsonResponse({ error: 'bad gateway' }, 502));

    const error: unknown = await createProvider().lookup('x').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProviderTransientError);
    expect(error instanceof Error ? error.message : '').toBe('HTTP 502');
  });
});
