/**
 * Provider Registry Tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../../core/errors.js';
import {
  PROVIDER_DEFINITIONS,
  createProviderClient,
  isProviderId,
} from '../../../providers/index.js';
import { FakeClock, RecordingLogger } from '../../utils/mocks.js';

describe('PROVIDER_DEFINITIONS', () => {
  it('should pace nominatim at one request per second', () => {
    expect(PROVIDER_DEFINITIONS.nominatim.defaultRateLimit).toEqual({
      kind: 'fixed-interval',
      minIntervalMs: 1000,
    });
    expect(PROVIDER_DEFINITIONS.nominatim.requiresKey).toBe(false);
  });

  it('should express the mapbox ceiling per minute', () => {
    expect(PROVIDER_DEFINITIONS.mapbox.defaultRateLimit).toEqual({
      kind: 'sliding-window',
      maxRequests: 600,
      windowMs: 60_000,
    });
  });

  it('should allow google 50 requests per second', () => {
    expect(PROVIDER_DEFINITIONS.google.defaultRateLimit).toEqual({
      kind: 'fixed-interval',
      minIntervalMs: 20,
    });
  });
});

describe('isProviderId', () => {
  it('should recognize known providers only', () => {
    expect(isProviderId('mapbox')).toBe(true);
    expect(isProviderId('bing')).toBe(false);
  });
});

describe('createProviderClient', () => {
  const options = { clock: new FakeClock(), logger: new RecordingLogger() };

  it('should reject google without an API key before any request', () => {
    expect(() => createProviderClient({ id: 'google' }, options)).toThrow(ConfigurationError);
  });

  it('should reject mapbox without an access token', () => {
    expect(() => createProviderClient({ id: 'mapbox' }, options)).toThrow(ConfigurationError);
  });

  it('should build a client for a keyed provider', () => {
    const client = createProviderClient({ id: 'mapbox', accessToken: 'test-secret' }, options);

    expect(client.providerId).toBe('mapbox');
    expect(client.callCount).toBe(0);
  });

  it('should warn when nominatim runs with the generic User-Agent', () => {
    const logger = new RecordingLogger();

    createProviderClient({ id: 'nominatim' }, { clock: new FakeClock(), logger });

    expect(logger.messages('warn')).toHaveLength(1);
    expect(logger.messages('warn')[0]).toMatch(/identifying User-Agent/);
  });

  it('should not warn when a User-Agent is configured', () => {
    const logger = new RecordingLogger();

    createProviderClient(
      { id: 'nominatim', userAgent: 'acme-import/1.0' },
      { clock: new FakeClock(), logger }
    );

    expect(logger.messages('warn')).toEqual([]);
  });

  it('should refuse to exceed one request per second on the public nominatim', () => {
    expect(() =>
      createProviderClient(
        { id: 'nominatim', userAgent: 'acme-import/1.0' },
        { ...options, rateLimit: { kind: 'fixed-interval', minIntervalMs: 500 } }
      )
    ).toThrow(/at most 1 request per second/);
  });

  it('should allow a faster policy against a self-hosted nominatim', () => {
    const client = createProviderClient(
      { id: 'nominatim', userAgent: 'acme-import/1.0', baseUrl: 'http://geocoder.internal:8080' },
      { ...options, rateLimit: { kind: 'fixed-interval', minIntervalMs: 10 } }
    );

    expect(client.providerId).toBe('nominatim');
  });
});
