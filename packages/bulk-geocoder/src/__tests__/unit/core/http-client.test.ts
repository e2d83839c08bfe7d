/**
 * HTTP Client Tests
 *
 * fetch is stubbed; no request leaves the process.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  DEFAULT_USER_AGENT,
  HTTPClient,
  HTTPError,
  HTTPJSONParseError,
  HTTPNetworkError,
  HTTPTimeoutError,
} from '../../../core/http-client.js';
import { silentLogger } from '../../../core/utils/logger.js';
import { NominatimProvider } from '../../../providers/nominatim.js';
import { ProviderClient } from '../../../providers/provider-client.js';
import { FixedIntervalRateLimiter } from '../../../resilience/rate-limiter.js';
import { RetryExecutor } from '../../../resilience/retry.js';
import { FakeClock, jsonResponse, stubFetch } from '../../utils/mocks.js';

const URL_UNDER_TEST = 'https://geo.example.test/search?q=1+Main+St';

/**
 * 200 response whose body fails after the headers arrived
 */
function resetBodyResponse(): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode('[{"lat":'));
      controller.error(new Error('ECONNRESET'));
    },
  });
  return new Response(body, { status: 200 });
}

/**
 * 200 response whose body never finishes
 */
function stalledBodyResponse(): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode('[{"lat":'));
    },
  });
  return new Response(body, { status: 200 });
}

describe('HTTPClient', () => {
  it('should return the parsed JSON body', async () => {
    stubFetch(jsonResponse([{ lat: '1.5' }]));

    const client = new HTTPClient();

    await expect(client.fetchJSON(URL_UNDER_TEST)).resolves.toEqual([{ lat: '1.5' }]);
  });

  it('should send the configured User-Agent with a JSON Accept header', async () => {
    const fetchMock = stubFetch(jsonResponse({}));

    await new HTTPClient({ userAgent: 'acme-import/1.0' }).fetchJSON(URL_UNDER_TEST);

    const init = fetchMock.mock.calls[0]?.[1];
    expect(fetchMock.mock.calls[0]?.[0]).toBe(URL_UNDER_TEST);
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({
      'User-Agent': 'acme-import/1.0',
      Accept: 'application/json',
    });
  });

  it('should default the User-Agent to the package identifier', () => {
    expect(new HTTPClient().userAgent).toBe(DEFAULT_USER_AGENT);
    expect(DEFAULT_USER_AGENT).toBe('bulk-geocoder/1.0');
  });

  it('should raise HTTPError with status and body for non-2xx responses', async () => {
    stubFetch(new Response('over quota', { status: 429, statusText: 'Too Many Requests' }));

    const error = await new HTTPClient().fetchJSON(URL_UNDER_TEST).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HTTPError);
    expect(error).toMatchObject({
      message: 'HTTP 429: Too Many Requests',
      statusCode: 429,
      url: URL_UNDER_TEST,
      body: 'over quota',
    });
  });

  it('should raise HTTPJSONParseError for a body that is not JSON', async () => {
    stubFetch(new Response('<html>maintenance</html>', { status: 200 }));

    const error = await new HTTPClient().fetchJSON(URL_UNDER_TEST).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HTTPJSONParseError);
    expect(error).toMatchObject({ responseText: '<html>maintenance</html>' });
  });

  it('should wrap a failed connection as HTTPNetworkError', async () => {
    stubFetch(new TypeError('fetch failed'));

    const error = await new HTTPClient().fetchJSON(URL_UNDER_TEST).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HTTPNetworkError);
    expect(error).toMatchObject({ message: 'Network error: fetch failed', url: URL_UNDER_TEST });
  });

  it('should time out when the response headers never arrive', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(() => new Promise<Response>(() => undefined))
    );

    const error = await new HTTPClient({ timeoutMs: 20 })
      .fetchJSON(URL_UNDER_TEST)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HTTPTimeoutError);
    expect(error).toMatchObject({ timeoutMs: 20 });
  });

  it('should abort the fetch signal on timeout', async () => {
    let signal: AbortSignal | undefined;
    vi.stubGlobal(
      'fetch',
      vi.fn((_input: string, init?: RequestInit) => {
        signal = init?.signal ?? undefined;
        return new Promise<Response>(() => undefined);
      })
    );

    await new HTTPClient({ timeoutMs: 20 }).fetchJSON(URL_UNDER_TEST).catch(() => undefined);

    expect(signal?.aborted).toBe(true);
  });

  it('should wrap a connection reset while reading the body as HTTPNetworkError', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => resetBodyResponse())
    );

    const error = await new HTTPClient().fetchJSON(URL_UNDER_TEST).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HTTPNetworkError);
  });

  it('should time out when the body stalls after the headers', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => stalledBodyResponse())
    );

    const error = await new HTTPClient({ timeoutMs: 20 })
      .fetchJSON(URL_UNDER_TEST)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HTTPTimeoutError);
    expect(error).toMatchObject({
      message: `Request timeout after 20ms: ${URL_UNDER_TEST}`,
    });
  });

  it('should let the provider client retry a body reset as a transient failure', async () => {
    const fetchMock = vi.fn(async () => resetBodyResponse());
    vi.stubGlobal('fetch', fetchMock);
    const clock = new FakeClock();
    const client = new ProviderClient(
      new NominatimProvider(
        { id: 'nominatim' },
        new HTTPClient({ userAgent: 'acme-import/1.0', timeoutMs: 1000 })
      ),
      new FixedIntervalRateLimiter(1000, clock),
      new RetryExecutor(
        { maxAttempts: 3, initialDelayMs: 100, maxDelayMs: 1000, backoffMultiplier: 2, jitterFactor: 0 },
        clock
      ),
      silentLogger
    );

    const result = await client.geocode('1 Main St, Springfield');

    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(client.callCount).toBe(3);
    expect(result).toMatchObject({
      status: 'failed',
      error: expect.stringMatching(/^Network error: .*\(gave up after 3 attempts\)$/),
    });
  });
});
