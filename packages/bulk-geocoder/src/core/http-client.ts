/**
 * HTTP Client for geocoding providers
 *
 * One request per call, with:
 * - Configurable timeout via AbortController
 * - User-Agent on every request
 * - Typed errors that providers map onto the geocoder error taxonomy
 *
 * Retries are NOT performed here: ProviderClient wraps each lookup in a
 * RetryExecutor so that every attempt passes through the rate limiter.
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ timeoutMs: 10000, userAgent: 'my-app/1.0' });
 * const body = await client.fetchJSON('https://nominatim.openstreetmap.org/search?q=...');
 * ```
 */

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Timeout for headers and body together, in milliseconds (default: 10000) */
  readonly timeoutMs: number;

  /** User-Agent header (default: 'bulk-geocoder/1.0') */
  readonly userAgent: string;
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Non-2xx response
 */
export class HTTPError extends Error {
  readonly statusCode: number;
  readonly url: string;
  readonly body: string;

  constructor(message: string, statusCode: number, url: string, body: string) {
    super(message);
    this.name = 'HTTPError';
    this.statusCode = statusCode;
    this.url = url;
    this.body = body.slice(0, 500);
  }
}

/**
 * Request timeout error (AbortController triggered)
 */
export class HTTPTimeoutError extends Error {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Network error (connection failed, DNS resolution, reset, etc.)
 */
export class HTTPNetworkError extends Error {
  readonly url: string;

  constructor(url: string, cause: Error) {
    super(`Network error: ${cause.message}`, { cause });
    this.name = 'HTTPNetworkError';
    this.url = url;
  }
}

/**
 * Response body was not valid JSON
 */
export class HTTPJSONParseError extends Error {
  readonly url: string;
  readonly responseText: string;

  constructor(url: string, responseText: string, cause: Error) {
    super(`Failed to parse JSON response: ${cause.message}`, { cause });
    this.name = 'HTTPJSONParseError';
    this.url = url;
    this.responseText = responseText.slice(0, 500); // Truncate for safety
  }
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export const DEFAULT_TIMEOUT_MS = 10_000;

export const DEFAULT_USER_AGENT = 'bulk-geocoder/1.0';

/**
 * Settle with `promise`, or reject as soon as `signal` aborts
 *
 * A late rejection of `promise` after the abort is absorbed.
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new Error('Aborted'));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

interface RawResponse {
  readonly response: Response;
  readonly text: string;
}

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      timeoutMs: DEFAULT_TIMEOUT_MS,
      userAgent: DEFAULT_USER_AGENT,
      ...config,
    };
  }

  get userAgent(): string {
    return this.config.userAgent;
  }

  /**
   * Fetch and parse a JSON response
   *
   * @throws {HTTPError} For non-2xx responses
   * @throws {HTTPTimeoutError} If headers and body take longer than the timeout
   * @throws {HTTPNetworkError} For network failures, including while reading the body
   * @throws {HTTPJSONParseError} If response is not valid JSON
   */
  async fetchJSON(url: string): Promise<unknown> {
    const { response, text } = await this.request(url);

    if (!response.ok) {
      throw new HTTPError(
        `HTTP ${response.status}: ${response.statusText}`,
        response.status,
        url,
        text
      );
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new HTTPJSONParseError(
        url,
        text,
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  /**
   * GET `url` and read the whole body under one AbortController timeout
   */
  private async request(url: string): Promise<RawResponse> {
    const { timeoutMs } = this.config;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await untilAborted(
        fetch(url, {
          method: 'GET',
          headers: {
            'User-Agent': this.config.userAgent,
            Accept: 'application/json',
          },
          signal: controller.signal,
        }),
        controller.signal
      );
      const text = await untilAborted(response.text(), controller.signal);
      return { response, text };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new HTTPTimeoutError(url, timeoutMs);
      }

      throw new HTTPNetworkError(
        url,
        error instanceof Error ? error : new Error(String(error))
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
