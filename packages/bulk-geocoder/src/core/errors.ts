/**
 * Bulk Geocoder Error Types
 *
 * Fatal errors (configuration, persistence, input, authentication) abort the
 * run. Row-local errors (transient, permanent) are caught per row and turned
 * into a 'failed' status.
 */

export type GeocoderErrorCode =
  | 'CONFIGURATION'
  | 'INPUT_READ'
  | 'PERSISTENCE'
  | 'PROVIDER_TRANSIENT'
  | 'PROVIDER_PERMANENT'
  | 'PROVIDER_AUTH';

/**
 * Base class for every error raised by the engine
 */
export class GeocoderError extends Error {
  constructor(
    message: string,
    public readonly code: GeocoderErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GeocoderError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /** Whether this error ends the run */
  get fatal(): boolean {
    return this.code !== 'PROVIDER_TRANSIENT' && this.code !== 'PROVIDER_PERMANENT';
  }
}

/**
 * Invalid run configuration: missing key, unknown provider, unreadable input,
 * column mapping that does not match the input header.
 *
 * Raised before any row is processed.
 */
export class ConfigurationError extends GeocoderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIGURATION', options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Input file failed to parse or read after processing started
 */
export class InputReadError extends GeocoderError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'INPUT_READ', options);
    this.name = 'InputReadError';
  }
}

/**
 * Output or checkpoint could not be written.
 * Chunks committed before the failure remain resumable.
 */
export class PersistenceError extends GeocoderError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'PERSISTENCE', options);
    this.name = 'PersistenceError';
  }
}

/**
 * Timeout, connection failure, 408/429/5xx. Retried with backoff.
 */
export class ProviderTransientError extends GeocoderError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'PROVIDER_TRANSIENT', options);
    this.name = 'ProviderTransientError';
  }
}

/**
 * Malformed request or provider-reported invalid query. Not retried.
 */
export class ProviderPermanentError extends GeocoderError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'PROVIDER_PERMANENT', options);
    this.name = 'ProviderPermanentError';
  }
}

/**
 * Provider rejected the credentials (401/403, REQUEST_DENIED).
 * Every following row would fail the same way, so the run aborts.
 */
export class ProviderAuthError extends GeocoderError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly statusCode?: number
  ) {
    super(message, 'PROVIDER_AUTH');
    this.name = 'ProviderAuthError';
  }
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
