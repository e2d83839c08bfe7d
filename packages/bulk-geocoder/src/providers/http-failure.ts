/**
 * Maps HTTP client failures onto the provider error taxonomy.
 *
 * Messages never include the request URL: it carries the API key.
 */

import { ZodError } from 'zod';
import {
  GeocoderError,
  ProviderAuthError,
  ProviderPermanentError,
  ProviderTransientError,
  toError,
} from '../core/errors.js';
import {
  HTTPError,
  HTTPJSONParseError,
  HTTPNetworkError,
  HTTPTimeoutError,
} from '../core/http-client.js';
import type { ProviderId } from './types.js';

/**
 * HTTP statuses worth another attempt
 */
export function isTransientStatus(status: number): boolean {
  return (
    status === 408 || // Request Timeout
    status === 429 || // Too Many Requests
    status >= 500
  );
}

export function classifyHttpFailure(error: unknown, provider: ProviderId): GeocoderError {
  if (error instanceof GeocoderError) {
    return error;
  }

  if (error instanceof HTTPTimeoutError) {
    return new ProviderTransientError(`timeout after ${error.timeoutMs}ms`, provider, undefined, {
      cause: error,
    });
  }

  if (error instanceof HTTPNetworkError) {
    return new ProviderTransientError(error.message, provider, undefined, { cause: error });
  }

  if (error instanceof HTTPError) {
    const status = error.statusCode;
    if (status === 401 || status === 403) {
      return new ProviderAuthError(`${provider} rejected the credentials (HTTP ${status})`, provider, status);
    }
    if (isTransientStatus(status)) {
      return new ProviderTransientError(`HTTP ${status}`, provider, status, { cause: error });
    }
    return new ProviderPermanentError(`HTTP ${status}`, provider, status, { cause: error });
  }

  if (error instanceof HTTPJSONParseError) {
    return new ProviderPermanentError('response was not valid JSON', provider, undefined, {
      cause: error,
    });
  }

  if (error instanceof ZodError) {
    const issue = error.issues[0];
    const where = issue ? ` at ${issue.path.join('.') || '<root>'}: ${issue.message}` : '';
    return new ProviderPermanentError(`unexpected response shape${where}`, provider, undefined, {
      cause: error,
    });
  }

  return new ProviderPermanentError(toError(error).message, provider, undefined, { cause: error });
}
