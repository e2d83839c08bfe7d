/**
 * Core Types for the Bulk Geocoder
 *
 * Records flow through the engine in this order:
 * InputRecord → GeocodeQuery → GeocodeResult → output row.
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

// ============================================================================
// Records
// ============================================================================

/**
 * One data row of the input file.
 *
 * `values` holds every column named in the header (missing trailing cells are
 * empty strings). `index` is the 0-based position among data rows.
 */
export interface InputRecord {
  readonly index: number;
  readonly values: Readonly<Record<string, string>>;
}

/**
 * Address string derived from a single record
 */
export type GeocodeQuery =
  | { readonly valid: true; readonly text: string }
  | { readonly valid: false; readonly reason: string };

// ============================================================================
// Results
// ============================================================================

export type GeocodeStatus = 'success' | 'failed' | 'no_address';

export interface SuccessfulGeocode {
  readonly status: 'success';
  readonly latitude: number;
  readonly longitude: number;
  readonly formattedAddress: string | null;
}

export interface UnsuccessfulGeocode {
  readonly status: 'failed' | 'no_address';
  readonly latitude: null;
  readonly longitude: null;
  readonly formattedAddress: null;
  /** Diagnostic only, never written to the output */
  readonly error?: string;
}

/**
 * Normalized provider answer.
 * Coordinates are present exactly when status is 'success'.
 */
export type GeocodeResult = SuccessfulGeocode | UnsuccessfulGeocode;

export function successResult(
  latitude: number,
  longitude: number,
  formattedAddress: string | null
): SuccessfulGeocode {
  return { status: 'success', latitude, longitude, formattedAddress };
}

export function failedResult(error?: string): UnsuccessfulGeocode {
  return {
    status: 'failed',
    latitude: null,
    longitude: null,
    formattedAddress: null,
    ...(error !== undefined && { error }),
  };
}

export function noAddressResult(reason?: string): UnsuccessfulGeocode {
  return {
    status: 'no_address',
    latitude: null,
    longitude: null,
    formattedAddress: null,
    ...(reason !== undefined && { error: reason }),
  };
}

// ============================================================================
// Output
// ============================================================================

/**
 * Columns appended to every output row, in this order
 */
export const OUTPUT_COLUMNS = [
  'latitude',
  'longitude',
  'geocode_status',
  'geocode_address',
] as const;

export type OutputColumn = (typeof OUTPUT_COLUMNS)[number];

/**
 * Build the output header from the input header
 */
export function outputHeader(inputHeader: readonly string[]): string[] {
  return [...inputHeader, ...OUTPUT_COLUMNS];
}

/**
 * Merge a result into an output row.
 * Original columns are copied in header order and never modified.
 */
export function toOutputRow(
  inputHeader: readonly string[],
  record: InputRecord,
  result: GeocodeResult
): string[] {
  const original = inputHeader.map((column) => record.values[column] ?? '');

  return [
    ...original,
    result.latitude === null ? '' : String(result.latitude),
    result.longitude === null ? '' : String(result.longitude),
    result.status,
    result.formattedAddress ?? '',
  ];
}

// ============================================================================
// Run Statistics
// ============================================================================

export interface StatusCounts {
  readonly succeeded: number;
  readonly failed: number;
  readonly skipped: number;
}

/**
 * Run statistics.
 *
 * Counters are cumulative across resumed runs: a resumed run starts from the
 * counts already present in the output file.
 */
export interface RunStats extends StatusCounts {
  /** Rows given a status (succeeded + failed + skipped) */
  readonly attempted: number;
  /** Rows processed by this process, excluding resumed rows */
  readonly processedThisRun: number;
  /** Lookups sent to the provider, retries included */
  readonly providerCalls: number;
  /** First row index processed by this process */
  readonly startIndex: number;
  /** Last row index committed to the output (-1 if none) */
  readonly lastCommittedIndex: number;
  readonly elapsedMs: number;
}

export function emptyStatusCounts(): StatusCounts {
  return { succeeded: 0, failed: 0, skipped: 0 };
}
