/**
 * Address Extractor
 *
 * Derives the query string sent to a provider from one input record.
 * Pure: no I/O, same record and mapping always give the same query.
 *
 * MODES:
 * - single: trimmed value of one address column
 * - components: "street, city, state zip" from whichever parts are present
 */

import { ConfigurationError } from '../core/errors.js';
import type { GeocodeQuery, InputRecord } from '../core/types.js';

export interface ComponentColumns {
  readonly street?: string;
  readonly city?: string;
  readonly state?: string;
  readonly zip?: string;
}

export type AddressMapping =
  | {
      readonly mode: 'single';
      readonly addressColumn: string;
      /** Used when the address column is blank */
      readonly fallback?: ComponentColumns;
    }
  | ({ readonly mode: 'components' } & ComponentColumns);

const COMPONENT_ORDER = ['street', 'city', 'state'] as const;

/**
 * Build the geocode query for a record
 */
export function extractQuery(record: InputRecord, mapping: AddressMapping): GeocodeQuery {
  if (mapping.mode === 'components') {
    return extractComponents(record, mapping);
  }

  const address = cell(record, mapping.addressColumn);
  if (address !== null) {
    return { valid: true, text: address };
  }

  if (mapping.fallback && hasAnyComponent(mapping.fallback)) {
    return extractComponents(record, mapping.fallback);
  }

  return { valid: false, reason: `column "${mapping.addressColumn}" is empty` };
}

/**
 * Join address components: street, city and state separated by ", ",
 * zip appended after a space.
 */
function extractComponents(record: InputRecord, columns: ComponentColumns): GeocodeQuery {
  const parts: string[] = [];

  for (const key of COMPONENT_ORDER) {
    const column = columns[key];
    const value = column === undefined ? null : cell(record, column);
    if (value !== null) {
      parts.push(value);
    }
  }

  const zip = columns.zip === undefined ? null : cell(record, columns.zip);
  const head = parts.join(', ');
  const text = zip === null ? head : head.length > 0 ? `${head} ${zip}` : zip;

  if (text.length === 0) {
    return { valid: false, reason: 'no address components present' };
  }

  return { valid: true, text };
}

/**
 * Trimmed cell value, or null when the column is absent or blank
 */
function cell(record: InputRecord, column: string): string | null {
  if (!Object.hasOwn(record.values, column)) {
    return null;
  }
  const raw = record.values[column] ?? '';
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function hasAnyComponent(columns: ComponentColumns): boolean {
  return (
    columns.street !== undefined ||
    columns.city !== undefined ||
    columns.state !== undefined ||
    columns.zip !== undefined
  );
}

/**
 * Columns a mapping reads from
 */
export function mappedColumns(mapping: AddressMapping): string[] {
  const components = (columns: ComponentColumns): string[] =>
    [columns.street, columns.city, columns.state, columns.zip].filter(
      (column): column is string => column !== undefined
    );

  if (mapping.mode === 'components') {
    return components(mapping);
  }
  return [mapping.addressColumn, ...(mapping.fallback ? components(mapping.fallback) : [])];
}

/**
 * Check a mapping against the input header before any row is read.
 * Columns missing from the header are skipped for every row, like blank cells.
 *
 * @returns mapped columns the header does not contain
 * @throws {ConfigurationError} when the mapping names no column, or none of
 *   its columns exist in the header
 */
export function validateMapping(mapping: AddressMapping, header: readonly string[]): string[] {
  const columns = mappedColumns(mapping);

  if (columns.length === 0) {
    throw new ConfigurationError(
      'No address columns configured: set an address column or at least one of street, city, state, zip'
    );
  }

  const known = new Set(header);
  const missing = columns.filter((column) => !known.has(column));
  if (missing.length === columns.length) {
    throw new ConfigurationError(
      `Address column(s) not found in input header: ${missing.join(', ')} (available: ${header.join(', ')})`
    );
  }

  return missing;
}
