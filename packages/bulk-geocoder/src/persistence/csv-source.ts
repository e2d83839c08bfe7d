/**
 * CSV Record Source
 *
 * Streams the input file as InputRecords. The first line is the header; data
 * rows get 0-based indexes in file order. Rows shorter than the header are
 * padded with empty cells, cells beyond the header are dropped.
 *
 * Blank lines are skipped, except in a one-column file: there a blank line
 * is a record with an empty value, so every line keeps its output row.
 */

import { access, constants } from 'node:fs/promises';
import { ConfigurationError, InputReadError, toError } from '../core/errors.js';
import type { InputRecord } from '../core/types.js';
import { isBlankLine, isStringRow, openCsvParser, type CsvFormat } from './csv-format.js';

/**
 * Parsed rows, header first
 */
async function* parseRows(path: string, format: CsvFormat): AsyncGenerator<string[]> {
  let header: string[] | null = null;

  for await (const row of openCsvParser(path, format, { skipEmptyLines: false })) {
    if (!isStringRow(row)) {
      continue;
    }
    if (isBlankLine(row) && (header === null || header.length > 1)) {
      continue;
    }
    if (header === null) {
      header = row;
    }
    yield row;
  }
}

/**
 * Read and validate the header row
 *
 * @throws {ConfigurationError} when the file is missing, unreadable, empty,
 *   or its header has blank or duplicate column names
 */
export async function readHeader(path: string, format: CsvFormat): Promise<string[]> {
  try {
    await access(path, constants.R_OK);
  } catch (error) {
    throw new ConfigurationError(`Input file is not readable: ${path}`, { cause: error });
  }

  let header: string[] | null = null;
  try {
    for await (const row of parseRows(path, format)) {
      header = row;
      break;
    }
  } catch (error) {
    throw new ConfigurationError(
      `Input file could not be parsed: ${path}: ${toError(error).message}`,
      { cause: error }
    );
  }

  if (header === null) {
    throw new ConfigurationError(`Input file has no header row: ${path}`);
  }

  const blank = header.findIndex((column) => column.trim().length === 0);
  if (blank >= 0) {
    throw new ConfigurationError(`Input header has a blank column name at position ${blank + 1}`);
  }

  const seen = new Set<string>();
  for (const column of header) {
    if (seen.has(column)) {
      throw new ConfigurationError(`Input header has duplicate column "${column}"`);
    }
    seen.add(column);
  }

  return header;
}

/**
 * Stream data rows, skipping those before `startIndex` without yielding them
 *
 * @throws {InputReadError} on read or parse failures
 */
export async function* readRecords(
  path: string,
  format: CsvFormat,
  startIndex = 0
): AsyncGenerator<InputRecord> {
  let header: string[] | null = null;
  let index = -1;

  try {
    for await (const row of parseRows(path, format)) {
      if (header === null) {
        header = row;
        continue;
      }

      index++;
      if (index < startIndex) {
        continue;
      }

      const columns = header;
      const values = Object.fromEntries(columns.map((column, i) => [column, row[i] ?? '']));
      yield { index, values };
    }
  } catch (error) {
    throw new InputReadError(
      `Failed reading input after row ${index}: ${toError(error).message}`,
      path,
      { cause: error }
    );
  }
}

/**
 * Count data rows (used for progress and ETA)
 *
 * @throws {InputReadError} on read or parse failures
 */
export async function countRecords(path: string, format: CsvFormat): Promise<number> {
  let rows = -1;
  try {
    for await (const _row of parseRows(path, format)) {
      rows++;
    }
  } catch (error) {
    throw new InputReadError(`Failed counting input rows: ${toError(error).message}`, path, {
      cause: error,
    });
  }
  return Math.max(0, rows);
}
