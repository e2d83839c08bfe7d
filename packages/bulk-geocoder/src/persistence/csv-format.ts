/**
 * Delimited file format, fixed for the whole run
 */

import { createReadStream } from 'node:fs';
import { parse, type Parser } from 'csv-parse';

export interface CsvFormat {
  readonly delimiter: string;
  readonly encoding: BufferEncoding;
}

export const DEFAULT_CSV_FORMAT: CsvFormat = {
  delimiter: ',',
  encoding: 'utf-8',
};

export function resolveCsvFormat(overrides?: Partial<CsvFormat>): CsvFormat {
  return { ...DEFAULT_CSV_FORMAT, ...overrides };
}

export interface ParserOptions {
  /** Drop blank lines (default: true). When false a blank line parses as `['']`. */
  readonly skipEmptyLines?: boolean;
}

/**
 * Streaming row parser over a file. Rows come out as string arrays; a
 * leading BOM is stripped.
 */
export function openCsvParser(
  path: string,
  format: CsvFormat,
  { skipEmptyLines = true }: ParserOptions = {}
): Parser {
  const parser = parse({
    delimiter: format.delimiter,
    encoding: format.encoding,
    bom: true,
    relax_column_count: true,
    skip_empty_lines: skipEmptyLines,
  });
  const stream = createReadStream(path);
  stream.on('error', (error) => parser.destroy(error));
  // Early exit from iteration destroys the parser; release the file too
  parser.on('close', () => stream.destroy());
  return stream.pipe(parser);
}

export function isStringRow(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((cell) => typeof cell === 'string');
}

export function isBlankLine(row: readonly string[]): boolean {
  return row.length === 1 && row[0] === '';
}
