/**
 * CSV Output File
 *
 * Append-only sink for geocoded rows. The engine appends one chunk at a time
 * and commits the checkpoint after each append; `inspect` and `truncateRows`
 * let the checkpoint store reconcile the file after an interruption.
 */

import { appendFile, open, stat } from 'node:fs/promises';
import { stringify } from 'csv-stringify/sync';
import { PersistenceError, toError } from '../core/errors.js';
import { emptyStatusCounts, type StatusCounts } from '../core/types.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';
import { isStringRow, openCsvParser, type CsvFormat } from './csv-format.js';

/**
 * What an existing output file holds
 */
export interface OutputInspection {
  readonly header: readonly string[];
  /** Complete data rows counted (never more than the requested limit) */
  readonly rowCount: number;
  /** Status tallies over the counted rows */
  readonly counts: StatusCounts;
  /**
   * Content beyond the counted rows: rows past the limit, a partially
   * written final line, or unparseable trailing data
   */
  readonly hasTrailingData: boolean;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class CsvOutputFile {
  constructor(
    readonly path: string,
    private readonly format: CsvFormat
  ) {}

  /**
   * Create or replace the file with just a header row
   *
   * @throws {PersistenceError}
   */
  async writeHeader(header: readonly string[]): Promise<void> {
    try {
      await atomicWriteFile(this.path, this.serialize([header]), this.format.encoding);
    } catch (error) {
      throw new PersistenceError(
        `Failed to create output file: ${toError(error).message}`,
        this.path,
        { cause: error }
      );
    }
  }

  /**
   * Append data rows
   *
   * @throws {PersistenceError}
   */
  async append(rows: readonly (readonly string[])[]): Promise<void> {
    if (rows.length === 0) {
      return;
    }

    try {
      await appendFile(this.path, this.serialize(rows), { encoding: this.format.encoding });
    } catch (error) {
      throw new PersistenceError(
        `Failed to append ${rows.length} rows to output: ${toError(error).message}`,
        this.path,
        { cause: error }
      );
    }
  }

  /**
   * Scan the file: header, complete rows (up to `limit`) and status tallies.
   *
   * @returns null when the file does not exist or holds no bytes
   * @throws {PersistenceError} when the header cannot be read
   */
  async inspect(limit = Number.POSITIVE_INFINITY): Promise<OutputInspection | null> {
    let size: number;
    try {
      size = (await stat(this.path)).size;
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new PersistenceError(`Cannot stat output file: ${toError(error).message}`, this.path, {
        cause: error,
      });
    }

    if (size === 0) {
      return null;
    }

    const endsWithNewline = await this.endsWithNewline(size);

    let header: string[] | null = null;
    let statusColumn = -1;
    // Rows parsed, the last one possibly partial
    const parsed: string[][] = [];
    let rowCount = 0;
    let counts = emptyStatusCounts();
    let hasTrailingData = false;
    let tornTail = false;

    const tally = (row: readonly string[]): void => {
      rowCount++;
      const status = row[statusColumn];
      counts = {
        succeeded: counts.succeeded + (status === 'success' ? 1 : 0),
        failed: counts.failed + (status === 'failed' ? 1 : 0),
        skipped: counts.skipped + (status === 'no_address' ? 1 : 0),
      };
    };

    try {
      for await (const row of openCsvParser(this.path, this.format)) {
        if (!isStringRow(row)) {
          continue;
        }
        if (header === null) {
          header = row;
          statusColumn = header.indexOf('geocode_status');
          continue;
        }

        // Hold one row back: it is only known complete once another follows
        const previous = parsed.pop();
        if (previous !== undefined) {
          if (rowCount >= limit) {
            hasTrailingData = true;
            break;
          }
          tally(previous);
        }
        parsed.push(row);
      }
    } catch {
      // Unparseable data after the last complete row is a torn write
      hasTrailingData = true;
      tornTail = true;
    }

    if (header === null) {
      throw new PersistenceError('Output file header could not be read', this.path);
    }

    const last = parsed.pop();
    if (last !== undefined) {
      // A row followed by a torn write was terminated; otherwise the file must end the line
      const complete = (tornTail || endsWithNewline) && last.length === header.length;
      if (complete && rowCount < limit) {
        tally(last);
      } else {
        hasTrailingData = true;
      }
    }

    return { header, rowCount, counts, hasTrailingData };
  }

  /**
   * Rewrite the file keeping the header and the first `keep` data rows
   *
   * @throws {PersistenceError}
   */
  async truncateRows(keep: number): Promise<void> {
    const kept: string[][] = [];

    try {
      for await (const row of openCsvParser(this.path, this.format)) {
        if (!isStringRow(row)) {
          continue;
        }
        if (kept.length > keep) {
          break;
        }
        kept.push(row);
      }
    } catch (error) {
      // Torn tail: everything wanted is already collected
      if (kept.length <= keep) {
        throw new PersistenceError(
          `Cannot repair output file: ${toError(error).message}`,
          this.path,
          { cause: error }
        );
      }
    }

    try {
      await atomicWriteFile(
        this.path,
        this.serialize(kept.slice(0, keep + 1)),
        this.format.encoding
      );
    } catch (error) {
      throw new PersistenceError(
        `Failed to rewrite output file: ${toError(error).message}`,
        this.path,
        { cause: error }
      );
    }
  }

  private serialize(rows: readonly (readonly string[])[]): string {
    return stringify(
      rows.map((row) => [...row]),
      { delimiter: this.format.delimiter, record_delimiter: 'unix' }
    );
  }

  private async endsWithNewline(size: number): Promise<boolean> {
    if (size === 0) {
      return false;
    }

    const handle = await open(this.path, 'r');
    try {
      const buffer = Buffer.alloc(1);
      await handle.read(buffer, 0, 1, size - 1);
      return buffer[0] === 0x0a;
    } finally {
      await handle.close();
    }
  }
}
