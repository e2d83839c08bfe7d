/**
 * Checkpoint Store - Resumable Run State
 *
 * Persists how far a run got so an interrupted run resumes where it left off.
 *
 * ARCHITECTURE:
 * - Sidecar file next to the output: {output}.checkpoint.json
 * - Atomic writes with temp files + rename
 * - Committed after every chunk append, so the output never holds fewer
 *   rows than the checkpoint claims (modulo a crash between the two, which
 *   `load` reconciles)
 * - Lock-free (single process assumption)
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import { readFile, unlink } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError, PersistenceError, toError } from '../core/errors.js';
import type { StatusCounts } from '../core/types.js';
import { atomicWriteJSON } from '../core/utils/atomic-write.js';
import type { EngineLogger } from '../core/utils/logger.js';
import { PROVIDER_IDS, type ProviderId } from '../providers/types.js';
import type { CsvOutputFile } from './csv-output.js';

// ============================================================================
// Types
// ============================================================================

const CheckpointSchema = z.object({
  version: z.literal(1),
  providerId: z.enum(PROVIDER_IDS),
  inputPath: z.string(),
  chunkSize: z.number().int().positive(),
  lastCompletedIndex: z.number().int().min(-1),
  rowsWritten: z.number().int().nonnegative(),
  status: z.enum(['running', 'completed']),
  updatedAt: z.string(),
});

/**
 * Every row with index <= lastCompletedIndex is in the output file.
 * A run resumes at lastCompletedIndex + 1.
 */
export type Checkpoint = z.infer<typeof CheckpointSchema>;

export type CheckpointStatus = Checkpoint['status'];

/**
 * Where a loaded checkpoint came from
 * - sidecar: the checkpoint file, reconciled with the output
 * - output-rows: no usable checkpoint file; inferred from the output row count
 */
export type CheckpointSource = 'sidecar' | 'output-rows';

export interface LoadedCheckpoint {
  readonly checkpoint: Checkpoint;
  /** Status tallies of the rows already in the output */
  readonly counts: StatusCounts;
  readonly source: CheckpointSource;
  /** Whether uncommitted or torn rows were cut from the output */
  readonly repaired: boolean;
}

export interface CheckpointContext {
  readonly providerId: ProviderId;
  readonly chunkSize: number;
  readonly inputPath: string;
  /** Header the output must carry for this input */
  readonly expectedHeader: readonly string[];
}

/**
 * Checkpoint for a run that has not written any data row yet
 */
export function initialCheckpoint(context: Omit<CheckpointContext, 'expectedHeader'>): Checkpoint {
  return {
    version: 1,
    providerId: context.providerId,
    inputPath: context.inputPath,
    chunkSize: context.chunkSize,
    lastCompletedIndex: -1,
    rowsWritten: 0,
    status: 'running',
    updatedAt: new Date().toISOString(),
  };
}

// ============================================================================
// Checkpoint Store
// ============================================================================

export class CheckpointStore {
  readonly path: string;

  constructor(
    private readonly output: CsvOutputFile,
    private readonly logger: EngineLogger
  ) {
    this.path = CheckpointStore.sidecarPath(output.path);
  }

  static sidecarPath(outputPath: string): string {
    return `${outputPath}.checkpoint.json`;
  }

  /**
   * Load the resume position, repairing the output file where needed.
   *
   * @returns null when there is no output to resume from
   * @throws {ConfigurationError} when the existing output was written for a
   *   different input layout
   * @throws {PersistenceError} when the output cannot be read or repaired
   */
  async load(context: CheckpointContext): Promise<LoadedCheckpoint | null> {
    const stored = await this.readSidecar();
    const committedRows = stored === null ? Number.POSITIVE_INFINITY : stored.lastCompletedIndex + 1;

    const inspection = await this.output.inspect(committedRows);
    if (inspection === null) {
      if (stored !== null) {
        this.logger.warn('Checkpoint found but output file is missing; starting fresh', {
          checkpoint: this.path,
        });
      }
      return null;
    }

    if (!sameColumns(inspection.header, context.expectedHeader)) {
      throw new ConfigurationError(
        `Existing output ${this.output.path} has a different header than this input would produce; ` +
          'choose another output file or run without resume'
      );
    }

    if (inspection.hasTrailingData) {
      this.logger.warn('Removing uncommitted rows from output', {
        output: this.output.path,
        keptRows: inspection.rowCount,
      });
      await this.output.truncateRows(inspection.rowCount);
    }

    if (stored !== null && inspection.rowCount < committedRows) {
      this.logger.warn('Output holds fewer rows than the checkpoint; rewinding', {
        checkpointRows: committedRows,
        outputRows: inspection.rowCount,
      });
    }

    if (stored !== null && stored.providerId !== context.providerId) {
      this.logger.warn('Checkpoint was written by a different provider; continuing with the new one', {
        previous: stored.providerId,
        current: context.providerId,
      });
    }

    if (stored !== null && stored.inputPath !== context.inputPath) {
      this.logger.warn('Checkpoint was written for a different input path', {
        previous: stored.inputPath,
        current: context.inputPath,
      });
    }

    const rewound = stored === null || inspection.rowCount < committedRows;
    const base = stored ?? initialCheckpoint(context);

    const checkpoint: Checkpoint = {
      ...base,
      providerId: context.providerId,
      inputPath: context.inputPath,
      chunkSize: context.chunkSize,
      lastCompletedIndex: inspection.rowCount - 1,
      rowsWritten: inspection.rowCount,
      status: rewound ? 'running' : base.status,
    };

    return {
      checkpoint,
      counts: inspection.counts,
      source: stored === null ? 'output-rows' : 'sidecar',
      repaired: inspection.hasTrailingData,
    };
  }

  /**
   * Persist a checkpoint atomically
   *
   * @throws {PersistenceError}
   */
  async commit(checkpoint: Checkpoint): Promise<Checkpoint> {
    const stamped: Checkpoint = { ...checkpoint, updatedAt: new Date().toISOString() };
    try {
      await atomicWriteJSON(this.path, stamped);
    } catch (error) {
      throw new PersistenceError(
        `Failed to write checkpoint: ${toError(error).message}`,
        this.path,
        { cause: error }
      );
    }
    return stamped;
  }

  /**
   * Remove the sidecar (fresh runs over an existing output)
   *
   * @throws {PersistenceError}
   */
  async clear(): Promise<void> {
    try {
      await unlink(this.path);
    } catch (error) {
      if (isNotFoundError(error)) {
        return;
      }
      throw new PersistenceError(
        `Failed to remove checkpoint: ${toError(error).message}`,
        this.path,
        { cause: error }
      );
    }
  }

  /**
   * Read and validate the sidecar. An unreadable or invalid sidecar is
   * ignored with a warning; the output row count then decides.
   */
  private async readSidecar(): Promise<Checkpoint | null> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw new PersistenceError(
        `Failed to read checkpoint: ${toError(error).message}`,
        this.path,
        { cause: error }
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      this.logger.warn('Ignoring unparseable checkpoint file', {
        checkpoint: this.path,
        error: toError(error).message,
      });
      return null;
    }

    const result = CheckpointSchema.safeParse(json);
    if (!result.success) {
      this.logger.warn('Ignoring invalid checkpoint file', {
        checkpoint: this.path,
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return null;
    }

    return result.data;
  }
}

function sameColumns(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((column, i) => column === b[i]);
}

function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
