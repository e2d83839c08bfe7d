/**
 * Batch Processor
 *
 * Drives one geocoding run: input rows in order → address extraction →
 * rate-limited provider call → output row, committed in chunks.
 *
 * ARCHITECTURE:
 * - Single worker, strict row order
 * - Each chunk is appended to the output, then the checkpoint is committed
 * - A crash loses at most the rows of the uncommitted chunk; resuming
 *   reprocesses exactly those
 * - RunStats live on the instance and are returned in the result
 *
 * FAILURE MODEL:
 * - Row-local failures become 'failed' or 'no_address' rows
 * - GeocoderErrors with `fatal` set abort the run; rows processed before the
 *   failing one are committed first when the output is still writable
 * - Anything else is a bug and propagates without touching the output
 */

import { resolve } from 'node:path';
import { systemClock, type Clock } from '../core/clock.js';
import { ConfigurationError, GeocoderError, PersistenceError, toError } from '../core/errors.js';
import {
  emptyStatusCounts,
  noAddressResult,
  OUTPUT_COLUMNS,
  outputHeader,
  toOutputRow,
  type GeocodeResult,
  type RunStats,
  type StatusCounts,
} from '../core/types.js';
import { logger as defaultLogger, type EngineLogger } from '../core/utils/logger.js';
import { extractQuery, validateMapping, type AddressMapping } from '../extraction/address-extractor.js';
import { CheckpointStore, initialCheckpoint, type Checkpoint } from '../persistence/checkpoint-store.js';
import { resolveCsvFormat, type CsvFormat } from '../persistence/csv-format.js';
import { CsvOutputFile } from '../persistence/csv-output.js';
import { countRecords, readHeader, readRecords } from '../persistence/csv-source.js';
import { createProviderClient } from '../providers/index.js';
import type { GeocodeClient } from '../providers/provider-client.js';
import {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_PROGRESS_INTERVAL,
  type BatchDependencies,
  type BatchOptions,
  type BatchResult,
  type BatchState,
  type ProgressUpdate,
  type TerminalBatchState,
} from './batch-processor.types.js';

const TRANSITIONS: Readonly<Record<BatchState, readonly BatchState[]>> = {
  idle: ['initializing'],
  initializing: ['running', 'completed', 'aborted'],
  running: ['completed', 'aborted'],
  completed: [],
  aborted: [],
};

/**
 * Everything the running phase needs, produced by initialization
 */
interface PreparedRun {
  readonly client: GeocodeClient;
  readonly header: readonly string[];
  readonly format: CsvFormat;
  readonly output: CsvOutputFile;
  readonly store: CheckpointStore;
  readonly checkpoint: Checkpoint;
  readonly counts: StatusCounts;
  readonly totalRows: number;
}

/**
 * Mutable progress of the running phase
 */
interface RunProgress {
  checkpoint: Checkpoint | null;
  counts: StatusCounts;
  processedThisRun: number;
  startIndex: number;
}

export class BatchProcessor {
  private currentState: BatchState = 'idle';
  private readonly logger: EngineLogger;
  private readonly clock: Clock;
  private readonly createClient: NonNullable<BatchDependencies['createClient']>;
  private readonly chunkSize: number;
  private readonly progressInterval: number;
  private client: GeocodeClient | null = null;
  private startedAt = 0;

  constructor(
    private readonly options: BatchOptions,
    dependencies: BatchDependencies = {}
  ) {
    this.logger = dependencies.logger ?? defaultLogger;
    this.clock = dependencies.clock ?? systemClock;
    this.createClient = dependencies.createClient ?? createProviderClient;
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.progressInterval = options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
  }

  get state(): BatchState {
    return this.currentState;
  }

  /**
   * Execute the run. Resolves for every completed or aborted run; rejects
   * only for errors that are not GeocoderErrors.
   */
  async run(): Promise<BatchResult> {
    if (this.currentState !== 'idle') {
      throw new Error(`BatchProcessor can only run once (state: ${this.currentState})`);
    }

    this.startedAt = this.clock.now();
    this.transition('initializing');

    let prepared: PreparedRun;
    try {
      prepared = await this.initialize();
    } catch (error) {
      if (error instanceof GeocoderError) {
        return this.abort(error, {
          checkpoint: null,
          counts: emptyStatusCounts(),
          processedThisRun: 0,
          startIndex: 0,
        });
      }
      throw error;
    }

    const progress: RunProgress = {
      checkpoint: prepared.checkpoint,
      counts: prepared.counts,
      processedThisRun: 0,
      startIndex: prepared.checkpoint.lastCompletedIndex + 1,
    };

    if (prepared.checkpoint.status === 'completed') {
      this.logger.info('Output is already complete; nothing to do', {
        output: this.options.outputPath,
        rows: prepared.checkpoint.rowsWritten,
      });
      return this.finish('completed', progress);
    }

    this.transition('running');
    return this.process(prepared, progress);
  }

  // ==========================================================================
  // Initialization
  // ==========================================================================

  private async initialize(): Promise<PreparedRun> {
    const { inputPath, outputPath, provider, mapping } = this.options;

    if (!Number.isInteger(this.chunkSize) || this.chunkSize < 1) {
      throw new ConfigurationError(`Chunk size must be a positive integer, got ${this.chunkSize}`);
    }
    if (!Number.isInteger(this.progressInterval) || this.progressInterval < 1) {
      throw new ConfigurationError(
        `Progress interval must be a positive integer, got ${this.progressInterval}`
      );
    }
    if (resolve(inputPath) === resolve(outputPath)) {
      throw new ConfigurationError('Output file must differ from the input file');
    }

    // Provider keys are checked before the input is touched
    const client = this.createClient(provider, {
      ...this.options.client,
      clock: this.clock,
      logger: this.logger,
    });
    this.client = client;

    const format = resolveCsvFormat(this.options.format);
    const header = await readHeader(inputPath, format);
    this.checkColumns(header, mapping);

    const output = new CsvOutputFile(outputPath, format);
    const store = new CheckpointStore(output, this.logger);
    const expectedHeader = outputHeader(header);
    const context = {
      providerId: provider.id,
      chunkSize: this.chunkSize,
      inputPath,
      expectedHeader,
    };

    const totalRows = await countRecords(inputPath, format);

    if (this.options.resume) {
      const loaded = await store.load(context);
      if (loaded !== null) {
        this.logger.info('Resuming from checkpoint', {
          source: loaded.source,
          resumeFrom: loaded.checkpoint.lastCompletedIndex + 1,
          totalRows,
          repaired: loaded.repaired,
        });
        return {
          client,
          header,
          format,
          output,
          store,
          checkpoint: loaded.checkpoint,
          counts: loaded.counts,
          totalRows,
        };
      }
      this.logger.info('No previous progress found; starting from the first row', {
        output: outputPath,
      });
    }

    await store.clear();
    await output.writeHeader(expectedHeader);
    const checkpoint = await store.commit(initialCheckpoint(context));

    return {
      client,
      header,
      format,
      output,
      store,
      checkpoint,
      counts: emptyStatusCounts(),
      totalRows,
    };
  }

  /**
   * @throws {ConfigurationError} when the input already carries output
   *   columns or the address mapping matches no input column
   */
  private checkColumns(header: readonly string[], mapping: AddressMapping): void {
    const reserved = OUTPUT_COLUMNS.filter((column) => header.includes(column));
    if (reserved.length > 0) {
      throw new ConfigurationError(
        `Input already has output column(s): ${reserved.join(', ')}. Rename them before geocoding.`
      );
    }

    const missing = validateMapping(mapping, header);
    if (missing.length > 0) {
      this.logger.warn('Address columns missing from input are treated as blank', { missing });
    }
  }

  // ==========================================================================
  // Running
  // ==========================================================================

  private async process(prepared: PreparedRun, progress: RunProgress): Promise<BatchResult> {
    const { client, header, format, output, store } = prepared;
    const { signal, mapping, inputPath } = this.options;

    let buffer: string[][] = [];
    let lastBufferedIndex = progress.startIndex - 1;

    const flush = async (status: Checkpoint['status']): Promise<void> => {
      const base = progress.checkpoint ?? prepared.checkpoint;
      await output.append(buffer);
      progress.checkpoint = await store.commit({
        ...base,
        lastCompletedIndex: lastBufferedIndex,
        rowsWritten: lastBufferedIndex + 1,
        status,
      });
      buffer = [];
    };

    this.logger.info('Geocoding started', {
      provider: client.providerId,
      startIndex: progress.startIndex,
      totalRows: prepared.totalRows,
      chunkSize: this.chunkSize,
    });

    let interrupted = false;

    try {
      for await (const record of readRecords(inputPath, format, progress.startIndex)) {
        if (signal?.aborted) {
          interrupted = true;
          break;
        }

        const query = extractQuery(record, mapping);
        let result: GeocodeResult;
        if (query.valid) {
          result = await client.geocode(query.text);
        } else {
          result = noAddressResult(query.reason);
          this.logger.debug('Row has no address', { row: record.index, reason: query.reason });
        }

        if (result.status === 'failed') {
          this.logger.debug('Geocode failed', { row: record.index, error: result.error });
        }

        buffer.push(toOutputRow(header, record, result));
        lastBufferedIndex = record.index;
        progress.counts = tally(progress.counts, result);
        progress.processedThisRun++;

        if (progress.processedThisRun % this.progressInterval === 0) {
          this.reportProgress(lastBufferedIndex + 1, prepared.totalRows, progress);
        }

        if (buffer.length >= this.chunkSize) {
          await flush('running');
          this.logger.debug('Chunk committed', { lastCompletedIndex: lastBufferedIndex });
        }
      }

      if (interrupted) {
        await flush('running');
        this.logger.warn('Run interrupted; resume to continue', {
          resumeFrom: lastBufferedIndex + 1,
        });
        return this.finish('aborted', progress, { interrupted: true });
      }

      await flush('completed');
      return this.finish('completed', progress);
    } catch (error) {
      if (!(error instanceof GeocoderError)) {
        throw error;
      }

      // Rows before the failing one are valid results; keep them
      if (!(error instanceof PersistenceError) && buffer.length > 0) {
        try {
          await flush('running');
        } catch (flushError) {
          this.logger.error('Could not commit buffered rows after failure', {
            error: toError(flushError).message,
          });
        }
      }

      return this.abort(error, progress);
    }
  }

  private reportProgress(completedRows: number, totalRows: number, progress: RunProgress): void {
    const stats = this.buildStats(progress);
    const seconds = stats.elapsedMs / 1000;
    const ratePerSecond = seconds > 0 ? progress.processedThisRun / seconds : 0;
    const remaining = Math.max(0, totalRows - completedRows);
    const etaMs = ratePerSecond > 0 ? (remaining / ratePerSecond) * 1000 : null;

    const update: ProgressUpdate = { completedRows, totalRows, ratePerSecond, etaMs, stats };

    this.logger.debug('Progress', {
      completedRows,
      totalRows,
      ratePerSecond: Number(ratePerSecond.toFixed(2)),
      etaSeconds: etaMs === null ? null : Math.round(etaMs / 1000),
    });
    this.options.onProgress?.(update);
  }

  // ==========================================================================
  // Termination
  // ==========================================================================

  private abort(error: GeocoderError, progress: RunProgress): BatchResult {
    this.logger.error('Run aborted', {
      code: error.code,
      error: error.message,
      lastCommittedIndex: progress.checkpoint?.lastCompletedIndex ?? -1,
    });
    return this.finish('aborted', progress, { error });
  }

  private finish(
    state: TerminalBatchState,
    progress: RunProgress,
    extra: { readonly error?: GeocoderError; readonly interrupted?: boolean } = {}
  ): BatchResult {
    this.transition(state);
    const stats = this.buildStats(progress);

    if (state === 'completed') {
      this.logger.info('Geocoding complete', {
        succeeded: stats.succeeded,
        failed: stats.failed,
        skipped: stats.skipped,
        providerCalls: stats.providerCalls,
        elapsedMs: Math.round(stats.elapsedMs),
      });
    }

    return {
      state,
      stats,
      checkpoint: progress.checkpoint,
      resumeFrom: stats.lastCommittedIndex + 1,
      interrupted: extra.interrupted ?? false,
      ...(extra.error !== undefined && { error: extra.error }),
    };
  }

  private buildStats(progress: RunProgress): RunStats {
    const { succeeded, failed, skipped } = progress.counts;
    return {
      attempted: succeeded + failed + skipped,
      succeeded,
      failed,
      skipped,
      processedThisRun: progress.processedThisRun,
      providerCalls: this.client?.callCount ?? 0,
      startIndex: progress.startIndex,
      lastCommittedIndex: progress.checkpoint?.lastCompletedIndex ?? -1,
      elapsedMs: this.clock.now() - this.startedAt,
    };
  }

  private transition(next: BatchState): void {
    if (!TRANSITIONS[this.currentState].includes(next)) {
      throw new Error(`Invalid batch state transition: ${this.currentState} -> ${next}`);
    }
    this.currentState = next;
  }
}

function tally(counts: StatusCounts, result: GeocodeResult): StatusCounts {
  switch (result.status) {
    case 'success':
      return { ...counts, succeeded: counts.succeeded + 1 };
    case 'failed':
      return { ...counts, failed: counts.failed + 1 };
    case 'no_address':
      return { ...counts, skipped: counts.skipped + 1 };
  }
}
