/**
 * Batch Processor Type Definitions
 *
 * Options, dependencies and results of resumable batch runs.
 * `run()` reports every GeocoderError through BatchResult; any other error
 * is a bug and propagates.
 */

import type { Clock } from '../core/clock.js';
import type { GeocoderError } from '../core/errors.js';
import type { RunStats } from '../core/types.js';
import type { EngineLogger } from '../core/utils/logger.js';
import type { AddressMapping } from '../extraction/address-extractor.js';
import type { Checkpoint } from '../persistence/checkpoint-store.js';
import type { CsvFormat } from '../persistence/csv-format.js';
import type { GeocodeClient } from '../providers/provider-client.js';
import type { ProviderClientOptions } from '../providers/index.js';
import type { ProviderConfig } from '../providers/types.js';

// ============================================================================
// Lifecycle
// ============================================================================

/**
 * Run lifecycle
 */
export type BatchState =
  | 'idle'          // Constructed, run() not called
  | 'initializing'  // Validating configuration, loading checkpoint
  | 'running'       // Processing rows
  | 'completed'     // Input exhausted, final checkpoint committed
  | 'aborted';      // Fatal error or interrupted; resumable from the checkpoint

export type TerminalBatchState = Extract<BatchState, 'completed' | 'aborted'>;

// ============================================================================
// Options
// ============================================================================

/**
 * Client settings the processor forwards to the provider factory
 */
export type BatchClientOptions = Pick<ProviderClientOptions, 'timeoutMs' | 'rateLimit' | 'retry'>;

export interface BatchOptions {
  readonly inputPath: string;
  readonly outputPath: string;
  readonly provider: ProviderConfig;
  readonly mapping: AddressMapping;
  /** Continue from the checkpoint instead of starting over (default: false) */
  readonly resume?: boolean;
  /** Rows per output append and checkpoint commit (default: 1000) */
  readonly chunkSize?: number;
  readonly format?: Partial<CsvFormat>;
  /** Rows between progress reports (default: 100) */
  readonly progressInterval?: number;
  readonly client?: BatchClientOptions;
  /** Stops the run at the next row boundary; buffered rows are committed */
  readonly signal?: AbortSignal;
  readonly onProgress?: (update: ProgressUpdate) => void;
}

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_PROGRESS_INTERVAL = 100;

/**
 * Collaborators, injectable for tests
 */
export interface BatchDependencies {
  readonly logger?: EngineLogger;
  readonly clock?: Clock;
  readonly createClient?: (config: ProviderConfig, options: ProviderClientOptions) => GeocodeClient;
}

// ============================================================================
// Progress & Result
// ============================================================================

export interface ProgressUpdate {
  /** Rows with a result, resumed rows included */
  readonly completedRows: number;
  /** Data rows in the input */
  readonly totalRows: number;
  /** Rows per second over this process's rows */
  readonly ratePerSecond: number;
  /** Estimated time to finish, null until a rate is known */
  readonly etaMs: number | null;
  readonly stats: RunStats;
}

export interface BatchResult {
  readonly state: TerminalBatchState;
  readonly stats: RunStats;
  /** Last committed checkpoint, null when the run aborted before writing one */
  readonly checkpoint: Checkpoint | null;
  /** Index the next resumed run starts at */
  readonly resumeFrom: number;
  /** Set when the run was stopped through the abort signal */
  readonly interrupted: boolean;
  /** Cause of an abort other than an interruption */
  readonly error?: GeocoderError;
}
