/**
 * Bulk Geocoder - Batch Address Geocoding Engine
 *
 * bulk-geocoder provides:
 * - CSV in, CSV out: every input row kept, four result columns appended
 * - Pluggable providers (Nominatim, Google Maps, Mapbox) behind one client
 * - Per-provider rate limiting and retry of transient failures
 * - Chunked output commits with a checkpoint, so interrupted runs resume
 *
 * @packageDocumentation
 */

// Batch processing
export { BatchProcessor } from './services/batch-processor.js';
export {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_PROGRESS_INTERVAL,
  type BatchState,
  type TerminalBatchState,
  type BatchOptions,
  type BatchClientOptions,
  type BatchDependencies,
  type BatchResult,
  type ProgressUpdate,
} from './services/batch-processor.types.js';

// Records and results
export {
  OUTPUT_COLUMNS,
  outputHeader,
  toOutputRow,
  successResult,
  failedResult,
  noAddressResult,
  emptyStatusCounts,
  type InputRecord,
  type GeocodeQuery,
  type GeocodeStatus,
  type GeocodeResult,
  type SuccessfulGeocode,
  type UnsuccessfulGeocode,
  type OutputColumn,
  type StatusCounts,
  type RunStats,
} from './core/types.js';

// Errors
export {
  GeocoderError,
  ConfigurationError,
  InputReadError,
  PersistenceError,
  ProviderTransientError,
  ProviderPermanentError,
  ProviderAuthError,
  type GeocoderErrorCode,
} from './core/errors.js';

// Address extraction
export {
  extractQuery,
  validateMapping,
  mappedColumns,
  type AddressMapping,
  type ComponentColumns,
} from './extraction/address-extractor.js';

// Providers
export {
  PROVIDER_IDS,
  PROVIDER_DEFINITIONS,
  DEFAULT_USER_AGENT,
  createProvider,
  createProviderClient,
  isProviderId,
  ProviderClient,
  NominatimProvider,
  GoogleProvider,
  MapboxProvider,
  type GeocodeClient,
  type GeocodingProvider,
  type ProviderClientOptions,
  type ProviderConfig,
  type ProviderDefinition,
  type ProviderId,
  type NominatimConfig,
  type GoogleConfig,
  type MapboxConfig,
} from './providers/index.js';

// Rate limiting & retry
export {
  FixedIntervalRateLimiter,
  SlidingWindowRateLimiter,
  createRateLimiter,
  describePolicy,
} from './resilience/rate-limiter.js';
export {
  RetryExecutor,
  RetryExhaustedError,
  DEFAULT_RETRY_CONFIG,
  createRetryExecutor,
} from './resilience/retry.js';
export type {
  RateLimiter,
  RateLimitPolicy,
  RetryConfig,
  RetryAttempt,
} from './resilience/types.js';

// Persistence
export {
  CheckpointStore,
  initialCheckpoint,
  type Checkpoint,
  type CheckpointContext,
  type CheckpointSource,
  type CheckpointStatus,
  type LoadedCheckpoint,
} from './persistence/checkpoint-store.js';
export { CsvOutputFile, type OutputInspection } from './persistence/csv-output.js';
export { DEFAULT_CSV_FORMAT, resolveCsvFormat, type CsvFormat } from './persistence/csv-format.js';
export { readHeader, readRecords, countRecords } from './persistence/csv-source.js';

// Infrastructure
export { systemClock, type Clock } from './core/clock.js';
export {
  logger,
  silentLogger,
  type EngineLogger,
  type LogLevel,
  type LogMetadata,
} from './core/utils/logger.js';
