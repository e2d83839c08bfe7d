/**
 * Bulk Geocoder CLI
 *
 * @module cli
 */

export * from './lib/config.js';
export * from './lib/exit-codes.js';
export { CLILogger, createCLILogger, formatDuration } from './lib/logger.js';
export type { CLILoggerConfig, ProgressOptions, StructuredLogEntry } from './lib/logger.js';
export * from './commands/index.js';

export const CLI_NAME = 'bulk-geocoder';
