/**
 * Geocode Command
 *
 * Geocode every row of a CSV file into a new CSV file.
 *
 * Usage:
 *   bulk-geocoder geocode <input> <output> [options]
 *
 * Options:
 *   -p, --provider <name>   nominatim|google|mapbox (default: nominatim)
 *   -k, --api-key <key>     API key or access token for the provider
 *   -a, --address <column>  Column holding the full address
 *   --street/--city/--state/--zip <column>
 *                           Address component columns
 *   -r, --resume            Continue from the checkpoint
 *   -c, --chunk-size <n>    Rows per commit (default: 1000)
 *
 * Examples:
 *   bulk-geocoder geocode addresses.csv out.csv -a address --user-agent "acme-import/1.0"
 *   bulk-geocoder geocode addresses.csv out.csv -p google --street street --city city --zip zip
 *   bulk-geocoder geocode addresses.csv out.csv -p google -a address --resume
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import { InvalidArgumentError, type Command } from 'commander';
import { ConfigurationError, toError } from '../../core/errors.js';
import type { RunStats } from '../../core/types.js';
import type { AddressMapping, ComponentColumns } from '../../extraction/address-extractor.js';
import { BatchProcessor } from '../../services/batch-processor.js';
import type { BatchDependencies, BatchResult } from '../../services/batch-processor.types.js';
import { loadConfig, toProviderConfig, type CLIConfig } from '../lib/config.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { createCLILogger, formatDuration, type CLILogger } from '../lib/logger.js';

/**
 * Geocode options from CLI
 */
export interface GeocodeOptions {
  readonly provider?: string;
  readonly apiKey?: string;
  readonly address?: string;
  readonly street?: string;
  readonly city?: string;
  readonly state?: string;
  readonly zip?: string;
  readonly resume?: boolean;
  readonly chunkSize?: number;
  readonly delimiter?: string;
  readonly userAgent?: string;
  readonly email?: string;
  readonly timeout?: number;
  readonly maxRetries?: number;
  readonly config?: string;
  readonly verbose?: boolean;
  readonly json?: boolean;
}

/**
 * Seams for tests
 */
export interface GeocodeCommandContext {
  readonly env?: NodeJS.ProcessEnv;
  readonly cwd?: string;
  readonly createClient?: BatchDependencies['createClient'];
  readonly signal?: AbortSignal;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Register the geocode command
 */
export function registerGeocodeCommand(program: Command): void {
  program
    .command('geocode <input> <output>')
    .description('Geocode the addresses of a CSV file, appending coordinates to each row')
    .option('-p, --provider <name>', 'Geocoding provider: nominatim|google|mapbox')
    .option('-k, --api-key <key>', 'API key (google) or access token (mapbox)')
    .option('-a, --address <column>', 'Column containing the full address')
    .option('--street <column>', 'Street address column')
    .option('--city <column>', 'City column')
    .option('--state <column>', 'State column')
    .option('--zip <column>', 'ZIP/postal code column')
    .option('-r, --resume', 'Resume from the last checkpoint')
    .option('-c, --chunk-size <n>', 'Rows per output commit', parsePositiveInt)
    .option('--delimiter <char>', 'Field delimiter of input and output')
    .option('--user-agent <ua>', 'User-Agent identifying your application (nominatim)')
    .option('--email <address>', 'Contact email sent to nominatim')
    .option('--timeout <ms>', 'Request timeout in milliseconds', parsePositiveInt)
    .option('--max-retries <n>', 'Attempts per address on transient failures', parsePositiveInt)
    .option('--config <path>', 'Path to config file (default: .bulk-geocoderrc)')
    .option('-v, --verbose', 'Verbose output')
    .option('--json', 'Output as JSON lines')
    .action(async (input: string, output: string, options: GeocodeOptions) => {
      const exitCode = await executeGeocode(input, output, options);
      if (exitCode !== EXIT_CODES.SUCCESS) {
        process.exit(exitCode);
      }
    });
}

/**
 * Build the address mapping from the column flags
 *
 * @throws {ConfigurationError} when no column flag is given
 */
export function buildMapping(options: GeocodeOptions): AddressMapping {
  const components: ComponentColumns = {
    ...(options.street !== undefined && { street: options.street }),
    ...(options.city !== undefined && { city: options.city }),
    ...(options.state !== undefined && { state: options.state }),
    ...(options.zip !== undefined && { zip: options.zip }),
  };
  const hasComponents = Object.keys(components).length > 0;

  if (options.address !== undefined) {
    return {
      mode: 'single',
      addressColumn: options.address,
      ...(hasComponents && { fallback: components }),
    };
  }

  if (hasComponents) {
    return { mode: 'components', ...components };
  }

  throw new ConfigurationError(
    'Specify --address <column> or at least one of --street, --city, --state, --zip'
  );
}

/**
 * Execute the geocode command
 *
 * @returns process exit code
 */
export async function executeGeocode(
  input: string,
  output: string,
  options: GeocodeOptions,
  context: GeocodeCommandContext = {}
): Promise<ExitCode> {
  let config: CLIConfig;
  let mapping: AddressMapping;
  try {
    config = loadConfig({
      configPath: options.config,
      cwd: context.cwd,
      env: context.env,
      overrides: {
        provider: options.provider,
        apiKey: options.apiKey,
        chunkSize: options.chunkSize,
        timeout: options.timeout,
        maxRetries: options.maxRetries,
        delimiter: options.delimiter,
        userAgent: options.userAgent,
        email: options.email,
        verbose: options.verbose,
        json: options.json,
      },
    });
    mapping = buildMapping(options);
  } catch (error) {
    console.error(`Configuration error: ${toError(error).message}`);
    return EXIT_CODES.CONFIG_ERROR;
  }

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  logger.commandStart('geocode', {
    input,
    output,
    provider: config.provider,
    resume: options.resume === true,
    ...(config.configPath !== null && { config: config.configPath }),
  });

  // Ctrl-C stops at the next row and commits what was processed
  const controller = new AbortController();
  const onSigint = (): void => {
    logger.warn('Interrupt received; saving progress');
    controller.abort();
  };
  const forward = (): void => controller.abort();
  process.once('SIGINT', onSigint);
  context.signal?.addEventListener('abort', forward, { once: true });
  if (context.signal?.aborted) {
    controller.abort();
  }

  let result: BatchResult;
  try {
    const processor = new BatchProcessor(
      {
        inputPath: input,
        outputPath: output,
        provider: toProviderConfig(config),
        mapping,
        resume: options.resume === true,
        chunkSize: config.chunkSize,
        progressInterval: config.progressInterval,
        format: { delimiter: config.delimiter, encoding: config.encoding },
        client: {
          timeoutMs: config.timeout,
          retry: { maxAttempts: config.maxRetries },
        },
        signal: controller.signal,
        onProgress: (update) =>
          logger.progress({
            current: update.completedRows,
            total: update.totalRows,
            ratePerSecond: update.ratePerSecond,
            etaMs: update.etaMs,
          }),
      },
      {
        logger,
        ...(context.createClient !== undefined && { createClient: context.createClient }),
      }
    );
    result = await processor.run();
  } finally {
    process.removeListener('SIGINT', onSigint);
    context.signal?.removeEventListener('abort', forward);
  }

  printSummary(logger, output, result);
  logger.commandEnd(result.state === 'completed', { state: result.state });

  if (result.state === 'completed') {
    return EXIT_CODES.SUCCESS;
  }
  return result.error instanceof ConfigurationError ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.ERRORS;
}

function printSummary(logger: CLILogger, output: string, result: BatchResult): void {
  const { stats } = result;

  if (logger.json) {
    console.log(
      JSON.stringify({
        success: result.state === 'completed',
        state: result.state,
        output,
        resumeFrom: result.resumeFrom,
        interrupted: result.interrupted,
        ...(result.error !== undefined && {
          error: { code: result.error.code, message: result.error.message },
        }),
        stats,
      })
    );
    return;
  }

  console.log('\nGeocoding Summary');
  console.log('='.repeat(50));
  console.log(`Rows:          ${stats.attempted}`);
  console.log(`Successful:    ${stats.succeeded} (${percent(stats.succeeded, stats)})`);
  console.log(`Failed:        ${stats.failed} (${percent(stats.failed, stats)})`);
  console.log(`No address:    ${stats.skipped} (${percent(stats.skipped, stats)})`);
  console.log(`Provider calls: ${stats.providerCalls}`);
  console.log(`Duration:      ${formatDuration(Math.round(stats.elapsedMs))}`);
  console.log(`Output:        ${output}`);

  if (result.state === 'aborted') {
    console.log('');
    if (result.error !== undefined) {
      console.error(`Error: ${result.error.message}`);
    }
    if (result.checkpoint !== null) {
      console.log(`Last committed row: ${stats.lastCommittedIndex}`);
      console.log(`Re-run with --resume to continue from row ${result.resumeFrom}.`);
    }
  }
}

function percent(count: number, stats: RunStats): string {
  return stats.attempted > 0 ? `${((count / stats.attempted) * 100).toFixed(1)}%` : '0.0%';
}
