/**
 * Bulk Geocoder CLI Configuration Management
 *
 * Loads configuration from .bulk-geocoderrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (BULK_GEOCODER_*, plus the providers' own
 *    GOOGLE_MAPS_API_KEY / MAPBOX_ACCESS_TOKEN)
 * 3. Config file (.bulk-geocoderrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, toError } from '../../core/errors.js';
import { DEFAULT_CSV_FORMAT } from '../../persistence/csv-format.js';
import { DEFAULT_RETRY_CONFIG } from '../../resilience/retry.js';
import { DEFAULT_CHUNK_SIZE, DEFAULT_PROGRESS_INTERVAL } from '../../services/batch-processor.types.js';
import { DEFAULT_TIMEOUT_MS } from '../../core/http-client.js';
import { PROVIDER_IDS, type ProviderConfig, type ProviderId } from '../../providers/types.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Per-provider settings
 */
export interface ProvidersConfig {
  readonly nominatim: {
    readonly baseUrl?: string;
    readonly userAgent?: string;
    readonly email?: string;
  };
  readonly google: {
    readonly baseUrl?: string;
    readonly apiKey?: string;
  };
  readonly mapbox: {
    readonly baseUrl?: string;
    readonly accessToken?: string;
  };
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** Configuration file version */
  readonly version: 1;
  /** Active provider */
  readonly provider: ProviderId;
  readonly providers: ProvidersConfig;
  /** Rows per output append and checkpoint commit */
  readonly chunkSize: number;
  /** Request timeout in milliseconds */
  readonly timeout: number;
  /** Attempts per lookup, first try included */
  readonly maxRetries: number;
  readonly delimiter: string;
  readonly encoding: BufferEncoding;
  /** Rows between progress lines */
  readonly progressInterval: number;

  // Runtime overrides (from CLI flags)
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output as JSON lines */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

const positiveInt = z.number().int().positive();

/**
 * Config file structure (YAML), snake_case keys
 */
const ConfigFileSchema = z
  .object({
    version: z.literal(1).optional(),
    provider: z.enum(PROVIDER_IDS).optional(),
    providers: z
      .object({
        nominatim: z
          .object({
            base_url: z.string().url().optional(),
            user_agent: z.string().min(1).optional(),
            email: z.string().email().optional(),
          })
          .strict()
          .optional(),
        google: z
          .object({
            base_url: z.string().url().optional(),
            api_key: z.string().min(1).optional(),
          })
          .strict()
          .optional(),
        mapbox: z
          .object({
            base_url: z.string().url().optional(),
            access_token: z.string().min(1).optional(),
          })
          .strict()
          .optional(),
      })
      .strict()
      .optional(),
    defaults: z
      .object({
        chunk_size: positiveInt.optional(),
        timeout: positiveInt.optional(),
        max_retries: positiveInt.optional(),
        delimiter: z.string().min(1).optional(),
        encoding: z.string().optional(),
        progress_interval: positiveInt.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,
  provider: 'nominatim',
  providers: {
    nominatim: {},
    google: {},
    mapbox: {},
  },
  chunkSize: DEFAULT_CHUNK_SIZE,
  timeout: DEFAULT_TIMEOUT_MS,
  maxRetries: DEFAULT_RETRY_CONFIG.maxAttempts,
  delimiter: DEFAULT_CSV_FORMAT.delimiter,
  encoding: DEFAULT_CSV_FORMAT.encoding,
  progressInterval: DEFAULT_PROGRESS_INTERVAL,
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.bulk-geocoderrc',
  '.bulk-geocoderrc.yaml',
  '.bulk-geocoderrc.yml',
  '.bulk-geocoderrc.json',
];

const ENV_PREFIX = 'BULK_GEOCODER_';

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }

    const parent = resolve(dir, '..');
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Parse and validate config file content
 *
 * @throws {ConfigurationError}
 */
function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    // YAML is a superset of JSON, so .json files parse the same way
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read config file ${filePath}: ${toError(error).message}`,
      { cause: error }
    );
  }

  // An empty file parses to null
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid config file ${filePath}: ${issues}`);
  }

  return result.data;
}

/**
 * Environment reader bound to one environment
 */
class EnvReader {
  constructor(private readonly env: NodeJS.ProcessEnv) {}

  /** Variable with the tool prefix */
  get(name: string): string | undefined {
    return this.raw(`${ENV_PREFIX}${name}`);
  }

  /** Variable by its full name */
  raw(name: string): string | undefined {
    const value = this.env[name];
    return value === undefined || value === '' ? undefined : value;
  }

  bool(name: string): boolean | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;
    return value.toLowerCase() === 'true' || value === '1';
  }

  /**
   * @throws {ConfigurationError} for a value that is not a positive integer
   */
  positiveInt(name: string): number | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;
    const num = Number(value);
    if (!Number.isInteger(num) || num < 1) {
      throw new ConfigurationError(`${ENV_PREFIX}${name} must be a positive integer, got "${value}"`);
    }
    return num;
  }
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory the config file search starts in (default: cwd) */
  readonly cwd?: string;
  /** Environment (default: process.env) */
  readonly env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  readonly overrides?: {
    readonly provider?: string;
    readonly apiKey?: string;
    readonly chunkSize?: number;
    readonly timeout?: number;
    readonly maxRetries?: number;
    readonly delimiter?: string;
    readonly userAgent?: string;
    readonly email?: string;
    readonly verbose?: boolean;
    readonly json?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws {ConfigurationError} for a missing or invalid config file, or an
 *   invalid value in any layer
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const env = new EnvReader(options.env ?? process.env);
  const overrides = options.overrides ?? {};

  // Find config file
  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? env.get('CONFIG');
  if (explicitPath) {
    configPath = resolve(options.cwd ?? process.cwd(), explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(options.cwd ?? process.cwd());
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const providerName = overrides.provider ?? env.get('PROVIDER') ?? fileConfig.provider;
  const provider = parseProvider(providerName);

  const files = fileConfig.providers;
  const defaults = fileConfig.defaults;

  // --api-key applies to whichever provider is active
  const sharedKey = overrides.apiKey ?? env.get('API_KEY');

  const encoding = env.get('ENCODING') ?? defaults?.encoding ?? DEFAULT_CONFIG.encoding;
  if (!Buffer.isEncoding(encoding)) {
    throw new ConfigurationError(`Unsupported encoding: ${encoding}`);
  }

  const config: CLIConfig = {
    version: 1,
    provider,

    providers: {
      nominatim: {
        baseUrl: env.get('NOMINATIM_URL') ?? files?.nominatim?.base_url,
        userAgent:
          overrides.userAgent ?? env.get('USER_AGENT') ?? files?.nominatim?.user_agent,
        email: overrides.email ?? env.get('EMAIL') ?? files?.nominatim?.email,
      },
      google: {
        baseUrl: env.get('GOOGLE_URL') ?? files?.google?.base_url,
        apiKey:
          (provider === 'google' ? sharedKey : undefined) ??
          env.raw('GOOGLE_MAPS_API_KEY') ??
          files?.google?.api_key,
      },
      mapbox: {
        baseUrl: env.get('MAPBOX_URL') ?? files?.mapbox?.base_url,
        accessToken:
          (provider === 'mapbox' ? sharedKey : undefined) ??
          env.raw('MAPBOX_ACCESS_TOKEN') ??
          files?.mapbox?.access_token,
      },
    },

    chunkSize:
      overrides.chunkSize ??
      env.positiveInt('CHUNK_SIZE') ??
      defaults?.chunk_size ??
      DEFAULT_CONFIG.chunkSize,
    timeout:
      overrides.timeout ?? env.positiveInt('TIMEOUT') ?? defaults?.timeout ?? DEFAULT_CONFIG.timeout,
    maxRetries:
      overrides.maxRetries ??
      env.positiveInt('MAX_RETRIES') ??
      defaults?.max_retries ??
      DEFAULT_CONFIG.maxRetries,
    delimiter:
      overrides.delimiter ?? env.get('DELIMITER') ?? defaults?.delimiter ?? DEFAULT_CONFIG.delimiter,
    encoding,
    progressInterval:
      env.positiveInt('PROGRESS_INTERVAL') ??
      defaults?.progress_interval ??
      DEFAULT_CONFIG.progressInterval,

    // Runtime flags
    verbose: overrides.verbose ?? env.bool('VERBOSE') ?? false,
    json: overrides.json ?? env.bool('JSON') ?? false,
    configPath,
  };

  validateConfig(config);
  return config;
}

function parseProvider(name: string | undefined): ProviderId {
  if (name === undefined) {
    return DEFAULT_CONFIG.provider;
  }
  const normalized = name.toLowerCase();
  const match = PROVIDER_IDS.find((id) => id === normalized);
  if (match === undefined) {
    throw new ConfigurationError(
      `Unknown provider "${name}". Must be one of: ${PROVIDER_IDS.join(', ')}`
    );
  }
  return match;
}

/**
 * Validate configuration
 *
 * @throws {ConfigurationError} if configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  const integers: ReadonlyArray<readonly [string, number]> = [
    ['Chunk size', config.chunkSize],
    ['Timeout', config.timeout],
    ['Max retries', config.maxRetries],
    ['Progress interval', config.progressInterval],
  ];
  for (const [label, value] of integers) {
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigurationError(`${label} must be a positive integer, got ${value}`);
    }
  }

  if (config.delimiter.length === 0) {
    throw new ConfigurationError('Delimiter must not be empty');
  }
}

/**
 * Provider config for the active provider
 */
export function toProviderConfig(config: CLIConfig): ProviderConfig {
  switch (config.provider) {
    case 'nominatim':
      return { id: 'nominatim', ...config.providers.nominatim };
    case 'google':
      return { id: 'google', ...config.providers.google };
    case 'mapbox':
      return { id: 'mapbox', ...config.providers.mapbox };
  }
}
