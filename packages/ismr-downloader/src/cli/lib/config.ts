/**
 * ismr-downloader CLI Configuration Management
 *
 * Loads configuration from .ismrrc (YAML) with environment variable
 * overrides and defaults, then validates the merged result.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (ISMR_*), including those loaded from .env
 * 3. Config file (.ismrrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../../core/errors.js';
import { createRequestSpec } from '../../core/request-spec.js';
import { DATA_TYPES, type RequestSpec } from '../../core/types.js';
import { RESPONSE_MODES } from '../../acquisition/ismr-api-client.js';
import { DEFAULT_RETRY_POLICY } from '../../resilience/retry-policy.js';

// ============================================================================
// Schema
// ============================================================================

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off', '']);

/** Accepts booleans and the usual environment spellings */
const booleanish = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return value;
}, z.boolean());

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

/** Comma-separated string or list */
const stationList = z.preprocess(
  (value) => (typeof value === 'string' ? value.split(',') : value),
  z.array(z.string().trim()).transform((stations) => stations.filter((station) => station !== ''))
);

const optionalText = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().optional()
);

const RetrySchema = z.object({
  throttled: z.object({
    maxRetries: nonNegativeInt,
    initialDelayMs: nonNegativeInt,
    backoffMultiplier: z.coerce.number().min(1),
    maxDelayMs: nonNegativeInt,
    jitterFactor: z.coerce.number().min(0).max(1),
  }),
  timedOut: z.object({
    maxRetries: nonNegativeInt,
    delayMs: nonNegativeInt,
  }),
  maxTokenRefreshes: nonNegativeInt,
});

const ConfigSchema = z.object({
  apiBaseUrl: z.string().url(),
  mode: z.enum(RESPONSE_MODES),
  requestTimeoutMs: positiveInt,
  downloadTimeoutMs: positiveInt,
  insecureTls: booleanish,

  email: optionalText,
  password: optionalText,

  stations: stationList,
  dataType: z.enum(DATA_TYPES),
  start: optionalText,
  end: optionalText,
  maxDays: positiveInt,
  maxWorkers: positiveInt,
  maxRequestsPerMinute: positiveInt,
  overwrite: booleanish,

  outputDir: z.string().trim().min(1),
  logsDir: z.string().trim().min(1),
  tokenCache: z.string().trim().min(1),
  tokenExpirySkewMs: nonNegativeInt,
  forceAuth: booleanish,

  reauthAfterConsecutiveErrors: nonNegativeInt,
  retry: RetrySchema,

  verbose: booleanish,
  json: booleanish,
});

/**
 * Full CLI configuration
 */
export type DownloaderConfig = z.infer<typeof ConfigSchema> & {
  /** Resolved config file path */
  readonly configPath: string | null;
};

/**
 * Config file structure (YAML). Leaves are validated after merging.
 */
const ConfigFileSchema = z
  .object({
    api: z
      .object({
        base_url: z.unknown(),
        mode: z.unknown(),
        timeout_ms: z.unknown(),
        download_timeout_ms: z.unknown(),
        insecure_tls: z.unknown(),
      })
      .partial(),
    credentials: z.object({ email: z.unknown(), password: z.unknown() }).partial(),
    stations: z.unknown(),
    data_type: z.unknown(),
    start: z.unknown(),
    end: z.unknown(),
    max_days: z.unknown(),
    max_workers: z.unknown(),
    max_requests_per_minute: z.unknown(),
    overwrite: z.unknown(),
    output_dir: z.unknown(),
    logs_dir: z.unknown(),
    token_cache: z.unknown(),
    token_expiry_skew_ms: z.unknown(),
    reauth_after_consecutive_errors: z.unknown(),
    retry: z
      .object({
        throttled: z
          .object({
            max_retries: z.unknown(),
            initial_delay_ms: z.unknown(),
            backoff_multiplier: z.unknown(),
            max_delay_ms: z.unknown(),
            jitter_factor: z.unknown(),
          })
          .partial(),
        timed_out: z.object({ max_retries: z.unknown(), delay_ms: z.unknown() }).partial(),
        max_token_refreshes: z.unknown(),
      })
      .partial(),
  })
  .partial();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Omit<
  DownloaderConfig,
  'configPath' | 'email' | 'password' | 'start' | 'end'
> = {
  apiBaseUrl: 'https://api-ismrquerytool.fct.unesp.br/api/v1',
  mode: 'bundle',
  requestTimeoutMs: 30000,
  downloadTimeoutMs: 120000,
  insecureTls: false,
  stations: [],
  dataType: 'ismr',
  maxDays: 62,
  maxWorkers: 5,
  maxRequestsPerMinute: 30,
  overwrite: false,
  outputDir: 'downloads',
  logsDir: 'logs',
  tokenCache: '.ismr-token.json',
  tokenExpirySkewMs: 60000,
  forceAuth: false,
  reauthAfterConsecutiveErrors: 3,
  retry: DEFAULT_RETRY_POLICY,
  verbose: false,
  json: false,
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = ['.ismrrc', '.ismrrc.yaml', '.ismrrc.yml', '.ismrrc.json'];

/**
 * Find config file in the start directory or its parents
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }

    const parent = resolve(dir, '..');
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse config file content (YAML also covers JSON)
 */
function parseConfigFile(filePath: string): ConfigFile {
  let content: unknown;
  try {
    content = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read config file: ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  // An empty file parses to null
  if (content === null || content === undefined) {
    return {};
  }

  const parsed = ConfigFileSchema.safeParse(content);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file: ${filePath}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * CLI flag overrides (commander option values)
 */
export interface ConfigOverrides {
  readonly baseUrl?: string;
  readonly mode?: string;
  readonly timeoutMs?: string | number;
  readonly downloadTimeoutMs?: string | number;
  readonly insecure?: boolean;
  readonly stations?: string | readonly string[];
  readonly dataType?: string;
  readonly start?: string;
  readonly end?: string;
  readonly maxDays?: string | number;
  readonly maxWorkers?: string | number;
  readonly maxRequestsPerMinute?: string | number;
  readonly overwrite?: boolean;
  readonly outputDir?: string;
  readonly logsDir?: string;
  readonly tokenCache?: string;
  readonly forceAuth?: boolean;
  readonly verbose?: boolean;
  readonly json?: boolean;
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  readonly overrides?: ConfigOverrides;

  /** Defaults to process.env */
  readonly env?: NodeJS.ProcessEnv;

  /** Where the config file search starts (default: process.cwd()) */
  readonly cwd?: string;
}

/**
 * Load, merge and validate configuration from all sources
 *
 * @throws {ConfigError} If the config file is missing or unreadable, or any
 *   merged value is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): DownloaderConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const getEnvVar = (name: string): string | undefined => env[`ISMR_${name}`];

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? getEnvVar('CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const o = options.overrides ?? {};
  const api = fileConfig.api ?? {};
  const credentials = fileConfig.credentials ?? {};
  const retry = fileConfig.retry ?? {};
  const throttled = retry.throttled ?? {};
  const timedOut = retry.timed_out ?? {};
  const defaults = DEFAULT_CONFIG;

  // Merge configuration layers
  const merged = {
    apiBaseUrl: o.baseUrl ?? getEnvVar('API_BASE_URL') ?? api.base_url ?? defaults.apiBaseUrl,
    mode: o.mode ?? getEnvVar('RESPONSE_MODE') ?? api.mode ?? defaults.mode,
    requestTimeoutMs:
      o.timeoutMs ?? getEnvVar('TIMEOUT_MS') ?? api.timeout_ms ?? defaults.requestTimeoutMs,
    downloadTimeoutMs:
      o.downloadTimeoutMs ??
      getEnvVar('DOWNLOAD_TIMEOUT_MS') ??
      api.download_timeout_ms ??
      defaults.downloadTimeoutMs,
    insecureTls:
      o.insecure ?? getEnvVar('INSECURE_TLS') ?? api.insecure_tls ?? defaults.insecureTls,

    email: getEnvVar('EMAIL') ?? credentials.email,
    password: getEnvVar('PASSWORD') ?? credentials.password,

    stations: o.stations ?? getEnvVar('STATIONS') ?? fileConfig.stations ?? defaults.stations,
    dataType: o.dataType ?? getEnvVar('DATA_TYPE') ?? fileConfig.data_type ?? defaults.dataType,
    start: o.start ?? getEnvVar('START') ?? fileConfig.start,
    end: o.end ?? getEnvVar('END') ?? fileConfig.end,
    maxDays: o.maxDays ?? getEnvVar('MAX_DAYS') ?? fileConfig.max_days ?? defaults.maxDays,
    maxWorkers:
      o.maxWorkers ?? getEnvVar('MAX_WORKERS') ?? fileConfig.max_workers ?? defaults.maxWorkers,
    maxRequestsPerMinute:
      o.maxRequestsPerMinute ??
      getEnvVar('MAX_REQUESTS_PER_MINUTE') ??
      fileConfig.max_requests_per_minute ??
      defaults.maxRequestsPerMinute,
    overwrite: o.overwrite ?? getEnvVar('OVERWRITE') ?? fileConfig.overwrite ?? defaults.overwrite,

    outputDir:
      o.outputDir ?? getEnvVar('OUTPUT_DIR') ?? fileConfig.output_dir ?? defaults.outputDir,
    logsDir: o.logsDir ?? getEnvVar('LOGS_DIR') ?? fileConfig.logs_dir ?? defaults.logsDir,
    tokenCache:
      o.tokenCache ?? getEnvVar('TOKEN_CACHE') ?? fileConfig.token_cache ?? defaults.tokenCache,
    tokenExpirySkewMs: fileConfig.token_expiry_skew_ms ?? defaults.tokenExpirySkewMs,
    forceAuth: o.forceAuth ?? getEnvVar('FORCE_AUTH') ?? defaults.forceAuth,

    reauthAfterConsecutiveErrors:
      getEnvVar('REAUTH_AFTER_CONSECUTIVE_ERRORS') ??
      fileConfig.reauth_after_consecutive_errors ??
      defaults.reauthAfterConsecutiveErrors,
    retry: {
      throttled: {
        maxRetries: throttled.max_retries ?? defaults.retry.throttled.maxRetries,
        initialDelayMs: throttled.initial_delay_ms ?? defaults.retry.throttled.initialDelayMs,
        backoffMultiplier:
          throttled.backoff_multiplier ?? defaults.retry.throttled.backoffMultiplier,
        maxDelayMs: throttled.max_delay_ms ?? defaults.retry.throttled.maxDelayMs,
        jitterFactor: throttled.jitter_factor ?? defaults.retry.throttled.jitterFactor,
      },
      timedOut: {
        maxRetries: timedOut.max_retries ?? defaults.retry.timedOut.maxRetries,
        delayMs: timedOut.delay_ms ?? defaults.retry.timedOut.delayMs,
      },
      maxTokenRefreshes: retry.max_token_refreshes ?? defaults.retry.maxTokenRefreshes,
    },

    verbose: o.verbose ?? getEnvVar('VERBOSE') ?? defaults.verbose,
    json: o.json ?? getEnvVar('JSON') ?? defaults.json,
  };

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', formatIssues(parsed.error));
  }

  return { ...parsed.data, configPath };
}

// ============================================================================
// Derived Settings
// ============================================================================

/**
 * Credentials for commands that talk to the API
 *
 * @throws {ConfigError} If either value is missing
 */
export function requireCredentials(config: DownloaderConfig): {
  readonly email: string;
  readonly password: string;
} {
  const { email, password } = config;
  if (email === undefined || password === undefined) {
    const issues: string[] = [];
    if (email === undefined) issues.push('ISMR_EMAIL is not set');
    if (password === undefined) issues.push('ISMR_PASSWORD is not set');
    throw new ConfigError('Missing credentials', issues);
  }
  return { email, password };
}

/**
 * Build the validated request from configuration
 *
 * @throws {ConfigError} If start or end is missing, or a field is invalid
 * @throws {InvalidRangeError} If the range cannot be parsed or is empty
 */
export function toRequestSpec(config: DownloaderConfig): RequestSpec {
  const { start, end } = config;
  if (start === undefined || end === undefined) {
    const issues: string[] = [];
    if (start === undefined) issues.push('start: required (--start or ISMR_START)');
    if (end === undefined) issues.push('end: required (--end or ISMR_END)');
    throw new ConfigError('Missing time range', issues);
  }

  return createRequestSpec({
    stations: config.stations,
    dataType: config.dataType,
    start,
    end,
    maxDays: config.maxDays,
    maxWorkers: config.maxWorkers,
    maxRequestsPerMinute: config.maxRequestsPerMinute,
    overwrite: config.overwrite,
    outputDir: config.outputDir,
  });
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
