/**
 * Centralized configuration for the health warehouse pipeline.
 *
 * This file extracts all configurable values from the codebase into a single location.
 * Values can be overridden via environment variables where noted.
 *
 * Configuration categories:
 * - Transform: Timezone, merge gap and midnight policy defaults
 * - Server: HTTP server settings (port, host, body limits)
 * - Request: Request timeout
 * - Auth: Write token header and format
 * - Retry: Retry logic for warehouse uploads
 * - Warehouse: File warehouse location, tables and locking
 *
 * `loadPipelineConfig` builds the immutable PipelineConfig passed to every
 * transform call from these defaults, an optional YAML file and the environment.
 */

import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { ConfigError } from './errors';
import { METRIC_DEFINITIONS } from './transform/metricTable';
import { isKnownUnit, listUnits } from './transform/units';
import { isMetricType } from './types';
import { isDateKey, isValidTimezone } from './utils/dateUtilities';
import { PipelineConfigFileSchema } from './validation/schemas';

import type { MetricType, MidnightPolicy, PipelineConfig } from './types';
import type { TransformOptions } from './validation/schemas';

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

type Env = Record<string, string | undefined>;

/**
 * Safely parse an integer from an environment variable.
 * Throws a descriptive error if the value is not a valid number.
 *
 * @param value - The raw environment variable value (or undefined)
 * @param defaultValue - Default value if env var is not set
 * @param variableName - Name of the environment variable (for error messages)
 * @throws ConfigError if value is set but not a valid integer
 */
function parseIntSafe(
  value: string | undefined,
  defaultValue: number,
  variableName: string,
): number {
  if (!value) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || String(parsed) !== value.trim()) {
    throw new ConfigError(`Invalid ${variableName}: "${value}" is not a valid integer`);
  }
  return parsed;
}

function parseMidnightPolicy(value: string | undefined, defaultValue: MidnightPolicy): MidnightPolicy {
  if (!value) return defaultValue;
  if (value === 'start-day' || value === 'split') return value;
  throw new ConfigError(`Invalid MIDNIGHT_POLICY: "${value}" (expected "start-day" or "split")`);
}

// =============================================================================
// TRANSFORM CONFIGURATION
// =============================================================================

const DEFAULT_MIDNIGHT_POLICY: MidnightPolicy = 'start-day';

export const TransformDefaults = {
  /**
   * Timezone whose calendar days are the aggregation key.
   * @env LOCAL_TIMEZONE
   * @default 'UTC'
   */
  localTimezone: 'UTC',

  /**
   * Maximum gap between consecutive workout records of one session.
   * @env MERGE_GAP_SECONDS
   * @default 300 (5 minutes)
   */
  mergeGapSeconds: 300,

  /**
   * Attribution of records crossing local midnight.
   * @env MIDNIGHT_POLICY
   * @default 'start-day'
   */
  midnightPolicy: DEFAULT_MIDNIGHT_POLICY,
} as const;

// =============================================================================
// SERVER CONFIGURATION
// =============================================================================

export const ServerConfig = {
  /**
   * Server port.
   * @env PORT
   * @default 3001
   */
  port: parseIntSafe(process.env.PORT, 3001, 'PORT'),

  /**
   * Server bind address.
   * Use '0.0.0.0' to listen on all interfaces.
   * @default '0.0.0.0'
   */
  host: '0.0.0.0',

  /**
   * Maximum request body size for JSON payloads.
   * A full export can hold hundreds of thousands of records.
   * @default '50mb'
   */
  bodyLimit: '50mb',

  /**
   * Graceful shutdown timeout in milliseconds.
   * @default 10000 (10 seconds)
   */
  shutdownTimeoutMs: 10_000,
} as const;

// =============================================================================
// REQUEST CONFIGURATION
// =============================================================================

export const RequestConfig = {
  /**
   * Maximum request processing time in milliseconds.
   * Requests exceeding this will receive a 408 timeout response.
   * @default 120000 (2 minutes)
   */
  timeoutMs: 120_000,
} as const;

// =============================================================================
// AUTHENTICATION CONFIGURATION
// =============================================================================

export const AuthConfig = {
  /**
   * Required prefix for API tokens.
   * @default 'sk-'
   */
  tokenPrefix: 'sk-',

  /**
   * HTTP header name for the API token.
   * @default 'api-key'
   */
  headerName: 'api-key',

  /**
   * Environment variable name for the write token.
   * @default 'WRITE_TOKEN'
   */
  tokenEnvVar: 'WRITE_TOKEN',
} as const;

// =============================================================================
// RETRY CONFIGURATION
// =============================================================================

export const RetryConfig = {
  /**
   * Maximum attempts for one warehouse upload.
   * @env LOAD_MAX_RETRIES
   * @default 3
   */
  maxRetries: parseIntSafe(process.env.LOAD_MAX_RETRIES, 3, 'LOAD_MAX_RETRIES'),

  /**
   * Base delay for exponential backoff in milliseconds.
   * Actual delay = baseDelayMs * 2^attemptNumber.
   * @default 1000
   */
  baseDelayMs: 1000,
} as const;

// =============================================================================
// WAREHOUSE CONFIGURATION
// =============================================================================

export const WarehouseConfig = {
  /**
   * Directory of the file warehouse.
   * @env DATA_DIR
   * @default './data'
   */
  dataDir: process.env.DATA_DIR ?? './data',

  /**
   * Table names, one JSON file each.
   */
  tables: {
    dailyMetrics: 'daily_metrics',
    vo2Max: 'vo2_max',
    workoutDaily: 'workout_daily',
    workoutSessions: 'workout_sessions',
  },

  /**
   * Delay between lock acquisition retry attempts in milliseconds.
   * @default 50
   */
  lockRetryDelayMs: 50,

  /**
   * Maximum number of lock acquisition attempts.
   * @default 100
   */
  lockMaxRetries: 100,

  /**
   * Time in milliseconds before a lock is considered stale.
   * @default 30000 (30 seconds)
   */
  lockStaleMs: 30_000,
} as const;

export type TableName = (typeof WarehouseConfig.tables)[keyof typeof WarehouseConfig.tables];

// =============================================================================
// HTTP STATUS CODES
// =============================================================================

export const HttpStatus = {
  BAD_REQUEST: 400,
  INTERNAL_SERVER_ERROR: 500,
  MULTI_STATUS: 207,
  OK: 200,
  REQUEST_TIMEOUT: 408,
  UNAUTHORIZED: 401,
} as const;

// =============================================================================
// PIPELINE CONFIGURATION
// =============================================================================

export interface LoadPipelineConfigOptions {
  env?: Env;
  path?: string;
}

/**
 * Build the pipeline configuration.
 * Precedence, highest first: environment, YAML file, defaults.
 *
 * @throws ConfigError if the file is unreadable or any value is invalid
 */
export async function loadPipelineConfig(
  options: LoadPipelineConfigOptions = {},
): Promise<PipelineConfig> {
  const { env = process.env, path } = options;
  let fileContent: unknown = {};

  if (path) {
    try {
      fileContent = parseYaml(await readFile(path, 'utf8')) ?? {};
    } catch (error) {
      throw new ConfigError(`Failed to read configuration file ${path}`, { cause: error });
    }
  }

  const parsed = PipelineConfigFileSchema.safeParse(fileContent);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration file ${path ?? ''}: ${details}`);
  }
  const file = parsed.data;

  return createPipelineConfig({
    canonicalUnits: file.canonicalUnits,
    localTimezone: env.LOCAL_TIMEZONE ?? file.localTimezone ?? TransformDefaults.localTimezone,
    mergeGapSeconds: parseIntSafe(
      env.MERGE_GAP_SECONDS,
      file.mergeGapSeconds ?? TransformDefaults.mergeGapSeconds,
      'MERGE_GAP_SECONDS',
    ),
    midnightPolicy: parseMidnightPolicy(
      env.MIDNIGHT_POLICY,
      file.midnightPolicy ?? TransformDefaults.midnightPolicy,
    ),
    since: env.SINCE_DATE ?? file.since,
  });
}

/**
 * Validate and freeze a pipeline configuration.
 *
 * @throws ConfigError for an unknown timezone, a negative merge gap, a
 * malformed `since` date or a unit override outside the metric's dimension
 */
export function createPipelineConfig(
  values: Partial<PipelineConfig> = {},
): Readonly<PipelineConfig> {
  const config: PipelineConfig = {
    canonicalUnits: Object.freeze(validateCanonicalUnits(values.canonicalUnits ?? {})),
    localTimezone: values.localTimezone ?? TransformDefaults.localTimezone,
    mergeGapSeconds: values.mergeGapSeconds ?? TransformDefaults.mergeGapSeconds,
    midnightPolicy: values.midnightPolicy ?? TransformDefaults.midnightPolicy,
    ...(values.since ? { since: values.since } : {}),
  };

  if (!isValidTimezone(config.localTimezone)) {
    throw new ConfigError(`Unknown timezone "${config.localTimezone}"`);
  }
  if (!Number.isFinite(config.mergeGapSeconds) || config.mergeGapSeconds < 0) {
    throw new ConfigError(`mergeGapSeconds must be a non-negative number, got ${String(config.mergeGapSeconds)}`);
  }
  if (config.since !== undefined && !isDateKey(config.since)) {
    throw new ConfigError(`since must be YYYY-MM-DD, got "${config.since}"`);
  }

  return Object.freeze(config);
}

/**
 * Apply per-run options on top of a base configuration.
 */
export function withOptions(
  base: PipelineConfig,
  options: TransformOptions | undefined,
): Readonly<PipelineConfig> {
  if (!options) return base;
  return createPipelineConfig({
    ...base,
    ...(options.localTimezone ? { localTimezone: options.localTimezone } : {}),
    ...(options.mergeGapSeconds === undefined ? {} : { mergeGapSeconds: options.mergeGapSeconds }),
    ...(options.midnightPolicy ? { midnightPolicy: options.midnightPolicy } : {}),
    ...(options.since ? { since: options.since } : {}),
  });
}

/**
 * Check canonical unit overrides: known metric types, units of the metric's dimension.
 */
function validateCanonicalUnits(
  overrides: Readonly<Record<string, string | undefined>>,
): Partial<Record<MetricType, string>> {
  const result: Partial<Record<MetricType, string>> = {};

  for (const [metricType, unit] of Object.entries(overrides)) {
    if (unit === undefined) continue;
    if (!isMetricType(metricType)) {
      throw new ConfigError(`canonicalUnits: unknown metric type "${metricType}"`);
    }
    const { dimension } = METRIC_DEFINITIONS[metricType];
    if (!isKnownUnit(dimension, unit)) {
      throw new ConfigError(
        `canonicalUnits.${metricType}: "${unit}" is not a ${dimension} unit (expected one of ${listUnits(dimension).join(', ')})`,
      );
    }
    result[metricType] = unit;
  }

  return result;
}
