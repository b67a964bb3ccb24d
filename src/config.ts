/**
 * Centralized configuration for the health export tabulator.
 *
 * Values can be overridden via environment variables where noted.
 *
 * Configuration categories:
 * - Pipeline: Lookback window for the extraction pipeline
 * - Export: Apple Health identifiers and the output table layout
 * - Server: HTTP server settings (port, host, body limits)
 * - Auth: Authentication settings (token format, headers)
 * - CORS: Cross-origin resource sharing
 */

import { RecordType } from './types';

import type { EventKind, TableColumn } from './types';

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Safely parse an integer from an environment variable.
 * Throws a descriptive error if the value is not a valid number.
 *
 * @param value - The raw environment variable value (or undefined)
 * @param defaultValue - Default value if env var is not set
 * @param variableName - Name of the environment variable (for error messages)
 * @throws TypeError if value is set but not a valid integer
 */
export function parseIntSafe(
  value: string | undefined,
  defaultValue: number,
  variableName: string,
): number {
  if (!value) return defaultValue;
  if (!/^-?\d+$/.test(value.trim())) {
    throw new TypeError(`Invalid ${variableName}: "${value}" is not a valid integer`);
  }
  return Number.parseInt(value, 10);
}

// =============================================================================
// PIPELINE CONFIGURATION
// =============================================================================

export const PipelineConfig = {
  /**
   * Number of days to look back from the reference time.
   * Events starting before `now - daysBack` are ignored.
   * @env DAYS_BACK
   * @default 30
   */
  daysBack: parseIntSafe(process.env.DAYS_BACK, 30, 'DAYS_BACK'),
} as const;

// =============================================================================
// EXPORT CONFIGURATION
// =============================================================================

export const ExportConfig = {
  /**
   * Output CSV file name used when none is given.
   * @default 'health_data_export.csv'
   */
  defaultOutputFile: 'health_data_export.csv',

  /**
   * Archive entry suffix of the export document inside export.zip.
   */
  exportEntrySuffix: 'export.xml',

  /**
   * Apple Health record type for each handled event kind.
   */
  recordTypes: {
    HRV: RecordType.HEART_RATE_VARIABILITY,
    HeartRate: RecordType.HEART_RATE,
    RestingHeartRate: RecordType.RESTING_HEART_RATE,
    SleepStage: RecordType.SLEEP_ANALYSIS,
  } satisfies Record<EventKind, RecordType>,

  /**
   * Source name used when a record carries no `sourceName`.
   */
  unknownSource: 'Unknown',

  /**
   * Prefix Apple puts in front of every sleep analysis value.
   */
  sleepValuePrefix: 'HKCategoryValueSleepAnalysis',

  /**
   * Column order of the output table.
   */
  columns: [
    'date',
    'bedtime',
    'wake_time',
    'time_in_bed_hours',
    'total_sleep_hours',
    'awake_minutes',
    'core_sleep_hours',
    'deep_sleep_hours',
    'rem_sleep_hours',
    'hr_avg',
    'hr_min',
    'hr_max',
    'hr_measurements',
    'resting_hr',
    'hrv_sdnn',
  ] as const satisfies readonly TableColumn[],
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
   * @default '0.0.0.0'
   */
  host: '0.0.0.0',

  /**
   * Maximum request body size for JSON payloads.
   * A month of heart rate samples runs to tens of thousands of events.
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
   * Environment variable name for the API token.
   * @default 'API_TOKEN'
   */
  tokenEnvVar: 'API_TOKEN',
} as const;

// =============================================================================
// CORS CONFIGURATION
// =============================================================================

export const CorsConfig = {
  allowedHeaders: ['Content-Type', 'Authorization', 'api-key'],
  allowedMethods: ['GET', 'POST', 'OPTIONS'],

  /**
   * Environment variable name for CORS origins (comma-separated).
   * If not set or set to '*', allows all origins.
   * @env CORS_ORIGINS
   */
  originsEnvVar: 'CORS_ORIGINS',
} as const;

// =============================================================================
// HTTP STATUS CODES
// =============================================================================

export const HttpStatus = {
  BAD_REQUEST: 400,
  INTERNAL_SERVER_ERROR: 500,
  NOT_FOUND: 404,
  OK: 200,
  UNAUTHORIZED: 401,
} as const;

// =============================================================================
// COMBINED EXPORT
// =============================================================================

export const config = {
  auth: AuthConfig,
  cors: CorsConfig,
  export: ExportConfig,
  httpStatus: HttpStatus,
  pipeline: PipelineConfig,
  server: ServerConfig,
} as const;

export default config;
