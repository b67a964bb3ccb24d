/**
 * Debug logging utilities for troubleshooting data flow.
 * Enabled via DEBUG_LOGGING=true environment variable.
 *
 * Categories:
 * - REQUEST: Incoming export requests
 * - RESPONSE: Outgoing response summaries
 * - VALIDATION: Zod schema validation details
 * - TRANSFORM: Extraction and aggregation steps
 * - STORAGE: File writes
 * - DATA_VALIDATION: Per-record data quality issues (invalid dates, bad values, unknown stages)
 */

import type { LogContext, Logger } from './logger';

export type DataValidationIssue =
  | 'INVALID_DATE'
  | 'INVALID_VALUE'
  | 'OUTSIDE_WINDOW'
  | 'UNKNOWN_SLEEP_STAGE';

export type DebugCategory =
  | 'DATA_VALIDATION'
  | 'REQUEST'
  | 'RESPONSE'
  | 'STORAGE'
  | 'TRANSFORM'
  | 'VALIDATION';

/**
 * Per-run tally of how input records were handled.
 * `outsideWindow` records are excluded on purpose and do not count as skipped.
 */
export interface ValidationStats {
  invalidDates: number;
  invalidValues: number;
  outsideWindow: number;
  processedRecords: number;
  skippedRecords: number;
  unknownStages: number;
}

/**
 * Check if debug logging is enabled.
 */
export function isDebugEnabled(): boolean {
  return process.env.DEBUG_LOGGING === 'true';
}

/**
 * Core debug logging function.
 * Only logs if DEBUG_LOGGING is enabled.
 */
export function debugLog(
  logger: Logger,
  category: DebugCategory,
  message: string,
  data?: unknown,
): void {
  if (!isDebugEnabled()) return;

  const context: LogContext = {
    debugCategory: category,
  };

  if (data !== undefined) {
    context.data = data;
  }

  logger.debug(`[DEBUG:${category}] ${message}`, context);
}

/**
 * Log a record dropped because one of its timestamps did not parse.
 * Logger is optional so the pipeline can run without one.
 */
export function debugInvalidDate(
  logger: Logger | undefined,
  rawValue: unknown,
  context: string,
): void {
  if (!isDebugEnabled() || !logger) return;

  debugLog(logger, 'DATA_VALIDATION', 'Invalid date detected', {
    action: 'skipped',
    context,
    issue: 'INVALID_DATE' satisfies DataValidationIssue,
    rawData: rawValue,
  });
}

/**
 * Log a measurement dropped because its value is missing or not a number.
 */
export function debugInvalidValue(
  logger: Logger | undefined,
  metricKind: string,
  rawValue: unknown,
): void {
  if (!isDebugEnabled() || !logger) return;

  debugLog(logger, 'DATA_VALIDATION', 'Non-numeric measurement value', {
    action: 'skipped',
    issue: 'INVALID_VALUE' satisfies DataValidationIssue,
    metricKind,
    rawValue,
  });
}

/**
 * Log an unrecognized sleep stage label.
 * The session is kept under the Unknown stage.
 */
export function debugUnknownSleepStage(
  logger: Logger | undefined,
  value: unknown,
  validValues: readonly string[],
): void {
  if (!isDebugEnabled() || !logger) return;

  debugLog(logger, 'DATA_VALIDATION', 'Unknown sleep stage', {
    action: 'kept_as_unknown',
    issue: 'UNKNOWN_SLEEP_STAGE' satisfies DataValidationIssue,
    validValues,
    value,
  });
}

/**
 * Log the lookback window applied to a run.
 */
export function debugWindow(
  logger: Logger | undefined,
  windowStart: Date,
  details: { inputCount: number; outsideCount: number },
): void {
  if (!isDebugEnabled() || !logger) return;

  debugLog(logger, 'TRANSFORM', 'Lookback window applied', {
    issue: 'OUTSIDE_WINDOW' satisfies DataValidationIssue,
    windowStart: windowStart.toISOString(),
    ...details,
  });
}

/**
 * Log aggregation input and output sizes with the first output item as a sample.
 */
export function debugAggregation(
  logger: Logger | undefined,
  stage: string,
  input: readonly unknown[],
  output: readonly unknown[],
): void {
  if (!isDebugEnabled() || !logger) return;

  debugLog(logger, 'TRANSFORM', `Aggregated ${stage}`, {
    inputCount: input.length,
    outputCount: output.length,
    outputSample: output[0],
  });
}

/**
 * Log request metadata.
 */
export function debugRequest(logger: Logger, metadata: LogContext): void {
  if (!isDebugEnabled()) return;

  debugLog(logger, 'REQUEST', 'Export request', metadata);
}

/**
 * Log response summary.
 */
export function debugResponse(logger: Logger, statusCode: number, metadata?: LogContext): void {
  if (!isDebugEnabled()) return;

  debugLog(logger, 'RESPONSE', `Response (${String(statusCode)})`, {
    statusCode,
    ...metadata,
  });
}

/**
 * Log storage operation.
 */
export function debugStorage(
  logger: Logger,
  operation: string,
  details: { filePath?: string; rowCount?: number; bytes?: number },
): void {
  if (!isDebugEnabled()) return;

  debugLog(logger, 'STORAGE', operation, details);
}

/**
 * Log validation results.
 */
export function debugValidation(logger: Logger, success: boolean, errors?: unknown): void {
  if (!isDebugEnabled()) return;

  if (success) {
    debugLog(logger, 'VALIDATION', 'Validation passed');
  } else {
    debugLog(logger, 'VALIDATION', 'Validation failed', { errors });
  }
}

/**
 * Log validation summary after processing a batch.
 */
export function debugValidationSummary(logger: Logger, stats: ValidationStats): void {
  if (!isDebugEnabled()) return;

  const hasIssues =
    stats.invalidDates > 0 ||
    stats.invalidValues > 0 ||
    stats.unknownStages > 0 ||
    stats.skippedRecords > 0;

  if (!hasIssues) return;

  debugLog(logger, 'DATA_VALIDATION', 'Validation summary', { ...stats });
}
