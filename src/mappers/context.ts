/**
 * Run-scoped mapping context.
 * Carries the optional logger and the validation tally through every
 * extraction step of a single pipeline run.
 */

import { debugValidationSummary, isDebugEnabled } from '../utils/debugLogger';

import type { ValidationStats } from '../utils/debugLogger';
import type { Logger } from '../utils/logger';

/**
 * Scoped per run so concurrent runs never share counters.
 */
export interface MappingContext {
  stats: ValidationStats;
  logger?: Logger;
}

/**
 * Create a new mapping context for a run.
 */
export function createMappingContext(logger?: Logger): MappingContext {
  return {
    logger,
    stats: {
      invalidDates: 0,
      invalidValues: 0,
      outsideWindow: 0,
      processedRecords: 0,
      skippedRecords: 0,
      unknownStages: 0,
    },
  };
}

/**
 * Snapshot validation stats and log summary if debug is enabled.
 */
export function flushValidationStats(context: MappingContext): ValidationStats {
  const stats = { ...context.stats };
  if (isDebugEnabled() && context.logger) {
    debugValidationSummary(context.logger, stats);
  }
  return stats;
}

/**
 * Describe data quality issues in a run, or undefined when there were none.
 */
export function describeValidationIssues(stats: ValidationStats): string | undefined {
  const issues: string[] = [];
  if (stats.invalidDates > 0) issues.push(`${String(stats.invalidDates)} invalid dates`);
  if (stats.invalidValues > 0) issues.push(`${String(stats.invalidValues)} invalid values`);
  if (stats.unknownStages > 0) issues.push(`${String(stats.unknownStages)} unknown sleep stages`);
  return issues.length > 0 ? issues.join(', ') : undefined;
}

/**
 * Log validation warning if there were data quality issues.
 * Called after processing to surface issues at WARN level.
 */
export function logValidationWarning(logger: Logger, stats: ValidationStats): void {
  const details = describeValidationIssues(stats);
  if (!details) return;

  const total = stats.processedRecords + stats.skippedRecords;
  logger.warn(
    `Data quality issues: ${String(stats.skippedRecords)}/${String(total)} records skipped`,
    {
      details,
      validationStats: stats,
    },
  );
}
