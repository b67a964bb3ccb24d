/**
 * Run summary.
 * Averages across the whole window, reported once after an export.
 */

import { roundTo } from './utils/dateUtilities';

import type { DailyCardiacSummary, DailySleepSummary } from './types';
import type { Logger } from './utils/logger';

export interface RunSummary {
  cardiacDays: number;
  nightsTracked: number;
  avgDeepSleepHours?: number;
  avgHeartRate?: number;
  avgHrv?: number;
  avgRemSleepHours?: number;
  avgRestingHr?: number;
  avgSleepHours?: number;
}

function average(values: readonly number[], decimals: number): number | undefined {
  if (values.length === 0) return undefined;
  const sum = values.reduce((total, value) => total + value, 0);
  return roundTo(sum / values.length, decimals);
}

/**
 * Positive values only: zero deep or REM means the device did not stage that night.
 */
function positive(values: readonly (number | null)[]): number[] {
  return values.filter((value): value is number => value !== null && value > 0);
}

export function buildRunSummary(
  sleepSummaries: readonly DailySleepSummary[],
  cardiacSummaries: readonly DailyCardiacSummary[],
): RunSummary {
  return {
    avgDeepSleepHours: average(positive(sleepSummaries.map((s) => s.deepSleepHours)), 2),
    avgHeartRate: average(positive(cardiacSummaries.map((c) => c.hrAvg)), 1),
    avgHrv: average(positive(cardiacSummaries.map((c) => c.hrv)), 1),
    avgRemSleepHours: average(positive(sleepSummaries.map((s) => s.remSleepHours)), 2),
    avgRestingHr: average(positive(cardiacSummaries.map((c) => c.restingHr)), 1),
    avgSleepHours: average(sleepSummaries.map((s) => s.totalSleepHours), 2),
    cardiacDays: cardiacSummaries.length,
    nightsTracked: sleepSummaries.length,
  };
}

export function logRunSummary(logger: Logger, summary: RunSummary): void {
  if (summary.nightsTracked > 0) {
    logger.info('Sleep metrics', {
      averageDeepSleepHours: summary.avgDeepSleepHours,
      averageRemSleepHours: summary.avgRemSleepHours,
      averageSleepHours: summary.avgSleepHours,
      nightsTracked: summary.nightsTracked,
    });
  }

  if (summary.cardiacDays > 0) {
    logger.info('Heart metrics', {
      averageHeartRateBpm: summary.avgHeartRate,
      averageHrvMs: summary.avgHrv,
      averageRestingHrBpm: summary.avgRestingHr,
      days: summary.cardiacDays,
    });
  }
}
