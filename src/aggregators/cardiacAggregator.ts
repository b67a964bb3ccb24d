/**
 * Daily cardiac aggregation.
 * Folds heart rate, resting heart rate and HRV measurements into one summary per day.
 */

import { debugAggregation } from '../utils/debugLogger';
import { roundTo } from '../utils/dateUtilities';
import { groupBy } from '../utils/grouping';

import type { CardiacKind, CardiacMeasurement, DailyCardiacSummary } from '../types';
import type { Logger } from '../utils/logger';

interface HeartRateStats {
  avg: number;
  count: number;
  max: number;
  min: number;
}

/**
 * Count, mean, min and max of heart rate samples, each rounded to 1 decimal.
 * Undefined when there are no samples.
 */
export function heartRateStats(values: readonly number[]): HeartRateStats | undefined {
  if (values.length === 0) return undefined;

  let sum = 0;
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const value of values) {
    sum += value;
    if (value < min) min = value;
    if (value > max) max = value;
  }

  return {
    avg: roundTo(sum / values.length, 1),
    count: values.length,
    max: roundTo(max, 1),
    min: roundTo(min, 1),
  };
}

/**
 * Value of the last measurement of a kind in input order.
 * Resting HR and HRV keep the last reading of the day rather than an average.
 */
export function lastValueOf(
  measurements: readonly CardiacMeasurement[],
  kind: CardiacKind,
): number | null {
  const last = measurements.findLast((measurement) => measurement.metricKind === kind);
  return last ? roundTo(last.value, 1) : null;
}

/**
 * Reduce one day's measurements into its summary.
 */
export function summarizeCardiacDay(
  date: string,
  measurements: readonly CardiacMeasurement[],
): DailyCardiacSummary {
  const heartRates = measurements
    .filter((measurement) => measurement.metricKind === 'HeartRate')
    .map((measurement) => measurement.value);
  const stats = heartRateStats(heartRates);

  return {
    date,
    hrAvg: stats?.avg ?? null,
    hrCount: stats?.count ?? 0,
    hrMax: stats?.max ?? null,
    hrMin: stats?.min ?? null,
    hrv: lastValueOf(measurements, 'HRV'),
    restingHr: lastValueOf(measurements, 'RestingHeartRate'),
  };
}

/**
 * Group measurements by date and summarize each day, ordered by date.
 */
export function aggregateDailyCardiac(
  measurements: readonly CardiacMeasurement[],
  logger?: Logger,
): DailyCardiacSummary[] {
  const byDate = groupBy(measurements, (measurement) => measurement.measurementDate);

  const summaries = [...byDate]
    .map(([date, dayMeasurements]) => summarizeCardiacDay(date, dayMeasurements))
    .toSorted((a, b) => a.date.localeCompare(b.date));

  debugAggregation(logger, 'daily cardiac', measurements, summaries);

  return summaries;
}
