/**
 * Cardiac measurement extraction.
 * Heart rate, resting heart rate and HRV events share one conversion rule.
 */

import { debugInvalidDate, debugInvalidValue } from '../utils/debugLogger';
import { getDateKey, isValidDate } from '../utils/dateUtilities';

import type { MappingContext } from './context';
import type { CardiacEvent, CardiacMeasurement } from '../types';

/**
 * Read a measurement magnitude.
 * Returns undefined for a missing, blank or non-numeric value.
 */
export function parseMeasurementValue(value: number | string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;

  const trimmed = value.trim();
  if (trimmed === '') return undefined;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Convert one cardiac event into a measurement keyed by the date of its timestamp.
 * A record with an unusable value is skipped and counted, never thrown.
 */
export function toCardiacMeasurement(
  event: CardiacEvent,
  context: MappingContext,
): CardiacMeasurement | undefined {
  if (!isValidDate(event.start)) {
    context.stats.invalidDates++;
    context.stats.skippedRecords++;
    debugInvalidDate(context.logger, String(event.start), event.kind);
    return undefined;
  }

  const value = parseMeasurementValue(event.value);
  if (value === undefined) {
    context.stats.invalidValues++;
    context.stats.skippedRecords++;
    debugInvalidValue(context.logger, event.kind, event.value);
    return undefined;
  }

  context.stats.processedRecords++;
  return {
    measurementDate: getDateKey(event.start),
    metricKind: event.kind,
    source: event.source,
    timestamp: event.start,
    unit: event.unit,
    value,
  };
}

/**
 * Extract measurements from cardiac events, keeping input order.
 */
export function extractCardiacMeasurements(
  events: Iterable<CardiacEvent>,
  context: MappingContext,
): CardiacMeasurement[] {
  const measurements: CardiacMeasurement[] = [];
  for (const event of events) {
    const measurement = toCardiacMeasurement(event, context);
    if (measurement) measurements.push(measurement);
  }
  return measurements;
}
