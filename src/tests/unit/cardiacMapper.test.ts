import { describe, expect, it } from 'vitest';

import {
  extractCardiacMeasurements,
  parseMeasurementValue,
  toCardiacMeasurement,
} from '../../mappers/cardiacMapper';
import { createMappingContext } from '../../mappers/context';
import { cardiacEvent } from '../fixtures';

describe('parseMeasurementValue', () => {
  it('reads numeric strings and numbers', () => {
    expect(parseMeasurementValue('72')).toBe(72);
    expect(parseMeasurementValue(' 48.25 ')).toBe(48.25);
    expect(parseMeasurementValue(61)).toBe(61);
  });

  it('rejects blank, missing and non-numeric values', () => {
    expect(parseMeasurementValue(undefined)).toBeUndefined();
    expect(parseMeasurementValue('')).toBeUndefined();
    expect(parseMeasurementValue('   ')).toBeUndefined();
    expect(parseMeasurementValue('fast')).toBeUndefined();
    expect(parseMeasurementValue(Number.NaN)).toBeUndefined();
    expect(parseMeasurementValue('Infinity')).toBeUndefined();
  });
});

describe('toCardiacMeasurement', () => {
  it('keys the measurement by the date of its timestamp', () => {
    const context = createMappingContext();
    const result = toCardiacMeasurement(
      cardiacEvent('HRV', '2024-03-05 23:59:59 +0100', '42.7'),
      context,
    );

    expect(result).toMatchObject({
      measurementDate: '2024-03-05',
      metricKind: 'HRV',
      source: 'Test Watch',
      value: 42.7,
    });
    expect(context.stats.processedRecords).toBe(1);
  });

  it('skips and counts a non-numeric value', () => {
    const context = createMappingContext();

    expect(toCardiacMeasurement(cardiacEvent('HeartRate', '2024-03-05 08:00:00', 'n/a'), context))
      .toBeUndefined();
    expect(context.stats.invalidValues).toBe(1);
    expect(context.stats.skippedRecords).toBe(1);
  });

  it('skips and counts an unparseable timestamp', () => {
    const context = createMappingContext();

    expect(toCardiacMeasurement(cardiacEvent('HeartRate', 'yesterday', 70), context))
      .toBeUndefined();
    expect(context.stats.invalidDates).toBe(1);
    expect(context.stats.invalidValues).toBe(0);
  });
});

describe('extractCardiacMeasurements', () => {
  it('keeps valid measurements in input order', () => {
    const measurements = extractCardiacMeasurements(
      [
        cardiacEvent('RestingHeartRate', '2024-03-05 07:00:00', 55),
        cardiacEvent('HeartRate', '2024-03-05 08:00:00', undefined),
        cardiacEvent('RestingHeartRate', '2024-03-05 21:00:00', 58),
      ],
      createMappingContext(),
    );

    expect(measurements.map((m) => m.value)).toEqual([55, 58]);
  });
});
