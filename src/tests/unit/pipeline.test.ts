import { describe, expect, it } from 'vitest';

import { runPipeline } from '../../pipeline';
import { ConfigError } from '../../utils/errors';
import { at, cardiacEvent, sleepEvent } from '../fixtures';

import type { RawEvent } from '../../types';

const now = at('2024-01-10 12:00:00');

const events: RawEvent[] = [
  sleepEvent('2024-01-08 22:45:00', '2024-01-08 23:00:00', 'HKCategoryValueSleepAnalysisAwake'),
  sleepEvent('2024-01-08 23:00:00', '2024-01-09 00:30:00', 'HKCategoryValueSleepAnalysisAsleepCore'),
  cardiacEvent('HeartRate', '2024-01-09 09:00:00', 60),
  cardiacEvent('HeartRate', '2024-01-09 10:00:00', '80'),
  cardiacEvent('RestingHeartRate', '2024-01-09 07:00:00', 55),
  cardiacEvent('HeartRate', '2023-11-01 09:00:00', 99),
];

describe('runPipeline', () => {
  it('builds the daily table from sleep and cardiac events', () => {
    const result = runPipeline(events, { daysBack: 30, now });

    expect(result.rows).toEqual([
      {
        awakeMinutes: 15,
        bedtime: '22:45',
        coreSleepHours: 1.5,
        date: '2024-01-08',
        deepSleepHours: 0,
        hrAvg: null,
        hrMax: null,
        hrMeasurements: null,
        hrMin: null,
        hrvSdnn: null,
        remSleepHours: 0,
        restingHr: null,
        timeInBedHours: 0,
        totalSleepHours: 1.5,
        wakeTime: '00:30',
      },
      {
        awakeMinutes: null,
        bedtime: null,
        coreSleepHours: null,
        date: '2024-01-09',
        deepSleepHours: null,
        hrAvg: 70,
        hrMax: 80,
        hrMeasurements: 2,
        hrMin: 60,
        hrvSdnn: null,
        remSleepHours: null,
        restingHr: 55,
        timeInBedHours: null,
        totalSleepHours: null,
        wakeTime: null,
      },
    ]);
    expect(result.stats.processedRecords).toBe(5);
    expect(result.stats.outsideWindow).toBe(1);
  });

  it('never lets an event before the window reach a summary', () => {
    const { cardiacSummaries } = runPipeline(events, { daysBack: 30, now });

    expect(cardiacSummaries.map((summary) => summary.date)).toEqual(['2024-01-09']);
  });

  it('is deterministic for the same input and reference time', () => {
    expect(runPipeline(events, { daysBack: 30, now })).toEqual(
      runPipeline(events, { daysBack: 30, now }),
    );
  });

  it('shrinks the table as the window narrows', () => {
    const result = runPipeline(events, { daysBack: 1, now: at('2024-01-10 00:00:00') });

    expect(result.rows.map((row) => row.date)).toEqual(['2024-01-09']);
    expect(result.stats.outsideWindow).toBe(3);
  });

  it('produces an empty table for no events', () => {
    const result = runPipeline([], { daysBack: 30, now });

    expect(result.rows).toEqual([]);
    expect(result.sleepSummaries).toEqual([]);
    expect(result.cardiacSummaries).toEqual([]);
  });

  it('rejects an invalid window or reference time', () => {
    expect(() => runPipeline(events, { daysBack: -3, now })).toThrow(ConfigError);
    expect(() => runPipeline(events, { daysBack: 30, now: at('later') })).toThrow(ConfigError);
  });
});
