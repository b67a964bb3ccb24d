import { describe, expect, it } from 'vitest';

import { createMappingContext } from '../../mappers/context';
import {
  extractSleepSessions,
  normalizeSleepStage,
  stripStagePrefix,
  toSleepSession,
} from '../../mappers/sleepMapper';
import { sleepEvent } from '../fixtures';

describe('normalizeSleepStage', () => {
  it.each([
    ['HKCategoryValueSleepAnalysisInBed', 'InBed'],
    ['HKCategoryValueSleepAnalysisAsleep', 'Asleep'],
    ['HKCategoryValueSleepAnalysisAsleepUnspecified', 'Asleep'],
    ['HKCategoryValueSleepAnalysisAwake', 'Awake'],
    ['HKCategoryValueSleepAnalysisAsleepCore', 'Core'],
    ['HKCategoryValueSleepAnalysisCore', 'Core'],
    ['HKCategoryValueSleepAnalysisAsleepDeep', 'Deep'],
    ['HKCategoryValueSleepAnalysisDeep', 'Deep'],
    ['HKCategoryValueSleepAnalysisAsleepREM', 'REM'],
    ['REM', 'REM'],
  ])('maps %s to %s', (value, stage) => {
    expect(normalizeSleepStage(value)).toBe(stage);
  });

  it('tags unrecognized labels as Unknown', () => {
    expect(normalizeSleepStage('HKCategoryValueSleepAnalysisNap')).toBe('Unknown');
    expect(normalizeSleepStage('')).toBe('Unknown');
  });

  it('strips only the category prefix', () => {
    expect(stripStagePrefix('HKCategoryValueSleepAnalysisAsleepCore')).toBe('AsleepCore');
    expect(stripStagePrefix('Deep')).toBe('Deep');
  });
});

describe('toSleepSession', () => {
  it('attributes a session crossing midnight to the night it began', () => {
    const context = createMappingContext();
    const result = toSleepSession(
      sleepEvent('2024-01-01 23:00:00 -0800', '2024-01-02 00:30:00 -0800', 'HKCategoryValueSleepAnalysisAsleepCore'),
      context,
    );

    expect(result?.nightDate).toBe('2024-01-01');
    expect(result?.durationMinutes).toBe(90);
    expect(result?.stage).toBe('Core');
    expect(result?.stageLabel).toBe('AsleepCore');
    expect(context.stats.processedRecords).toBe(1);
  });

  it('passes a negative duration through unchanged', () => {
    const result = toSleepSession(
      sleepEvent('2024-01-02 06:00:00', '2024-01-02 05:45:00', 'HKCategoryValueSleepAnalysisAwake'),
      createMappingContext(),
    );

    expect(result?.durationMinutes).toBe(-15);
  });

  it('keeps an unknown stage and counts it', () => {
    const context = createMappingContext();
    const result = toSleepSession(
      sleepEvent('2024-01-02 01:00:00', '2024-01-02 01:10:00', 'HKCategoryValueSleepAnalysisSnoring'),
      context,
    );

    expect(result?.stage).toBe('Unknown');
    expect(result?.stageLabel).toBe('Snoring');
    expect(context.stats.unknownStages).toBe(1);
    expect(context.stats.skippedRecords).toBe(0);
  });

  it('drops a session with an unparseable end and counts it', () => {
    const context = createMappingContext();
    const result = toSleepSession(
      sleepEvent('2024-01-02 01:00:00', 'soon', 'HKCategoryValueSleepAnalysisAsleepDeep'),
      context,
    );

    expect(result).toBeUndefined();
    expect(context.stats.invalidDates).toBe(1);
    expect(context.stats.skippedRecords).toBe(1);
  });
});

describe('extractSleepSessions', () => {
  it('returns one session per valid event in input order', () => {
    const sessions = extractSleepSessions(
      [
        sleepEvent('2024-01-02 01:00:00', '2024-01-02 02:00:00', 'HKCategoryValueSleepAnalysisAsleepDeep'),
        sleepEvent('2024-01-02 02:00:00', 'bad', 'HKCategoryValueSleepAnalysisAsleepREM'),
        sleepEvent('2024-01-01 22:00:00', '2024-01-02 07:00:00', 'HKCategoryValueSleepAnalysisInBed'),
      ],
      createMappingContext(),
    );

    expect(sessions.map((s) => [s.nightDate, s.stage, s.durationMinutes])).toEqual([
      ['2024-01-02', 'Deep', 60],
      ['2024-01-01', 'InBed', 540],
    ]);
  });
});
