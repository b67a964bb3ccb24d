import { describe, expect, it } from 'vitest';

import { mergeDailySummaries } from '../../aggregators/tableMerger';

import type { DailyCardiacSummary, DailySleepSummary } from '../../types';

const night: DailySleepSummary = {
  awakeMinutes: 12,
  bedtime: '23:05',
  coreSleepHours: 3.5,
  date: '2024-04-02',
  deepSleepHours: 1.25,
  remSleepHours: 1.5,
  sessionCount: 9,
  timeInBedHours: 7.9,
  totalSleepHours: 6.25,
  unknownStageMinutes: 0,
  wakeTime: '07:02',
};

const day: DailyCardiacSummary = {
  date: '2024-04-02',
  hrAvg: 68.4,
  hrCount: 120,
  hrMax: 131,
  hrMin: 49,
  hrv: 38.2,
  restingHr: 54,
};

describe('mergeDailySummaries', () => {
  it('merges both summaries of the same date into one row', () => {
    expect(mergeDailySummaries([night], [day])).toEqual([
      {
        awakeMinutes: 12,
        bedtime: '23:05',
        coreSleepHours: 3.5,
        date: '2024-04-02',
        deepSleepHours: 1.25,
        hrAvg: 68.4,
        hrMax: 131,
        hrMeasurements: 120,
        hrMin: 49,
        hrvSdnn: 38.2,
        remSleepHours: 1.5,
        restingHr: 54,
        timeInBedHours: 7.9,
        totalSleepHours: 6.25,
        wakeTime: '07:02',
      },
    ]);
  });

  it('keeps a date with only cardiac data, sleep fields absent', () => {
    const [row] = mergeDailySummaries([], [{ ...day, date: '2024-04-05' }]);

    expect(row.date).toBe('2024-04-05');
    expect(row.hrAvg).toBe(68.4);
    expect([
      row.bedtime,
      row.wakeTime,
      row.awakeMinutes,
      row.coreSleepHours,
      row.deepSleepHours,
      row.remSleepHours,
      row.timeInBedHours,
      row.totalSleepHours,
    ]).toEqual([null, null, null, null, null, null, null, null]);
  });

  it('keeps a date with only sleep data, cardiac fields absent', () => {
    const [row] = mergeDailySummaries([night], []);

    expect(row.totalSleepHours).toBe(6.25);
    expect([row.hrAvg, row.hrMin, row.hrMax, row.hrMeasurements, row.restingHr, row.hrvSdnn])
      .toEqual([null, null, null, null, null, null]);
  });

  it('orders the union of dates without filling gaps', () => {
    const rows = mergeDailySummaries(
      [{ ...night, date: '2024-04-09' }, { ...night, date: '2024-04-01' }],
      [{ ...day, date: '2024-04-04' }, { ...day, date: '2024-04-09' }],
    );

    expect(rows.map((row) => row.date)).toEqual(['2024-04-01', '2024-04-04', '2024-04-09']);
  });

  it('returns no rows for no summaries', () => {
    expect(mergeDailySummaries([], [])).toEqual([]);
  });
});
