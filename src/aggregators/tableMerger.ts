/**
 * Daily table merge.
 * Outer-joins nightly sleep and daily cardiac summaries on date.
 */

import type { CombinedRow, DailyCardiacSummary, DailySleepSummary } from '../types';

type SleepFields = Pick<
  CombinedRow,
  | 'awakeMinutes'
  | 'bedtime'
  | 'coreSleepHours'
  | 'deepSleepHours'
  | 'remSleepHours'
  | 'timeInBedHours'
  | 'totalSleepHours'
  | 'wakeTime'
>;

type CardiacFields = Pick<
  CombinedRow,
  'hrAvg' | 'hrMax' | 'hrMeasurements' | 'hrMin' | 'hrvSdnn' | 'restingHr'
>;

const NO_SLEEP: SleepFields = {
  awakeMinutes: null,
  bedtime: null,
  coreSleepHours: null,
  deepSleepHours: null,
  remSleepHours: null,
  timeInBedHours: null,
  totalSleepHours: null,
  wakeTime: null,
};

const NO_CARDIAC: CardiacFields = {
  hrAvg: null,
  hrMax: null,
  hrMeasurements: null,
  hrMin: null,
  hrvSdnn: null,
  restingHr: null,
};

function sleepFields(summary: DailySleepSummary | undefined): SleepFields {
  if (!summary) return NO_SLEEP;
  return {
    awakeMinutes: summary.awakeMinutes,
    bedtime: summary.bedtime,
    coreSleepHours: summary.coreSleepHours,
    deepSleepHours: summary.deepSleepHours,
    remSleepHours: summary.remSleepHours,
    timeInBedHours: summary.timeInBedHours,
    totalSleepHours: summary.totalSleepHours,
    wakeTime: summary.wakeTime,
  };
}

function cardiacFields(summary: DailyCardiacSummary | undefined): CardiacFields {
  if (!summary) return NO_CARDIAC;
  return {
    hrAvg: summary.hrAvg,
    hrMax: summary.hrMax,
    hrMeasurements: summary.hrCount,
    hrMin: summary.hrMin,
    hrvSdnn: summary.hrv,
    restingHr: summary.restingHr,
  };
}

/**
 * Build one row per date present in either input, ascending by date.
 * Fields of a missing summary are null; no date without data is produced.
 */
export function mergeDailySummaries(
  sleepSummaries: readonly DailySleepSummary[],
  cardiacSummaries: readonly DailyCardiacSummary[],
): CombinedRow[] {
  const sleepByDate = new Map(sleepSummaries.map((summary) => [summary.date, summary]));
  const cardiacByDate = new Map(cardiacSummaries.map((summary) => [summary.date, summary]));

  const dates = [...new Set([...sleepByDate.keys(), ...cardiacByDate.keys()])].toSorted();

  return dates.map((date) => ({
    date,
    ...sleepFields(sleepByDate.get(date)),
    ...cardiacFields(cardiacByDate.get(date)),
  }));
}
