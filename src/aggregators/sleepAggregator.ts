/**
 * Nightly sleep aggregation.
 * Folds sleep sessions into one summary per night date.
 */

import { debugAggregation } from '../utils/debugLogger';
import { formatTime, roundTo } from '../utils/dateUtilities';
import { groupBy } from '../utils/grouping';

import type { DailySleepSummary, SleepSession, SleepStage } from '../types';
import type { Logger } from '../utils/logger';

type StageMinutes = Record<SleepStage, number>;

/**
 * Sum session minutes per stage.
 */
export function sumStageMinutes(sessions: readonly SleepSession[]): StageMinutes {
  const totals: StageMinutes = {
    Asleep: 0,
    Awake: 0,
    Core: 0,
    Deep: 0,
    InBed: 0,
    REM: 0,
    Unknown: 0,
  };
  for (const session of sessions) {
    totals[session.stage] += session.durationMinutes;
  }
  return totals;
}

/**
 * Minutes that count as sleep: unspecified asleep plus the core, deep and REM stages.
 */
export function asleepMinutes(totals: StageMinutes): number {
  return totals.Asleep + totals.Core + totals.Deep + totals.REM;
}

/**
 * Reduce the sessions of one night into its summary.
 * Bedtime and wake time span every session of the night, Unknown ones included.
 */
export function summarizeNight(date: string, sessions: readonly SleepSession[]): DailySleepSummary {
  if (sessions.length === 0) {
    throw new RangeError(`No sleep sessions for ${date}`);
  }

  let earliestStart = sessions[0].start;
  let latestEnd = sessions[0].end;
  for (const session of sessions) {
    if (session.start < earliestStart) earliestStart = session.start;
    if (session.end > latestEnd) latestEnd = session.end;
  }

  const totals = sumStageMinutes(sessions);

  return {
    awakeMinutes: roundTo(totals.Awake, 1),
    bedtime: formatTime(earliestStart),
    coreSleepHours: roundTo(totals.Core / 60, 2),
    date,
    deepSleepHours: roundTo(totals.Deep / 60, 2),
    remSleepHours: roundTo(totals.REM / 60, 2),
    sessionCount: sessions.length,
    timeInBedHours: roundTo(totals.InBed / 60, 2),
    totalSleepHours: roundTo(asleepMinutes(totals) / 60, 2),
    unknownStageMinutes: roundTo(totals.Unknown, 1),
    wakeTime: formatTime(latestEnd),
  };
}

/**
 * Group sessions by night date and summarize each night, ordered by date.
 * Only nights with at least one session appear.
 */
export function aggregateNightlySleep(
  sessions: readonly SleepSession[],
  logger?: Logger,
): DailySleepSummary[] {
  const byNight = groupBy(sessions, (session) => session.nightDate);

  const summaries = [...byNight]
    .map(([date, nightSessions]) => summarizeNight(date, nightSessions))
    .toSorted((a, b) => a.date.localeCompare(b.date));

  debugAggregation(logger, 'nightly sleep', sessions, summaries);

  return summaries;
}
