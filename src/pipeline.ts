/**
 * Extraction and aggregation pipeline.
 *
 * A pure function from an event sequence, a lookback window and a reference
 * time to the daily table. It does no I/O; the optional logger only receives
 * debug traces.
 */

import { PipelineConfig } from './config';
import {
  aggregateDailyCardiac,
  aggregateNightlySleep,
  mergeDailySummaries,
} from './aggregators';
import {
  assertValidDaysBack,
  createMappingContext,
  extractCardiacMeasurements,
  extractSleepSessions,
  flushValidationStats,
  selectWindowEvents,
} from './mappers';
import { currentWallClock, isValidDate } from './utils/dateUtilities';
import { ConfigError } from './utils/errors';

import type {
  CardiacEvent,
  CombinedRow,
  DailyCardiacSummary,
  DailySleepSummary,
  RawEvent,
  SleepStageEvent,
} from './types';
import type { ValidationStats } from './utils/debugLogger';
import type { Logger } from './utils/logger';

export interface PipelineOptions {
  daysBack?: number;
  logger?: Logger;
  /** Wall-clock reference time; defaults to the current local time. */
  now?: Date;
}

export interface PipelineResult {
  cardiacSummaries: DailyCardiacSummary[];
  rows: CombinedRow[];
  sleepSummaries: DailySleepSummary[];
  stats: ValidationStats;
}

function isSleepStageEvent(event: RawEvent): event is SleepStageEvent {
  return event.kind === 'SleepStage';
}

function isCardiacEvent(event: RawEvent): event is CardiacEvent {
  return event.kind !== 'SleepStage';
}

/**
 * Run the full pipeline over a materialized event sequence.
 *
 * @throws ConfigError when `daysBack` is negative or fractional, or `now` is invalid
 */
export function runPipeline(
  events: Iterable<RawEvent>,
  options: PipelineOptions = {},
): PipelineResult {
  const daysBack = options.daysBack ?? PipelineConfig.daysBack;
  const now = options.now ?? currentWallClock();
  assertValidDaysBack(daysBack);
  if (!isValidDate(now)) {
    throw new ConfigError('reference time is not a valid date');
  }

  const context = createMappingContext(options.logger);
  const windowed = selectWindowEvents(events, now, daysBack, context);

  const sessions = extractSleepSessions(windowed.filter(isSleepStageEvent), context);
  const measurements = extractCardiacMeasurements(windowed.filter(isCardiacEvent), context);

  const sleepSummaries = aggregateNightlySleep(sessions, options.logger);
  const cardiacSummaries = aggregateDailyCardiac(measurements, options.logger);

  return {
    cardiacSummaries,
    rows: mergeDailySummaries(sleepSummaries, cardiacSummaries),
    sleepSummaries,
    stats: flushValidationStats(context),
  };
}
