/**
 * Sleep session extraction.
 * Converts raw sleep analysis events into typed sleep sessions.
 */

import { ExportConfig } from '../config';
import { debugInvalidDate, debugUnknownSleepStage } from '../utils/debugLogger';
import { getDateKey, isValidDate, MS_PER_MINUTE } from '../utils/dateUtilities';

import type { MappingContext } from './context';
import type { SleepSession, SleepStage, SleepStageEvent } from '../types';

// Apple has renamed the asleep stages over the years; both spellings map to one stage
const STAGE_LABELS = new Map<string, SleepStage>([
  ['Asleep', 'Asleep'],
  ['AsleepCore', 'Core'],
  ['AsleepDeep', 'Deep'],
  ['AsleepREM', 'REM'],
  ['AsleepUnspecified', 'Asleep'],
  ['Awake', 'Awake'],
  ['Core', 'Core'],
  ['Deep', 'Deep'],
  ['InBed', 'InBed'],
  ['REM', 'REM'],
]);

const KNOWN_STAGE_LABELS: readonly string[] = [...STAGE_LABELS.keys()];

/**
 * Strip the Apple category prefix from a sleep analysis value.
 */
export function stripStagePrefix(value: string): string {
  const prefix = ExportConfig.sleepValuePrefix;
  return value.startsWith(prefix) ? value.slice(prefix.length) : value;
}

/**
 * Map a raw sleep analysis value onto the closed stage set.
 */
export function normalizeSleepStage(value: string): SleepStage {
  return STAGE_LABELS.get(stripStagePrefix(value)) ?? 'Unknown';
}

/**
 * Convert one sleep event into a session.
 * Returns undefined when either timestamp is unparseable.
 * A negative duration is passed through unchanged.
 */
export function toSleepSession(
  event: SleepStageEvent,
  context: MappingContext,
): SleepSession | undefined {
  if (!isValidDate(event.start) || !isValidDate(event.end)) {
    context.stats.invalidDates++;
    context.stats.skippedRecords++;
    debugInvalidDate(
      context.logger,
      { end: String(event.end), start: String(event.start) },
      'sleep_session',
    );
    return undefined;
  }

  const stageLabel = stripStagePrefix(event.value);
  const stage = normalizeSleepStage(event.value);
  if (stage === 'Unknown') {
    context.stats.unknownStages++;
    debugUnknownSleepStage(context.logger, event.value, KNOWN_STAGE_LABELS);
  }

  context.stats.processedRecords++;
  return {
    durationMinutes: (event.end.getTime() - event.start.getTime()) / MS_PER_MINUTE,
    end: event.end,
    nightDate: getDateKey(event.start),
    source: event.source,
    stage,
    stageLabel,
    start: event.start,
  };
}

/**
 * Extract sleep sessions from sleep events, keeping input order.
 */
export function extractSleepSessions(
  events: Iterable<SleepStageEvent>,
  context: MappingContext,
): SleepSession[] {
  const sessions: SleepSession[] = [];
  for (const event of events) {
    const session = toSleepSession(event, context);
    if (session) sessions.push(session);
  }
  return sessions;
}
