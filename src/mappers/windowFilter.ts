/**
 * Lookback window selection.
 * Keeps the events that start at or after `now - daysBack days`.
 */

import { ConfigError } from '../utils/errors';
import { debugInvalidDate, debugWindow } from '../utils/debugLogger';
import { isValidDate, MS_PER_DAY } from '../utils/dateUtilities';

import type { MappingContext } from './context';
import type { RawEvent } from '../types';

/**
 * Throw a ConfigError unless `daysBack` is a non-negative integer.
 */
export function assertValidDaysBack(daysBack: number): void {
  if (!Number.isInteger(daysBack) || daysBack < 0) {
    throw new ConfigError(`days back must be a non-negative integer, got ${String(daysBack)}`);
  }
}

/**
 * Earliest start time still inside the window.
 */
export function getWindowStart(now: Date, daysBack: number): Date {
  return new Date(now.getTime() - daysBack * MS_PER_DAY);
}

/**
 * True iff the event has a parseable start at or after `now - daysBack` days.
 */
export function isWithinWindow(
  event: Pick<RawEvent, 'start'>,
  now: Date,
  daysBack: number,
): boolean {
  if (!isValidDate(event.start)) return false;
  return event.start.getTime() >= getWindowStart(now, daysBack).getTime();
}

/**
 * Select the events inside the lookback window.
 * Events with an unparseable start are dropped and counted as invalid dates;
 * events that are simply too old are counted separately.
 */
export function selectWindowEvents<T extends RawEvent>(
  events: Iterable<T>,
  now: Date,
  daysBack: number,
  context: MappingContext,
): T[] {
  const selected: T[] = [];
  let inputCount = 0;
  let outsideCount = 0;

  for (const event of events) {
    inputCount++;
    if (!isValidDate(event.start)) {
      context.stats.invalidDates++;
      context.stats.skippedRecords++;
      debugInvalidDate(context.logger, { kind: event.kind, start: String(event.start) }, 'window');
      continue;
    }
    if (!isWithinWindow(event, now, daysBack)) {
      context.stats.outsideWindow++;
      outsideCount++;
      continue;
    }
    selected.push(event);
  }

  debugWindow(context.logger, getWindowStart(now, daysBack), { inputCount, outsideCount });

  return selected;
}
