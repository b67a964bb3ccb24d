import { parseHealthDate } from '../utils/dateUtilities';

import type {
  CardiacEvent,
  CardiacKind,
  CardiacMeasurement,
  SleepSession,
  SleepStage,
  SleepStageEvent,
} from '../types';

export function at(text: string): Date {
  return parseHealthDate(text);
}

export function sleepEvent(start: string, end: string, value: string): SleepStageEvent {
  return { end: at(end), kind: 'SleepStage', source: 'Test Watch', start: at(start), value };
}

export function cardiacEvent(
  kind: CardiacKind,
  start: string,
  value: number | string | undefined,
): CardiacEvent {
  const timestamp = at(start);
  return { end: timestamp, kind, source: 'Test Watch', start: timestamp, unit: 'count/min', value };
}

export function session(
  nightDate: string,
  start: string,
  end: string,
  stage: SleepStage,
): SleepSession {
  const startDate = at(start);
  const endDate = at(end);
  return {
    durationMinutes: (endDate.getTime() - startDate.getTime()) / 60_000,
    end: endDate,
    nightDate,
    source: 'Test Watch',
    stage,
    stageLabel: stage,
    start: startDate,
  };
}

export function measurement(
  kind: CardiacKind,
  timestamp: string,
  value: number,
): CardiacMeasurement {
  const date = at(timestamp);
  return {
    measurementDate: timestamp.slice(0, 10),
    metricKind: kind,
    source: 'Test Watch',
    timestamp: date,
    unit: kind === 'HRV' ? 'ms' : 'count/min',
    value,
  };
}
