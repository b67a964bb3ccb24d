/**
 * Raw event construction.
 * Builds the tagged RawEvent variant from a `Record` element's attributes,
 * or from an already-validated JSON event.
 */

import { ExportConfig } from '../config';
import { parseHealthDate } from '../utils/dateUtilities';

import type { EventInput } from '../validation/schemas';
import type { EventKind, RawEvent } from '../types';

/**
 * Attributes of an export `Record` element that the exporter reads.
 */
export interface RecordAttributes {
  endDate?: string;
  sourceName?: string;
  startDate?: string;
  type?: string;
  unit?: string;
  value?: string;
}

const EVENT_KINDS: readonly EventKind[] = ['HRV', 'HeartRate', 'RestingHeartRate', 'SleepStage'];

const KIND_BY_RECORD_TYPE = new Map<string, EventKind>(
  EVENT_KINDS.map((kind) => [ExportConfig.recordTypes[kind], kind]),
);

/**
 * Event kind for an Apple Health record type, or undefined for unhandled types.
 */
export function eventKindOf(recordType: string | undefined): EventKind | undefined {
  return recordType === undefined ? undefined : KIND_BY_RECORD_TYPE.get(recordType);
}

/**
 * Build a RawEvent from record attributes.
 * Unparseable timestamps become Invalid Dates and are dropped downstream.
 * A missing end date falls back to the start date.
 */
export function toRawEvent(attributes: RecordAttributes): RawEvent | undefined {
  const kind = eventKindOf(attributes.type);
  if (!kind) return undefined;

  const start = parseHealthDate(attributes.startDate);
  const end = attributes.endDate === undefined ? start : parseHealthDate(attributes.endDate);
  const source = attributes.sourceName ?? ExportConfig.unknownSource;

  if (kind === 'SleepStage') {
    return { end, kind, source, start, value: attributes.value ?? '' };
  }

  return { end, kind, source, start, unit: attributes.unit ?? '', value: attributes.value };
}

/**
 * Build a RawEvent from a JSON event accepted by the HTTP endpoint.
 */
export function fromEventInput(input: EventInput): RawEvent {
  const start = parseHealthDate(input.start);
  const end = input.end === undefined ? start : parseHealthDate(input.end);
  const source = input.source ?? ExportConfig.unknownSource;

  if (input.kind === 'SleepStage') {
    return { end, kind: input.kind, source, start, value: input.value };
  }

  return { end, kind: input.kind, source, start, unit: input.unit ?? '', value: input.value };
}
