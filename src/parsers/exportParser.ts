/**
 * Streaming parser for Apple Health `export.xml`.
 * Exports run to gigabytes, so the document is never held in memory; only the
 * handled `Record` elements are kept, in document order.
 */

import sax from 'sax';

import { ExportParseError, errorMessage } from '../utils/errors';
import { toRawEvent } from './healthRecord';

import type { QualifiedTag, Tag } from 'sax';
import type { Readable } from 'node:stream';
import type { RecordAttributes } from './healthRecord';
import type { RawEvent } from '../types';
import type { Logger } from '../utils/logger';

const RECORD_ELEMENT = 'Record';

const RECORD_ATTRIBUTES = [
  'endDate',
  'sourceName',
  'startDate',
  'type',
  'unit',
  'value',
] as const satisfies readonly (keyof RecordAttributes)[];

/**
 * Read the attributes the exporter needs from an element.
 */
export function readRecordAttributes(tag: QualifiedTag | Tag): RecordAttributes {
  const attributes: RecordAttributes = {};
  for (const name of RECORD_ATTRIBUTES) {
    const attribute = tag.attributes[name];
    if (attribute === undefined) continue;
    attributes[name] = typeof attribute === 'string' ? attribute : attribute.value;
  }
  return attributes;
}

/**
 * Parse an export document stream into raw events.
 *
 * @throws ExportParseError when the document is not well-formed XML or has no root element
 */
export async function parseExportStream(stream: Readable, logger?: Logger): Promise<RawEvent[]> {
  const timer = logger?.startTimer('parseExportStream');
  const parser = sax.parser(true);
  const events: RawEvent[] = [];
  let recordCount = 0;
  let sawRoot = false;
  const parseErrors: Error[] = [];

  parser.onopentag = (tag) => {
    sawRoot = true;
    if (tag.name !== RECORD_ELEMENT) return;
    recordCount++;
    const event = toRawEvent(readRecordAttributes(tag));
    if (event) events.push(event);
  };
  parser.onerror = (error) => {
    parseErrors.push(error);
  };

  const fail = (error: unknown): ExportParseError =>
    new ExportParseError(`Error parsing XML: ${errorMessage(error)}`, { cause: error });

  try {
    stream.setEncoding('utf8');
    for await (const chunk of stream) {
      parser.write(String(chunk));
      if (parseErrors.length > 0) throw fail(parseErrors[0]);
    }
    parser.close();
  } catch (error) {
    stream.destroy();
    throw error instanceof ExportParseError ? error : fail(error);
  }

  if (parseErrors.length > 0) throw fail(parseErrors[0]);
  if (!sawRoot) throw new ExportParseError('Error parsing XML: document has no root element');

  timer?.end('info', 'XML parsed successfully', { events: events.length, records: recordCount });
  return events;
}
