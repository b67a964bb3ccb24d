/**
 * Export reading exports.
 */

export { isZipPath, openExportEntry, readExportEvents } from './archive';
export { parseExportStream, readRecordAttributes } from './exportParser';
export { eventKindOf, fromEventInput, toRawEvent } from './healthRecord';
export type { RecordAttributes } from './healthRecord';
