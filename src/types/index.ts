/**
 * Centralized type exports.
 * All type definitions are exported from this index for consistent imports.
 */

// Cardiac types
export type { CardiacMeasurement, DailyCardiacSummary } from './cardiac';

// Event types
export type { CardiacEvent, CardiacKind, EventKind, RawEvent, SleepStageEvent } from './event';

// Record type enum
export { RecordType } from './recordType';

// Sleep types
export type { DailySleepSummary, SleepSession, SleepStage } from './sleep';

// Table types
export type { CombinedRow, TableColumn } from './table';
