/**
 * Extraction exports.
 * Window selection and conversion of raw events into typed records.
 */

export {
  createMappingContext,
  describeValidationIssues,
  flushValidationStats,
  logValidationWarning,
} from './context';
export type { MappingContext } from './context';
export {
  extractCardiacMeasurements,
  parseMeasurementValue,
  toCardiacMeasurement,
} from './cardiacMapper';
export {
  extractSleepSessions,
  normalizeSleepStage,
  stripStagePrefix,
  toSleepSession,
} from './sleepMapper';
export {
  assertValidDaysBack,
  getWindowStart,
  isWithinWindow,
  selectWindowEvents,
} from './windowFilter';
