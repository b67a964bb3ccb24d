/**
 * Aggregation exports.
 * Per-day summaries and the combined daily table.
 */

export {
  aggregateDailyCardiac,
  heartRateStats,
  lastValueOf,
  summarizeCardiacDay,
} from './cardiacAggregator';
export {
  aggregateNightlySleep,
  asleepMinutes,
  summarizeNight,
  sumStageMinutes,
} from './sleepAggregator';
export { mergeDailySummaries } from './tableMerger';
