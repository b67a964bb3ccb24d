/**
 * Apple Health record type identifiers handled by the exporter.
 */
export enum RecordType {
  HEART_RATE = 'HKQuantityTypeIdentifierHeartRate',
  HEART_RATE_VARIABILITY = 'HKQuantityTypeIdentifierHeartRateVariabilitySDNN',
  RESTING_HEART_RATE = 'HKQuantityTypeIdentifierRestingHeartRate',
  SLEEP_ANALYSIS = 'HKCategoryTypeIdentifierSleepAnalysis',
}
