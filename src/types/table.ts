/**
 * Output table definitions.
 */

/**
 * One dense row of the daily table. `null` is the "no data" marker for a
 * field whose source summary is absent on that date.
 */
export interface CombinedRow {
  readonly awakeMinutes: number | null;
  readonly bedtime: string | null;
  readonly coreSleepHours: number | null;
  readonly date: string;
  readonly deepSleepHours: number | null;
  readonly hrAvg: number | null;
  readonly hrMax: number | null;
  readonly hrMeasurements: number | null;
  readonly hrMin: number | null;
  readonly hrvSdnn: number | null;
  readonly remSleepHours: number | null;
  readonly restingHr: number | null;
  readonly timeInBedHours: number | null;
  readonly totalSleepHours: number | null;
  readonly wakeTime: string | null;
}

export type TableColumn =
  | 'awake_minutes'
  | 'bedtime'
  | 'core_sleep_hours'
  | 'date'
  | 'deep_sleep_hours'
  | 'hr_avg'
  | 'hr_max'
  | 'hr_measurements'
  | 'hr_min'
  | 'hrv_sdnn'
  | 'rem_sleep_hours'
  | 'resting_hr'
  | 'time_in_bed_hours'
  | 'total_sleep_hours'
  | 'wake_time';
