/**
 * Sleep type definitions.
 */

/**
 * Closed set of sleep stages after label normalization.
 * `Unknown` keeps unrecognized labels visible without counting them in any total.
 */
export type SleepStage = 'Asleep' | 'Awake' | 'Core' | 'Deep' | 'InBed' | 'REM' | 'Unknown';

export interface SleepSession {
  readonly durationMinutes: number; // negative when the source has end < start
  readonly end: Date;
  readonly nightDate: string; // YYYY-MM-DD of start
  readonly source: string;
  readonly stage: SleepStage;
  readonly start: Date;
  /** Label as it appeared in the export, after prefix stripping. */
  readonly stageLabel: string;
}

export interface DailySleepSummary {
  readonly awakeMinutes: number;
  readonly bedtime: string; // HH:MM
  readonly coreSleepHours: number;
  readonly date: string;
  readonly deepSleepHours: number;
  readonly remSleepHours: number;
  readonly sessionCount: number;
  readonly timeInBedHours: number;
  readonly totalSleepHours: number;
  readonly unknownStageMinutes: number;
  readonly wakeTime: string; // HH:MM
}
