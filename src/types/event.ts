/**
 * Raw event type definitions.
 * One event per `Record` element of an Apple Health export, narrowed to the
 * four kinds this tool tabulates.
 */

export type EventKind = 'HeartRate' | 'HRV' | 'RestingHeartRate' | 'SleepStage';

export type CardiacKind = Exclude<EventKind, 'SleepStage'>;

interface EventCommon {
  /**
   * Wall-clock time in the wearer's local clock, stored in the UTC fields of the Date.
   * An Invalid Date marks a timestamp that could not be parsed.
   */
  start: Date;
  end: Date;
  source: string;
}

export interface SleepStageEvent extends EventCommon {
  kind: 'SleepStage';
  value: string; // e.g. "HKCategoryValueSleepAnalysisAsleepCore"
}

export interface CardiacEvent extends EventCommon {
  kind: CardiacKind;
  unit: string;
  value: number | string | undefined;
}

export type RawEvent = CardiacEvent | SleepStageEvent;
