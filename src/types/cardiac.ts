/**
 * Cardiac measurement type definitions.
 */

import type { CardiacKind } from './event';

export interface CardiacMeasurement {
  readonly measurementDate: string; // YYYY-MM-DD
  readonly metricKind: CardiacKind;
  readonly source: string;
  readonly timestamp: Date;
  readonly unit: string;
  readonly value: number;
}

/**
 * Per-day cardiac summary.
 * Heart rate statistics are null when the day has no heart rate samples;
 * resting HR and HRV keep the last value seen that day.
 */
export interface DailyCardiacSummary {
  readonly date: string;
  readonly hrAvg: number | null;
  readonly hrCount: number;
  readonly hrMax: number | null;
  readonly hrMin: number | null;
  readonly hrv: number | null;
  readonly restingHr: number | null;
}
