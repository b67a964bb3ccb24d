/**
 * Daily table rendering.
 * Writes combined rows as a delimited text table in the fixed column order.
 */

import { ExportConfig } from '../config';
import { debugStorage } from '../utils/debugLogger';
import { atomicWriteText } from './fileHelpers';

import type { CombinedRow, TableColumn } from '../types';
import type { Logger } from '../utils/logger';

const LINE_END = '\r\n';

const FIELD_BY_COLUMN: Record<TableColumn, keyof CombinedRow> = {
  awake_minutes: 'awakeMinutes',
  bedtime: 'bedtime',
  core_sleep_hours: 'coreSleepHours',
  date: 'date',
  deep_sleep_hours: 'deepSleepHours',
  hr_avg: 'hrAvg',
  hr_max: 'hrMax',
  hr_measurements: 'hrMeasurements',
  hr_min: 'hrMin',
  hrv_sdnn: 'hrvSdnn',
  rem_sleep_hours: 'remSleepHours',
  resting_hr: 'restingHr',
  time_in_bed_hours: 'timeInBedHours',
  total_sleep_hours: 'totalSleepHours',
  wake_time: 'wakeTime',
};

/**
 * Render one cell. Absent values are empty; cells holding a delimiter,
 * quote or line break are quoted with doubled quotes.
 */
export function formatCell(value: number | string | null): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replaceAll('"', '""')}"` : text;
}

/**
 * Render rows as CSV text: header line, then one line per row.
 */
export function renderCsv(
  rows: readonly CombinedRow[],
  columns: readonly TableColumn[] = ExportConfig.columns,
): string {
  const lines = [columns.join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => formatCell(row[FIELD_BY_COLUMN[column]])).join(','));
  }
  return lines.join(LINE_END) + LINE_END;
}

/**
 * Write rows to a CSV file, replacing any existing file.
 */
export async function writeCsvFile(
  filePath: string,
  rows: readonly CombinedRow[],
  logger?: Logger,
): Promise<void> {
  const content = renderCsv(rows);
  await atomicWriteText(filePath, content);
  if (logger) {
    debugStorage(logger, 'CSV written', {
      bytes: Buffer.byteLength(content),
      filePath,
      rowCount: rows.length,
    });
  }
}
