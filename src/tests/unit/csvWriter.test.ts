import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { formatCell, renderCsv, writeCsvFile } from '../../storage/csvWriter';

import type { CombinedRow } from '../../types';

const HEADER =
  'date,bedtime,wake_time,time_in_bed_hours,total_sleep_hours,awake_minutes,' +
  'core_sleep_hours,deep_sleep_hours,rem_sleep_hours,hr_avg,hr_min,hr_max,' +
  'hr_measurements,resting_hr,hrv_sdnn';

const row: CombinedRow = {
  awakeMinutes: 12.5,
  bedtime: '23:05',
  coreSleepHours: 3.5,
  date: '2024-04-02',
  deepSleepHours: 1.25,
  hrAvg: null,
  hrMax: null,
  hrMeasurements: null,
  hrMin: null,
  hrvSdnn: null,
  remSleepHours: 1.5,
  restingHr: null,
  timeInBedHours: 7.9,
  totalSleepHours: 6,
  wakeTime: '07:02',
};

describe('formatCell', () => {
  it('renders absent values as empty cells', () => {
    expect(formatCell(null)).toBe('');
  });

  it('renders numbers without padding', () => {
    expect(formatCell(6)).toBe('6');
    expect(formatCell(0.33)).toBe('0.33');
  });

  it('quotes cells holding delimiters or quotes', () => {
    expect(formatCell('a,b')).toBe('"a,b"');
    expect(formatCell('say "hi"')).toBe('"say ""hi"""');
  });
});

describe('renderCsv', () => {
  it('writes the header in fixed column order, then one line per row', () => {
    expect(renderCsv([row])).toBe(
      `${HEADER}\r\n2024-04-02,23:05,07:02,7.9,6,12.5,3.5,1.25,1.5,,,,,,\r\n`,
    );
  });

  it('writes only the header for an empty table', () => {
    expect(renderCsv([])).toBe(`${HEADER}\r\n`);
  });

  it('honours a custom column selection', () => {
    expect(renderCsv([row], ['date', 'total_sleep_hours'])).toBe(
      'date,total_sleep_hours\r\n2024-04-02,6\r\n',
    );
  });
});

describe('writeCsvFile', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(tmpdir(), 'health-export-csv-'));
  });

  afterEach(async () => {
    await rm(workDir, { force: true, recursive: true });
  });

  it('creates missing directories and replaces an existing file', async () => {
    const filePath = path.join(workDir, 'nested', 'table.csv');

    await writeCsvFile(filePath, [row]);
    await writeCsvFile(filePath, []);

    expect(await readFile(filePath, 'utf8')).toBe(`${HEADER}\r\n`);
  });
});
