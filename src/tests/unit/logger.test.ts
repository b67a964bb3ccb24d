import { describe, expect, it } from 'vitest';

import { Logger, isLogLevel } from '../../utils/logger';

import type { LogLevel } from '../../utils/logger';

function capture(level: LogLevel = 'debug') {
  const lines: { level: LogLevel; line: string }[] = [];
  const logger = new Logger({
    format: 'json',
    level,
    sink: (lineLevel, line) => lines.push({ level: lineLevel, line }),
  });
  return { lines, logger };
}

describe('Logger', () => {
  it('writes structured JSON entries', () => {
    const { lines, logger } = capture();

    logger.info('Spreadsheet created', { rows: 3 });

    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe('info');
    expect(JSON.parse(lines[0].line)).toMatchObject({
      context: { rows: 3 },
      level: 'info',
      message: 'Spreadsheet created',
    });
  });

  it('drops entries below the minimum level', () => {
    const { lines, logger } = capture('warn');

    logger.debug('noise');
    logger.info('noise');
    logger.warn('kept');

    expect(lines.map((entry) => entry.level)).toEqual(['warn']);
  });

  it('carries the correlation ID and sink into child loggers', () => {
    const { lines, logger } = capture();

    logger.child('req-42').error('failed', new TypeError('bad input'));

    expect(JSON.parse(lines[0].line)).toMatchObject({
      correlationId: 'req-42',
      error: { message: 'bad input', name: 'TypeError' },
    });
  });

  it('records the duration of a timed operation', () => {
    const { lines, logger } = capture('info');

    logger.startTimer('parse').end('info', 'Parsed');

    const entry: unknown = JSON.parse(lines[0].line);
    expect(entry).toMatchObject({ message: 'Parsed' });
    expect(entry).toHaveProperty('durationMs');
  });
});

describe('isLogLevel', () => {
  it('recognizes only the four levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
