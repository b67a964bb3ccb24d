import { HttpStatus } from '../config';
import { describeValidationIssues, logValidationWarning } from '../mappers';
import { fromEventInput } from '../parsers';
import { runPipeline } from '../pipeline';
import { renderCsv } from '../storage';
import { debugRequest, debugResponse, debugValidation } from '../utils/debugLogger';
import { parseHealthDate } from '../utils/dateUtilities';
import { ExportQuerySchema, ExportRequestSchema } from '../validation/schemas';

import type { Request, Response } from 'express';

/**
 * POST /api/export
 * Runs the pipeline over the posted events and returns the daily table as
 * JSON (with both summary collections) or as CSV.
 */
export const exportDailyTable = (req: Request, res: Response): void => {
  const { log } = req;
  const timer = log.startTimer('exportDailyTable');

  try {
    const query = ExportQuerySchema.safeParse(req.query);
    const body = ExportRequestSchema.safeParse(req.body);
    debugValidation(log, query.success && body.success, body.error?.issues ?? query.error?.issues);

    if (!query.success || !body.success) {
      const issues = [...(query.error?.issues ?? []), ...(body.error?.issues ?? [])];
      log.warn('Invalid export request', { errors: issues });
      res.status(HttpStatus.BAD_REQUEST).json({
        details: issues,
        error: 'Invalid request format',
      });
      return;
    }

    const { daysBack, events, now } = body.data;
    debugRequest(log, { daysBack, eventCount: events.length, format: query.data.format, now });

    const result = runPipeline(events.map(fromEventInput), {
      daysBack,
      logger: log,
      now: now === undefined ? undefined : parseHealthDate(now),
    });

    if (describeValidationIssues(result.stats)) {
      logValidationWarning(log, result.stats);
    }

    timer.end('info', 'Export completed', {
      rows: result.rows.length,
      stats: result.stats,
    });
    debugResponse(log, HttpStatus.OK, { format: query.data.format, rows: result.rows.length });

    if (query.data.format === 'csv') {
      res.status(HttpStatus.OK).type('text/csv').send(renderCsv(result.rows));
      return;
    }

    res.status(HttpStatus.OK).json({
      cardiac: result.cardiacSummaries,
      rows: result.rows,
      sleep: result.sleepSummaries,
      stats: result.stats,
    });
  } catch (error) {
    timer.end('error', 'Failed to process export request', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      error: 'Failed to process request',
      message: error instanceof Error ? error.message : 'An error occurred',
    });
  }
};
