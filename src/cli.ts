/**
 * Command-line export.
 *
 *   health-export export.zip
 *   health-export export.zip --days 60 --output my_health_data.csv
 *   health-export apple_health_export/export.xml --days 7
 */

import { parseArgs } from 'node:util';

import { ExportConfig, PipelineConfig } from './config';
import { describeValidationIssues, logValidationWarning } from './mappers';
import { readExportEvents } from './parsers';
import { runPipeline } from './pipeline';
import { writeCsvFile } from './storage';
import { buildRunSummary, logRunSummary } from './summary';
import { parseHealthDate } from './utils/dateUtilities';
import { ConfigError, HealthExportError, errorMessage } from './utils/errors';
import { CliOptionsSchema } from './validation/schemas';

import type { Logger } from './utils/logger';
import type { ValidatedCliOptions } from './validation/schemas';

export const USAGE = `Usage: health-export <export.zip | export.xml> [options]

Extract sleep and heart data from an Apple Health export into a daily CSV table.

Options:
  -d, --days <n>        Number of days to look back (default: ${String(PipelineConfig.daysBack)})
  -o, --output <file>   Output CSV file name (default: ${ExportConfig.defaultOutputFile})
      --now <datetime>  Reference time instead of the current time ("YYYY-MM-DD HH:MM:SS")
  -h, --help            Show this help`;

export type CliArguments = { help: true } | { help: false; options: ValidatedCliOptions };

function readArguments(argv: readonly string[]) {
  try {
    return parseArgs({
      allowPositionals: true,
      args: [...argv],
      options: {
        days: { default: String(PipelineConfig.daysBack), short: 'd', type: 'string' },
        help: { default: false, short: 'h', type: 'boolean' },
        now: { type: 'string' },
        output: { default: ExportConfig.defaultOutputFile, short: 'o', type: 'string' },
      },
    });
  } catch (error) {
    throw new ConfigError(errorMessage(error), { cause: error });
  }
}

/**
 * Parse and validate command-line arguments.
 *
 * @throws ConfigError on unknown flags, a missing input path or an invalid value
 */
export function parseCliArguments(argv: readonly string[]): CliArguments {
  const parsed = readArguments(argv);
  if (parsed.values.help) return { help: true };

  const result = CliOptionsSchema.safeParse({
    days: parsed.values.days,
    input: parsed.positionals[0] ?? '',
    now: parsed.values.now,
    output: parsed.values.output,
  });
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid arguments: ${details}`);
  }

  return { help: false, options: result.data };
}

/**
 * Run an export end to end and return the process exit code.
 * Fatal problems (bad arguments, missing or unreadable input) are logged and yield 1.
 */
export async function runCli(argv: readonly string[], logger: Logger): Promise<number> {
  try {
    const args = parseCliArguments(argv);
    if (args.help) {
      console.log(USAGE);
      return 0;
    }
    const { days, input, now, output } = args.options;

    logger.info('Apple Health Data Processor', { daysBack: days, input, output });

    const events = await readExportEvents(input, logger);

    const timer = logger.startTimer('runPipeline');
    const result = runPipeline(events, {
      daysBack: days,
      logger,
      now: now === undefined ? undefined : parseHealthDate(now),
    });
    timer.end('info', 'Aggregated daily metrics', {
      cardiacDays: result.cardiacSummaries.length,
      outsideWindow: result.stats.outsideWindow,
      processedRecords: result.stats.processedRecords,
      sleepNights: result.sleepSummaries.length,
    });

    if (describeValidationIssues(result.stats)) {
      logValidationWarning(logger, result.stats);
    }

    await writeCsvFile(output, result.rows, logger);
    logger.info(`Spreadsheet created with ${String(result.rows.length)} days of data`, {
      output,
    });

    logRunSummary(logger, buildRunSummary(result.sleepSummaries, result.cardiacSummaries));
    logger.info(`Done! Your health data is in: ${output}`);
    return 0;
  } catch (error) {
    if (error instanceof HealthExportError) {
      logger.error(error.message, undefined, { code: error.code });
    } else {
      logger.error('Error processing data', error);
    }
    return 1;
  }
}
