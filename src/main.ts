import { runCli } from './cli';
import { logger } from './utils/logger';

process.exitCode = await runCli(process.argv.slice(2), logger);
