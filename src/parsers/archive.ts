/**
 * Export file access.
 * Reads `export.xml` either directly or out of the `export.zip` the Health app shares.
 */

import { createReadStream } from 'node:fs';
import { access } from 'node:fs/promises';

import unzipper from 'unzipper';

import { ExportConfig } from '../config';
import { ArchiveError, InputNotFoundError, errorMessage } from '../utils/errors';
import { parseExportStream } from './exportParser';

import type { Readable } from 'node:stream';
import type { RawEvent } from '../types';
import type { Logger } from '../utils/logger';

export function isZipPath(inputPath: string): boolean {
  return inputPath.toLowerCase().endsWith('.zip');
}

/**
 * Open the export document inside a zip archive as a stream.
 * The entry is streamed out of the archive, so nothing is extracted to disk.
 *
 * @throws ArchiveError when the archive is unreadable or holds no export.xml
 */
export async function openExportEntry(zipPath: string, logger?: Logger): Promise<Readable> {
  logger?.info(`Extracting ${zipPath}...`);

  const directory = await unzipper.Open.file(zipPath).catch((error: unknown) => {
    throw new ArchiveError(`Error extracting zip file: ${errorMessage(error)}`, { cause: error });
  });

  const entry = directory.files.find(
    (file) => file.type === 'File' && file.path.endsWith(ExportConfig.exportEntrySuffix),
  );
  if (!entry) {
    throw new ArchiveError(`No ${ExportConfig.exportEntrySuffix} found in the zip file`);
  }

  logger?.info(`Found ${entry.path}`);
  return entry.stream();
}

/**
 * Read every handled event from an export.zip or export.xml path.
 *
 * @throws InputNotFoundError when the path does not exist
 */
export async function readExportEvents(inputPath: string, logger?: Logger): Promise<RawEvent[]> {
  try {
    await access(inputPath);
  } catch (error) {
    throw new InputNotFoundError(inputPath, { cause: error });
  }

  const stream = isZipPath(inputPath)
    ? await openExportEntry(inputPath, logger)
    : createReadStream(inputPath);

  return parseExportStream(stream, logger);
}
