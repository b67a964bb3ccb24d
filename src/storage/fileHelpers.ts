import { promises as fs } from 'node:fs';
import * as path from 'node:path';

/**
 * Ensure a directory exists, creating it recursively if needed.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Write text atomically using temp file + rename pattern.
 * Readers never see a partially written file.
 */
export async function atomicWriteText(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp.${String(Date.now())}.${Math.random().toString(36).slice(2)}`;

  await ensureDir(path.dirname(filePath));
  try {
    await fs.writeFile(tempPath, content, 'utf8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
