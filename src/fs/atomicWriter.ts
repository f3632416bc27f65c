import { writeFile, mkdir, rename, unlink } from 'fs/promises';
import { dirname, join } from 'path';
import { randomBytes } from 'crypto';
import { logger } from '../util/logger.js';

export interface AtomicWriteOptions {
  ensureDir?: boolean;
}

/**
 * Atomically write content to a file using a temporary file and rename
 */
export async function atomicWriteFile(
  filePath: string,
  content: string,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const { ensureDir = false } = options;
  const tempPath = generateTempPath(filePath);

  try {
    if (ensureDir) {
      await mkdir(dirname(filePath), { recursive: true });
    }

    await writeFile(tempPath, content, 'utf8');
    await rename(tempPath, filePath);

    logger.debug('Atomic write completed', {
      path: filePath,
      size: content.length,
    });
  } catch (error) {
    try {
      await unlink(tempPath);
    } catch (cleanupError) {
      logger.debug('No temp file to clean up', {
        tempPath,
        error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError)
      });
    }

    throw error;
  }
}

function generateTempPath(filePath: string): string {
  const randomSuffix = randomBytes(8).toString('hex');
  return join(dirname(filePath), `.tmp-${randomSuffix}`);
}
