import { join } from 'path';
import type { RootDirectories } from '../types/index.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { ensureDir } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Ensure the temp workspace and bundle store exist.
 * Failures (e.g. permission denied under /usr) propagate to the caller.
 */
export async function ensureRootDirectories(directories: RootDirectories): Promise<void> {
  try {
    await Promise.all([
      ensureDir(directories.tempDir),
      ensureDir(directories.bundleDir)
    ]);

    logger.debug('Root directories ensured', { directories });
  } catch (error) {
    logger.error('Failed to create root directories', { error, directories });
    throw error;
  }
}

/**
 * Get the directory of a bundle inside the store
 */
export function getBundlePath(directories: RootDirectories, bundleName: string): string {
  return join(directories.bundleDir, bundleName);
}

/**
 * Get the metadata record path of a bundle directory
 */
export function getMetadataPath(bundleRoot: string): string {
  return join(bundleRoot, FILE_PATTERNS.METADATA_JSON);
}
