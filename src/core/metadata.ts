/**
 * Bundle metadata store.
 *
 * Each bundle directory carries a `metadata.json` record naming its entry
 * point. Records are written once at bootstrap and read back by run and
 * delete. Reading is lenient: fields of the wrong type are dropped and
 * unknown fields are preserved so newer records stay readable.
 */

import { join } from 'path';
import type { BundleMetadata, MetadataReadResult, StoredBundleMetadata } from '../types/index.js';
import { BUNDLE_DEFAULTS } from '../constants/index.js';
import { ensureDir, exists, readTextFile, writeJsonFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';
import { getMetadataPath } from './directory.js';

export function createBundleMetadata(name: string, bin: string): BundleMetadata {
  return {
    name,
    bin,
    version: BUNDLE_DEFAULTS.VERSION,
    description: `${BUNDLE_DEFAULTS.DESCRIPTION_PREFIX}${name}`
  };
}

/**
 * Write the metadata record for `name` under the bundle store, creating the
 * bundle directory if needed. An existing record is replaced.
 */
export async function writeBundleMetadata(bundleDir: string, name: string, bin: string): Promise<BundleMetadata> {
  const bundleRoot = join(bundleDir, name);
  const metadataPath = getMetadataPath(bundleRoot);
  const metadata = createBundleMetadata(name, bin);

  await ensureDir(bundleRoot);
  if (await exists(metadataPath)) {
    logger.warn(`Overwriting existing bundle metadata: ${metadataPath}`);
  }
  await writeJsonFile(metadataPath, metadata);

  logger.debug('Bundle metadata written', { metadataPath, metadata });
  return metadata;
}

/**
 * Keep known string fields; collect everything else into `extra`.
 */
export function normalizeStoredMetadata(record: object): StoredBundleMetadata {
  const stored: StoredBundleMetadata = { extra: {} };

  for (const [key, value] of Object.entries(record)) {
    switch (key) {
      case 'name':
      case 'bin':
      case 'version':
      case 'description':
        if (typeof value === 'string') {
          stored[key] = value;
        } else {
          logger.debug(`Ignoring non-string metadata field '${key}'`, { value });
        }
        break;
      default:
        stored.extra[key] = value;
    }
  }

  return stored;
}

/**
 * Read the metadata record of a bundle directory.
 */
export async function readBundleMetadata(bundleRoot: string): Promise<MetadataReadResult> {
  const metadataPath = getMetadataPath(bundleRoot);

  if (!(await exists(metadataPath))) {
    return { status: 'not-found', path: metadataPath };
  }

  // A record that exists but cannot be read (a directory, no permission)
  // is as unusable as one that does not parse.
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readTextFile(metadataPath));
  } catch (error) {
    return { status: 'corrupt', path: metadataPath, reason: describeError(error) };
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { status: 'corrupt', path: metadataPath, reason: 'metadata record is not a JSON object' };
  }

  return {
    status: 'ok',
    path: metadataPath,
    metadata: normalizeStoredMetadata(parsed)
  };
}
