/**
 * Entry-point inference.
 *
 * Best-effort, zero-configuration discovery of the file a bundle runs:
 *
 *   1. the first regular file (by name) under `<package>/bin/`, counting
 *      links that resolve to files;
 *   2. otherwise the first source file, in walk order, whose extension is
 *      listed in the rules and whose text contains the entry marker;
 *   3. otherwise nothing.
 *
 * Walk order is the one `walkFiles` documents: depth-first, files before
 * subdirectories, names in code-unit order.
 */

import { extname, join, relative, sep } from 'path';
import type { EntryPointRules } from '../types/index.js';
import { DEFAULT_ENTRY_POINT_RULES, DIR_PATTERNS } from '../constants/index.js';
import { isDirectory, listFiles, readTextFile } from '../utils/fs.js';
import { walkFiles } from '../utils/file-walker.js';
import { logger } from '../utils/logger.js';

export type EntryPointSource = 'bin' | 'source-scan';

export interface InferredEntryPoint {
  /** Path relative to the package root, always with `/` separators */
  relativePath: string;
  source: EntryPointSource;
}

function toPosix(relativePath: string): string {
  return sep === '/' ? relativePath : relativePath.split(sep).join('/');
}

async function findBinEntry(packageRoot: string): Promise<string | undefined> {
  const binDir = join(packageRoot, DIR_PATTERNS.BIN);
  if (!(await isDirectory(binDir))) {
    return undefined;
  }

  const [first] = await listFiles(binDir);
  if (first === undefined) {
    logger.debug(`'${DIR_PATTERNS.BIN}' directory holds no regular files, scanning sources`, { binDir });
    return undefined;
  }

  return `${DIR_PATTERNS.BIN}/${first}`;
}

async function findMarkedSource(packageRoot: string, rules: EntryPointRules): Promise<string | undefined> {
  const extensions = new Set(rules.extensions);

  for await (const filePath of walkFiles(packageRoot)) {
    if (!extensions.has(extname(filePath))) {
      continue;
    }

    let content: string;
    try {
      content = await readTextFile(filePath);
    } catch (error) {
      logger.warn(`Skipping unreadable file during entry-point scan: ${filePath}`, { error });
      continue;
    }

    if (content.includes(rules.marker)) {
      return toPosix(relative(packageRoot, filePath));
    }
  }

  return undefined;
}

/**
 * Determine the entry point of a fetched package, with the branch that
 * produced it.
 */
export async function resolveEntryPoint(
  packageRoot: string,
  rules: EntryPointRules = DEFAULT_ENTRY_POINT_RULES
): Promise<InferredEntryPoint | undefined> {
  const binEntry = await findBinEntry(packageRoot);
  if (binEntry) {
    return { relativePath: binEntry, source: 'bin' };
  }

  const sourceEntry = await findMarkedSource(packageRoot, rules);
  if (sourceEntry) {
    return { relativePath: sourceEntry, source: 'source-scan' };
  }

  return undefined;
}

/**
 * Determine the entry point of a fetched package as a path relative to its
 * root, or `undefined` when neither a `bin/` file nor a marked source file
 * exists.
 */
export async function inferEntryPoint(
  packageRoot: string,
  rules: EntryPointRules = DEFAULT_ENTRY_POINT_RULES
): Promise<string | undefined> {
  const entry = await resolveEntryPoint(packageRoot, rules);
  return entry?.relativePath;
}
