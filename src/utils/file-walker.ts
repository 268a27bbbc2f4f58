/**
 * File Walker Utility
 *
 * Deterministic depth-first traversal of a directory tree. Within each
 * directory, regular files are yielded before descending into
 * subdirectories, and both groups are visited in code-unit name order.
 * A symbolic link to a file is yielded like a file; links to directories
 * are never descended into.
 */

import { promises as fs, type Dirent } from 'fs';
import { join } from 'path';
import { compareNames, errnoCode, isFileEntry } from './fs.js';

/**
 * Async generator that walks a directory tree and yields file paths
 *
 * @example
 * for await (const filePath of walkFiles('/path/to/dir')) {
 *   console.log(filePath);
 * }
 */
export async function* walkFiles(dir: string): AsyncGenerator<string> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    // Ignore permission errors and continue
    const code = errnoCode(error);
    if (code === 'EACCES' || code === 'EPERM') {
      return;
    }
    throw error;
  }

  const files: string[] = [];
  const directories: string[] = [];

  for (const entry of entries.sort((a, b) => compareNames(a.name, b.name))) {
    if (entry.isDirectory()) {
      directories.push(join(dir, entry.name));
    } else if (await isFileEntry(dir, entry)) {
      files.push(join(dir, entry.name));
    }
  }

  yield* files;

  for (const subdir of directories) {
    yield* walkFiles(subdir);
  }
}
