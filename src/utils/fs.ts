import { promises as fs, constants as fsConstants, type Dirent } from 'fs';
import { dirname, join } from 'path';
import { parse as parseJsonc, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { isJunk } from 'junk';
import { logger } from './logger.js';
import { FileSystemError, describeError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check if a path is a file
 */
export async function isFile(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Write text to a file
 */
export async function writeTextFile(path: string, content: string, encoding: BufferEncoding = 'utf8'): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(path, content, encoding);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    if (error instanceof FileSystemError) {
      throw error;
    }
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Write object to JSON file
 */
export async function writeJsonFile(path: string, data: unknown, indent: number = 2): Promise<void> {
  const content = `${JSON.stringify(data, null, indent)}\n`;
  await writeTextFile(path, content);
}

/**
 * Read a JSON or JSONC file and parse it.
 * Syntax errors are reported rather than silently recovered from.
 */
export async function readJsonOrJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const first = errors[0];
    throw new FileSystemError(`Failed to parse JSON/JSONC file: ${path}`, {
      path,
      error: printParseErrorCode(first.error),
      offset: first.offset
    });
  }
  return result;
}

/**
 * Remove a file or directory recursively
 */
export async function remove(path: string): Promise<void> {
  try {
    await fs.rm(path, { recursive: true });
    logger.debug(`Removed: ${path}`);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      // File doesn't exist, which is fine
      return;
    }
    throw new FileSystemError(`Failed to remove ${path} (${describeError(error)})`, { path, error });
  }
}

/**
 * Move a file or directory, replacing whatever is at the destination.
 */
export async function move(src: string, dest: string): Promise<void> {
  try {
    await fs.rm(dest, { recursive: true, force: true });
    await ensureDir(dirname(dest));
    await fs.rename(src, dest);
    logger.debug(`Moved: ${src} -> ${dest}`);
  } catch (error) {
    if (error instanceof FileSystemError) {
      throw error;
    }
    throw new FileSystemError(`Failed to move ${src} -> ${dest} (${describeError(error)})`, { src, dest, error });
  }
}

/**
 * True for a regular file, or a symbolic link that resolves to one.
 * Dangling links are not files.
 */
export async function isFileEntry(dirPath: string, entry: Dirent): Promise<boolean> {
  if (entry.isFile()) {
    return true;
  }
  if (!entry.isSymbolicLink()) {
    return false;
  }
  return isFile(join(dirPath, entry.name));
}

/**
 * List regular files in a directory (non-recursive), skipping OS junk
 * files, sorted by name. Links to files are listed under their own name.
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    throw new FileSystemError(`Failed to list files in directory: ${dirPath}`, { dirPath, error });
  }

  const names: string[] = [];
  for (const entry of entries) {
    if (!isJunk(entry.name) && (await isFileEntry(dirPath, entry))) {
      names.push(entry.name);
    }
  }
  return names.sort(compareNames);
}

/**
 * Compare names by UTF-16 code unit (not locale-aware).
 */
export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
