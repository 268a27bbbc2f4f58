/**
 * Home Directory Utilities
 *
 * Path resolution and display normalization for the invoking user's home.
 */

import { homedir } from 'os';
import { resolve, normalize } from 'path';

/**
 * Get the home directory path.
 *
 * @returns Absolute path to the user's home directory
 */
export function getHomeDirectory(): string {
  return homedir();
}

/**
 * Convert a path under the home directory to tilde notation for display.
 *
 * Only converts if the path is exactly the home directory or
 * a subdirectory of it. Other paths are returned unchanged.
 *
 * @param path - Absolute path to normalize
 * @param homeDir - Home directory to compare against
 */
export function normalizePathWithTilde(path: string, homeDir: string = getHomeDirectory()): string {
  const normalizedPath = normalize(resolve(path));
  const normalizedHome = normalize(resolve(homeDir));

  if (normalizedPath === normalizedHome) {
    return '~/';
  }

  if (normalizedPath.startsWith(normalizedHome + '/')) {
    return '~/' + normalizedPath.slice(normalizedHome.length + 1);
  }

  return normalizedPath;
}
