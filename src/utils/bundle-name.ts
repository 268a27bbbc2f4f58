import { InvalidNameError } from './errors.js';

/**
 * Validate a package or bundle name before it is used as a directory name
 * under the bundle store.
 *
 * @throws InvalidNameError if the name is empty, padded with whitespace, a
 *         dot segment, or contains a path separator
 */
export function validateName(name: string, kind: 'package' | 'bundle' = 'package'): void {
  if (name.trim().length === 0) {
    throw new InvalidNameError(kind, name, 'name cannot be empty');
  }

  if (name.trim() !== name) {
    throw new InvalidNameError(kind, name, 'name cannot have leading or trailing spaces');
  }

  if (name === '.' || name === '..') {
    throw new InvalidNameError(kind, name, 'name cannot be a relative path segment');
  }

  if (/[\/\\\0]/.test(name)) {
    throw new InvalidNameError(kind, name, 'name cannot contain path separators');
  }
}

/**
 * Derive the bundle name from a package name: hyphens become underscores.
 */
export function toBundleName(packageName: string): string {
  return packageName.replace(/-/g, '_');
}
