/**
 * Shared constants for the aapp CLI.
 * Single source of truth for directory names, file names and defaults.
 */

import { ErrorCodes } from '../types/index.js';

export const APP_NAME = 'aapp-cli';

export const DIR_PATTERNS = {
  /** Per-user config/scratch root under the home directory */
  USER_ROOT: '.aapp-cli',
  /** Per-user bundle store under the home directory */
  USER_BUNDLES: '.apps',
  USER_TEMP: 'tmp',
  /** Conventional executables directory inside a package */
  BIN: 'bin'
} as const;

export const SYSTEM_PATHS = {
  ROOT: '/usr/share/aapp-cli',
  TEMP: '/usr/share/aapp-cli/temp',
  BUNDLES: '/usr/apps'
} as const;

export const FILE_PATTERNS = {
  METADATA_JSON: 'metadata.json',
  CONFIG_FILES: ['config.jsonc', 'config.json']
} as const;

export const BUNDLE_DEFAULTS = {
  VERSION: '1.0.0',
  DESCRIPTION_PREFIX: 'App bundle for '
} as const;

/**
 * Placeholders substituted into the provider argument template.
 */
export const PROVIDER_PLACEHOLDERS = {
  PACKAGE: '{package}',
  TARGET: '{target}'
} as const;

export const DEFAULT_PROVIDER = {
  command: 'apkg',
  args: ['get-pypi', PROVIDER_PLACEHOLDERS.PACKAGE, '-t', PROVIDER_PLACEHOLDERS.TARGET]
};

export const DEFAULT_ENTRY_POINT_RULES = {
  extensions: ['.py'],
  marker: 'def main()'
};

export const ENV_VARS = {
  PROVIDER: 'AAPP_PROVIDER'
} as const;

/**
 * Process exit codes, one per failure kind. 0 is success (including a
 * declined deletion), 1 is an unexpected failure escaping an operation.
 */
export const EXIT_CODES: Record<ErrorCodes, number> = {
  [ErrorCodes.FILE_SYSTEM_ERROR]: 1,
  [ErrorCodes.CONFIG_ERROR]: 3,
  [ErrorCodes.INVALID_NAME]: 2,
  [ErrorCodes.FETCH_FAILED]: 10,
  [ErrorCodes.NO_ENTRY_POINT]: 11,
  [ErrorCodes.BUNDLE_NOT_FOUND]: 20,
  [ErrorCodes.METADATA_MISSING]: 21,
  [ErrorCodes.METADATA_CORRUPT]: 22,
  [ErrorCodes.EXECUTABLE_MISSING]: 23,
  [ErrorCodes.EXECUTION_FAILED]: 24,
  [ErrorCodes.DELETE_FAILED]: 30
};
