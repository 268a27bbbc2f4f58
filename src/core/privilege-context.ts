/**
 * Privilege context resolution.
 *
 * Whether the process runs elevated decides which root directories an
 * invocation works in. The check itself is an injected capability so the
 * resolution stays a pure function of its inputs.
 */

import { join } from 'path';
import type { RootDirectories } from '../types/index.js';
import { DIR_PATTERNS, SYSTEM_PATHS } from '../constants/index.js';

export interface PrivilegeCheck {
  isElevated(): boolean;
}

export interface PrivilegeContext {
  elevated: boolean;
  directories: RootDirectories;
}

/**
 * Effective-uid check. Hosts without `process.geteuid` (Windows) are
 * treated as unprivileged.
 */
export const processPrivilegeCheck: PrivilegeCheck = {
  isElevated(): boolean {
    return typeof process.geteuid === 'function' && process.geteuid() === 0;
  }
};

export function resolveRootDirectories(elevated: boolean, homeDir: string): RootDirectories {
  if (elevated) {
    return {
      tempDir: SYSTEM_PATHS.TEMP,
      bundleDir: SYSTEM_PATHS.BUNDLES,
      configDir: SYSTEM_PATHS.ROOT
    };
  }

  const userRoot = join(homeDir, DIR_PATTERNS.USER_ROOT);
  return {
    tempDir: join(userRoot, DIR_PATTERNS.USER_TEMP),
    bundleDir: join(homeDir, DIR_PATTERNS.USER_BUNDLES),
    configDir: userRoot
  };
}

export function resolvePrivilegeContext(check: PrivilegeCheck, homeDir: string): PrivilegeContext {
  const elevated = check.isElevated();
  return {
    elevated,
    directories: resolveRootDirectories(elevated, homeDir)
  };
}
