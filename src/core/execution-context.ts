/**
 * Execution Context Module
 *
 * Creates the ExecutionContext every lifecycle operation receives. This is
 * the single place where the privilege context is resolved, the root
 * directories are derived, and configuration is loaded; operations never
 * consult process-global state themselves.
 */

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { getHomeDirectory, normalizePathWithTilde } from '../utils/home-directory.js';
import { logger } from '../utils/logger.js';
import { processPrivilegeCheck, resolvePrivilegeContext } from './privilege-context.js';
import { ConfigManager } from './config.js';
import { CommandPackageProvider } from './ports/package-provider.js';
import { spawnProcessRunner } from './ports/process-runner.js';
import { fsRemover } from './ports/file-remover.js';

/**
 * Create an ExecutionContext from options.
 *
 * Defaults: effective-uid privilege check, `os.homedir()`, `process.cwd()`,
 * `process.env`, the command-based package provider from configuration,
 * the spawning process runner and the fs remover.
 *
 * @throws ConfigError if a config file exists but is invalid
 */
export async function createExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const homeDir = options.homeDir ?? getHomeDirectory();
  const { elevated, directories } = resolvePrivilegeContext(
    options.privilegeCheck ?? processPrivilegeCheck,
    homeDir
  );

  const config = await new ConfigManager(directories.configDir, options.env ?? process.env).load();
  const runner = options.runner ?? spawnProcessRunner;

  const context: ExecutionContext = {
    elevated,
    homeDir,
    directories,
    config,
    cwd: options.cwd ?? process.cwd(),
    provider: options.provider ?? new CommandPackageProvider(config.provider, runner),
    runner,
    remover: options.remover ?? fsRemover,
    output: options.output,
    prompt: options.prompt
  };

  logger.debug('Created execution context', {
    elevated: context.elevated,
    directories: context.directories,
    cwd: context.cwd
  });

  return context;
}

/**
 * Get a display-friendly version of a path (~/ for the home directory).
 */
export function getDisplayPath(context: ExecutionContext, path: string): string {
  return normalizePathWithTilde(path, context.homeDir);
}
