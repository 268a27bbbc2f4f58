/**
 * Execution Context Types
 *
 * Everything a lifecycle operation needs, resolved once per invocation and
 * passed explicitly: root directories derived from the privilege context,
 * loaded configuration, and the ports to the outside world.
 */

import type { AappConfig, RootDirectories } from './index.js';
import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';
import type { PackageProvider } from '../core/ports/package-provider.js';
import type { ProcessRunner } from '../core/ports/process-runner.js';
import type { FileRemover } from '../core/ports/file-remover.js';
import type { PrivilegeCheck } from '../core/privilege-context.js';

export interface ExecutionContext {
  /**
   * True if the process holds elevated (root-equivalent) privilege.
   */
  elevated: boolean;

  /**
   * Home directory the unprivileged roots hang off; also used to shorten
   * paths for display.
   */
  homeDir: string;

  /**
   * Root directories for this invocation.
   */
  directories: RootDirectories;

  /**
   * Configuration loaded from `directories.configDir`, or the defaults.
   */
  config: AappConfig;

  /**
   * Working directory executed bundles inherit.
   */
  cwd: string;

  /**
   * Fetches packages into a target directory.
   */
  provider: PackageProvider;

  /**
   * Spawns bundle entry points.
   */
  runner: ProcessRunner;

  /**
   * Removes bundle directories.
   */
  remover: FileRemover;

  /**
   * Output port for all user-facing messages.
   * When not provided, defaults to consoleOutput (plain console.log).
   */
  output?: OutputPort;

  /**
   * Prompt port for interactive input.
   * When not provided, defaults to nonInteractivePrompt (throws on prompt).
   */
  prompt?: PromptPort;
}

/**
 * Options for creating an ExecutionContext
 */
export interface ExecutionOptions {
  /** Privilege capability (defaults to the effective-uid check) */
  privilegeCheck?: PrivilegeCheck;

  /** Home directory used for unprivileged roots (defaults to os.homedir()) */
  homeDir?: string;

  /** Working directory for executed bundles (defaults to process.cwd()) */
  cwd?: string;

  /** Environment consulted for overrides (defaults to process.env) */
  env?: NodeJS.ProcessEnv;

  provider?: PackageProvider;
  runner?: ProcessRunner;
  remover?: FileRemover;
  output?: OutputPort;
  prompt?: PromptPort;
}
