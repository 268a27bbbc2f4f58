/**
 * Package Provider Port
 *
 * Fetches a named package into a target directory. The core only needs to
 * know whether the fetch succeeded; the reason for a failure is opaque and
 * reported as-is.
 */

import type { ProviderConfig } from '../../types/index.js';
import { PROVIDER_PLACEHOLDERS } from '../../constants/index.js';
import { logger } from '../../utils/logger.js';
import { describeOutcome, isSuccessfulOutcome, spawnProcessRunner, type ProcessRunner } from './process-runner.js';

export type FetchOutcome =
  | { success: true }
  | { success: false; reason: string };

export interface PackageProvider {
  fetch(packageName: string, targetDir: string): Promise<FetchOutcome>;
}

const PLACEHOLDER_PATTERN = /\{(package|target)\}/g;

/**
 * Substitute `{package}` and `{target}` in each argument of the template.
 * Substituted values are never scanned for placeholders again.
 */
export function buildProviderArgs(template: string[], packageName: string, targetDir: string): string[] {
  const values: Record<string, string> = {
    [PROVIDER_PLACEHOLDERS.PACKAGE]: packageName,
    [PROVIDER_PLACEHOLDERS.TARGET]: targetDir
  };
  return template.map(arg => arg.replace(PLACEHOLDER_PATTERN, placeholder => values[placeholder] ?? placeholder));
}

/**
 * Provider backed by an external command, e.g.
 * `apkg get-pypi <package> -t <target>`.
 */
export class CommandPackageProvider implements PackageProvider {
  constructor(
    private readonly config: ProviderConfig,
    private readonly runner: ProcessRunner = spawnProcessRunner
  ) {}

  async fetch(packageName: string, targetDir: string): Promise<FetchOutcome> {
    const args = buildProviderArgs(this.config.args, packageName, targetDir);
    logger.debug('Invoking package provider', { command: this.config.command, args });

    const outcome = await this.runner.run(this.config.command, args);
    if (isSuccessfulOutcome(outcome)) {
      return { success: true };
    }

    return { success: false, reason: `'${this.config.command}' ${describeOutcome(outcome)}` };
  }
}
