import { Command } from 'commander';

import { runBundle } from '../core/bundle/run.js';
import { createCliExecutionContext } from '../cli/context.js';
import { applyExitCode, withErrorHandling } from '../cli/error-handling.js';
import { FORWARD_FLAG } from '../cli/forwarded-args.js';

/**
 * @param forwarded - tokens split off after `--args` before parsing
 */
export function setupRunCommand(program: Command, forwarded: string[]): void {
  program
    .command('run')
    .description('Run an app bundle')
    .argument('<bundle_name>', 'name of the app bundle to run')
    .option(`${FORWARD_FLAG} [args...]`, 'additional arguments for the app (everything after --args is forwarded)')
    .action(withErrorHandling(async (bundleName: string) => {
      const ctx = await createCliExecutionContext();
      applyExitCode(await runBundle(ctx, bundleName, forwarded));
    }));
}
