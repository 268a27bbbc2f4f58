import { Command } from 'commander';

import { bootstrapBundle } from '../core/bundle/bootstrap.js';
import { createCliExecutionContext } from '../cli/context.js';
import { applyExitCode, withErrorHandling } from '../cli/error-handling.js';

export function setupBootstrapCommand(program: Command): void {
  program
    .command('bootstrap')
    .description('Bootstrap an app bundle from a package')
    .argument('<package_name>', 'name of the package to bootstrap')
    .action(withErrorHandling(async (packageName: string) => {
      const ctx = await createCliExecutionContext();
      applyExitCode(await bootstrapBundle(ctx, packageName));
    }));
}
