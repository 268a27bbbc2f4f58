import { Command } from 'commander';

import { deleteBundle } from '../core/bundle/delete.js';
import { createCliExecutionContext } from '../cli/context.js';
import { applyExitCode, withErrorHandling } from '../cli/error-handling.js';

export function setupDeleteCommand(program: Command): void {
  program
    .command('delete')
    .description('Delete an app bundle')
    .argument('<bundle_name>', 'name of the app bundle to delete')
    .action(withErrorHandling(async (bundleName: string) => {
      const ctx = await createCliExecutionContext();
      applyExitCode(await deleteBundle(ctx, bundleName));
    }));
}
