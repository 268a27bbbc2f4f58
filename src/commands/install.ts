import { Command } from 'commander';

import { installApp } from '../core/bundle/install.js';
import { createCliExecutionContext } from '../cli/context.js';
import { applyExitCode, withErrorHandling } from '../cli/error-handling.js';

export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .description('Install an app from a repository')
    .argument('<app_name>', 'name of the app to install')
    .action(withErrorHandling(async (appName: string) => {
      const ctx = await createCliExecutionContext();
      applyExitCode(await installApp(ctx, appName));
    }));
}
