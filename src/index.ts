#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { splitForwardedArgs } from './cli/forwarded-args.js';

// Import command setup functions
import { setupInstallCommand } from './commands/install.js';
import { setupBootstrapCommand } from './commands/bootstrap.js';
import { setupRunCommand } from './commands/run.js';
import { setupDeleteCommand } from './commands/delete.js';

/**
 * aapp CLI - Main entry point
 *
 * Bootstraps app bundles from packages, runs them, and deletes them.
 */

/**
 * Build the Commander program. Tokens after `run <bundle> --args` are
 * handed to the run command directly instead of being parsed.
 */
export function createProgram(forwarded: string[] = []): Command {
  const program = new Command();

  program
    .name('aapp')
    .description('aapp-cli: Advanced App CLI')
    .version(getVersion())
    .configureHelp({ sortSubcommands: true });

  setupInstallCommand(program);
  setupBootstrapCommand(program);
  setupRunCommand(program, forwarded);
  setupDeleteCommand(program);

  return program;
}

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Set AAPP_VERBOSE=1 for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Set AAPP_VERBOSE=1 for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  const { argv: parsedArgv, forwarded } = splitForwardedArgs(argv);
  const program = createProgram(forwarded);

  // No command: show help and exit successfully
  if (parsedArgv.length <= 2) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(parsedArgv);
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('aapp')
  )) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}
