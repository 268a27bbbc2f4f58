/**
 * CLI-specific error handling for Commander.js actions.
 *
 * Lives in the CLI layer (not core) because it sets the process exit code
 * and writes directly to stderr.
 */

import { AappError, type OperationResult } from '../types/index.js';
import { EXIT_CODES } from '../constants/index.js';
import { handleError, UserCancellationError } from '../utils/errors.js';

/**
 * Exit code for an error escaping an operation: the code of its kind for
 * aapp errors (e.g. 3 for an invalid config file), 1 for anything else.
 */
export function exitCodeForError(error: unknown): number {
  return error instanceof AappError ? EXIT_CODES[error.code] : 1;
}

/**
 * Wraps an async function with error handling for Commander.js actions.
 * Errors escaping an operation are unexpected (e.g. permission denied
 * creating root directories): they are reported and exit with
 * `exitCodeForError`.
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      // Handle user cancellation gracefully - just exit without error message
      if (error instanceof UserCancellationError) {
        process.exit(0);
      }

      const result = handleError(error);
      console.error(`❌ ${result.error}`);
      process.exit(exitCodeForError(error));
    }
  };
}

/**
 * Map an operation outcome onto the process exit code. The operation has
 * already reported its own message.
 */
export function applyExitCode<T>(result: OperationResult<T>): void {
  if (!result.success) {
    process.exitCode = EXIT_CODES[result.code];
  }
}
