/**
 * delete: remove a bundle directory after interactive confirmation.
 */

import { AappError, ErrorCodes, type OperationResult } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import { validateName } from '../../utils/bundle-name.js';
import { describeError, UserCancellationError } from '../../utils/errors.js';
import { isDirectory } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { getBundlePath } from '../directory.js';
import { getDisplayPath } from '../execution-context.js';
import { NonInteractivePromptError } from '../ports/console-prompt.js';
import { resolveOutput, resolvePrompt } from '../ports/resolve.js';
import { failOperation } from './operation-result.js';

export interface DeleteResult {
  bundleRoot: string;
  deleted: boolean;
}

/**
 * Only a single `y` (any case, surrounding whitespace ignored) confirms.
 */
export function isAffirmativeAnswer(answer: string): boolean {
  return answer.trim().toLowerCase() === 'y';
}

async function askForConfirmation(ctx: ExecutionContext, bundleName: string): Promise<boolean> {
  try {
    const answer = await resolvePrompt(ctx).text(`Delete ${bundleName}? (Y/n)`, { placeholder: 'y/n' });
    return isAffirmativeAnswer(answer);
  } catch (error) {
    if (error instanceof UserCancellationError || error instanceof NonInteractivePromptError) {
      logger.debug('Delete confirmation not given', { reason: error.message });
      return false;
    }
    throw error;
  }
}

export async function deleteBundle(
  ctx: ExecutionContext,
  bundleName: string
): Promise<OperationResult<DeleteResult>> {
  const output = resolveOutput(ctx);

  try {
    validateName(bundleName, 'bundle');
  } catch (error) {
    if (error instanceof AappError) {
      return failOperation(ctx, error.code, error.message);
    }
    throw error;
  }

  const { directories } = ctx;
  const bundleRoot = getBundlePath(directories, bundleName);

  if (!(await isDirectory(bundleRoot))) {
    return failOperation(
      ctx,
      ErrorCodes.BUNDLE_NOT_FOUND,
      `App bundle '${bundleName}' not found in '${getDisplayPath(ctx, directories.bundleDir)}'.`
    );
  }

  if (!(await askForConfirmation(ctx, bundleName))) {
    output.info(`${bundleName} was not deleted.`);
    return { success: true, data: { bundleRoot, deleted: false } };
  }

  try {
    await ctx.remover.remove(bundleRoot);
  } catch (error) {
    return failOperation(
      ctx,
      ErrorCodes.DELETE_FAILED,
      `Failed to delete ${bundleName}: ${describeError(error)}`,
      { bundleRoot, error }
    );
  }

  output.success(`Deleted ${bundleName}.`);
  return { success: true, data: { bundleRoot, deleted: true } };
}
