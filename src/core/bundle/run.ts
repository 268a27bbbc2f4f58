/**
 * run: resolve a bundle's metadata and execute its entry point.
 */

import { resolve } from 'path';
import { AappError, ErrorCodes, type OperationResult } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { validateName } from '../../utils/bundle-name.js';
import { exists, isDirectory } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { getBundlePath } from '../directory.js';
import { readBundleMetadata } from '../metadata.js';
import { getDisplayPath } from '../execution-context.js';
import { describeOutcome, isSuccessfulOutcome } from '../ports/process-runner.js';
import { failOperation } from './operation-result.js';

export interface RunResult {
  executablePath: string;
  args: string[];
}

export async function runBundle(
  ctx: ExecutionContext,
  bundleName: string,
  extraArgs: string[] = []
): Promise<OperationResult<RunResult>> {
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

  const read = await readBundleMetadata(bundleRoot);
  if (read.status === 'not-found') {
    return failOperation(
      ctx,
      ErrorCodes.METADATA_MISSING,
      `${FILE_PATTERNS.METADATA_JSON} not found in app bundle '${bundleName}'.`,
      { path: read.path }
    );
  }
  if (read.status === 'corrupt') {
    return failOperation(
      ctx,
      ErrorCodes.METADATA_CORRUPT,
      `${FILE_PATTERNS.METADATA_JSON} of app bundle '${bundleName}' is corrupt: ${read.reason}`,
      { path: read.path }
    );
  }

  const { bin } = read.metadata;
  if (!bin) {
    return failOperation(
      ctx,
      ErrorCodes.EXECUTABLE_MISSING,
      `Executable information not found in ${FILE_PATTERNS.METADATA_JSON} of app bundle '${bundleName}'.`
    );
  }

  const executablePath = resolve(bundleRoot, bin);
  if (!(await exists(executablePath))) {
    return failOperation(
      ctx,
      ErrorCodes.EXECUTABLE_MISSING,
      `Executable '${getDisplayPath(ctx, executablePath)}' not found.`
    );
  }

  logger.debug(`Running bundle '${bundleName}'`, { executablePath, args: extraArgs });
  const outcome = await ctx.runner.run(executablePath, extraArgs, { cwd: ctx.cwd });
  if (!isSuccessfulOutcome(outcome)) {
    return failOperation(
      ctx,
      ErrorCodes.EXECUTION_FAILED,
      `Failed to run '${getDisplayPath(ctx, executablePath)}': ${describeOutcome(outcome)}.`,
      { outcome }
    );
  }

  return { success: true, data: { executablePath, args: extraArgs } };
}
