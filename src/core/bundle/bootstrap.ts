/**
 * bootstrap: fetch a package into the bundle store and turn it into a
 * runnable bundle.
 *
 * Steps are not transactional. A previous bundle of the same name, and any
 * leftover fetch directory, are removed before fetching, so nothing of an
 * earlier bootstrap survives into the new bundle. A failure after the
 * fetch leaves the fetched directory in place without a metadata record,
 * which `run` later reports as missing metadata.
 */

import { join } from 'path';
import { AappError, ErrorCodes, type BundleMetadata, type OperationResult } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import { validateName, toBundleName } from '../../utils/bundle-name.js';
import { isDirectory, move } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { ensureRootDirectories, getBundlePath } from '../directory.js';
import { resolveEntryPoint, type EntryPointSource } from '../entry-point.js';
import { writeBundleMetadata } from '../metadata.js';
import { getDisplayPath } from '../execution-context.js';
import { resolveOutput } from '../ports/resolve.js';
import { failOperation } from './operation-result.js';

export interface BootstrapResult {
  bundleName: string;
  bundleRoot: string;
  metadata: BundleMetadata;
  entrySource: EntryPointSource;
}

export async function bootstrapBundle(
  ctx: ExecutionContext,
  packageName: string
): Promise<OperationResult<BootstrapResult>> {
  const output = resolveOutput(ctx);

  try {
    validateName(packageName, 'package');
  } catch (error) {
    if (error instanceof AappError) {
      return failOperation(ctx, error.code, error.message);
    }
    throw error;
  }

  const { directories } = ctx;
  await ensureRootDirectories(directories);

  const packageDir = join(directories.bundleDir, packageName);
  const bundleName = toBundleName(packageName);
  const bundleRoot = getBundlePath(directories, bundleName);

  // Clear earlier state
  if (await isDirectory(bundleRoot)) {
    logger.warn(`Replacing existing app bundle '${bundleName}'`, { bundleRoot });
  }
  await ctx.remover.remove(bundleRoot);
  if (packageDir !== bundleRoot) {
    await ctx.remover.remove(packageDir);
  }

  // Fetch
  output.step(`Fetching '${packageName}' into '${getDisplayPath(ctx, packageDir)}'`);

  const fetched = await ctx.provider.fetch(packageName, packageDir);
  if (!fetched.success) {
    return failOperation(
      ctx,
      ErrorCodes.FETCH_FAILED,
      `Failed to download and install '${packageName}': ${fetched.reason}`,
      { packageDir }
    );
  }
  output.info(`'${packageName}' successfully installed in '${getDisplayPath(ctx, packageDir)}'.`);

  // Infer entry point
  const entry = await resolveEntryPoint(packageDir, ctx.config.entryPoint);
  if (!entry) {
    return failOperation(
      ctx,
      ErrorCodes.NO_ENTRY_POINT,
      `No files in 'bin' and no file containing '${ctx.config.entryPoint.marker}' found in '${packageName}'; ` +
        `app bundle not created.`,
      { packageDir }
    );
  }
  logger.debug('Entry point inferred', { packageName, entry });

  // Write metadata next to the fetched files
  if (bundleRoot !== packageDir) {
    logger.debug(`Relocating fetched package to bundle directory`, { from: packageDir, to: bundleRoot });
    await move(packageDir, bundleRoot);
  }

  const metadata = await writeBundleMetadata(directories.bundleDir, bundleName, entry.relativePath);
  output.success(`App bundle created at '${getDisplayPath(ctx, bundleRoot)}'.`);

  return {
    success: true,
    data: { bundleName, bundleRoot, metadata, entrySource: entry.source }
  };
}
