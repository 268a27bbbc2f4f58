import type { OperationResult } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import { resolveOutput } from '../ports/resolve.js';

export interface InstallResult {
  appName: string;
}

/**
 * install: placeholder for installing an app from a repository.
 * Acknowledges the request and changes nothing on disk.
 */
export async function installApp(
  ctx: ExecutionContext,
  appName: string
): Promise<OperationResult<InstallResult>> {
  resolveOutput(ctx).info(`Installing app: ${appName}`);
  return { success: true, data: { appName } };
}
