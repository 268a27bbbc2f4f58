import type { ErrorCodes, OperationResult } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import { resolveOutput } from '../ports/resolve.js';
import { logger } from '../../utils/logger.js';

/**
 * Report a recovered failure to the user and turn it into a result.
 */
export function failOperation<T>(
  ctx: ExecutionContext,
  code: ErrorCodes,
  message: string,
  details?: unknown
): OperationResult<T> {
  logger.debug(`Operation failed: ${code}`, details);
  resolveOutput(ctx).error(message);
  return { success: false, code, error: message };
}
