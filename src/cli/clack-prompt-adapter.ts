/**
 * Clack Prompt Adapter
 *
 * PromptPort implementation that routes to @clack/prompts for interactive
 * terminal sessions.
 */

import * as clack from '@clack/prompts';
import type { PromptPort, TextPromptOptions } from '../core/ports/prompt.js';
import { UserCancellationError } from '../utils/errors.js';

/**
 * Create a Clack-based PromptPort for interactive terminal sessions.
 */
export function createClackPrompt(): PromptPort {
  return {
    async text(message: string, options?: TextPromptOptions): Promise<string> {
      const result = await clack.text({
        message,
        placeholder: options?.placeholder
      });
      if (clack.isCancel(result)) {
        clack.cancel('Operation cancelled.');
        throw new UserCancellationError('Operation cancelled by user');
      }
      // Submitting an empty line yields no value
      return typeof result === 'string' ? result : '';
    }
  };
}
