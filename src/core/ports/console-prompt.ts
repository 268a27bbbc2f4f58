/**
 * Non-Interactive Prompt Adapter (Default)
 *
 * PromptPort implementation that throws on any prompt attempt.
 */

import type { PromptPort, TextPromptOptions } from './prompt.js';

export class NonInteractivePromptError extends Error {
  constructor(promptType: string) {
    super(`Cannot prompt for ${promptType} in non-interactive mode.`);
    this.name = 'NonInteractivePromptError';
  }
}

export const nonInteractivePrompt: PromptPort = {
  async text(_message: string, _options?: TextPromptOptions): Promise<string> {
    throw new NonInteractivePromptError('text input');
  }
};
