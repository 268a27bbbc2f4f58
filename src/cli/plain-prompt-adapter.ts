/**
 * Plain Prompt Adapter
 *
 * PromptPort implementation that reads a line with Node's readline module.
 * Used when stdin is not a TTY (piped answers) or when plain output is
 * requested. Prompts go to stderr so stdout stays clean for piping.
 */

import { createInterface, type Interface as ReadlineInterface } from 'node:readline';
import type { PromptPort, TextPromptOptions } from '../core/ports/prompt.js';
import { UserCancellationError } from '../utils/errors.js';

/** Create a one-shot readline interface. */
function createRl(): ReadlineInterface {
  return createInterface({
    input: process.stdin,
    output: process.stderr,
    terminal: process.stdin.isTTY === true
  });
}

/** Read a single line, handling Ctrl-C / EOF as cancellation. */
function askLine(rl: ReadlineInterface, query: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    rl.question(query, (answer) => {
      resolve(answer);
    });
    rl.once('close', () => {
      reject(new UserCancellationError('Prompt cancelled'));
    });
    rl.once('SIGINT', () => {
      rl.close();
      reject(new UserCancellationError('Prompt cancelled'));
    });
  });
}

export function createPlainPrompt(): PromptPort {
  return {
    async text(message: string, _options?: TextPromptOptions): Promise<string> {
      const rl = createRl();
      try {
        return await askLine(rl, `${message}: `);
      } finally {
        rl.close();
      }
    }
  };
}
