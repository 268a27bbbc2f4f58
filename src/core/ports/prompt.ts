/**
 * Prompt Port Interface
 *
 * Defines the contract for interactive user input.
 * Core logic uses this interface instead of readline or @clack/prompts directly.
 *
 * Implementations:
 *   - ClackPromptAdapter (CLI, TTY): routes to @clack/prompts
 *   - PlainPromptAdapter (CLI, piped stdin): reads a line with readline
 *   - NonInteractivePromptAdapter (default): throws on prompt attempts
 */

/**
 * Options for text input prompts.
 */
export interface TextPromptOptions {
  placeholder?: string;
}

export interface PromptPort {
  /**
   * Prompt for a line of free text. Resolves with the raw answer (possibly
   * empty); rejects with UserCancellationError when the user aborts.
   */
  text(message: string, options?: TextPromptOptions): Promise<string>;
}
