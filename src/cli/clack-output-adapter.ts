/**
 * Clack Output Adapter
 *
 * CLI-specific OutputPort implementations: @clack/prompts for interactive
 * terminal sessions, plain console for piped output and CI.
 */

import { log } from '@clack/prompts';
import type { OutputPort } from '../core/ports/output.js';

/**
 * Create a Clack-based OutputPort for interactive terminal sessions.
 */
export function createClackOutput(): OutputPort {
  return {
    info(message: string): void {
      log.info(message);
    },

    step(message: string): void {
      log.step(message);
    },

    success(message: string): void {
      log.success(message);
    },

    error(message: string): void {
      log.error(message);
    },

    warn(message: string): void {
      log.warn(message);
    }
  };
}

/**
 * Create a plain console OutputPort for non-interactive sessions (CI, piped output).
 * Errors and warnings go to stderr.
 */
export function createPlainOutput(): OutputPort {
  return {
    info(message: string): void {
      console.log(message);
    },

    step(message: string): void {
      console.log(message);
    },

    success(message: string): void {
      console.log(message);
    },

    error(message: string): void {
      console.error(message);
    },

    warn(message: string): void {
      console.error(message);
    }
  };
}
