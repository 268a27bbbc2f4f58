/**
 * Process Runner Port
 *
 * Spawns an executable with an argument vector (never a shell string),
 * inheriting the parent's standard streams, and waits for it to exit.
 */

import { spawn } from 'child_process';
import { logger } from '../../utils/logger.js';

export interface RunProcessOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export type ProcessOutcome =
  | { status: 'exited'; exitCode: number }
  | { status: 'signaled'; signal: NodeJS.Signals }
  | { status: 'failed-to-start'; error: Error };

export interface ProcessRunner {
  run(executable: string, args: string[], options?: RunProcessOptions): Promise<ProcessOutcome>;
}

export function isSuccessfulOutcome(outcome: ProcessOutcome): boolean {
  return outcome.status === 'exited' && outcome.exitCode === 0;
}

export function describeOutcome(outcome: ProcessOutcome): string {
  switch (outcome.status) {
    case 'exited':
      return `exited with code ${outcome.exitCode}`;
    case 'signaled':
      return `terminated by signal ${outcome.signal}`;
    case 'failed-to-start':
      return `failed to start: ${outcome.error.message}`;
  }
}

export const spawnProcessRunner: ProcessRunner = {
  run(executable: string, args: string[], options: RunProcessOptions = {}): Promise<ProcessOutcome> {
    logger.debug('Spawning process', { executable, args, cwd: options.cwd });

    return new Promise<ProcessOutcome>((resolve) => {
      let settled = false;
      const settle = (outcome: ProcessOutcome): void => {
        if (!settled) {
          settled = true;
          logger.debug(`Process ${describeOutcome(outcome)}`, { executable });
          resolve(outcome);
        }
      };

      const child = spawn(executable, args, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: 'inherit',
        shell: false
      });

      child.once('error', (error) => {
        settle({ status: 'failed-to-start', error });
      });

      child.once('close', (code, signal) => {
        if (signal) {
          settle({ status: 'signaled', signal });
        } else {
          settle({ status: 'exited', exitCode: code ?? 1 });
        }
      });
    });
  }
};
