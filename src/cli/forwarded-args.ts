/**
 * `run <bundle> --args ...` forwards every token after `--args` verbatim,
 * including tokens that look like options. Commander would try to parse
 * those, so they are split off before parsing.
 */

export const FORWARD_FLAG = '--args';

export interface SplitArgv {
  /** Tokens Commander parses (`--args` itself is kept) */
  argv: string[];
  /** Tokens handed to the executed bundle */
  forwarded: string[];
}

/**
 * Split `process.argv`-style input. Only a `--args` following a `run`
 * command (the first non-option token) is treated as the forwarding
 * marker.
 *
 * @param argv - full argv including the node executable and script path
 */
export function splitForwardedArgs(argv: string[]): SplitArgv {
  const userArgs = argv.slice(2);
  const runIndex = userArgs.findIndex(token => !token.startsWith('-'));
  if (runIndex === -1 || userArgs[runIndex] !== 'run') {
    return { argv, forwarded: [] };
  }

  const flagIndex = userArgs.indexOf(FORWARD_FLAG, runIndex + 1);
  if (flagIndex === -1) {
    return { argv, forwarded: [] };
  }

  return {
    argv: [...argv.slice(0, 2), ...userArgs.slice(0, flagIndex + 1)],
    forwarded: userArgs.slice(flagIndex + 1)
  };
}
