/* src/cli/cli-utils.ts
 * Global option handling shared by the subcommands.
 */
import type { Command } from 'commander';

export type GlobalOptions = {
  config?: string;
  debug?: boolean;
  boring?: boolean;
};

/** Read root options (-c/-d/-b) from any subcommand. */
export const globalOptions = (cmd: Command): GlobalOptions => {
  const o = cmd.optsWithGlobals<Record<string, unknown>>();
  return {
    config: typeof o.config === 'string' ? o.config : undefined,
    debug: typeof o.debug === 'boolean' ? o.debug : undefined,
    boring: typeof o.boring === 'boolean' ? o.boring : undefined,
  };
};

/** Mirror -d/-b into the environment the loggers read. */
export const applyGlobalEnv = (opts: GlobalOptions): void => {
  if (opts.debug === true) process.env.DEVRELAY_DEBUG = '1';
  if (opts.boring === true) {
    process.env.DEVRELAY_BORING = '1';
    process.env.FORCE_COLOR = '0';
    process.env.NO_COLOR = '1';
  }
};
