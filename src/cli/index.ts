/* src/cli/index.ts
 * Root CLI factory for the "devrelay" tool.
 * - Registers subcommands: serve (default), run, check.
 * - Never calls process.exit; usage errors and help surface as CommanderError.
 */
import { Command } from 'commander';

import { registerCheck } from './check/action';
import { applyGlobalEnv, globalOptions } from './cli-utils';
import { registerRun } from './run/action';
import { registerServe } from './serve/action';

/**
 * Build the root CLI without side effects (safe for tests).
 *
 * @returns New Commander `Command` instance.
 */
export const makeCli = (): Command => {
  const cli = new Command();

  cli
    .name('devrelay')
    .description(
      'Proxy a local backend, inject live reload into its pages, and run task pipelines that trigger the reload.',
    )
    .option('-c, --config <path>', 'configuration file (default: nearest devrelay.yml/.yaml/.json)')
    .option('-d, --debug', 'enable verbose debug logging')
    .option('-b, --boring', 'disable all color and styling (useful for tests/CI)');

  // Throw CommanderError instead of exiting; subcommands inherit this.
  cli.exitOverride();

  // Propagate -d/-b before any subcommand action runs.
  cli.hook('preAction', (_thisCommand, actionCommand) => {
    applyGlobalEnv(globalOptions(actionCommand));
  });

  registerServe(cli);
  registerRun(cli);
  registerCheck(cli);

  return cli;
};
