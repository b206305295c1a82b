/* src/cli/run/action.ts
 * "devrelay run [tasks...]": run tasks once and report the pipeline outcome.
 */
import type { Command } from 'commander';

import { globalOptions } from '../cli-utils';
import { loadConfig } from '../config/load';
import { Context } from '../../runner/task/context';
import { ConfigError } from '../../runner/task/errors';
import { runPipeline, type Task } from '../../runner/task/task';
import type { Outcome } from '../../runner/task/types';
import { ok } from '../../runner/util/color';
import * as log from '../../runner/util/log';

/**
 * Pick tasks by name, keeping configuration order.
 * - no names => all tasks
 * - unknown name => ConfigError listing the available ones
 */
export const selectTasks = (
  tasks: ReadonlyArray<Task>,
  names: ReadonlyArray<string>,
): Task[] => {
  if (names.length === 0) return [...tasks];
  const known = new Set(tasks.map((t) => t.name));
  const unknown = names.filter((n) => !known.has(n));
  if (unknown.length > 0) {
    throw new ConfigError(
      `unknown task${unknown.length > 1 ? 's' : ''} ${unknown
        .map((n) => `'${n}'`)
        .join(', ')} (available: ${[...known].join(', ') || 'none'})`,
    );
  }
  const wanted = new Set(names);
  return tasks.filter((t) => wanted.has(t.name));
};

export const runTasks = async (
  cwd: string,
  names: ReadonlyArray<string>,
  configPath?: string,
): Promise<Outcome> => {
  const cfg = await loadConfig(cwd, configPath);
  const tasks = selectTasks(cfg.tasks, names);
  const ctx = new Context(cfg.baseWorkdir);

  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.on('SIGINT', onSigint);
  try {
    const outcome = await runPipeline(tasks, ctx, controller.signal);
    if (outcome === 'success') {
      log.info([], ok(`finished ${tasks.length} task(s)`));
    }
    return outcome;
  } finally {
    process.off('SIGINT', onSigint);
  }
};

export const registerRun = (cli: Command): Command => {
  cli
    .command('run')
    .description('run tasks once (all tasks in configuration order by default)')
    .argument('[tasks...]', 'names of the tasks to run')
    .action(async (names: string[], _opts: unknown, cmd: Command) => {
      const outcome = await runTasks(
        process.cwd(),
        names,
        globalOptions(cmd).config,
      );
      if (outcome === 'failure') process.exitCode = 1;
    });
  return cli;
};
