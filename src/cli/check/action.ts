/* src/cli/check/action.ts
 * "devrelay check": validate configuration and print what would run.
 */
import path from 'node:path';

import type { Command } from 'commander';

import { globalOptions } from '../cli-utils';
import { type LoadedConfig, loadConfig } from '../config/load';
import { formatAddress } from '../../runner/http/address';
import { describeOperation, keyword } from '../../runner/task/ops/index';
import { bold } from '../../runner/util/color';

/** Human-readable summary, one line per entry. */
export const describeConfig = (cfg: LoadedConfig, cwd: string): string[] => {
  const lines = [`config: ${path.relative(cwd, cfg.path) || cfg.path}`];
  lines.push(`workdir: ${cfg.baseWorkdir}`);
  if (cfg.http) {
    const h = cfg.http;
    const reload = h.autoReload
      ? `, reload on ws://${formatAddress(h.wsAddr)}`
      : ', auto-reload off';
    lines.push(
      `proxy: http://${formatAddress(h.addr)} -> ${formatAddress(h.proxy)}${reload}`,
    );
  }
  if (cfg.tasks.length === 0) lines.push('tasks: none');
  for (const task of cfg.tasks) {
    lines.push(`${bold(task.name)}:`);
    for (const op of task.operations) {
      lines.push(`  ${keyword(op)} ${describeOperation(op)}`);
    }
  }
  return lines;
};

export const registerCheck = (cli: Command): Command => {
  cli
    .command('check')
    .description('validate the configuration and list tasks without running them')
    .action(async (_opts: unknown, cmd: Command) => {
      const cwd = process.cwd();
      const cfg = await loadConfig(cwd, globalOptions(cmd).config);
      for (const l of describeConfig(cfg, cwd)) console.log(l);
    });
  return cli;
};
