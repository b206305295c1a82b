/* src/cli/serve/action.ts
 * "devrelay serve" (default): proxy + live reload, running tasks on demand.
 */
import type { Command } from 'commander';

import { globalOptions } from '../cli-utils';
import { loadConfig } from '../config/load';
import { attachControls } from '../../runner/serve/keys';
import { ServeSession } from '../../runner/serve/session';

export const serve = async (cwd: string, configPath?: string): Promise<number> => {
  const cfg = await loadConfig(cwd, configPath);
  const session = new ServeSession(cfg);
  await session.start();
  const detach = attachControls(session);
  try {
    await session.wait();
  } finally {
    detach();
  }
  return session.exitCode;
};

export const registerServe = (cli: Command): Command => {
  cli
    .command('serve', { isDefault: true })
    .description('start the proxy and reload server, run all tasks, reload browsers when they finish')
    .action(async (_opts: unknown, cmd: Command) => {
      const code = await serve(process.cwd(), globalOptions(cmd).config);
      if (code !== 0) process.exitCode = code;
    });
  return cli;
};
