/* src/runner/task/ops/command.ts
 * "command" operation: spawn a program in the resolved working directory.
 */
import { type ChildProcess, spawn } from 'node:child_process';
import { stat } from 'node:fs/promises';

import treeKill from 'tree-kill';

import { ok } from '../../util/color';
import * as log from '../../util/log';
import type { Context } from '../context';
import { ConfigError, errnoCode, SpawnError } from '../errors';
import { formatProgramSpec } from '../program';
import type {
  CommandOperation,
  Outcome,
  RunningOperation,
} from '../types';

export const COMMAND_KEYWORD = 'command';

type Exit = { code: number | null; signal: NodeJS.Signals | null };

export const validateCommand = (op: CommandOperation): void => {
  if (op.workdir !== undefined && op.workdir.trim().length === 0) {
    throw new ConfigError('workdir must be a non-empty path');
  }
};

export const resolveCommandWorkdir = (
  op: CommandOperation,
  ctx: Context,
): string =>
  op.workdir !== undefined ? ctx.joinWorkdir(op.workdir) : ctx.workdir();

class RunningCommand implements RunningOperation {
  private exit: Exit | undefined;
  private outcome: Outcome | undefined;
  private cancelled = false;

  constructor(
    private readonly child: ChildProcess,
    private readonly exited: Promise<Exit>,
    private readonly display: string,
    private readonly scope: string[],
  ) {
    void exited.then((e) => {
      this.exit = e;
    });
  }

  async finish(): Promise<Outcome> {
    return this.settle(await this.exited);
  }

  tryFinish(): Outcome | undefined {
    return this.exit ? this.settle(this.exit) : undefined;
  }

  cancel(): void {
    if (this.cancelled || this.exit) return;
    this.cancelled = true;
    const pid = this.child.pid;
    if (typeof pid !== 'number') return;
    log.verbose(this.scope, `cancelling ${this.display} (pid ${pid})`);
    if (process.platform === 'win32') {
      treeKill(pid, 'SIGKILL', (err) => {
        if (!err) return;
        log.verbose(this.scope, `tree-kill failed: ${err.message}`);
        this.child.kill('SIGKILL');
      });
      return;
    }
    try {
      process.kill(-pid, 'SIGKILL');
    } catch (e) {
      log.verbose(this.scope, `group kill failed: ${errnoCode(e) ?? String(e)}`);
      this.child.kill('SIGKILL');
    }
  }

  private settle(exit: Exit): Outcome {
    if (this.outcome) return this.outcome;
    if (exit.code === 0) {
      this.outcome = 'success';
    } else {
      const how =
        exit.code === null
          ? `was terminated by ${exit.signal ?? 'a signal'}`
          : `returned non-zero exit code ${exit.code}`;
      log.warn(this.scope, `${ok(this.display)} ${how}`);
      this.outcome = 'failure';
    }
    return this.outcome;
  }
}

/**
 * Spawn the command. Resolves once the OS reports the process started;
 * rejects with SpawnError when it could not be started.
 */
export const startCommand = async (
  op: CommandOperation,
  ctx: Context,
): Promise<RunningOperation> => {
  const scope = [...ctx.scope, COMMAND_KEYWORD];
  const display = formatProgramSpec(op.run);
  log.info(scope, `running: ${ok(display)}`);

  const cwd = resolveCommandWorkdir(op, ctx);
  const dir = await stat(cwd).catch(() => undefined);
  if (!dir?.isDirectory()) {
    throw new Error(`working directory '${cwd}' does not exist`);
  }

  // POSIX children lead their own process group so cancel() can take down
  // the whole tree. A background group that reads the terminal is stopped by
  // SIGTTIN, so such children get no stdin.
  const detached = process.platform !== 'win32';
  const child = spawn(op.run.program, [...op.run.args], {
    cwd,
    stdio: detached ? ['ignore', 'inherit', 'inherit'] : 'inherit',
    windowsHide: true,
    detached,
  });
  // Listen for exit before the first await so an early exit is not missed.
  const exited = new Promise<Exit>((resolve) => {
    child.once('exit', (code, signal) => resolve({ code, signal }));
  });

  await new Promise<void>((resolve, reject) => {
    const onSpawn = (): void => {
      child.off('error', onError);
      // Later errors (e.g. a failed kill) are reported, not thrown.
      child.on('error', (e) => log.warn(scope, e.message));
      resolve();
    };
    const onError = (e: Error): void => {
      child.off('spawn', onSpawn);
      reject(new SpawnError(op.run.program, display, errnoCode(e), e));
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });

  return new RunningCommand(child, exited, display, scope);
};
