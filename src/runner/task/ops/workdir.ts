/* src/runner/task/ops/workdir.ts
 * "set-workdir" operation: change the working directory for the rest of the task.
 */
import { stat } from 'node:fs/promises';

import { alert } from '../../util/color';
import * as log from '../../util/log';
import type { Context } from '../context';
import { ConfigError } from '../errors';
import {
  completed,
  type RunningOperation,
  type SetWorkdirOperation,
} from '../types';

export const SET_WORKDIR_KEYWORD = 'set-workdir';

export const validateSetWorkdir = (op: SetWorkdirOperation): void => {
  if (op.path.trim().length === 0) {
    throw new ConfigError('path must be non-empty');
  }
};

export const startSetWorkdir = async (
  op: SetWorkdirOperation,
  ctx: Context,
): Promise<RunningOperation> => {
  const dir = ctx.joinWorkdir(op.path);
  const st = await stat(dir).catch(() => undefined);
  if (!st?.isDirectory()) {
    throw new Error(
      `'${dir}' is not a valid path to a directory (or it is inaccessible)`,
    );
  }
  ctx.set('workdir', dir);
  log.verbose(
    [...ctx.scope, SET_WORKDIR_KEYWORD],
    `set working directory to ${alert(dir)}`,
  );
  return completed('success');
};
