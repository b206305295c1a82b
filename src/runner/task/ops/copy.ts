/* src/runner/task/ops/copy.ts
 * "copy" operation: recursive copy relative to the working directory.
 * Overwrites existing files, creates missing parents, keeps symlinks as links.
 */
import path from 'node:path';

import { copy, pathExists } from 'fs-extra/esm';

import { alert } from '../../util/color';
import * as log from '../../util/log';
import type { Context } from '../context';
import { ConfigError } from '../errors';
import {
  completed,
  type CopyOperation,
  type RunningOperation,
} from '../types';

export const COPY_KEYWORD = 'copy';

export const validateCopy = (op: CopyOperation): void => {
  if (op.src.trim().length === 0 || op.dst.trim().length === 0) {
    throw new ConfigError('src and dst must be non-empty paths');
  }
  if (path.normalize(op.src) === path.normalize(op.dst)) {
    throw new ConfigError(`src and dst are the same path ('${op.src}')`);
  }
};

export const startCopy = async (
  op: CopyOperation,
  ctx: Context,
): Promise<RunningOperation> => {
  const src = ctx.joinWorkdir(op.src);
  const dst = ctx.joinWorkdir(op.dst);
  if (!(await pathExists(src))) {
    throw new Error(`cannot copy '${src}': no such file or directory`);
  }
  await copy(src, dst, {
    overwrite: true,
    errorOnExist: false,
    dereference: false,
  });
  log.verbose(
    [...ctx.scope, COPY_KEYWORD],
    `copied ${alert(src)} -> ${alert(dst)}`,
  );
  return completed('success');
};
