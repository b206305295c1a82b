/* src/runner/task/ops/index.ts
 * Exhaustive dispatch over the Operation union.
 */
import type { Context } from '../context';
import { formatProgramSpec } from '../program';
import type {
  Operation,
  OperationKind,
  RunningOperation,
} from '../types';

import { COMMAND_KEYWORD, startCommand, validateCommand } from './command';
import { COPY_KEYWORD, startCopy, validateCopy } from './copy';
import {
  SET_WORKDIR_KEYWORD,
  startSetWorkdir,
  validateSetWorkdir,
} from './workdir';

const unreachable = (op: never): never => {
  throw new Error(`unknown operation: ${JSON.stringify(op)}`);
};

export const KEYWORDS: Record<OperationKind, string> = {
  command: COMMAND_KEYWORD,
  copy: COPY_KEYWORD,
  'set-workdir': SET_WORKDIR_KEYWORD,
};

/** Stable keyword used in logs and error messages. */
export const keyword = (op: Operation): string => KEYWORDS[op.kind];

/** One-line, human-readable description of an operation's configuration. */
export const describeOperation = (op: Operation): string => {
  switch (op.kind) {
    case 'command':
      return op.workdir !== undefined
        ? `${formatProgramSpec(op.run)} (in ${op.workdir})`
        : formatProgramSpec(op.run);
    case 'copy':
      return `${op.src} -> ${op.dst}`;
    case 'set-workdir':
      return op.path;
    default:
      return unreachable(op);
  }
};

/** Static checks run once at load time. Throws ConfigError. */
export const validateOperation = (op: Operation): void => {
  switch (op.kind) {
    case 'command':
      return validateCommand(op);
    case 'copy':
      return validateCopy(op);
    case 'set-workdir':
      return validateSetWorkdir(op);
    default:
      return unreachable(op);
  }
};

export const startOperation = (
  op: Operation,
  ctx: Context,
): Promise<RunningOperation> => {
  switch (op.kind) {
    case 'command':
      return startCommand(op, ctx);
    case 'copy':
      return startCopy(op, ctx);
    case 'set-workdir':
      return startSetWorkdir(op, ctx);
    default:
      return unreachable(op);
  }
};
