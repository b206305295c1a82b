/* src/runner/task/task.ts
 * Named, ordered operation sequences with fail-fast semantics, and the
 * pipeline that runs several tasks one after another.
 */
import * as log from '../util/log';
import type { Context } from './context';
import { ConfigError, OperationError } from './errors';
import { keyword, startOperation, validateOperation } from './ops/index';
import type {
  Operation,
  Outcome,
  RunningOperation,
} from './types';

export class Task {
  constructor(
    readonly name: string,
    readonly operations: ReadonlyArray<Operation>,
  ) {}

  /** Load-time checks; never called during a run. Throws ConfigError. */
  validate(): void {
    for (const op of this.operations) {
      try {
        validateOperation(op);
      } catch (e) {
        throw new ConfigError(
          `invalid configuration for operation '${keyword(op)}' in task '${this.name}'`,
          { cause: e },
        );
      }
    }
  }

  /**
   * Run every operation in order inside a fresh context frame.
   * Stops at the first Failure. Errors (e.g. spawn failures) propagate as
   * OperationError. Aborting `signal` cancels the running operation.
   */
  async run(ctx: Context, signal?: AbortSignal): Promise<Outcome> {
    ctx.push(this.name);
    const scope = ctx.scope;
    try {
      log.verbose(scope, 'starting task');
      for (const op of this.operations) {
        if (signal?.aborted) {
          log.warn(scope, 'aborted; remaining operations skipped');
          return 'failure';
        }
        const outcome = await this.runOne(op, ctx, signal);
        if (outcome === 'failure') {
          log.warn(
            scope,
            `'${keyword(op)}' operation failed -> stopping (no further operations of this task are run)`,
          );
          return 'failure';
        }
      }
      log.verbose(scope, 'finished running all operations of task');
      return 'success';
    } finally {
      ctx.pop();
    }
  }

  private async runOne(
    op: Operation,
    ctx: Context,
    signal?: AbortSignal,
  ): Promise<Outcome> {
    let handle: RunningOperation;
    try {
      handle = await startOperation(op, ctx);
    } catch (e) {
      throw new OperationError(this.name, keyword(op), e);
    }
    const onAbort = (): void => handle.cancel();
    signal?.addEventListener('abort', onAbort, { once: true });
    if (signal?.aborted) handle.cancel();
    try {
      return await handle.finish();
    } catch (e) {
      throw new OperationError(this.name, keyword(op), e);
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Run tasks sequentially; the first failing task ends the pipeline.
 * Only one pipeline is expected to run at a time per Context.
 */
export const runPipeline = async (
  tasks: ReadonlyArray<Task>,
  ctx: Context,
  signal?: AbortSignal,
): Promise<Outcome> => {
  for (const task of tasks) {
    const outcome = await task.run(ctx, signal);
    if (outcome === 'failure') {
      log.warn([task.name], 'task failed; later tasks were not run');
      return 'failure';
    }
  }
  return 'success';
};
