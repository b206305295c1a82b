/* src/runner/task/types.ts
 * Operation model: a closed union of operation kinds and the handle a
 * started operation returns.
 */
import type { ProgramSpec } from './program';

export type Outcome = 'success' | 'failure';

export type CommandOperation = {
  kind: 'command';
  run: ProgramSpec;
  /** Resolved against the context working directory at start time. */
  workdir?: string;
};

export type CopyOperation = {
  kind: 'copy';
  src: string;
  dst: string;
};

export type SetWorkdirOperation = {
  kind: 'set-workdir';
  path: string;
};

/** Add new kinds here; dispatch in ops/index.ts is exhaustive over this union. */
export type Operation = CommandOperation | CopyOperation | SetWorkdirOperation;
export type OperationKind = Operation['kind'];

/**
 * Live handle of a started operation.
 * - finish(): wait for completion and map it to an Outcome
 * - tryFinish(): non-blocking poll; undefined while still running
 * - cancel(): stop the underlying effect; idempotent, does not wait
 */
export interface RunningOperation {
  finish(): Promise<Outcome>;
  tryFinish(): Outcome | undefined;
  cancel(): void;
}

/** Handle for operations that did all their work inside start(). */
export const completed = (outcome: Outcome): RunningOperation => ({
  finish: () => Promise.resolve(outcome),
  tryFinish: () => outcome,
  cancel: () => undefined,
});

