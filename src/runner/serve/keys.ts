/* src/runner/serve/keys.ts
 * Keyboard and signal controls for a serve session.
 * r = rerun tasks, q / Ctrl-C = quit. Keys only attach on a TTY.
 */
import type { ServeSession } from './session';
import * as log from '../util/log';

/** The parts of stdin the controls use. */
export type KeyInput = {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  off(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  resume(): unknown;
  pause(): unknown;
};

/** Map one chunk of raw stdin to a session action. */
export const handleKey = (session: ServeSession, chunk: string): void => {
  const key = chunk.toLowerCase();
  if (key === 'r') {
    log.info([], 'rerunning tasks');
    void session.rerun();
  } else if (key === 'q' || chunk === '\u0003') {
    void session.stop();
  }
};

/**
 * Install SIGINT/SIGTERM handlers and (on a TTY) raw key handling.
 *
 * @returns Detach function restoring the previous terminal state.
 */
export const attachControls = (
  session: ServeSession,
  input: KeyInput = process.stdin,
): (() => void) => {
  const onSignal = (): void => {
    void session.stop();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  const onData = (d: Buffer | string): void => handleKey(session, d.toString());
  const tty = input.isTTY === true && typeof input.setRawMode === 'function';
  if (tty) {
    input.setRawMode?.(true);
    input.on('data', onData);
    input.resume();
    log.info([], 'press r to rerun tasks, q to quit');
  }

  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    if (tty) {
      input.off('data', onData);
      input.setRawMode?.(false);
      input.pause();
    }
  };
};
