/* src/runner/http/wait.ts
 * Backend readiness gate: poll a TCP port until it accepts a connection.
 */
import net from 'node:net';
import { setTimeout as sleep } from 'node:timers/promises';

import type { Address } from './address';

export const POLL_PERIOD_MS = 20;
export const PORT_WAIT_TIMEOUT_MS = 3000;

export type PollOptions = {
  /** Per-attempt connect timeout and slot length. */
  periodMs?: number;
  /** Total wall-clock budget. */
  timeoutMs?: number;
};

/** One connect attempt; resolves false on error or after `timeoutMs`. */
export const tryConnect = (target: Address, timeoutMs: number): Promise<boolean> =>
  new Promise<boolean>((resolve) => {
    const socket = net.connect({ host: target.host, port: target.port });
    const done = (reachable: boolean): void => {
      clearTimeout(timer);
      socket.destroy();
      resolve(reachable);
    };
    const timer = setTimeout(() => done(false), timeoutMs);
    socket.once('connect', () => done(true));
    socket.on('error', () => done(false));
  });

/**
 * Poll `target` until a connection succeeds or the budget runs out.
 * Each attempt gets one period; the rest of the slot is slept away.
 *
 * @returns true when the target became reachable in time.
 */
export const waitUntilReachable = async (
  target: Address,
  opts: PollOptions = {},
): Promise<boolean> => {
  const period = opts.periodMs ?? POLL_PERIOD_MS;
  const budget = opts.timeoutMs ?? PORT_WAIT_TIMEOUT_MS;
  const start = Date.now();
  while (Date.now() - start < budget) {
    const before = Date.now();
    if (await tryConnect(target, period)) return true;
    const remaining = period - (Date.now() - before);
    if (remaining > 0) await sleep(remaining);
  }
  return false;
};
