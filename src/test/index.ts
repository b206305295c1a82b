/* src/test/index.ts
 * Shared test helpers: temp dirs, in-process TCP/HTTP servers, node scripts.
 */
import { createServer, type RequestListener, type Server } from 'node:http';
import { mkdtemp, realpath, rm } from 'node:fs/promises';
import net from 'node:net';
import os from 'node:os';
import path from 'node:path';

import type { Address } from '@/runner/http/address';

export const makeTempDir = async (prefix: string): Promise<string> =>
  // realpath: macOS tmpdir is a symlink and spawned processes report the real path.
  realpath(await mkdtemp(path.join(os.tmpdir(), `devrelay-${prefix}-`)));

export const rmDirWithRetries = async (dir: string): Promise<void> => {
  await rm(dir, { recursive: true, force: true, maxRetries: 5, retryDelay: 50 });
};

/** A port that was free a moment ago (bound, read, released). */
export const freePort = (): Promise<number> =>
  new Promise<number>((resolve, reject) => {
    const srv = net.createServer();
    srv.once('error', reject);
    srv.listen(0, '127.0.0.1', () => {
      const a = srv.address();
      const port = a && typeof a !== 'string' ? a.port : 0;
      srv.close(() => resolve(port));
    });
  });

export type TestBackend = { server: Server; addr: Address; close: () => Promise<void> };

/** In-process HTTP backend on an ephemeral localhost port. */
export const startBackend = (handler: RequestListener): Promise<TestBackend> =>
  new Promise<TestBackend>((resolve, reject) => {
    const server = createServer(handler);
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const a = server.address();
      const port = a && typeof a !== 'string' ? a.port : 0;
      resolve({
        server,
        addr: { host: '127.0.0.1', port },
        close: () =>
          new Promise<void>((r) => {
            server.closeAllConnections();
            server.close(() => r());
          }),
      });
    });
  });

/** `node -e <code>` as a program list. */
export const nodeEval = (code: string): string[] => [process.execPath, '-e', code];

/** Poll `check` until it returns true or `timeoutMs` elapses. */
export const waitFor = async (
  check: () => boolean,
  timeoutMs = 3000,
): Promise<void> => {
  const start = Date.now();
  while (!check()) {
    if (Date.now() - start > timeoutMs) throw new Error('waitFor: timed out');
    await new Promise((r) => setTimeout(r, 10));
  }
};
