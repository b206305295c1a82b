/* src/runner/http/reload-server.ts
 * WebSocket side of live reload. Browsers connect and wait; a refresh
 * closes every connection, which the injected client takes as "reload".
 */
import { type WebSocket, WebSocketServer } from 'ws';

import { type Address, formatAddress } from './address';
import type { RefreshQueue } from './refresh';
import { ConnectionRegistry } from './registry';
import { type PollOptions, waitUntilReachable } from './wait';
import * as log from '../util/log';

const SCOPE = ['reload'];

export type ReloadServerOptions = {
  addr: Address;
  /** Backend to wait for before signalling; omitted => signal immediately. */
  target?: Address;
  poll?: PollOptions;
};

export class ReloadServer {
  readonly registry = new ConnectionRegistry<WebSocket>();
  private wss: WebSocketServer | undefined;

  constructor(private readonly opts: ReloadServerOptions) {}

  /** Bound port (useful when configured with port 0). */
  get port(): number {
    const a = this.wss?.address();
    if (!a || typeof a === 'string') {
      throw new Error('reload server is not listening');
    }
    return a.port;
  }

  /**
   * Bind the listener. Rejects when binding fails; errors after that are
   * passed to `onError`.
   */
  listen(onError: (e: Error) => void): Promise<void> {
    const wss = new WebSocketServer({
      host: this.opts.addr.host,
      port: this.opts.addr.port,
    });
    this.wss = wss;

    wss.on('connection', (ws) => {
      this.registry.add(ws);
      log.verbose(SCOPE, `client connected (${this.registry.size} open)`);
      ws.on('close', () => this.registry.delete(ws));
      ws.on('error', (e) => log.verbose(SCOPE, `client error: ${e.message}`));
    });
    wss.on('wsClientError', (e, socket) => {
      log.warn(SCOPE, `websocket handshake failed: ${e.message}`);
      socket.end('HTTP/1.1 400 Bad Request\r\nConnection: close\r\n\r\n');
    });

    return new Promise<void>((resolve, reject) => {
      const onBindError = (e: Error): void => {
        reject(
          new Error(
            `failed to bind reload server to ${formatAddress(this.opts.addr)}`,
            { cause: e },
          ),
        );
      };
      wss.once('error', onBindError);
      wss.once('listening', () => {
        wss.off('error', onBindError);
        wss.on('error', onError);
        resolve();
      });
    });
  }

  /**
   * Wait for the backend (best-effort), then close every open connection.
   *
   * @returns Number of connections closed.
   */
  async reload(): Promise<number> {
    const target = this.opts.target;
    if (target) {
      const up = await waitUntilReachable(target, this.opts.poll);
      if (!up) {
        log.warn(
          SCOPE,
          `backend ${formatAddress(target)} did not accept connections in time; reloading anyway`,
        );
      }
    }
    const n = this.registry.closeAll();
    log.verbose(SCOPE, `signalled reload to ${n} client(s)`);
    return n;
  }

  /** Handle refresh triggers one at a time, in arrival order, until the queue closes. */
  async consume(refresh: RefreshQueue): Promise<void> {
    for await (const _ of refresh) {
      await this.reload();
    }
  }

  close(): Promise<void> {
    const wss = this.wss;
    this.wss = undefined;
    if (!wss) return Promise.resolve();
    for (const ws of wss.clients) ws.terminate();
    return new Promise<void>((resolve, reject) => {
      wss.close((e) => (e ? reject(e) : resolve()));
    });
  }
}
