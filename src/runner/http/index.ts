/* src/runner/http/index.ts
 * Start the proxy and (optionally) the reload server with its refresh consumer.
 */
import { type Address, formatAddress } from './address';
import { boundPort, createProxyServer, listen } from './proxy';
import type { RefreshQueue } from './refresh';
import { ReloadServer } from './reload-server';
import type { PollOptions } from './wait';
import * as log from '../util/log';

export type HttpConfig = {
  /** Proxy listener. */
  addr: Address;
  /** Backend the proxy forwards to. */
  proxy: Address;
  autoReload: boolean;
  /** Reload (WebSocket) listener. */
  wsAddr: Address;
};

export type HttpHandle = {
  proxyPort: number;
  /** Undefined when auto-reload is off. */
  reloadPort: number | undefined;
  reload: ReloadServer | undefined;
  /** Stop both listeners and the refresh consumer (closes `refresh`). */
  close: () => Promise<void>;
};

/**
 * Bind everything and start consuming `refresh`. Bind failures reject;
 * later failures from either server go to `onError`.
 */
export const startHttp = async (
  config: HttpConfig,
  refresh: RefreshQueue,
  onError: (e: Error) => void,
  poll?: PollOptions,
): Promise<HttpHandle> => {
  let reload: ReloadServer | undefined;
  let consuming: Promise<void> = Promise.resolve();
  if (config.autoReload) {
    reload = new ReloadServer({
      addr: config.wsAddr,
      target: config.proxy,
      poll,
    });
    await reload.listen(onError);
    log.info(
      [],
      `reload server listening on ws://${formatAddress({ ...config.wsAddr, port: reload.port })}`,
    );
    consuming = reload.consume(refresh).catch(onError);
  }

  const server = createProxyServer({
    target: config.proxy,
    reloadPort: reload?.port,
  });
  try {
    await listen(server, config.addr);
  } catch (e) {
    refresh.close();
    await consuming;
    await reload?.close();
    throw e;
  }
  server.on('error', onError);
  const port = boundPort(server);
  log.info(
    [],
    `listening on http://${formatAddress({ ...config.addr, port })} -> ${formatAddress(config.proxy)}`,
  );

  return {
    proxyPort: port,
    reloadPort: reload?.port,
    reload,
    close: async () => {
      refresh.close();
      await consuming;
      await reload?.close();
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) =>
        server.close((e) => (e ? reject(e) : resolve())),
      );
    },
  };
};

export { type Address, formatAddress, parseAddress } from './address';
export { injectInto, reloadScript } from './inject';
export { RefreshQueue } from './refresh';
export { ReloadServer } from './reload-server';
