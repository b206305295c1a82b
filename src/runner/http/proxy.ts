/* src/runner/http/proxy.ts
 * Reverse proxy to a single backend. HTML responses get the reload script
 * when live reload is on; everything else streams through untouched.
 */
import {
  createServer,
  type IncomingMessage,
  request,
  type Server,
  type ServerResponse,
} from 'node:http';

import { type Address, formatAddress } from './address';
import { injectInto, reloadScript } from './inject';
import * as log from '../util/log';

const SCOPE = ['proxy'];

export type ProxyOptions = {
  /** Backend every request is forwarded to. */
  target: Address;
  /** Port of the reload server; undefined disables injection. */
  reloadPort?: number;
};

const isHtml = (res: IncomingMessage): boolean => {
  const type = res.headers['content-type'];
  return typeof type === 'string' && type.startsWith('text/html');
};

/** Encoded bodies (gzip, br, ...) are not HTML bytes; leave them alone. */
const isPlainBody = (res: IncomingMessage): boolean => {
  const enc = res.headers['content-encoding'];
  return enc === undefined || enc.trim().toLowerCase() === 'identity';
};

/** HEAD answers and 204/304 carry no body; their headers describe the real page. */
const hasBody = (req: IncomingMessage, res: IncomingMessage): boolean =>
  req.method !== 'HEAD' && res.statusCode !== 204 && res.statusCode !== 304;

const readBody = (res: IncomingMessage): Promise<Buffer> =>
  new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];
    res.on('data', (c: Buffer) => chunks.push(c));
    res.on('end', () => resolve(Buffer.concat(chunks)));
    res.on('error', reject);
  });

const badGateway = (res: ServerResponse, uri: string, e: Error): void => {
  log.warn(SCOPE, `failed to reach ${uri}: ${e.message}`);
  if (res.headersSent) {
    res.destroy(e);
    return;
  }
  const body = `failed to reach ${uri}\nError:\n\n${e.message}`;
  res.writeHead(502, {
    'content-type': 'text/plain',
    'content-length': Buffer.byteLength(body),
  });
  res.end(body);
};

const relayInjected = async (
  backend: IncomingMessage,
  res: ServerResponse,
  script: string,
): Promise<void> => {
  const body = injectInto(await readBody(backend), script);
  const headers = { ...backend.headers, 'content-length': String(body.length) };
  delete headers['transfer-encoding'];
  res.writeHead(backend.statusCode ?? 200, headers);
  res.end(body);
};

/** Forward one request, rebuilding its URI against `target`. */
export const forward = (
  req: IncomingMessage,
  res: ServerResponse,
  target: Address,
  script: string | undefined,
): void => {
  const pathAndQuery = req.url ?? '/';
  const uri = `http://${formatAddress(target)}${pathAndQuery}`;

  const upstream = request({
    host: target.host,
    port: target.port,
    method: req.method,
    path: pathAndQuery,
    headers: req.headers,
    agent: false,
  });

  upstream.on('response', (backend) => {
    if (
      script !== undefined &&
      hasBody(req, backend) &&
      isHtml(backend) &&
      isPlainBody(backend)
    ) {
      relayInjected(backend, res, script).catch((e: unknown) =>
        badGateway(res, uri, e instanceof Error ? e : new Error(String(e))),
      );
      return;
    }
    res.writeHead(backend.statusCode ?? 200, backend.headers);
    backend.pipe(res);
    backend.on('error', (e) => res.destroy(e));
  });
  upstream.on('error', (e) => badGateway(res, uri, e));
  req.on('error', (e) => upstream.destroy(e));
  req.pipe(upstream);
};

export const createProxyServer = (opts: ProxyOptions): Server => {
  const script =
    opts.reloadPort !== undefined ? reloadScript(opts.reloadPort) : undefined;
  return createServer((req, res) => forward(req, res, opts.target, script));
};

/** Bind `server` to `addr`; rejects with a descriptive error when binding fails. */
export const listen = (server: Server, addr: Address): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    const onError = (e: Error): void => {
      reject(
        new Error(`failed to bind ${formatAddress(addr)}`, { cause: e }),
      );
    };
    server.once('error', onError);
    server.listen(addr.port, addr.host, () => {
      server.off('error', onError);
      resolve();
    });
  });

export const boundPort = (server: Server): number => {
  const a = server.address();
  if (!a || typeof a === 'string') throw new Error('server is not listening');
  return a.port;
};
