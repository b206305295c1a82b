/* src/runner/http/address.ts
 * host:port pairs for listeners and the proxied backend.
 */

export type Address = { host: string; port: number };

export const DEFAULT_HOST = '127.0.0.1';

const validPort = (n: number): boolean =>
  Number.isInteger(n) && n >= 0 && n <= 65535;

/**
 * Parse "host:port", ":port" or a bare port (string or number).
 * IPv6 hosts are written in brackets: "[::1]:8030".
 */
export const parseAddress = (raw: string | number): Address => {
  if (typeof raw === 'number') {
    if (!validPort(raw)) throw new Error(`invalid port: ${raw}`);
    return { host: DEFAULT_HOST, port: raw };
  }
  const s = raw.trim();
  const m = /^(?:(\[[^\]]+\]|[^:]*):)?(\d+)$/.exec(s);
  if (!m) throw new Error(`invalid address '${raw}' (expected host:port)`);
  const port = Number(m[2]);
  if (!validPort(port)) throw new Error(`invalid port in '${raw}'`);
  const hostRaw = m[1] ?? '';
  const host = hostRaw.startsWith('[') ? hostRaw.slice(1, -1) : hostRaw;
  return { host: host.length > 0 ? host : DEFAULT_HOST, port };
};

export const formatAddress = (a: Address): string =>
  a.host.includes(':') ? `[${a.host}]:${a.port}` : `${a.host}:${a.port}`;
