/* src/cli/config/load.ts
 * Locate, parse and validate devrelay configuration, producing validated Tasks
 * and the resolved HTTP settings.
 */
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { ZodError } from 'zod';

import { configSchema, type RawHttpConfig } from './schema';
import { parseText } from '../../common/config/parse';
import { DEFAULT_HOST } from '../../runner/http/address';
import type { HttpConfig } from '../../runner/http/index';
import { ConfigError } from '../../runner/task/errors';
import { Task } from '../../runner/task/task';
import * as log from '../../runner/util/log';

export const CONFIG_FILE_NAMES = [
  'devrelay.yml',
  'devrelay.yaml',
  'devrelay.json',
] as const;

export const DEFAULT_HTTP_PORT = 8030;

export type LoadedConfig = {
  /** Absolute path of the file the configuration came from. */
  path: string;
  /** Working directory operations start from. */
  baseWorkdir: string;
  http?: HttpConfig;
  /** In configuration order; every task already validated. */
  tasks: Task[];
};

const formatZodError = (e: unknown): string =>
  e instanceof ZodError
    ? e.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n')
    : String(e);

/** Nearest config file in `cwd` or one of its ancestors. */
export const findConfigPath = (cwd: string): string | undefined => {
  let dir = path.resolve(cwd);
  for (;;) {
    for (const name of CONFIG_FILE_NAMES) {
      const p = path.join(dir, name);
      if (existsSync(p)) return p;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
};

/** Fill in listener defaults; the reload port defaults to the proxy port + 1. */
export const resolveHttpConfig = (raw: RawHttpConfig): HttpConfig => {
  const addr = raw.addr ?? { host: DEFAULT_HOST, port: DEFAULT_HTTP_PORT };
  const wsAddr = raw.wsAddr ?? {
    host: addr.host,
    port: addr.port === 0 ? 0 : addr.port + 1,
  };
  return { addr, proxy: raw.proxy, autoReload: raw.autoReload ?? true, wsAddr };
};

/**
 * Validate an already-parsed configuration document.
 *
 * @param root - Parsed YAML/JSON document.
 * @param cfgPath - Absolute path of its file (base for relative workdir).
 * @throws ConfigError listing every schema issue, or naming the invalid operation.
 */
export const parseConfig = (root: unknown, cfgPath: string): LoadedConfig => {
  const rel = path.relative(process.cwd(), cfgPath).replace(/\\/g, '/');
  const parsed = configSchema.safeParse(root ?? {});
  if (!parsed.success) {
    throw new ConfigError(
      `invalid config in ${rel || cfgPath}\n${formatZodError(parsed.error)}`,
    );
  }
  const cfg = parsed.data;
  const tasks = Object.entries(cfg.tasks).map(
    ([name, ops]) => new Task(name, ops),
  );
  for (const task of tasks) task.validate();

  const cfgDir = path.dirname(cfgPath);
  return {
    path: cfgPath,
    baseWorkdir: path.resolve(cfgDir, cfg.workdir ?? '.'),
    http: cfg.http ? resolveHttpConfig(cfg.http) : undefined,
    tasks,
  };
};

/** Load from `configPath` when given, otherwise from the nearest config file. */
export const loadConfig = async (
  cwd: string,
  configPath?: string,
): Promise<LoadedConfig> => {
  const cfgPath =
    configPath !== undefined
      ? path.resolve(cwd, configPath)
      : findConfigPath(cwd);
  if (!cfgPath) {
    throw new ConfigError(
      `no ${CONFIG_FILE_NAMES.join(', ')} found in ${cwd} or any parent directory`,
    );
  }
  let text: string;
  try {
    text = await readFile(cfgPath, 'utf8');
  } catch (e) {
    throw new ConfigError(`cannot read ${cfgPath}`, { cause: e });
  }
  let root: unknown;
  try {
    root = parseText(cfgPath, text);
  } catch (e) {
    throw new ConfigError(`cannot parse ${cfgPath}`, { cause: e });
  }
  log.verbose(['config'], `using ${cfgPath}`);
  return parseConfig(root, cfgPath);
};
