/* src/index.ts
 * Public API: task engine, proxy/live-reload servers and configuration loading.
 */
export { loadConfig, type LoadedConfig, parseConfig } from './cli/config/load';
export {
  type Address,
  formatAddress,
  type HttpConfig,
  type HttpHandle,
  injectInto,
  parseAddress,
  RefreshQueue,
  ReloadServer,
  reloadScript,
  startHttp,
} from './runner/http/index';
export { createProxyServer } from './runner/http/proxy';
export { ConnectionRegistry } from './runner/http/registry';
export { waitUntilReachable } from './runner/http/wait';
export { ServeSession } from './runner/serve/session';
export { Context } from './runner/task/context';
export { ConfigError, OperationError, SpawnError } from './runner/task/errors';
export { startOperation, validateOperation } from './runner/task/ops/index';
export {
  formatProgramSpec,
  parseProgramSpec,
  type ProgramSpec,
} from './runner/task/program';
export { runPipeline, Task } from './runner/task/task';
export type { Operation, Outcome, RunningOperation } from './runner/task/types';
