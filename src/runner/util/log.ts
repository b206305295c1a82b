/* src/runner/util/log.ts
 * Console logging with the "devrelay:" prefix and bracketed scopes.
 * Verbose lines are opt-in (DEVRELAY_DEBUG=1) and go to stderr.
 */
import { dim, orange, red } from './color';

/** Bracketed labels printed after the prefix, outermost first (e.g. task, operation). */
export type Scope = ReadonlyArray<string>;

export const debugOn = (): boolean => process.env.DEVRELAY_DEBUG === '1';

const line = (scope: Scope, message: string): string => {
  const tags = scope.map((s) => `[${s}] `).join('');
  return `devrelay: ${tags}${message}`;
};

export const info = (scope: Scope, message: string): void => {
  console.log(line(scope, message));
};

export const warn = (scope: Scope, message: string): void => {
  console.error(orange(line(scope, `warning: ${message}`)));
};

export const error = (scope: Scope, message: string): void => {
  console.error(red(line(scope, `error: ${message}`)));
};

export const verbose = (scope: Scope, message: string): void => {
  if (!debugOn()) return;
  console.error(dim(line(scope, message)));
};

/** Render an error and its `cause` chain, one "caused by" line per level. */
export const describeError = (e: unknown): string => {
  const parts: string[] = [];
  let cur: unknown = e;
  while (cur !== undefined && parts.length < 10) {
    if (cur instanceof Error) {
      parts.push(parts.length === 0 ? cur.message : `caused by: ${cur.message}`);
      cur = cur.cause;
    } else {
      parts.push(parts.length === 0 ? String(cur) : `caused by: ${String(cur)}`);
      cur = undefined;
    }
  }
  return parts.join('\n');
};
