/* src/runner/task/errors.ts
 * Error types for configuration, spawn and operation failures.
 * Non-zero exits are outcomes, not errors; see types.ts.
 */

export class ConfigError extends Error {
  override name = 'ConfigError';
}

/** A program could not be started at all (missing executable, permissions). */
export class SpawnError extends Error {
  override name = 'SpawnError';

  constructor(
    readonly program: string,
    readonly display: string,
    readonly code: string | undefined,
    cause: unknown,
  ) {
    let message = `failed to spawn \`${display}\``;
    if (code === 'ENOENT') {
      message += ` (you probably don't have the command '${program}' installed)`;
    }
    super(message, { cause });
  }
}

/** Wraps anything thrown while an operation of a task was started or awaited. */
export class OperationError extends Error {
  override name = 'OperationError';

  constructor(
    readonly task: string,
    readonly keyword: string,
    cause: unknown,
  ) {
    super(`failed to run '${keyword}' operation in task '${task}'`, { cause });
  }
}

/** Read the `code` of a Node system error without trusting its shape. */
export const errnoCode = (e: unknown): string | undefined => {
  if (e instanceof Error && 'code' in e && typeof e.code === 'string') {
    return e.code;
  }
  return undefined;
};
