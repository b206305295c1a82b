/* src/runner/task/context.ts
 * Stack of scoped variable frames consulted by operations.
 * Lookups go innermost-first; writes only touch the top frame.
 */
import path from 'node:path';

/** Values a frame may carry, keyed by capability. */
export type ContextVars = {
  /** Absolute working directory for operations that run after it was set. */
  workdir: string;
};
export type ContextKey = keyof ContextVars;

export type Frame = {
  /** Shown in log scopes (task name). */
  readonly label: string;
  readonly vars: Partial<ContextVars>;
};

export class Context {
  private readonly frames: Frame[] = [];

  /**
   * @param baseWorkdir - Process-wide working directory used when no frame
   *   overrides it (resolved to an absolute path).
   */
  constructor(private readonly baseWorkdir: string) {
    this.baseWorkdir = path.resolve(baseWorkdir);
  }

  get depth(): number {
    return this.frames.length;
  }

  /** Labels of all frames, outermost first. */
  get scope(): string[] {
    return this.frames.map((f) => f.label);
  }

  push(label: string): Frame {
    const frame: Frame = { label, vars: {} };
    this.frames.push(frame);
    return frame;
  }

  pop(): Frame {
    const frame = this.frames.pop();
    if (!frame) throw new Error('context: pop() on an empty frame stack');
    return frame;
  }

  get<K extends ContextKey>(key: K): ContextVars[K] | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const v = this.frames[i].vars[key];
      if (v !== undefined) return v;
    }
    return undefined;
  }

  set<K extends ContextKey>(key: K, value: ContextVars[K]): void {
    const top = this.frames.at(-1);
    if (!top) throw new Error(`context: cannot set '${key}' without a frame`);
    top.vars[key] = value;
  }

  workdir(): string {
    return this.get('workdir') ?? this.baseWorkdir;
  }

  /** Resolve `p` against the current working directory (absolute `p` wins). */
  joinWorkdir(p: string): string {
    return path.resolve(this.workdir(), p);
  }
}
