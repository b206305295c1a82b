/* src/runner/serve/session.ts
 * Long-lived "serve" session: proxy + reload server, plus pipeline runs that
 * push a refresh trigger when they succeed. One pipeline at a time.
 */
import type { LoadedConfig } from '../../cli/config/load';
import { type HttpHandle, RefreshQueue, startHttp } from '../http/index';
import type { PollOptions } from '../http/wait';
import { Context } from '../task/context';
import { runPipeline } from '../task/task';
import type { Outcome } from '../task/types';
import { ok } from '../util/color';
import * as log from '../util/log';

type PipelineRun = {
  controller: AbortController;
  done: Promise<Outcome | undefined>;
};

export class ServeSession {
  /** 0 while healthy; 1 once a background server error stopped the session. */
  exitCode = 0;
  readonly refresh = new RefreshQueue();
  private http: HttpHandle | undefined;
  private current: PipelineRun | undefined;
  private stopping: Promise<void> | undefined;
  private resolveStopped: (() => void) | undefined;
  private readonly stopped = new Promise<void>((resolve) => {
    this.resolveStopped = resolve;
  });

  constructor(
    private readonly config: LoadedConfig,
    private readonly poll?: PollOptions,
  ) {}

  get httpHandle(): HttpHandle | undefined {
    return this.http;
  }

  /** Bind the servers (bind errors reject) and start the first pipeline run. */
  async start(): Promise<void> {
    if (this.config.http) {
      this.http = await startHttp(
        this.config.http,
        this.refresh,
        (e) => this.fail(e),
        this.poll,
      );
    } else {
      log.info([], 'no http section configured; running tasks only');
    }
    void this.rerun();
  }

  /**
   * Abort the run in progress (cancelling its process), wait for it, then
   * run every task again.
   *
   * @returns Outcome of the new run; undefined when it was superseded or the
   *   session stopped first.
   */
  rerun(): Promise<Outcome | undefined> {
    const previous = this.current;
    previous?.controller.abort();
    const controller = new AbortController();
    const done = this.runOnce(previous, controller.signal);
    this.current = { controller, done };
    return done;
  }

  /** Resolves once stop() has completed. */
  wait(): Promise<void> {
    return this.stopped;
  }

  stop(): Promise<void> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  private async runOnce(
    previous: PipelineRun | undefined,
    signal: AbortSignal,
  ): Promise<Outcome | undefined> {
    if (previous) await previous.done;
    if (signal.aborted || this.stopping) return undefined;
    const ctx = new Context(this.config.baseWorkdir);
    try {
      const outcome = await runPipeline(this.config.tasks, ctx, signal);
      if (signal.aborted) return undefined;
      if (outcome === 'success') {
        log.info([], ok('all tasks finished'));
        if (this.http?.reload) this.refresh.push();
      }
      return outcome;
    } catch (e) {
      // A task that cannot even start does not end the session; the next
      // rerun may succeed once the problem is fixed.
      log.error([], log.describeError(e));
      return 'failure';
    }
  }

  private fail(e: Error): void {
    log.error([], log.describeError(e));
    this.exitCode = 1;
    void this.stop();
  }

  private async shutdown(): Promise<void> {
    this.current?.controller.abort();
    await this.current?.done;
    await this.http?.close();
    this.resolveStopped?.();
  }
}
