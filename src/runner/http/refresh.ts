/* src/runner/http/refresh.ts
 * Queue of refresh triggers ("tasks finished, reload browsers").
 * Payload-free: only arrival and order matter. Single consumer.
 */

export class RefreshQueue implements AsyncIterable<void> {
  private pending = 0;
  private closed = false;
  private wake: (() => void) | undefined;

  /** Number of triggers not yet taken by the consumer. */
  get size(): number {
    return this.pending;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(): void {
    if (this.closed) return;
    this.pending++;
    this.wake?.();
  }

  /** End the stream; triggers already queued are still delivered. */
  close(): void {
    this.closed = true;
    this.wake?.();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<void> {
    for (;;) {
      if (this.pending > 0) {
        this.pending--;
        yield;
        continue;
      }
      if (this.closed) return;
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
      this.wake = undefined;
    }
  }
}
