/* src/runner/http/registry.ts
 * Set of open reload connections. "Insert one" and "close all" are the only
 * mutations; each runs synchronously, so no insert can interleave with a drain.
 */

export type Closable = { close(): void };

export class ConnectionRegistry<C extends Closable> {
  private open = new Set<C>();

  get size(): number {
    return this.open.size;
  }

  add(conn: C): void {
    this.open.add(conn);
  }

  /** Forget a connection the client closed on its own. */
  delete(conn: C): boolean {
    return this.open.delete(conn);
  }

  /**
   * Swap out the whole set, then close every member of the old one.
   * Connections added while closing land in the new set untouched.
   *
   * @returns Number of connections closed.
   */
  closeAll(): number {
    const drained = this.open;
    this.open = new Set<C>();
    for (const conn of drained) conn.close();
    return drained.size;
  }
}
