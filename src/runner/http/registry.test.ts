import { describe, expect, it } from 'vitest';

import { ConnectionRegistry } from './registry';

class FakeConn {
  closed = 0;
  constructor(private readonly onClose?: () => void) {}
  close(): void {
    this.closed++;
    this.onClose?.();
  }
}

describe('ConnectionRegistry', () => {
  it('closes every open connection exactly once and empties itself', () => {
    const reg = new ConnectionRegistry<FakeConn>();
    const conns = [new FakeConn(), new FakeConn(), new FakeConn()];
    conns.forEach((c) => reg.add(c));
    expect(reg.size).toBe(3);

    expect(reg.closeAll()).toBe(3);
    expect(conns.map((c) => c.closed)).toEqual([1, 1, 1]);
    expect(reg.size).toBe(0);

    expect(reg.closeAll()).toBe(0);
    expect(conns.map((c) => c.closed)).toEqual([1, 1, 1]);
  });

  it('keeps connections added while a drain is in progress', () => {
    const reg = new ConnectionRegistry<FakeConn>();
    const late = new FakeConn();
    reg.add(new FakeConn(() => reg.add(late)));

    expect(reg.closeAll()).toBe(1);
    expect(late.closed).toBe(0);
    expect(reg.size).toBe(1);
  });

  it('forgets connections removed by the client', () => {
    const reg = new ConnectionRegistry<FakeConn>();
    const a = new FakeConn();
    reg.add(a);
    expect(reg.delete(a)).toBe(true);
    expect(reg.delete(a)).toBe(false);
    expect(reg.closeAll()).toBe(0);
    expect(a.closed).toBe(0);
  });
});
