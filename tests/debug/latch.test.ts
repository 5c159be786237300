import { describe, it, expect } from 'vitest';
import { Latch } from '../../src/debug/latch.js';

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('Latch', () => {
  it('lets waiters through while set', async () => {
    const latch = new Latch();
    await expect(latch.wait()).resolves.toBeUndefined();
    expect(latch.waiting).toBe(0);
  });

  it('parks waiters until set', async () => {
    const latch = new Latch(false);
    let released = 0;
    void latch.wait().then(() => released++);
    void latch.wait().then(() => released++);
    await flush();
    expect(latch.waiting).toBe(2);
    expect(released).toBe(0);

    latch.set();
    await flush();
    expect(released).toBe(2);
    expect(latch.waiting).toBe(0);
  });

  it('treats repeated set and clear as no-ops', () => {
    const latch = new Latch();
    latch.set();
    latch.set();
    expect(latch.isSet).toBe(true);
    latch.clear();
    latch.clear();
    expect(latch.isSet).toBe(false);
  });
});
