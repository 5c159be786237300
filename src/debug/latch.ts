/**
 * Binary gate. While set, `wait()` resolves immediately; while cleared,
 * waiters park until the next `set()`. Repeated set/clear calls are no-ops.
 */
export class Latch {
  private open: boolean;
  private waiters: Array<() => void> = [];

  constructor(initiallySet = true) {
    this.open = initiallySet;
  }

  get isSet(): boolean {
    return this.open;
  }

  set(): void {
    this.open = true;
    const released = this.waiters;
    this.waiters = [];
    for (const release of released) release();
  }

  clear(): void {
    this.open = false;
  }

  wait(): Promise<void> {
    if (this.open) return Promise.resolve();
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  get waiting(): number {
    return this.waiters.length;
  }
}
