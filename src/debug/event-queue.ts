import { QueueClosedError } from '../exception/errors.js';

/**
 * FIFO with a fixed capacity for producer → controller events. A full queue
 * drops its oldest entry so the producer never waits on a slow consumer.
 */
export class BoundedEventQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private readers: Array<(item: T | null) => void> = [];
  private closed = false;
  private droppedCount = 0;

  constructor(readonly capacity: number = 256) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(item: T): void {
    if (this.closed) throw new QueueClosedError();

    const reader = this.readers.shift();
    if (reader) {
      reader(item);
      return;
    }
    if (this.items.length >= this.capacity) {
      this.items.shift();
      this.droppedCount++;
    }
    this.items.push(item);
  }

  /** Next event, or null once the queue is closed and empty. */
  next(): Promise<T | null> {
    const item = this.items.shift();
    if (item !== undefined) return Promise.resolve(item);
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.readers.push(resolve);
    });
  }

  drain(): T[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const pending = this.readers;
    this.readers = [];
    for (const reader of pending) reader(null);
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    while (true) {
      const item = await this.next();
      if (item === null) return;
      yield item;
    }
  }
}
