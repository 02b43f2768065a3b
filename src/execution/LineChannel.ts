export interface LineChannelHooks {
  onFull?: () => void;
  onDrain?: () => void;
}

/**
 * Single-consumer line queue between a process's output readers and the streamer.
 *
 * `capacity` is a soft bound: pushes beyond it are kept, but `onFull` fires so the
 * producer can pause its sources, and `onDrain` fires once the consumer has taken
 * the backlog down to half capacity.
 */
export class LineChannel implements AsyncIterableIterator<string> {
  private readonly buffer: string[] = [];
  private waiter?: (result: IteratorResult<string>) => void;
  private closed = false;
  private full = false;
  private claimed = false;

  constructor(private readonly capacity: number, private readonly hooks: LineChannelHooks = {}) {
    if (!Number.isInteger(capacity) || capacity < 1) throw new RangeError(`invalid channel capacity: ${capacity}`);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  push(line: string): void {
    if (this.closed) return;
    if (this.waiter) {
      const deliver = this.waiter;
      this.waiter = undefined;
      deliver({ done: false, value: line });
      return;
    }
    this.buffer.push(line);
    if (!this.full && this.buffer.length >= this.capacity) {
      this.full = true;
      this.hooks.onFull?.();
    }
  }

  /** No further pushes are accepted; lines already buffered stay readable. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiter) {
      const deliver = this.waiter;
      this.waiter = undefined;
      deliver({ done: true, value: undefined });
    }
  }

  /** Marks the channel as taken by a consumer; false if someone already holds it. */
  claim(): boolean {
    if (this.claimed) return false;
    this.claimed = true;
    return true;
  }

  next(): Promise<IteratorResult<string>> {
    const line = this.buffer.shift();
    if (line !== undefined) {
      if (this.full && this.buffer.length <= Math.floor(this.capacity / 2)) {
        this.full = false;
        this.hooks.onDrain?.();
      }
      return Promise.resolve({ done: false, value: line });
    }
    if (this.closed) return Promise.resolve({ done: true, value: undefined });
    if (this.waiter) return Promise.reject(new Error("LineChannel supports a single pending read"));
    return new Promise(resolve => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<string> {
    return this;
  }
}
