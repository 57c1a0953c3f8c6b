// src/transport/message-queue.ts

/**
 * Unbounded FIFO with a pull-side async interface.
 *
 * The socket pushes on its own schedule; consumers pull with `next()`.
 * Items pushed before anyone waits are buffered, and a waiting consumer is
 * resolved directly by the next push. After `close()` buffered items are still
 * handed out, then every pull ends with `done`. `return()` drops the buffer.
 */
export class MessageQueue<T> implements AsyncIterableIterator<T> {
  private queue: T[] = [];
  private pendingResolvers: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed: boolean = false;

  constructor(private readonly onClose?: () => void) {}

  push(item: T): void {
    if (this.closed) return;

    const pending = this.pendingResolvers.shift();
    if (pending) {
      pending({ value: item, done: false });
    } else {
      this.queue.push(item);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const pending of this.pendingResolvers) {
      pending({ value: undefined, done: true });
    }
    this.pendingResolvers = [];
    this.onClose?.();
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const item = this.queue.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise(resolve => {
      this.pendingResolvers.push(resolve);
    });
  }

  /** Called by `for await` on break/throw */
  return(): Promise<IteratorResult<T, undefined>> {
    this.queue = [];
    this.close();
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of buffered items */
  get size(): number {
    return this.queue.length;
  }

  /** Number of consumers waiting for an item */
  get pendingCount(): number {
    return this.pendingResolvers.length;
  }
}
