// test/message-queue.test.ts
import { describe, it, expect, vi } from 'vitest';
import { MessageQueue } from '../src/transport/message-queue.js';

describe('MessageQueue', () => {
  it('buffers items pushed before a pull', async () => {
    const queue = new MessageQueue<number>();
    queue.push(1);
    queue.push(2);
    expect(queue.size).toBe(2);
    expect(await queue.next()).toEqual({ value: 1, done: false });
    expect(await queue.next()).toEqual({ value: 2, done: false });
  });

  it('resolves a waiting pull with the next push', async () => {
    const queue = new MessageQueue<number>();
    const pending = queue.next();
    expect(queue.pendingCount).toBe(1);
    queue.push(7);
    expect(await pending).toEqual({ value: 7, done: false });
  });

  it('hands out buffered items after close, then ends', async () => {
    const queue = new MessageQueue<number>();
    queue.push(1);
    queue.push(2);
    queue.close();
    queue.push(3);
    expect(await queue.next()).toEqual({ value: 1, done: false });
    expect(await queue.next()).toEqual({ value: 2, done: false });
    expect(await queue.next()).toEqual({ value: undefined, done: true });
  });

  it('ends waiting pulls on close and calls onClose once', async () => {
    const onClose = vi.fn();
    const queue = new MessageQueue<number>(onClose);
    const pending = queue.next();
    queue.close();
    queue.close();
    expect(await pending).toEqual({ value: undefined, done: true });
    expect(onClose).toHaveBeenCalledTimes(1);
    expect(queue.isClosed).toBe(true);
  });

  it('drops the buffer when the consumer returns', async () => {
    const queue = new MessageQueue<number>();
    queue.push(1);
    await queue.return();
    expect(await queue.next()).toEqual({ value: undefined, done: true });
  });

  it('stops a for-await loop on break', async () => {
    const onClose = vi.fn();
    const queue = new MessageQueue<number>(onClose);
    queue.push(1);
    queue.push(2);
    const seen: number[] = [];
    for await (const item of queue) {
      seen.push(item);
      break;
    }
    expect(seen).toEqual([1]);
    expect(onClose).toHaveBeenCalledTimes(1);
  });
});
