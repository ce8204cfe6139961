import { ChannelClosedError, QueueOverflowError } from './errors';

interface Waiter<T> {
  resolve: (item: T | undefined) => void;
  cleanup: () => void;
}

/**
 * Bounded FIFO queue with blocking, timed receive.
 *
 * `send` never blocks: it hands the item to the oldest waiting receiver, queues
 * it, or throws {@link QueueOverflowError} when the queue is at capacity.
 * `receive` resolves with `undefined` when the timeout elapses, the signal
 * aborts, or the channel closes.
 */
export class Channel<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private isClosed = false;

  constructor(readonly capacity = 1000, readonly label = 'channel') {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Receivers currently blocked on this channel.
   */
  get pendingReceivers(): number {
    return this.waiters.length;
  }

  send(item: T): void {
    if (this.isClosed) {
      throw new ChannelClosedError(this.label);
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.cleanup();
      waiter.resolve(item);
      return;
    }

    if (this.items.length >= this.capacity) {
      throw new QueueOverflowError(this.capacity, this.label);
    }

    this.items.push(item);
  }

  receive(timeoutMs?: number, signal?: AbortSignal): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.isClosed || signal?.aborted) {
      return Promise.resolve(undefined);
    }

    return new Promise<T | undefined>((resolve) => {
      let timer: NodeJS.Timeout | undefined;

      const onAbort = () => {
        this.removeWaiter(waiter);
        resolve(undefined);
      };

      const waiter: Waiter<T> = {
        resolve,
        cleanup: () => {
          if (timer) clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
        },
      };

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.removeWaiter(waiter);
          resolve(undefined);
        }, Math.max(0, timeoutMs));
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      this.waiters.push(waiter);
    });
  }

  /**
   * Close the channel, wake every blocked receiver and hand back whatever was
   * still queued so the owner can account for it.
   */
  close(): T[] {
    if (this.isClosed) {
      return [];
    }
    this.isClosed = true;

    for (const waiter of this.waiters.splice(0)) {
      waiter.cleanup();
      waiter.resolve(undefined);
    }

    return this.items.splice(0);
  }

  private removeWaiter(waiter: Waiter<T>): void {
    const index = this.waiters.indexOf(waiter);
    if (index !== -1) {
      this.waiters.splice(index, 1);
    }
    waiter.cleanup();
  }
}
