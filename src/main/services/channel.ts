import { ChannelClosedError } from '../errors';

interface PendingSend<T> {
  item: T;
  resolve: () => void;
  reject: (err: Error) => void;
}

interface PendingReceive<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (err: Error) => void;
}

/**
 * Bounded, ordered conduit from many concurrent producers to one consumer.
 *
 * `send` resolves once the item is buffered. When the buffer is full the
 * sender waits its turn (FIFO), so nothing is dropped. Closing lets the
 * consumer drain what is already buffered or waiting; failing rejects
 * everyone immediately.
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private senders: PendingSend<T>[] = [];
  private receiver: PendingReceive<T> | null = null;
  private closed = false;
  private failure: Error | null = null;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get pendingSenders(): number {
    return this.senders.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  send(item: T): Promise<void> {
    if (this.failure) return Promise.reject(this.failure);
    if (this.closed) return Promise.reject(new ChannelClosedError());

    if (this.receiver) {
      const receiver = this.receiver;
      this.receiver = null;
      receiver.resolve({ value: item, done: false });
      return Promise.resolve();
    }

    if (this.senders.length === 0 && this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.senders.push({ item, resolve, reject });
    });
  }

  receive(): Promise<IteratorResult<T>> {
    if (this.receiver) {
      return Promise.reject(new Error('EventChannel supports a single consumer'));
    }

    if (this.failure) return Promise.reject(this.failure);

    if (this.buffer.length > 0) {
      const item = this.buffer[0];
      this.buffer.shift();
      this.admitSender();
      return Promise.resolve({ value: item, done: false });
    }

    // Only reachable with an empty buffer, i.e. no senders are parked
    if (this.closed) return Promise.resolve({ value: undefined, done: true });

    return new Promise<IteratorResult<T>>((resolve, reject) => {
      this.receiver = { resolve, reject };
    });
  }

  /** Producer is finished. Buffered and parked items are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.receiver && this.buffer.length === 0) {
      const receiver = this.receiver;
      this.receiver = null;
      receiver.resolve({ value: undefined, done: true });
    }
  }

  /** Abort the channel. Every waiting and future call rejects with `error`. */
  fail(error: Error): void {
    if (this.failure) return;
    this.failure = error;
    this.closed = true;
    this.buffer = [];
    const senders = this.senders;
    this.senders = [];
    for (const sender of senders) sender.reject(error);
    if (this.receiver) {
      const receiver = this.receiver;
      this.receiver = null;
      receiver.reject(error);
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.receive(),
      // Consumer stopped early: release any parked producers
      return: async () => {
        this.fail(new ChannelClosedError());
        return { value: undefined, done: true };
      },
    };
  }

  private admitSender(): void {
    const next = this.senders.shift();
    if (!next) return;
    this.buffer.push(next.item);
    next.resolve();
  }
}
