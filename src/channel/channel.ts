import { ChannelClosedError, QueueFullError } from "../errors.js";

/**
 * A multi-producer, single-consumer FIFO queue.
 *
 * Producers choose between a lossy `trySend`, a throwing `sendOrThrow` and a
 * backpressured `send` that waits for room. The consumer either pulls with
 * `receive()`/async iteration, or multiplexes several channels by racing
 * their `ready()` promises and then draining with `tryReceive()`.
 */
export class Channel<T> {
  private readonly items: T[] = [];
  private readonly senders: Array<{ item: T; resolve: () => void; reject: (err: Error) => void }> = [];
  private readyWaiter: { promise: Promise<void>; resolve: () => void } | null = null;
  private _closed = false;

  constructor(
    readonly name: string,
    readonly capacity: number = Number.POSITIVE_INFINITY,
  ) {
    if (!(capacity > 0)) {
      throw new RangeError(`channel capacity must be positive, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Enqueue without waiting. Returns false when the channel is full or closed. */
  trySend(item: T): boolean {
    if (this._closed || this.items.length >= this.capacity) {
      return false;
    }
    this.items.push(item);
    this.notify();
    return true;
  }

  sendOrThrow(item: T): void {
    if (this._closed) {
      throw new ChannelClosedError(this.name);
    }
    if (!this.trySend(item)) {
      throw new QueueFullError(this.name);
    }
  }

  /** Enqueue, waiting for room if the channel is full. */
  send(item: T): Promise<void> {
    if (this._closed) {
      return Promise.reject(new ChannelClosedError(this.name));
    }
    if (this.trySend(item)) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.senders.push({ item, resolve, reject });
    });
  }

  tryReceive(): T | undefined {
    if (this.items.length === 0) {
      return undefined;
    }
    const item = this.items.shift();
    this.admitSender();
    return item;
  }

  /** Resolves once an item is buffered or the channel is closed. */
  ready(): Promise<void> {
    if (this.items.length > 0 || this._closed) {
      return Promise.resolve();
    }
    if (!this.readyWaiter) {
      let resolve: () => void = () => undefined;
      const promise = new Promise<void>((r) => {
        resolve = r;
      });
      this.readyWaiter = { promise, resolve };
    }
    return this.readyWaiter.promise;
  }

  /** Next item, or undefined once the channel is closed and drained. */
  async receive(): Promise<T | undefined> {
    for (;;) {
      if (this.items.length > 0) {
        return this.tryReceive();
      }
      if (this._closed) {
        return undefined;
      }
      await this.ready();
    }
  }

  close(): void {
    if (this._closed) {
      return;
    }
    this._closed = true;
    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError(this.name));
    }
    this.notify();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const item = await this.receive();
      if (item === undefined) {
        return;
      }
      yield item;
    }
  }

  private admitSender(): void {
    while (this.senders.length > 0 && this.items.length < this.capacity) {
      const sender = this.senders.shift();
      if (!sender) break;
      this.items.push(sender.item);
      sender.resolve();
    }
  }

  private notify(): void {
    const waiter = this.readyWaiter;
    if (waiter) {
      this.readyWaiter = null;
      waiter.resolve();
    }
  }
}
