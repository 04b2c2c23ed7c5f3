/**
 * Bounded single-consumer channel between an upstream producer and the
 * relay's writer.
 *
 * @packageDocumentation
 */

const DONE: IteratorReturnResult<undefined> = { value: undefined, done: true };

interface Receiver<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: unknown) => void;
}

export class BoundedChannel<T> implements AsyncIterable<T> {
  private readonly buffer: Array<{ value: T }> = [];
  private readonly receivers: Receiver<T>[] = [];
  private readonly senders: Array<() => void> = [];
  private closed = false;
  private failure: { error: unknown } | null = null;

  readonly capacity: number;

  constructor(capacity = 2) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Items waiting to be received. */
  get size(): number {
    return this.buffer.length;
  }

  /**
   * Enqueue an item, waiting while the buffer is full.
   * Resolves false once the channel is closed; the item is dropped.
   */
  async send(item: T): Promise<boolean> {
    while (!this.closed && this.receivers.length === 0 && this.buffer.length >= this.capacity) {
      await new Promise<void>((resolve) => this.senders.push(resolve));
    }
    if (this.closed) return false;

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.resolve({ value: item, done: false });
    } else {
      this.buffer.push({ value: item });
    }
    return true;
  }

  receive(): Promise<IteratorResult<T>> {
    const entry = this.buffer.shift();
    if (entry) {
      this.senders.shift()?.();
      return Promise.resolve({ value: entry.value, done: false });
    }
    if (this.closed) {
      return this.failure ? Promise.reject(this.failure.error) : Promise.resolve(DONE);
    }
    return new Promise((resolve, reject) => this.receivers.push({ resolve, reject }));
  }

  /** No more items; buffered ones are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.settle();
  }

  /** Deliver buffered items, then reject the consumer with `error`. */
  fail(error: unknown): void {
    if (this.closed) return;
    this.failure = { error };
    this.close();
  }

  /** Close and drop anything still buffered. */
  cancel(): void {
    this.buffer.length = 0;
    if (this.closed) {
      this.failure = null;
      return;
    }
    this.closed = true;
    this.settle();
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.receive(),
      return: () => {
        this.cancel();
        return Promise.resolve(DONE);
      },
    };
  }

  private settle(): void {
    // Receivers only wait on an empty buffer
    for (const receiver of this.receivers.splice(0)) {
      if (this.failure) {
        receiver.reject(this.failure.error);
      } else {
        receiver.resolve(DONE);
      }
    }
    for (const wake of this.senders.splice(0)) wake();
  }
}

/**
 * Pull from `source` into `channel` until the source ends, the channel is
 * closed, or `signal` aborts. An abandoned source is released through its
 * iterator's `return()`.
 */
export async function pump<T>(source: AsyncIterable<T>, channel: BoundedChannel<T>, signal: AbortSignal): Promise<void> {
  const iterator = source[Symbol.asyncIterator]();

  try {
    while (!signal.aborted) {
      const next = await iterator.next();
      if (next.done) {
        channel.close();
        return;
      }
      if (!(await channel.send(next.value))) break;
    }
  } catch (error) {
    if (signal.aborted) {
      channel.cancel();
    } else {
      channel.fail(error);
    }
    return;
  }

  channel.cancel();
  await iterator.return?.();
}
