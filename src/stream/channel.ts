/**
 * Bounded single-producer/single-consumer channel.
 *
 * `push` suspends while the buffer is full, so a slow consumer throttles the
 * producer instead of letting it buffer without limit.
 *
 * @packageDocumentation
 */

export class ChannelClosedError extends Error {
  constructor() {
    super('Channel closed');
    this.name = 'ChannelClosedError';
  }
}

export class BoundedChannel<T> implements AsyncIterable<T> {
  private readonly buffer: Array<{ value: T }> = [];
  private closed = false;
  private failure: { error: unknown } | null = null;
  private waitingReader: (() => void) | null = null;
  private waitingWriters: Array<() => void> = [];

  readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async push(value: T): Promise<void> {
    while (!this.closed && this.buffer.length >= this.capacity) {
      await new Promise<void>((resolve) => this.waitingWriters.push(resolve));
    }
    if (this.closed) throw new ChannelClosedError();
    this.buffer.push({ value });
    this.wakeReader();
  }

  /** No more values; buffered values are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.wakeReader();
    this.wakeWriters();
  }

  /** Close and make the consumer throw once the buffer drains. */
  fail(error: unknown): void {
    if (this.closed) return;
    this.failure = { error };
    this.close();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      const next = this.buffer.shift();
      if (next) {
        this.wakeWriters();
        yield next.value;
        continue;
      }
      if (this.failure) throw this.failure.error;
      if (this.closed) return;
      await new Promise<void>((resolve) => {
        this.waitingReader = resolve;
      });
    }
  }

  private wakeReader(): void {
    const reader = this.waitingReader;
    this.waitingReader = null;
    reader?.();
  }

  private wakeWriters(): void {
    const writers = this.waitingWriters;
    this.waitingWriters = [];
    for (const wake of writers) wake();
  }
}

/**
 * Run `source` in a reader task that feeds a bounded channel, and yield from
 * the channel. When the consumer stops early the channel is closed, the
 * reader's next push fails, and the source is returned.
 */
export async function* pipeThroughChannel<T>(
  source: AsyncIterable<T>,
  capacity: number,
): AsyncGenerator<T, void, undefined> {
  const channel = new BoundedChannel<T>(capacity);

  const reader = (async () => {
    try {
      for await (const value of source) {
        await channel.push(value);
      }
      channel.close();
    } catch (err) {
      if (!(err instanceof ChannelClosedError)) channel.fail(err);
    }
  })();

  try {
    yield* channel;
  } finally {
    channel.close();
    await reader;
  }
}
