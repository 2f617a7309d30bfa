/**
 * Bounded fan-out with a single writer.
 *
 * Producers (detail fetch + classify) run at most `concurrency` at a time,
 * gated by a counting semaphore. Their results go onto a bounded channel that
 * exactly one writer drains, so store writes never overlap. The channel is
 * closed explicitly once every producer has settled, and `runCoordinated`
 * resolves only after the writer has drained it.
 */

export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.available = capacity;
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return;
    }
    await new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Hand the permit straight to the next waiter.
      next();
      return;
    }
    if (this.available >= this.capacity) {
      throw new Error("Semaphore released more times than acquired");
    }
    this.available++;
  }

  async use<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

export class ChannelClosedError extends Error {
  constructor() {
    super("Cannot send on a closed channel");
    this.name = "ChannelClosedError";
  }
}

export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: Array<{ value: T }> = [];
  private readonly receivers: Array<(result: IteratorResult<T>) => void> = [];
  private readonly senders: Array<() => void> = [];
  private closed = false;

  constructor(readonly capacity: number = Number.POSITIVE_INFINITY) {
    if (!(capacity >= 1)) {
      throw new Error(`Channel capacity must be at least 1, got ${capacity}`);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  async send(value: T): Promise<void> {
    while (true) {
      if (this.closed) throw new ChannelClosedError();

      const receiver = this.receivers.shift();
      if (receiver) {
        receiver({ value, done: false });
        return;
      }
      if (this.buffer.length < this.capacity) {
        this.buffer.push({ value });
        return;
      }
      await new Promise<void>((resolve) => this.senders.push(resolve));
    }
  }

  receive(): Promise<IteratorResult<T>> {
    const head = this.buffer.shift();
    if (head) {
      this.senders.shift()?.();
      return Promise.resolve({ value: head.value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => this.receivers.push(resolve));
  }

  /** Buffered values are still delivered; receivers see `done` once drained. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver({ value: undefined, done: true });
    }
    for (const sender of this.senders.splice(0)) {
      sender();
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.receive(),
    };
  }
}

export interface CoordinatedRunOptions<T, R> {
  items: readonly T[];
  concurrency: number;
  queueCapacity?: number;
  signal?: AbortSignal;
  /** Returns null when there is nothing to write for the item. */
  produce: (item: T) => Promise<R | null>;
  consume: (result: R) => Promise<void>;
  onProduceError: (item: T, error: unknown) => void;
  onConsumeError: (result: R, error: unknown) => void;
}

export interface CoordinatedRunSummary {
  produced: number;
  written: number;
  failed: number;
  notStarted: number;
  aborted: boolean;
}

export async function runCoordinated<T, R>(
  options: CoordinatedRunOptions<T, R>,
): Promise<CoordinatedRunSummary> {
  const { items, signal, produce, consume } = options;
  const semaphore = new Semaphore(options.concurrency);
  const channel = new Channel<R>(
    options.queueCapacity ?? Math.max(1, options.concurrency * 2),
  );

  const summary: CoordinatedRunSummary = {
    produced: 0,
    written: 0,
    failed: 0,
    notStarted: 0,
    aborted: false,
  };

  const writer = (async () => {
    for await (const result of channel) {
      try {
        await consume(result);
        summary.written++;
      } catch (error) {
        summary.failed++;
        options.onConsumeError(result, error);
      }
    }
  })();

  const producers = items.map((item) =>
    semaphore.use(async () => {
      if (signal?.aborted) {
        summary.notStarted++;
        return;
      }

      let result: R | null;
      try {
        result = await produce(item);
      } catch (error) {
        summary.failed++;
        options.onProduceError(item, error);
        return;
      }

      if (result === null) return;
      summary.produced++;
      await channel.send(result);
    }),
  );

  try {
    await Promise.all(producers);
  } finally {
    channel.close();
    await writer;
  }

  summary.aborted = signal?.aborted ?? false;
  return summary;
}
