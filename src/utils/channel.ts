type Receiver<T> = {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: unknown) => void;
};

/**
 * Bounded single-producer/single-consumer channel.
 *
 * The producer `send`s and is suspended while the buffer is full, then calls
 * `close()` (optionally with an error) when it is done. The consumer iterates;
 * leaving the loop early cancels the channel, which aborts `signal` so the
 * producer can stop whatever upstream work feeds it.
 */
export class BoundedChannel<T> implements AsyncIterable<T> {
  private buffer: Array<{ value: T }> = [];
  private receivers: Receiver<T>[] = [];
  private senders: Array<() => void> = [];
  private closed = false;
  private failure: { error: unknown } | undefined;
  private controller = new AbortController();

  constructor(readonly capacity: number = 16) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError('Channel capacity must be a positive integer');
    }
  }

  /** Aborted when the consumer cancels. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Resolves `false` if the channel was closed or cancelled before the value could be queued.
   */
  async send(value: T): Promise<boolean> {
    while (!this.closed && this.receivers.length === 0 && this.buffer.length >= this.capacity) {
      await new Promise<void>(resolve => this.senders.push(resolve));
    }
    if (this.closed) return false;

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.resolve({ value, done: false });
    } else {
      this.buffer.push({ value });
    }
    return true;
  }

  /** Producer side: no more values. Buffered values are still delivered before `error` surfaces. */
  close(error?: unknown): void {
    if (this.closed) return;
    this.closed = true;
    if (error !== undefined) {
      this.failure = { error };
    }
    this.wakeSenders();
    this.settleReceivers();
  }

  /** Consumer side: stop receiving, drop the buffer and abort `signal`. */
  cancel(reason?: unknown): void {
    this.buffer = [];
    this.close();
    if (!this.controller.signal.aborted) {
      this.controller.abort(reason);
    }
  }

  receive(): Promise<IteratorResult<T>> {
    const item = this.buffer.shift();
    if (item) {
      this.senders.shift()?.();
      return Promise.resolve({ value: item.value, done: false });
    }
    if (this.closed) {
      if (this.failure) {
        const { error } = this.failure;
        this.failure = undefined;
        return Promise.reject(error);
      }
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => {
      this.receivers.push({ resolve, reject });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.receive(),
      return: async () => {
        if (!this.closed || this.buffer.length > 0) {
          this.cancel();
        }
        return { value: undefined, done: true };
      },
    };
  }

  private wakeSenders(): void {
    const waiting = this.senders;
    this.senders = [];
    waiting.forEach(wake => wake());
  }

  private settleReceivers(): void {
    const waiting = this.receivers;
    this.receivers = [];
    for (const receiver of waiting) {
      if (this.failure) {
        const { error } = this.failure;
        this.failure = undefined;
        receiver.reject(error);
      } else {
        receiver.resolve({ value: undefined, done: true });
      }
    }
  }
}
