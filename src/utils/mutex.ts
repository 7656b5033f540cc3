/**
 * FIFO async mutex. Callers queue behind the current holder in arrival order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    this.tail = previous.then(() => current);
    this.holders++;

    try {
      await previous;
      return await fn();
    } finally {
      this.holders--;
      release();
    }
  }

  isLocked(): boolean {
    return this.holders > 0;
  }
}

/**
 * One mutex per key, created on demand and dropped once nobody holds or waits on it.
 */
export class KeyedMutex {
  private locks = new Map<string, { mutex: Mutex; refs: number }>();

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), refs: 0 };
      this.locks.set(key, entry);
    }
    entry.refs++;

    try {
      return await entry.mutex.runExclusive(fn);
    } finally {
      entry.refs--;
      if (entry.refs === 0) {
        this.locks.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.locks.get(key)?.mutex.isLocked() ?? false;
  }

  get size(): number {
    return this.locks.size;
  }
}
