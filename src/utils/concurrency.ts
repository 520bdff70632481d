/**
 * Counting semaphore. Waiters are served in FIFO order.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer (got ${capacity})`);
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
      // Hand the permit straight to the next waiter
      next();
      return;
    }
    this.available = Math.min(this.available + 1, this.capacity);
  }

  async use<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  get inUse(): number {
    return this.capacity - this.available;
  }

  get pending(): number {
    return this.waiters.length;
  }
}

/** Exclusive async lock. */
export class Mutex {
  private readonly semaphore = new Semaphore(1);

  runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.semaphore.use(async () => fn());
  }

  get locked(): boolean {
    return this.semaphore.inUse > 0;
  }
}

/** One exclusive lock per key; idle keys are dropped. */
export class KeyedMutex {
  private readonly locks = new Map<string, { mutex: Mutex; holders: number }>();

  async runExclusive<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), holders: 0 };
      this.locks.set(key, entry);
    }
    entry.holders++;
    try {
      return await entry.mutex.runExclusive(fn);
    } finally {
      entry.holders--;
      if (entry.holders === 0) this.locks.delete(key);
    }
  }

  get size(): number {
    return this.locks.size;
  }
}
