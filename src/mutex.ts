type Release = () => void;

/**
 * Promise-chained mutual exclusion. Holders are served in acquisition order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  get locked(): boolean {
    return this.holders > 0;
  }

  acquire(): Promise<Release> {
    this.holders += 1;

    let release: Release = () => undefined;
    const next = new Promise<void>((resolve) => {
      let released = false;
      release = () => {
        if (released) return;
        released = true;
        this.holders -= 1;
        resolve();
      };
    });

    const previous = this.tail;
    this.tail = previous.then(() => next);
    return previous.then(() => release);
  }

  /**
   * Run `fn` inside the critical section. The lock is released on every exit
   * path, including a thrown error.
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

/**
 * One {@link Mutex} per key, dropped again once nobody holds or waits on it.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, Mutex>();

  isLocked(key: string): boolean {
    return this.locks.get(key)?.locked ?? false;
  }

  async runExclusive<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    let mutex = this.locks.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.locks.set(key, mutex);
    }

    try {
      return await mutex.runExclusive(fn);
    } finally {
      if (!mutex.locked && this.locks.get(key) === mutex) {
        this.locks.delete(key);
      }
    }
  }
}
