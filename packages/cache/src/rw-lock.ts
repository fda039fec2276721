type Waiter = { kind: "read" | "write"; resolve: () => void };

/**
 * Async reader/writer lock. Readers share the lock, writers hold it alone.
 * Waiters are served in arrival order, so a queued writer is not starved
 * by readers that arrive after it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readonly waiters: Waiter[] = [];

  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire("read");
    try {
      return await fn();
    } finally {
      this.readers--;
      this.drain();
    }
  }

  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire("write");
    try {
      return await fn();
    } finally {
      this.writing = false;
      this.drain();
    }
  }

  private acquire(kind: Waiter["kind"]): Promise<void> {
    return new Promise<void>((resolve) => {
      this.waiters.push({ kind, resolve });
      this.drain();
    });
  }

  private drain(): void {
    for (let next = this.waiters[0]; next; next = this.waiters[0]) {
      if (this.writing) return;
      if (next.kind === "write") {
        if (this.readers > 0) return;
        this.waiters.shift();
        this.writing = true;
        next.resolve();
        return;
      }
      this.waiters.shift();
      this.readers++;
      next.resolve();
    }
  }
}
