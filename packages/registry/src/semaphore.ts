import { CancelledError } from "./errors.js";

interface Waiter {
  grant: () => void;
}

/**
 * Counting semaphore bounding concurrent registry requests. Waiters are
 * served in arrival order; a waiter whose signal aborts leaves the queue
 * without taking a slot.
 */
export class Semaphore {
  private available: number;
  private readonly queue: Waiter[] = [];

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Semaphore size must be a positive integer, got ${size}`);
    }
    this.available = size;
  }

  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError("waiting for a fetch slot"));
    }
    if (this.available > 0) {
      this.available--;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.queue.indexOf(waiter);
        if (index !== -1) this.queue.splice(index, 1);
        reject(new CancelledError("waiting for a fetch slot"));
      };
      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
      };
      this.queue.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      next.grant();
    } else {
      this.available = Math.min(this.available + 1, this.size);
    }
  }

  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
