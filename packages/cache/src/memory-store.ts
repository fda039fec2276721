import { InvalidKeyError } from "./errors.js";
import { createEntry, isExpired } from "./types.js";
import type { CacheEntry, CacheStore } from "./types.js";

/** Non-persistent store with the same expiry semantics as the disk store. */
export class InMemoryCacheStore implements CacheStore {
  private readonly store = new Map<string, CacheEntry>();
  private readonly now: () => number;

  constructor(options: { now?: (() => number) | undefined } = {}) {
    this.now = options.now ?? Date.now;
  }

  async set(key: string, value: unknown, ttlMs: number): Promise<void> {
    if (key === "") throw new InvalidKeyError();
    this.store.set(key, createEntry(key, value, ttlMs, this.now()));
  }

  async get(key: string): Promise<unknown> {
    const entry = this.store.get(key);
    if (!entry || isExpired(entry, this.now())) return undefined;
    return entry.value;
  }

  async delete(key: string): Promise<void> {
    this.store.delete(key);
  }

  async clear(): Promise<void> {
    this.store.clear();
  }

  async exists(key: string): Promise<boolean> {
    const entry = this.store.get(key);
    return entry !== undefined && !isExpired(entry, this.now());
  }

  async getExpired(): Promise<readonly CacheEntry[]> {
    const now = this.now();
    return [...this.store.values()].filter((e) => isExpired(e, now));
  }

  async close(): Promise<void> {}
}
