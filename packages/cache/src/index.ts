// @modbump/cache: TTL cache stores for registry responses

export type { CacheEntry, CacheStore } from "./types.js";
export { isExpired } from "./types.js";
export { DiskCacheStore, DEFAULT_SWEEP_INTERVAL_MS, cacheFileName } from "./disk-store.js";
export type { DiskCacheStoreOptions } from "./disk-store.js";
export { InMemoryCacheStore } from "./memory-store.js";
export { ReadWriteLock } from "./rw-lock.js";
export { InvalidKeyError, CacheWriteError } from "./errors.js";
