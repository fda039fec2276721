export interface CacheEntry {
  key: string;
  /** Any JSON-serializable value */
  value: unknown;
  /** ISO 8601 */
  createdAt: string;
  /** ISO 8601; always createdAt + ttlMs */
  expiresAt: string;
  ttlMs: number;
}

export interface CacheStore {
  /** @throws {InvalidKeyError} for an empty key */
  set(key: string, value: unknown, ttlMs: number): Promise<void>;
  /** Resolves undefined for missing or expired keys. */
  get(key: string): Promise<unknown>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
  exists(key: string): Promise<boolean>;
  getExpired(): Promise<readonly CacheEntry[]>;
  close(): Promise<void>;
}

export function isExpired(entry: CacheEntry, now: number): boolean {
  return now > Date.parse(entry.expiresAt);
}

export function createEntry(key: string, value: unknown, ttlMs: number, now: number): CacheEntry {
  return Object.freeze({
    key,
    value,
    createdAt: new Date(now).toISOString(),
    expiresAt: new Date(now + ttlMs).toISOString(),
    ttlMs,
  });
}
