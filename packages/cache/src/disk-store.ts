import { createHash, randomUUID } from "node:crypto";
import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { extname, join } from "node:path";
import { z } from "zod";
import { CacheWriteError, InvalidKeyError } from "./errors.js";
import { ReadWriteLock } from "./rw-lock.js";
import { createEntry, isExpired } from "./types.js";
import type { CacheEntry, CacheStore } from "./types.js";

export const DEFAULT_SWEEP_INTERVAL_MS = 5 * 60 * 1000;

// Readable prefix length; a digest of the full key keeps long keys apart.
const MAX_KEY_CHARS = 64;
const UNSAFE_CHARS = /[/\\:*?"<>|\u0000]/g;

const EntryRecordSchema = z.object({
  key: z.string().min(1),
  value: z.unknown(),
  createdAt: z.string().datetime(),
  expiresAt: z.string().datetime(),
  ttlMs: z.number().nonnegative(),
});

export interface DiskCacheStoreOptions {
  /** Background sweep period; 0 disables the sweep (default: 5 minutes) */
  sweepIntervalMs?: number | undefined;
  /** Clock used for expiry (default: Date.now) */
  now?: (() => number) | undefined;
  /** Receives errors from the background sweep */
  onError?: ((err: unknown) => void) | undefined;
}

/** Filesystem-safe record name for a cache key. */
export function cacheFileName(key: string): string {
  const readable = key.slice(0, MAX_KEY_CHARS).replace(UNSAFE_CHARS, "_");
  const digest = createHash("sha256").update(key).digest("hex").slice(0, 16);
  return `${readable}-${digest}.json`;
}

/**
 * Cache store keeping every entry in memory and one JSON record per key on
 * disk. All access to the entry map goes through a single reader/writer
 * lock; disk writes happen while the write lock is held so memory and disk
 * never disagree.
 */
export class DiskCacheStore implements CacheStore {
  private entries = new Map<string, CacheEntry>();
  private readonly lock = new ReadWriteLock();
  private readonly now: () => number;
  private readonly onError: (err: unknown) => void;
  private timer: NodeJS.Timeout | undefined;
  private sweeping: Promise<void> | undefined;

  private constructor(
    readonly directory: string,
    options: DiskCacheStoreOptions,
  ) {
    this.now = options.now ?? Date.now;
    this.onError =
      options.onError ??
      ((err) => {
        console.error(`[cache] sweep failed: ${err instanceof Error ? err.message : String(err)}`);
      });
  }

  /**
   * Open (creating if needed) a cache directory and load its records.
   * Unreadable or malformed records are skipped.
   */
  static async open(directory: string, options: DiskCacheStoreOptions = {}): Promise<DiskCacheStore> {
    await mkdir(directory, { recursive: true });
    const store = new DiskCacheStore(directory, options);
    await store.load();

    const interval = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    if (interval > 0) {
      store.timer = setInterval(() => store.scheduleSweep(), interval);
      store.timer.unref();
    }
    return store;
  }

  async set(key: string, value: unknown, ttlMs: number): Promise<void> {
    if (key === "") throw new InvalidKeyError();

    await this.lock.write(async () => {
      const previous = this.entries.get(key);
      const entry = createEntry(key, value, ttlMs, this.now());
      this.entries.set(key, entry);

      try {
        await this.persist(entry);
      } catch (err) {
        if (previous) {
          this.entries.set(key, previous);
        } else {
          this.entries.delete(key);
        }
        throw new CacheWriteError(key, { cause: err });
      }
    });
  }

  get(key: string): Promise<unknown> {
    return this.lock.read(() => {
      const entry = this.entries.get(key);
      if (!entry || isExpired(entry, this.now())) return undefined;
      return entry.value;
    });
  }

  async delete(key: string): Promise<void> {
    await this.lock.write(() => this.remove(key));
  }

  async clear(): Promise<void> {
    await this.lock.write(async () => {
      // Known records first, each leaving memory only once its file is gone.
      for (const key of [...this.entries.keys()]) {
        await this.remove(key);
      }

      let names: string[];
      try {
        names = await readdir(this.directory);
      } catch (err) {
        if (isNotFound(err)) return;
        throw err;
      }

      for (const name of names) {
        if (extname(name) === ".json" || name.endsWith(".tmp")) {
          await rm(join(this.directory, name), { force: true });
        }
      }
    });
  }

  exists(key: string): Promise<boolean> {
    return this.lock.read(() => {
      const entry = this.entries.get(key);
      return entry !== undefined && !isExpired(entry, this.now());
    });
  }

  getExpired(): Promise<readonly CacheEntry[]> {
    return this.lock.read(() => {
      const now = this.now();
      return [...this.entries.values()].filter((e) => isExpired(e, now));
    });
  }

  /**
   * Remove every expired entry from memory and disk. An entry replaced by
   * a fresh `set` between the snapshot and the removal is kept.
   */
  async sweep(): Promise<number> {
    const expired = await this.getExpired();
    let removed = 0;

    for (const entry of expired) {
      const deleted = await this.lock.write(async () => {
        if (this.entries.get(entry.key) !== entry) return false;
        await this.remove(entry.key);
        return true;
      });
      if (deleted) removed++;
    }
    return removed;
  }

  /** Stop the background sweep, waiting for one in progress. */
  async close(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    await this.sweeping;
  }

  private scheduleSweep(): void {
    if (this.sweeping) return;
    this.sweeping = this.sweep()
      .then(() => undefined)
      .catch((err: unknown) => this.onError(err))
      .finally(() => {
        this.sweeping = undefined;
      });
  }

  private async remove(key: string): Promise<void> {
    await rm(this.fileFor(key), { force: true });
    this.entries.delete(key);
  }

  private fileFor(key: string): string {
    return join(this.directory, cacheFileName(key));
  }

  // Write to a sibling temp file and rename, so a failed write leaves the
  // previous record intact.
  private async persist(entry: CacheEntry): Promise<void> {
    const target = this.fileFor(entry.key);
    const temp = `${target}.${randomUUID()}.tmp`;
    try {
      await writeFile(temp, JSON.stringify(entry), "utf8");
      await rename(temp, target);
    } catch (err) {
      await rm(temp, { force: true });
      throw err;
    }
  }

  private async load(): Promise<void> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (err) {
      if (isNotFound(err)) return;
      throw err;
    }

    for (const name of names) {
      if (extname(name) !== ".json") continue;

      let raw: string;
      try {
        raw = await readFile(join(this.directory, name), "utf8");
      } catch {
        continue;
      }

      const record = parseRecord(raw);
      if (record) this.entries.set(record.key, record);
    }
  }
}

function parseRecord(raw: string): CacheEntry | undefined {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return undefined;
  }

  const result = EntryRecordSchema.safeParse(json);
  if (!result.success) return undefined;

  const { key, value, createdAt, expiresAt, ttlMs } = result.data;
  return Object.freeze({ key, value, createdAt, expiresAt, ttlMs });
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
