// apps/cli/src/session.ts: registry client and fetcher for one command run
import { DiskCacheStore, InMemoryCacheStore } from "@modbump/cache";
import type { CacheStore } from "@modbump/cache";
import { RegistryClient, VersionFetcher } from "@modbump/registry";
import pc from "picocolors";
import type { RunOptions } from "./options.js";

export interface Session {
  fetcher: VersionFetcher;
  close(): Promise<void>;
}

export interface SessionOptions {
  /** Also fetch per-version metadata (default: false) */
  details?: boolean | undefined;
}

export async function openSession(run: RunOptions, options: SessionOptions = {}): Promise<Session> {
  const warn = (err: unknown) => {
    console.error(pc.yellow(`⚠  ${err instanceof Error ? err.message : String(err)}`));
  };

  // Without a cache directory, responses are still shared within the run.
  const cache: CacheStore =
    run.cacheDir === undefined
      ? new InMemoryCacheStore()
      : await DiskCacheStore.open(run.cacheDir, { onError: warn });
  const client = new RegistryClient({
    cache,
    timeoutMs: run.timeoutMs,
    cacheTtlMs: run.cacheTtlMs,
    onError: warn,
  });

  return {
    fetcher: new VersionFetcher(client, {
      workers: run.workers,
      fetchInfo: options.details ?? false,
    }),
    async close() {
      await cache.close();
    },
  };
}
