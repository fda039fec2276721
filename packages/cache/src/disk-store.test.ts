import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { DiskCacheStore, cacheFileName } from "./disk-store.js";
import { CacheWriteError, InvalidKeyError } from "./errors.js";

describe("DiskCacheStore", () => {
  let dir: string;
  const stores: DiskCacheStore[] = [];

  async function open(options: Parameters<typeof DiskCacheStore.open>[1] = {}) {
    const store = await DiskCacheStore.open(dir, { sweepIntervalMs: 0, ...options });
    stores.push(store);
    return store;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "modbump-cache-"));
  });

  afterEach(async () => {
    await Promise.all(stores.splice(0).map((s) => s.close()));
    await rm(dir, { recursive: true, force: true });
  });

  it("returns a value immediately after set", async () => {
    const store = await open();
    await store.set("module_versions:a", { versions: ["1.0.0"] }, 60_000);
    expect(await store.get("module_versions:a")).toEqual({ versions: ["1.0.0"] });
    expect(await store.exists("module_versions:a")).toBe(true);
  });

  it("treats entries as absent once their TTL has passed", async () => {
    const store = await open();
    await store.set("short", "lived", 30);
    await sleep(80);
    expect(await store.get("short")).toBeUndefined();
    expect(await store.exists("short")).toBe(false);
  });

  it("does not evict on read", async () => {
    let now = 10_000;
    const store = await open({ now: () => now });
    await store.set("k", "v", 100);
    now += 101;

    expect(await store.get("k")).toBeUndefined();
    const expired = await store.getExpired();
    expect(expired.map((e) => e.key)).toEqual(["k"]);
    expect(expired[0]?.expiresAt).toBe(new Date(10_100).toISOString());
  });

  it("creates the cache directory on demand", async () => {
    const nested = join(dir, "nested", "cache");
    const store = await DiskCacheStore.open(nested, { sweepIntervalMs: 0 });
    stores.push(store);
    await store.set("k", 1, 1000);
    expect(await readdir(nested)).toEqual([cacheFileName("k")]);
  });

  it("makes values visible to a fresh instance on the same directory", async () => {
    const first = await open();
    await first.set("module_versions:registry.terraform.io:hashicorp:vault:aws", ["1.0.0"], 60_000);
    await first.set("module_info:registry.terraform.io:hashicorp:vault:aws:1.0.0", { source: "x" }, 60_000);
    await first.close();

    const second = await open();
    expect(await second.get("module_versions:registry.terraform.io:hashicorp:vault:aws")).toEqual([
      "1.0.0",
    ]);
    expect(
      await second.get("module_info:registry.terraform.io:hashicorp:vault:aws:1.0.0"),
    ).toEqual({ source: "x" });
  });

  it("skips malformed records when loading", async () => {
    await writeFile(join(dir, "broken.json"), "{not json", "utf8");
    await writeFile(join(dir, "wrong-shape.json"), JSON.stringify({ key: "" }), "utf8");
    await writeFile(join(dir, "notes.txt"), "ignored", "utf8");

    const store = await open();
    expect(await store.getExpired()).toEqual([]);
    await store.set("fine", true, 1000);
    expect(await store.get("fine")).toBe(true);
  });

  it("rejects empty keys", async () => {
    const store = await open();
    await expect(store.set("", "v", 1000)).rejects.toThrow(InvalidKeyError);
  });

  it("deletes idempotently", async () => {
    const store = await open();
    await store.set("k", "v", 1000);
    await store.delete("k");
    await store.delete("k");
    await store.delete("never-set");
    expect(await store.get("k")).toBeUndefined();
    expect(await readdir(dir)).toEqual([]);
  });

  it("clears memory and disk, and clearing an empty store succeeds", async () => {
    const store = await open();
    await store.set("a", 1, 1000);
    await store.set("b", 2, 1000);
    await store.clear();
    await store.clear();

    expect(await store.exists("a")).toBe(false);
    expect(await readdir(dir)).toEqual([]);
  });

  it("rolls back the in-memory entry when persisting fails", async () => {
    const store = await open();
    await store.set("kept", "original", 60_000);
    await rm(dir, { recursive: true, force: true });

    await expect(store.set("kept", "replacement", 60_000)).rejects.toThrow(CacheWriteError);
    await expect(store.set("new", "value", 60_000)).rejects.toThrow(
      'Failed to persist cache entry "new"',
    );

    expect(await store.get("kept")).toBe("original");
    expect(await store.exists("new")).toBe(false);
  });

  it("sweep removes expired entries from memory and disk", async () => {
    let now = 0;
    const store = await open({ now: () => now });
    await store.set("old", "x", 10);
    await store.set("fresh", "y", 10_000);
    now = 100;

    expect(await store.sweep()).toBe(1);
    expect(await store.getExpired()).toEqual([]);
    expect(await readdir(dir)).toEqual([cacheFileName("fresh")]);
  });

  it("runs the sweep in the background and stops on close", async () => {
    let now = 0;
    const store = await open({ now: () => now, sweepIntervalMs: 10 });
    await store.set("a", 1, 5);
    now = 50;

    await vi.waitFor(async () => {
      expect(await readdir(dir)).toEqual([]);
    });

    await store.close();
    await store.set("b", 2, 5);
    now = 100;
    await sleep(50);
    expect(await readdir(dir)).toEqual([cacheFileName("b")]);
  });

  it("keeps every entry under concurrent writers", async () => {
    const store = await open();
    const keys = Array.from({ length: 40 }, (_, i) => `key-${i}`);

    await Promise.all(keys.map((k, i) => store.set(k, i, 60_000)));
    const values = await Promise.all(keys.map((k) => store.get(k)));
    expect(values).toEqual(keys.map((_, i) => i));

    const reopened = await open();
    expect(await reopened.get("key-39")).toBe(39);
    expect((await readdir(dir)).length).toBe(40);
  });
});

describe("cacheFileName", () => {
  it("replaces path-unsafe characters", () => {
    const name = cacheFileName("module_versions:registry.terraform.io:hashicorp:vault:aws");
    expect(name.startsWith("module_versions_registry.terraform.io_hashicorp_vault_aws-")).toBe(
      true,
    );
    expect(name.endsWith(".json")).toBe(true);
  });

  it("bounds the readable part and keeps long keys distinct", () => {
    const prefix = "x".repeat(100);
    const a = cacheFileName(`${prefix}:1.0.0`);
    const b = cacheFileName(`${prefix}:2.0.0`);
    expect(a).not.toBe(b);
    expect(a.length).toBe(64 + 1 + 16 + ".json".length);
  });
});
