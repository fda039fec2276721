import { describe, expect, it } from "vitest";
import { InMemoryCacheStore } from "./memory-store.js";
import { InvalidKeyError } from "./errors.js";

describe("InMemoryCacheStore", () => {
  it("returns undefined for a cache miss", async () => {
    const cache = new InMemoryCacheStore();
    expect(await cache.get("nonexistent")).toBeUndefined();
  });

  it("returns the stored value after set", async () => {
    const cache = new InMemoryCacheStore();
    await cache.set("key-1", { versions: ["1.0.0"] }, 1000);
    expect(await cache.get("key-1")).toEqual({ versions: ["1.0.0"] });
  });

  it("overwrites a previous value", async () => {
    const cache = new InMemoryCacheStore();
    await cache.set("key-1", "a", 1000);
    await cache.set("key-1", "b", 1000);
    expect(await cache.get("key-1")).toBe("b");
  });

  it("hides expired entries", async () => {
    let now = 1_000;
    const cache = new InMemoryCacheStore({ now: () => now });
    await cache.set("k", "v", 50);
    now += 51;
    expect(await cache.get("k")).toBeUndefined();
    expect(await cache.exists("k")).toBe(false);
    expect((await cache.getExpired()).map((e) => e.key)).toEqual(["k"]);
  });

  it("rejects empty keys", async () => {
    const cache = new InMemoryCacheStore();
    await expect(cache.set("", "v", 1000)).rejects.toThrow(InvalidKeyError);
  });
});
