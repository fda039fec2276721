import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { defaultCacheDir, defaultConfigPath, loadConfig } from "../config.js";
import { ConfigError } from "../errors.js";

describe("loadConfig", () => {
  let dir: string;
  let env: Record<string, string>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "modbump-config-"));
    env = { XDG_CONFIG_HOME: join(dir, "config"), XDG_CACHE_HOME: join(dir, "cache") };
    await mkdir(join(dir, "config", "modbump"), { recursive: true });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("resolves XDG locations", () => {
    expect(defaultConfigPath(env)).toBe(join(dir, "config", "modbump", "config.toml"));
    expect(defaultCacheDir(env)).toBe(join(dir, "cache", "modbump"));
  });

  it("returns defaults when the file does not exist", async () => {
    expect(await loadConfig({ env })).toEqual({
      configPath: join(dir, "config", "modbump", "config.toml"),
      diffTool: undefined,
      cacheDir: join(dir, "cache", "modbump"),
      cacheTtlMs: 86_400_000,
      workers: 4,
      timeoutMs: 10_000,
    });
  });

  it("reads every section", async () => {
    await writeFile(
      defaultConfigPath(env),
      [
        "[diff]",
        'tool = "delta --paging=never"',
        "",
        "[cache]",
        'dir = "/var/cache/modbump"',
        'ttl = "1h30m"',
        "",
        "[fetch]",
        "workers = 8",
        'timeout = "30s"',
        "",
      ].join("\n"),
    );

    expect(await loadConfig({ env })).toMatchObject({
      diffTool: "delta --paging=never",
      cacheDir: "/var/cache/modbump",
      cacheTtlMs: 5_400_000,
      workers: 8,
      timeoutMs: 30_000,
    });
  });

  it("keeps defaults for sections that are left out", async () => {
    await writeFile(defaultConfigPath(env), '[diff]\ntool = "colordiff"\n');
    const settings = await loadConfig({ env });
    expect(settings.diffTool).toBe("colordiff");
    expect(settings.cacheTtlMs).toBe(86_400_000);
  });

  it("rejects invalid values with the path and key", async () => {
    const path = defaultConfigPath(env);
    await writeFile(path, '[cache]\nttl = "tomorrow"\n');

    await expect(loadConfig({ env })).rejects.toThrow(ConfigError);
    await expect(loadConfig({ env })).rejects.toThrow(`${path}: invalid configuration: cache.ttl:`);
  });

  it("rejects non-positive worker counts", async () => {
    await writeFile(defaultConfigPath(env), "[fetch]\nworkers = 0\n");
    await expect(loadConfig({ env })).rejects.toThrow(/fetch\.workers/);
  });

  it("rejects malformed TOML", async () => {
    await writeFile(defaultConfigPath(env), "[cache\n");
    await expect(loadConfig({ env })).rejects.toThrow(ConfigError);
  });

  it("rejects a directory in place of the file", async () => {
    const path = join(dir, "as-dir");
    await mkdir(path);
    await expect(loadConfig({ path, env })).rejects.toThrow(`${path}: is a directory`);
  });
});
