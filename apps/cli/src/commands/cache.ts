// apps/cli/src/commands/cache.ts: `modbump cache clear|prune`
import { Command } from "commander";
import { DiskCacheStore } from "@modbump/cache";
import { loadConfig } from "@modbump/core";
import pc from "picocolors";
import { reportError } from "../errors.js";
import { plural } from "../output/text.js";

interface CacheCommandOpts {
  cacheDir?: string | undefined;
  config?: string | undefined;
}

async function withStore(
  opts: CacheCommandOpts,
  fn: (store: DiskCacheStore) => Promise<string>,
): Promise<void> {
  try {
    const directory = opts.cacheDir ?? (await loadConfig({ path: opts.config })).cacheDir;
    const store = await DiskCacheStore.open(directory, { sweepIntervalMs: 0 });
    try {
      console.log(pc.green(`✓ ${await fn(store)}`));
      process.exitCode = 0;
    } finally {
      await store.close();
    }
  } catch (err) {
    reportError(err);
  }
}

function subcommand(name: string, description: string): Command {
  return new Command(name)
    .description(description)
    .option("--cache-dir <dir>", "Registry response cache directory")
    .option("--config <file>", "Path to config.toml");
}

export function createCacheCommand(): Command {
  return new Command("cache")
    .description("Manage the registry response cache.")
    .addCommand(
      subcommand("clear", "Delete every cached registry response.").action((opts: CacheCommandOpts) =>
        withStore(opts, async (store) => {
          await store.clear();
          return `Cleared ${store.directory}`;
        }),
      ),
    )
    .addCommand(
      subcommand("prune", "Delete expired registry responses.").action((opts: CacheCommandOpts) =>
        withStore(opts, async (store) => {
          const removed = await store.sweep();
          return `Removed ${plural(removed, "expired entry", "expired entries")}`;
        }),
      ),
    );
}
