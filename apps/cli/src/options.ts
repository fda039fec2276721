// apps/cli/src/options.ts: flags shared by `show` and `update`, merged over config.toml
import { InvalidArgumentError } from "commander";
import type { Command } from "commander";
import { buildModuleFilter, loadConfig, loadConstraints, parseDuration } from "@modbump/core";
import type { ModuleFilter, Settings } from "@modbump/core";
import type { Constraints } from "@modbump/version";

export interface SelectionOpts {
  module: string[];
  strategy?: string | undefined;
  constraint?: string | undefined;
  constraintFile?: string | undefined;
  workers?: number | undefined;
  cacheDir?: string | undefined;
  cacheTtl?: string | undefined;
  cache: boolean;
  config?: string | undefined;
  verbose?: boolean | undefined;
  quiet?: boolean | undefined;
}

export interface RunOptions {
  filter: ModuleFilter | undefined;
  constraints: Constraints;
  workers: number;
  timeoutMs: number;
  /** Undefined when caching is off */
  cacheDir: string | undefined;
  cacheTtlMs: number;
  diffTool: string | undefined;
  verbose: boolean;
  quiet: boolean;
}

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function withSelectionOptions(command: Command): Command {
  return command
    .option(
      "--module <pattern=strategy>",
      "Only modules matching pattern, with their strategy (repeatable)",
      collect,
      [],
    )
    .option("--strategy <strategy>", "Strategy for every module: minor or latest")
    .option("--constraint <expr>", 'Version constraints, e.g. ">= 1.2.0, < 2.0.0"')
    .option("--constraint-file <file>", "Read constraints from a file, one per line")
    .option("--workers <n>", "Concurrent registry requests", parsePositiveInt)
    .option("--cache-dir <dir>", "Registry response cache directory")
    .option("--cache-ttl <duration>", "Lifetime of cached responses, e.g. 24h")
    .option("--no-cache", "Do not read or write the on-disk response cache")
    .option("--config <file>", "Path to config.toml")
    .option("--verbose", "Print per-module warnings")
    .option("--quiet", "Suppress progress output");
}

/** Flags win over config.toml, which wins over built-in defaults. */
export function mergeRunOptions(
  opts: SelectionOpts,
  settings: Settings,
  constraints: Constraints,
): RunOptions {
  const filter = buildModuleFilter({ modules: opts.module, strategy: opts.strategy });

  return {
    filter,
    constraints,
    workers: opts.workers ?? settings.workers,
    timeoutMs: settings.timeoutMs,
    cacheDir: opts.cache ? (opts.cacheDir ?? settings.cacheDir) : undefined,
    cacheTtlMs: opts.cacheTtl === undefined ? settings.cacheTtlMs : parseDuration(opts.cacheTtl),
    diffTool: settings.diffTool,
    verbose: opts.verbose ?? false,
    quiet: opts.quiet ?? false,
  };
}

export async function resolveRunOptions(opts: SelectionOpts): Promise<RunOptions> {
  const settings = await loadConfig({ path: opts.config });
  const constraints = await loadConstraints({
    constraint: opts.constraint,
    constraintFile: opts.constraintFile,
  });
  return mergeRunOptions(opts, settings, constraints);
}
