import { readFile, stat } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { parse as parseTOML } from "smol-toml";
import { z } from "zod";
import { parseDuration } from "./duration.js";
import { ConfigError } from "./errors.js";

export const APP_NAME = "modbump";

// ---------------------------------------------------------------------------
// Schema: Zod validation for config.toml
// ---------------------------------------------------------------------------

const DurationSchema = z.string().transform((value, ctx) => {
  try {
    return parseDuration(value);
  } catch (err) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: err instanceof Error ? err.message : String(err),
    });
    return z.NEVER;
  }
});

const ConfigSchema = z.object({
  diff: z
    .object({
      tool: z.string().trim().min(1).optional(),
    })
    .default({}),
  cache: z
    .object({
      dir: z.string().min(1).optional(),
      ttl: DurationSchema.optional(),
    })
    .default({}),
  fetch: z
    .object({
      workers: z.number().int().positive().optional(),
      timeout: DurationSchema.optional(),
    })
    .default({}),
});

export type ConfigFile = z.infer<typeof ConfigSchema>;

// ---------------------------------------------------------------------------
// Defaults and XDG locations
// ---------------------------------------------------------------------------

export const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_WORKERS = 4;
export const DEFAULT_TIMEOUT_MS = 10_000;

export interface Settings {
  /** Config file that was consulted, whether or not it exists */
  configPath: string;
  diffTool: string | undefined;
  cacheDir: string;
  cacheTtlMs: number;
  workers: number;
  timeoutMs: number;
}

type Env = Record<string, string | undefined>;

export function defaultConfigPath(env: Env = process.env): string {
  const base = env["XDG_CONFIG_HOME"] || join(homedir(), ".config");
  return join(base, APP_NAME, "config.toml");
}

export function defaultCacheDir(env: Env = process.env): string {
  const base = env["XDG_CACHE_HOME"] || join(homedir(), ".cache");
  return join(base, APP_NAME);
}

// ---------------------------------------------------------------------------
// loadConfig: reads and validates config.toml, filling in defaults
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  /** Explicit config file (default: $XDG_CONFIG_HOME/modbump/config.toml) */
  path?: string | undefined;
  env?: Env | undefined;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<Settings> {
  const env = options.env ?? process.env;
  const configPath = options.path ?? defaultConfigPath(env);
  const file = await readConfigFile(configPath);

  return {
    configPath,
    diffTool: file?.diff.tool,
    cacheDir: file?.cache.dir ?? defaultCacheDir(env),
    cacheTtlMs: file?.cache.ttl ?? DEFAULT_CACHE_TTL_MS,
    workers: file?.fetch.workers ?? DEFAULT_WORKERS,
    timeoutMs: file?.fetch.timeout ?? DEFAULT_TIMEOUT_MS,
  };
}

async function readConfigFile(path: string): Promise<ConfigFile | undefined> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(path)).isDirectory();
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return undefined;
    throw new ConfigError(path, "cannot be read", { cause: err });
  }
  if (isDirectory) throw new ConfigError(path, "is a directory");

  let document: unknown;
  try {
    document = parseTOML(await readFile(path, "utf8"));
  } catch (err) {
    throw new ConfigError(path, err instanceof Error ? err.message : String(err), { cause: err });
  }

  const result = ConfigSchema.safeParse(document);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(path, `invalid configuration: ${detail}`);
  }
  return result.data;
}
