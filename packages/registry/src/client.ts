import type { CacheStore } from "@modbump/cache";
import type { z } from "zod";
import { CancelledError, RegistryError, RegistryTimeoutError } from "./errors.js";
import { registryPath } from "./source.js";
import { ModuleInfoSchema, RegistryModuleSchema, VersionsResponseSchema } from "./types.js";
import type { ModuleInfo, ModuleRef, ModuleVersion, RegistryModule } from "./types.js";

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000;

export interface RegistryClientOptions {
  /** Response cache; without one every call goes to the network */
  cache?: CacheStore | undefined;
  /** Per-request timeout (default: 10s) */
  timeoutMs?: number | undefined;
  /** Lifetime of cached responses (default: 24h) */
  cacheTtlMs?: number | undefined;
  /** Receives cache write failures, which never fail a fetch */
  onError?: ((err: unknown) => void) | undefined;
}

export interface RequestOptions {
  signal?: AbortSignal | undefined;
}

export interface VersionInfoError {
  version: string;
  error: Error;
}

export interface ModuleInfoResult {
  module: RegistryModule;
  errors: VersionInfoError[];
}

export function versionsCacheKey(ref: ModuleRef): string {
  return `module_versions:${ref.host}:${ref.namespace}:${ref.name}:${ref.provider}`;
}

export function infoCacheKey(ref: ModuleRef, version: string): string {
  return `module_info:${ref.host}:${ref.namespace}:${ref.name}:${ref.provider}:${version}`;
}

/**
 * Client for the Terraform module registry protocol (v1). Responses are
 * cached cache-aside: a valid cached value short-circuits the request.
 */
export class RegistryClient {
  private readonly cache: CacheStore | undefined;
  private readonly timeoutMs: number;
  private readonly cacheTtlMs: number;
  private readonly onError: (err: unknown) => void;

  constructor(options: RegistryClientOptions = {}) {
    this.cache = options.cache;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.cacheTtlMs = options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
    this.onError =
      options.onError ??
      ((err) => {
        console.error(`[registry] cache write failed: ${errorMessage(err)}`);
      });
  }

  /**
   * List every published version of a module. Resolves to null when the
   * registry knows the module but returns no entries for it.
   */
  async fetchModuleVersions(
    ref: ModuleRef,
    options: RequestOptions = {},
  ): Promise<RegistryModule | null> {
    const key = versionsCacheKey(ref);
    const cached = await this.readCache(key, RegistryModuleSchema);
    if (cached) return cached;

    const url = `https://${ref.host}/v1/modules/${registryPath(ref)}/versions`;
    const body = await this.getJson(url, options.signal);
    const parsed = VersionsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RegistryError(`Unexpected response shape from ${url}: ${parsed.error.message}`, {
        url,
      });
    }

    const module = parsed.data.modules[0];
    if (!module) return null;

    await this.writeCache(key, module);
    return module;
  }

  /**
   * Attach per-version metadata to a module. Failures for individual
   * versions are collected, not thrown; the input module is left as is.
   */
  async fetchModuleInfo(
    ref: ModuleRef,
    module: RegistryModule,
    options: RequestOptions = {},
  ): Promise<ModuleInfoResult> {
    const errors: VersionInfoError[] = [];
    const versions: ModuleVersion[] = [];

    for (const entry of module.versions) {
      if (options.signal?.aborted) {
        errors.push({ version: entry.version, error: new CancelledError("fetching module info") });
        versions.push({ ...entry });
        continue;
      }

      try {
        const info = await this.fetchVersionInfo(ref, entry.version, options);
        versions.push({ ...entry, info });
      } catch (err) {
        errors.push({ version: entry.version, error: toError(err) });
        versions.push({ ...entry });
      }
    }

    return { module: { ...module, versions }, errors };
  }

  private async fetchVersionInfo(
    ref: ModuleRef,
    version: string,
    options: RequestOptions,
  ): Promise<ModuleInfo> {
    const key = infoCacheKey(ref, version);
    const cached = await this.readCache(key, ModuleInfoSchema);
    if (cached) return cached;

    const url = `https://${ref.host}/v1/modules/${registryPath(ref)}/${encodeURIComponent(version)}`;
    const body = await this.getJson(url, options.signal);
    const parsed = ModuleInfoSchema.safeParse(body);
    if (!parsed.success) {
      throw new RegistryError(`Unexpected response shape from ${url}: ${parsed.error.message}`, {
        url,
      });
    }

    await this.writeCache(key, parsed.data);
    return parsed.data;
  }

  private async getJson(url: string, signal: AbortSignal | undefined): Promise<unknown> {
    if (signal?.aborted) throw new CancelledError(url);

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await fetch(url, {
        headers: { Accept: "application/json" },
        signal: controller.signal,
      });

      if (response.status !== 200) {
        // Release the connection; the body of an error response is never read.
        await response.body?.cancel();
        throw new RegistryError(`Registry returned ${response.status} for ${url}`, {
          url,
          status: response.status,
        });
      }

      return await response.json();
    } catch (err) {
      if (err instanceof RegistryError) throw err;
      if (timedOut) throw new RegistryTimeoutError(url, this.timeoutMs, err);
      if (signal?.aborted) throw new CancelledError(url);
      throw new RegistryError(`Registry request failed for ${url}: ${errorMessage(err)}`, {
        url,
        cause: err,
      });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  // Cached values come from disk; anything that no longer fits the schema
  // counts as a miss.
  private async readCache<S extends z.ZodTypeAny>(
    key: string,
    schema: S,
  ): Promise<z.output<S> | undefined> {
    if (!this.cache) return undefined;
    const value = await this.cache.get(key);
    if (value === undefined) return undefined;

    const parsed = schema.safeParse(value);
    return parsed.success ? parsed.data : undefined;
  }

  private async writeCache(key: string, value: unknown): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.set(key, value, this.cacheTtlMs);
    } catch (err) {
      this.onError(err);
    }
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
