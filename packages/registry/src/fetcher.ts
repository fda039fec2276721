import { sortValidVersions } from "@modbump/version";
import type { RegistryClient, VersionInfoError } from "./client.js";
import { UnsupportedSourceError } from "./errors.js";
import { Semaphore } from "./semaphore.js";
import { isRegistrySource, sourceKey } from "./source.js";
import type { RegistryModule, RegistrySource, Source } from "./types.js";

export const DEFAULT_WORKERS = 4;

export interface VersionFetcherOptions {
  /** Maximum concurrent registry fetches; values below 1 mean the default */
  workers?: number | undefined;
  /** Also fetch per-version metadata after listing versions (default: true) */
  fetchInfo?: boolean | undefined;
}

/**
 * Fetches version lists for many sources with bounded concurrency.
 * Successes and failures are recorded per source; one failing source never
 * affects the others.
 */
export class VersionFetcher {
  readonly workers: number;
  private readonly semaphore: Semaphore;
  private readonly fetchInfo: boolean;
  private readonly versions = new Map<string, string[]>();
  private readonly failures = new Map<string, Error>();
  private readonly infoFailures = new Map<string, VersionInfoError[]>();
  private readonly fetched = new Map<string, RegistryModule>();

  constructor(
    private readonly client: RegistryClient,
    options: VersionFetcherOptions = {},
  ) {
    const workers = options.workers ?? DEFAULT_WORKERS;
    this.workers = Number.isInteger(workers) && workers >= 1 ? workers : DEFAULT_WORKERS;
    this.semaphore = new Semaphore(this.workers);
    this.fetchInfo = options.fetchInfo ?? true;
  }

  /**
   * Fetch, sort (newest first) and record the versions of one source.
   *
   * @throws {UnsupportedSourceError} for sources that are not registry addresses
   */
  async fetchVersions(source: Source, signal?: AbortSignal): Promise<string[]> {
    if (!isRegistrySource(source)) {
      throw new UnsupportedSourceError(source.original);
    }
    const key = sourceKey(source);

    try {
      const listed = await this.semaphore.run(
        () => this.client.fetchModuleVersions(source, { signal }),
        signal,
      );
      const module = listed && this.fetchInfo ? await this.enrich(key, source, listed, signal) : listed;

      const sorted = module ? sortValidVersions(module.versions.map((v) => v.version)) : [];
      this.versions.set(key, sorted);
      this.failures.delete(key);
      if (module) this.fetched.set(key, module);
      return [...sorted];
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.failures.set(key, error);
      throw error;
    }
  }

  // Runs in its own slot; failures here, a cancelled wait included, only
  // leave metadata absent.
  private async enrich(
    key: string,
    source: RegistrySource,
    listed: RegistryModule,
    signal: AbortSignal | undefined,
  ): Promise<RegistryModule> {
    try {
      const { module, errors } = await this.semaphore.run(
        () => this.client.fetchModuleInfo(source, listed, { signal }),
        signal,
      );
      if (errors.length > 0) {
        this.infoFailures.set(key, errors);
      } else {
        this.infoFailures.delete(key);
      }
      return module;
    } catch (err) {
      this.infoFailures.set(key, [
        { version: "*", error: err instanceof Error ? err : new Error(String(err)) },
      ]);
      return listed;
    }
  }

  /**
   * Fetch every supported source concurrently. Unsupported sources are
   * skipped; failed sources are absent from the result and present in
   * {@link errors}.
   */
  async fetchMultipleVersions(
    sources: readonly Source[],
    signal?: AbortSignal,
  ): Promise<Map<string, string[]>> {
    const supported = sources.filter(isRegistrySource);
    await Promise.allSettled(supported.map((source) => this.fetchVersions(source, signal)));
    return this.result();
  }

  /** Snapshot of successfully fetched version lists, by source. */
  result(): Map<string, string[]> {
    return new Map([...this.versions].map(([key, list]) => [key, [...list]]));
  }

  /** Recorded versions of one source, newest first. */
  versionsFor(source: Source): string[] | undefined {
    const list = this.versions.get(sourceKey(source));
    return list ? [...list] : undefined;
  }

  /** Snapshot of fetch failures, by source. */
  errors(): Map<string, Error> {
    return new Map(this.failures);
  }

  /** Per-version metadata failures, by source. These never fail a fetch. */
  infoErrors(): Map<string, VersionInfoError[]> {
    return new Map([...this.infoFailures].map(([key, list]) => [key, [...list]]));
  }

  /** Registry module records (with metadata when enabled), by source. */
  modules(): Map<string, RegistryModule> {
    return new Map(this.fetched);
  }
}
