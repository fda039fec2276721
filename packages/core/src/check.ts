import { SourceResolver } from "@modbump/registry";
import type { Source, VersionFetcher } from "@modbump/registry";
import type { FileUpdater } from "@modbump/updater";
import { selectVersion } from "@modbump/version";
import type { Constraints } from "@modbump/version";
import type { ModuleFilter } from "./filter.js";
import { findModules } from "./finder.js";
import { buildSummary, plannedChanges } from "./plan.js";
import type { PlannedChange } from "./plan.js";
import type { ModuleUsage, UpdateSummary } from "./types.js";

export type CheckStage = "find" | "resolve" | "fetch" | "select";

export interface CheckWarning {
  stage: Exclude<CheckStage, "find">;
  source: string;
  error: Error;
}

export interface CheckOptions {
  root: string;
  fetcher: VersionFetcher;
  resolver?: SourceResolver | undefined;
  filter?: ModuleFilter | undefined;
  constraints?: Constraints | undefined;
  signal?: AbortSignal | undefined;
  /** Called when the pipeline enters a stage */
  onStage?: ((stage: CheckStage, detail: { usages: number; sources: number }) => void) | undefined;
}

export interface CheckResult {
  usages: ModuleUsage[];
  sources: Map<string, Source>;
  versions: Map<string, string[]>;
  targets: Map<string, Map<string, string>>;
  summary: UpdateSummary;
  /** Sources that could not be resolved, fetched or given a target */
  warnings: CheckWarning[];
}

/**
 * Find module calls under `root`, fetch their registry versions and pick a
 * target for every (source, version) pair. Nothing is written.
 *
 * Without a filter strategy or constraints the target is the newest
 * version; otherwise it comes from `selectVersion`.
 */
export async function checkModules(options: CheckOptions): Promise<CheckResult> {
  const { root, fetcher, filter, signal } = options;
  const resolver = options.resolver ?? new SourceResolver();
  const constraints = options.constraints ?? [];
  const warnings: CheckWarning[] = [];
  const stage = (name: CheckStage, usages: number, sources: number) =>
    options.onStage?.(name, { usages, sources });

  stage("find", 0, 0);
  const usages = await findModules(root, { filter });

  const raw = [...new Set(usages.map((u) => u.source))];
  stage("resolve", usages.length, raw.length);
  const sources = new Map<string, Source>();
  for (const value of raw) {
    try {
      sources.set(value, resolver.resolve(value));
    } catch (err) {
      warnings.push({ stage: "resolve", source: value, error: toError(err) });
    }
  }

  stage("fetch", usages.length, sources.size);
  const versions = await fetcher.fetchMultipleVersions([...sources.values()], signal);
  for (const [source, error] of fetcher.errors()) {
    if (sources.has(source)) warnings.push({ stage: "fetch", source, error });
  }

  stage("select", usages.length, sources.size);
  const targets = new Map<string, Map<string, string>>();
  for (const [source, available] of versions) {
    if (!sources.has(source) || available.length === 0) continue;

    const strategy = filter?.strategyFor(source);
    const perVersion = new Map<string, string>();
    const current = new Set(usages.filter((u) => u.source === source).map((u) => u.version));

    for (const version of current) {
      try {
        const target =
          strategy === undefined && constraints.length === 0
            ? available[0]
            : selectVersion(version, available, strategy ?? "latest", constraints);
        if (target !== undefined) perVersion.set(version, target);
      } catch (err) {
        warnings.push({ stage: "select", source, error: toError(err) });
      }
    }
    targets.set(source, perVersion);
  }

  const summary = buildSummary(usages, sources, versions, targets);
  return { usages, sources, versions, targets, summary, warnings };
}

export interface AppliedChange extends PlannedChange {
  file: string;
  count: number;
}

export interface ApplyFailure extends PlannedChange {
  file: string;
  error: Error;
}

export interface ApplyResult {
  changes: AppliedChange[];
  failures: ApplyFailure[];
  filesChanged: number;
  totalChanges: number;
}

export interface ApplyOptions {
  /** Count what would change instead of writing */
  dryRun?: boolean | undefined;
}

/** Rewrite every planned (source, from, to) move under `root`. */
export async function applyUpdates(
  summary: UpdateSummary,
  updater: FileUpdater,
  root: string,
  options: ApplyOptions = {},
): Promise<ApplyResult> {
  const changes: AppliedChange[] = [];
  const failures: ApplyFailure[] = [];

  for (const planned of plannedChanges(summary)) {
    const { source, from, to } = planned;
    const result = options.dryRun
      ? await updater.countDirectory(root, source, from)
      : await updater.updateDirectory(root, source, from, to);

    for (const [file, count] of result.files) {
      changes.push({ ...planned, file, count });
    }
    for (const { file, error } of result.errors) {
      failures.push({ ...planned, file, error });
    }
  }

  return {
    changes,
    failures,
    filesChanged: new Set(changes.map((c) => c.file)).size,
    totalChanges: changes.reduce((sum, c) => sum + c.count, 0),
  };
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
