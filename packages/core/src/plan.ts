import type { Source } from "@modbump/registry";
import { MAX_LOCATIONS } from "./types.js";
import type { ModuleReport, ModuleUsage, UnsupportedModule, UpdateSummary } from "./types.js";

/** Source → (version as written → target version). */
export type TargetMap = ReadonlyMap<string, ReadonlyMap<string, string>>;

export function changeKey(from: string, to: string): string {
  return `${from} → ${to}`;
}

interface Group {
  source: string;
  counts: Map<string, number>;
  locations: string[];
  total: number;
}

/**
 * Group usages per source and work out what would change.
 *
 * Without `targets`, every usage not already on the newest version moves
 * to it. With `targets`, only the listed (source, version) pairs move, to
 * the listed version.
 */
export function buildSummary(
  usages: readonly ModuleUsage[],
  sources: ReadonlyMap<string, Source>,
  versions: ReadonlyMap<string, readonly string[]>,
  targets?: TargetMap,
): UpdateSummary {
  const groups = new Map<string, Group>();
  for (const usage of usages) {
    let group = groups.get(usage.source);
    if (!group) {
      group = { source: usage.source, counts: new Map(), locations: [], total: 0 };
      groups.set(usage.source, group);
    }
    group.counts.set(usage.version, (group.counts.get(usage.version) ?? 0) + 1);
    group.total++;
    if (group.locations.length < MAX_LOCATIONS) {
      group.locations.push(`${usage.file}:${usage.line}`);
    }
  }

  const modules: ModuleReport[] = [];
  const unsupported: UnsupportedModule[] = [];
  const byVersionChange = new Map<string, number>();
  let totalUsages = 0;
  let totalUpdates = 0;

  for (const group of [...groups.values()].sort(bySource)) {
    totalUsages += group.total;
    const source = sources.get(group.source);

    if (!source?.supported) {
      unsupported.push({ source: group.source, type: source?.type ?? "unknown", count: group.total });
      continue;
    }

    const latestVersion = versions.get(group.source)?.[0];
    const moduleTargets = new Map<string, string>();
    let updateCount = 0;

    for (const [current, count] of group.counts) {
      const target = targets ? targets.get(group.source)?.get(current) : latestVersion;
      if (target === undefined || target === current) continue;

      moduleTargets.set(current, target);
      updateCount += count;
      const key = changeKey(current, target);
      byVersionChange.set(key, (byVersionChange.get(key) ?? 0) + count);
    }

    totalUpdates += updateCount;
    modules.push({
      source: group.source,
      type: source.type,
      supported: true,
      currentVersions: Object.fromEntries(group.counts),
      latestVersion,
      targets: Object.fromEntries(moduleTargets),
      totalUsages: group.total,
      updateCount,
      locations: group.locations,
    });
  }

  return {
    modules,
    unsupported,
    totalUsages,
    totalUpdates,
    supportedCount: modules.length,
    unsupportedCount: unsupported.length,
    byVersionChange: Object.fromEntries(byVersionChange),
  };
}

function bySource(a: Group, b: Group): number {
  if (a.source === b.source) return 0;
  return a.source < b.source ? -1 : 1;
}

export interface PlannedChange {
  source: string;
  from: string;
  to: string;
}

/** Every (source, from, to) move in a summary, in report order. */
export function plannedChanges(summary: UpdateSummary): PlannedChange[] {
  return summary.modules.flatMap((module) =>
    Object.entries(module.targets).map(([from, to]) => ({ source: module.source, from, to })),
  );
}
