// apps/cli/src/output/report.ts: serializable view of a check result
import type { CheckResult, CheckStage, ModuleReport, UnsupportedModule } from "@modbump/core";
import type { RegistryModule } from "@modbump/registry";

export interface ReportModule extends Omit<ModuleReport, "latestVersion"> {
  latestVersion: string | null;
  /** Publish date of the latest version, when metadata was fetched */
  publishedAt?: string;
}

export interface ReportWarning {
  stage: Exclude<CheckStage, "find">;
  source: string;
  message: string;
}

export interface Report {
  root: string;
  totals: {
    usages: number;
    updates: number;
    supported: number;
    unsupported: number;
  };
  modules: ReportModule[];
  unsupported: UnsupportedModule[];
  byVersionChange: Record<string, number>;
  warnings: ReportWarning[];
}

export function buildReport(
  root: string,
  result: CheckResult,
  metadata?: ReadonlyMap<string, RegistryModule>,
): Report {
  const { summary } = result;

  return {
    root,
    totals: {
      usages: summary.totalUsages,
      updates: summary.totalUpdates,
      supported: summary.supportedCount,
      unsupported: summary.unsupportedCount,
    },
    modules: summary.modules.map((module) => {
      const entry: ReportModule = { ...module, latestVersion: module.latestVersion ?? null };
      const published = metadata
        ?.get(module.source)
        ?.versions.find((v) => v.version === module.latestVersion)?.info?.published_at;
      if (published) entry.publishedAt = published;
      return entry;
    }),
    unsupported: summary.unsupported,
    byVersionChange: summary.byVersionChange,
    warnings: result.warnings.map(({ stage, source, error }) => ({
      stage,
      source,
      message: error.message,
    })),
  };
}
