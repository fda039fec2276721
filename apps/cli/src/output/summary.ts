// apps/cli/src/output/summary.ts: Human-readable summary table for terminal
import { relative } from "node:path";
import type { ApplyResult } from "@modbump/core";
import { classifyChange } from "@modbump/version";
import pc from "picocolors";
import type { Report, ReportModule, ReportWarning } from "./report.js";
import { pad, plural } from "./text.js";

function versionStatus(module: ReportModule, current: string): string {
  const target = module.targets[current];
  if (target !== undefined) {
    const kind = classifyChange(current, target);
    return `${pc.yellow(current)} → ${pc.green(target)}${kind ? pc.dim(` (${kind})`) : ""}`;
  }
  if (module.latestVersion === null) return `${current} ${pc.dim("(no versions found)")}`;
  return `${current} ${pc.green("✓")}`;
}

export function renderSummary(report: Report): string {
  const { modules, unsupported, totals } = report;
  const width = Math.max(0, ...modules.map((m) => m.source.length), ...unsupported.map((u) => u.source.length));
  const lines: string[] = ["", pc.bold(`  modbump: ${plural(totals.usages, "module call")} in ${report.root}`)];

  if (modules.length > 0) {
    lines.push("", pc.bold(`  Registry modules (${modules.length})`));
    for (const module of modules) {
      const published = module.publishedAt ? pc.dim(`  latest ${module.latestVersion} published ${module.publishedAt}`) : "";
      for (const [current, count] of Object.entries(module.currentVersions)) {
        lines.push(
          `    ${pad(module.source, width)}  ${versionStatus(module, current)}  ${pc.dim(plural(count, "usage"))}${published}`,
        );
      }
    }
  }

  if (unsupported.length > 0) {
    lines.push("", pc.bold(`  Not updated (${unsupported.length})`));
    for (const entry of unsupported) {
      lines.push(`    ${pad(entry.source, width)}  ${pad(entry.type, 8)}  ${pc.dim(plural(entry.count, "usage"))}`);
    }
  }

  const changes = Object.entries(report.byVersionChange);
  if (changes.length > 0) {
    lines.push("", pc.bold("  Changes"));
    for (const [change, count] of changes) {
      lines.push(`    ${change}  ${pc.dim(plural(count, "usage"))}`);
    }
  }

  lines.push(
    "",
    pc.dim(
      `  ${plural(totals.updates, "update")} available across ${plural(totals.supported, "module")} (${totals.unsupported} not supported)`,
    ),
  );
  return lines.join("\n") + "\n";
}

export function printSummaryTable(report: Report): void {
  process.stdout.write(renderSummary(report));
}

/** Warning lines for stderr; one summary line unless `verbose`. */
export function renderWarnings(warnings: readonly ReportWarning[], verbose: boolean): string[] {
  if (warnings.length === 0) return [];
  if (!verbose) {
    return [
      pc.yellow(`⚠  ${plural(warnings.length, "module")} could not be checked (use --verbose for details)`),
    ];
  }
  return warnings.map((w) => pc.yellow(`⚠  ${w.source} (${w.stage}): ${w.message}`));
}

/** One line per rewritten file, failures, then the tally. */
export function renderApplyResult(root: string, result: ApplyResult, dryRun: boolean): string[] {
  const lines: string[] = [];

  for (const change of result.changes) {
    const times = change.count > 1 ? pc.dim(` (×${change.count})`) : "";
    lines.push(`  ${relative(root, change.file)}: ${change.source} ${change.from} → ${change.to}${times}`);
  }
  for (const failure of result.failures) {
    lines.push(pc.red(`✗ ${relative(root, failure.file)}: ${failure.error.message}`));
  }

  const calls = plural(result.totalChanges, "module call");
  const files = plural(result.filesChanged, "file");
  lines.push(
    dryRun
      ? pc.bold(`Would update ${calls} in ${files}`)
      : pc.green(`✓ Updated ${calls} in ${files}`),
  );
  if (result.failures.length > 0) {
    lines.push(pc.red(`✗ ${plural(result.failures.length, "file update")} failed`));
  }
  return lines;
}
