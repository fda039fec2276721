// apps/cli/src/commands/update.ts: `modbump update` command handler
import { Command } from "commander";
import { relative, resolve } from "node:path";
import { applyUpdates, plannedChanges } from "@modbump/core";
import type { PlannedChange } from "@modbump/core";
import { DIFF_TOOL_TIMEOUT_MS, FileUpdater } from "@modbump/updater";
import pc from "picocolors";
import { EXIT_FAILURE, reportError } from "../errors.js";
import { buildReport } from "../output/report.js";
import { renderApplyResult, renderWarnings } from "../output/summary.js";
import { plural } from "../output/text.js";
import { resolveRunOptions, withSelectionOptions } from "../options.js";
import type { SelectionOpts } from "../options.js";
import { runCheck } from "../pipeline.js";
import { openSession } from "../session.js";
import type { Session } from "../session.js";
import { createSpinner } from "../ui/spinner.js";

interface UpdateCommandOpts extends SelectionOpts {
  dryRun?: boolean | undefined;
  diff?: boolean | undefined;
  diffTool?: string | undefined;
}

export function createUpdateCommand(): Command {
  return withSelectionOptions(
    new Command("update")
      .description("Rewrite module versions in place.")
      .argument("[path]", "Terraform configuration root", ".")
      .option("--dry-run", "Count what would change without writing")
      .option("--diff", "Print a unified diff instead of writing")
      .option("--diff-tool <cmd>", "Pipe each diff through a command (implies --diff)"),
  ).action(async (path: string, opts: UpdateCommandOpts) => {
    const root = resolve(path);
    let session: Session | undefined;
    try {
      const run = await resolveRunOptions(opts);
      const spinner = createSpinner(!run.quiet);
      session = await openSession(run);

      const result = await runCheck(root, run, session, spinner);
      const report = buildReport(root, result);
      for (const line of renderWarnings(report.warnings, run.verbose)) console.error(line);

      const changes = plannedChanges(result.summary);
      if (changes.length === 0) {
        console.log(pc.green("✓ All module versions are current"));
        process.exitCode = 0;
        return;
      }

      const updater = new FileUpdater();
      if (opts.diff || opts.diffTool !== undefined) {
        const failed = await printDiffs(root, changes, updater, opts.diffTool ?? run.diffTool);
        process.exitCode = failed > 0 ? EXIT_FAILURE : 0;
        return;
      }

      const dryRun = opts.dryRun ?? false;
      const applied = await applyUpdates(result.summary, updater, root, { dryRun });
      for (const line of renderApplyResult(root, applied, dryRun)) console.log(line);
      process.exitCode = applied.failures.length > 0 ? EXIT_FAILURE : 0;
    } catch (err) {
      reportError(err);
    } finally {
      await session?.close();
    }
  });
}

async function printDiffs(
  root: string,
  changes: readonly PlannedChange[],
  updater: FileUpdater,
  tool: string | undefined,
): Promise<number> {
  let failed = 0;
  for (const { source, from, to } of changes) {
    const { errors } = await updater.writeDiff(process.stdout, root, source, from, to, {
      tool,
      timeoutMs: DIFF_TOOL_TIMEOUT_MS,
    });
    for (const { file, error } of errors) {
      console.error(pc.red(`✗ ${relative(root, file)}: ${error.message}`));
    }
    failed += errors.length;
  }
  if (failed > 0) console.error(pc.red(`✗ ${plural(failed, "file")} could not be diffed`));
  return failed;
}
