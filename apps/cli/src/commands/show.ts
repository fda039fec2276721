// apps/cli/src/commands/show.ts: `modbump show` command handler
import { Command } from "commander";
import { resolve } from "node:path";
import pc from "picocolors";
import { reportError, EXIT_USAGE } from "../errors.js";
import { formatJson } from "../output/json.js";
import { buildReport } from "../output/report.js";
import { printSummaryTable, renderWarnings } from "../output/summary.js";
import { formatYaml } from "../output/yaml.js";
import { resolveRunOptions, withSelectionOptions } from "../options.js";
import type { SelectionOpts } from "../options.js";
import { runCheck } from "../pipeline.js";
import { openSession } from "../session.js";
import type { Session } from "../session.js";
import { createSpinner } from "../ui/spinner.js";

const FORMATS = ["table", "json", "yaml"];

interface ShowCommandOpts extends SelectionOpts {
  format: string;
  details?: boolean | undefined;
}

export function createShowCommand(): Command {
  return withSelectionOptions(
    new Command("show")
      .description("Show module calls and the versions they would move to.")
      .argument("[path]", "Terraform configuration root", ".")
      .option("-f, --format <format>", "Output format: table, json or yaml", "table")
      .option("--details", "Also fetch publish dates of the newest versions"),
  ).action(async (path: string, opts: ShowCommandOpts) => {
    if (!FORMATS.includes(opts.format)) {
      console.error(pc.red(`Error: Invalid format "${opts.format}". Use "table", "json" or "yaml".`));
      process.exitCode = EXIT_USAGE;
      return;
    }

    const root = resolve(path);
    let session: Session | undefined;
    try {
      const run = await resolveRunOptions(opts);
      // Progress is only drawn for the table; json and yaml stay pipeable.
      const spinner = createSpinner(!run.quiet && opts.format === "table");
      session = await openSession(run, { details: opts.details });

      const result = await runCheck(root, run, session, spinner);
      const report = buildReport(root, result, opts.details ? session.fetcher.modules() : undefined);

      if (opts.format === "json") {
        process.stdout.write(formatJson(report));
      } else if (opts.format === "yaml") {
        process.stdout.write(formatYaml(report));
      } else {
        printSummaryTable(report);
      }
      for (const line of renderWarnings(report.warnings, run.verbose)) console.error(line);
      process.exitCode = 0;
    } catch (err) {
      reportError(err);
    } finally {
      await session?.close();
    }
  });
}
