// apps/cli/src/pipeline.ts: runs the check pipeline behind a spinner
import { checkModules } from "@modbump/core";
import type { CheckResult, CheckStage } from "@modbump/core";
import { formatConstraints } from "@modbump/version";
import pc from "picocolors";
import type { RunOptions } from "./options.js";
import { plural } from "./output/text.js";
import type { Session } from "./session.js";
import type { Spinner } from "./ui/spinner.js";

export function stageText(stage: CheckStage, detail: { usages: number; sources: number }): string {
  switch (stage) {
    case "find":
      return "Finding module calls…";
    case "resolve":
      return `Resolving ${plural(detail.sources, "source")} from ${plural(detail.usages, "module call")}…`;
    case "fetch":
      return `Fetching versions for ${plural(detail.sources, "module")}…`;
    case "select":
      return "Selecting target versions…";
  }
}

export async function runCheck(
  root: string,
  run: RunOptions,
  session: Session,
  spinner: Spinner,
): Promise<CheckResult> {
  if (run.constraints.length > 0) {
    console.error(pc.dim(`Applied constraints: ${formatConstraints(run.constraints)}`));
  }
  spinner.start(stageText("find", { usages: 0, sources: 0 }));
  try {
    const result = await checkModules({
      root,
      fetcher: session.fetcher,
      filter: run.filter,
      constraints: run.constraints,
      onStage: (stage, detail) => spinner.update(stageText(stage, detail)),
    });
    const { totalUsages, totalUpdates } = result.summary;
    spinner.succeed(
      `Checked ${plural(totalUsages, "module call")}: ${plural(totalUpdates, "update")} available`,
    );
    return result;
  } catch (err) {
    spinner.fail("Check failed");
    throw err;
  }
}
