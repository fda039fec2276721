import { resolve } from "node:path";
import fg from "fast-glob";
import { IGNORED_DIRECTORIES } from "@modbump/updater";
import type { ModuleFilter } from "./filter.js";
import { inspectDirectory } from "./inspector.js";
import type { ModuleUsage } from "./types.js";

export interface FindOptions {
  /** Keep only sources the filter assigns a strategy to */
  filter?: ModuleFilter | undefined;
  /** Also return calls without a version attribute (default: false) */
  includeUnversioned?: boolean | undefined;
}

/**
 * Walk `root` and every directory below it (hidden directories and
 * `node_modules` excluded, as when updating) and collect module calls.
 */
export async function findModules(root: string, options: FindOptions = {}): Promise<ModuleUsage[]> {
  const base = resolve(root);
  const subdirectories = await fg.glob("**", {
    cwd: base,
    absolute: true,
    onlyDirectories: true,
    dot: false,
    followSymbolicLinks: false,
    ignore: [...IGNORED_DIRECTORIES],
  });

  const usages: ModuleUsage[] = [];
  for (const directory of [base, ...subdirectories.sort()]) {
    for (const call of await inspectDirectory(directory)) {
      if (!options.includeUnversioned && call.version === "") continue;
      if (options.filter && options.filter.strategyFor(call.source) === undefined) continue;

      usages.push({
        source: call.source,
        version: call.version,
        file: call.file,
        directory,
        blockName: call.name,
        line: call.line,
      });
    }
  }
  return usages;
}
