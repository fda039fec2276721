import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { scanModuleBlocks } from "@modbump/updater";
import type { ModuleCall } from "./types.js";

/**
 * Module calls declared in the `.tf` files directly inside `dir`, in file
 * name order. Blocks without a literal `source` are skipped.
 */
export async function inspectDirectory(dir: string): Promise<ModuleCall[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(".tf"))
    .map((entry) => join(dir, entry.name))
    .sort();

  const calls: ModuleCall[] = [];
  for (const file of files) {
    const text = await readFile(file, "utf8");
    for (const block of scanModuleBlocks(text)) {
      if (!block.source) continue;
      calls.push({
        name: block.name,
        source: block.source.value,
        version: block.version?.value ?? "",
        file,
        line: lineAt(text, block.span.start),
      });
    }
  }
  return calls;
}

function lineAt(text: string, offset: number): number {
  let line = 1;
  for (let i = text.indexOf("\n"); i !== -1 && i < offset; i = text.indexOf("\n", i + 1)) {
    line++;
  }
  return line;
}
