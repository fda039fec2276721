import { randomUUID } from "node:crypto";
import { chmod, open, readFile, rename, rm, stat } from "node:fs/promises";
import { basename, dirname, join, relative } from "node:path";
import fg from "fast-glob";
import { formatUnifiedDiff } from "./diff.js";
import { runDiffTool } from "./diff-tool.js";
import { InvalidRootError, ReadFailureError, WriteFailureError } from "./errors.js";
import { countMatches, replaceVersion } from "./replacer.js";

export interface FileError {
  file: string;
  error: Error;
}

export interface DirectoryResult {
  /** Files with at least one match, and their match count */
  files: Map<string, number>;
  /** Per-file failures; they never stop the walk */
  errors: FileError[];
}

export interface DiffOptions {
  /** External renderer the diff is piped through */
  tool?: string | undefined;
  timeoutMs?: number | undefined;
}

export interface DiffSink {
  write(chunk: string): unknown;
}

/** Directories never searched for module calls nor rewritten. */
export const IGNORED_DIRECTORIES: readonly string[] = [
  "**/.terraform/**",
  "**/.git/**",
  "**/node_modules/**",
];

/** Every `.tf` file under `root`, sorted, outside {@link IGNORED_DIRECTORIES}. */
export async function listTerraformFiles(root: string): Promise<string[]> {
  const info = await stat(root).catch((err: unknown) => {
    throw new ReadFailureError(root, { cause: err });
  });
  if (!info.isDirectory()) throw new InvalidRootError(root);

  const files = await fg.glob("**/*.tf", {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    dot: false,
    followSymbolicLinks: false,
    ignore: [...IGNORED_DIRECTORIES],
  });
  return files.sort();
}

/**
 * Counts and rewrites module versions in Terraform files. Files are changed
 * through a temp file, fsync and rename, so a file is either fully updated
 * or untouched.
 */
export class FileUpdater {
  async count(file: string, source: string, oldVersion: string): Promise<number> {
    const content = await readText(file);
    return countMatches(content, source, oldVersion);
  }

  /** Rewrite one file; resolves to the number of versions changed. */
  async update(
    file: string,
    source: string,
    oldVersion: string,
    newVersion: string,
  ): Promise<number> {
    const content = await readText(file);
    const { content: updated, count } = replaceVersion(content, source, oldVersion, newVersion);
    if (count === 0) return 0;

    await writeAtomically(file, updated);
    return count;
  }

  countDirectory(root: string, source: string, oldVersion: string): Promise<DirectoryResult> {
    return this.walk(root, (file) => this.count(file, source, oldVersion));
  }

  updateDirectory(
    root: string,
    source: string,
    oldVersion: string,
    newVersion: string,
  ): Promise<DirectoryResult> {
    return this.walk(root, (file) => this.update(file, source, oldVersion, newVersion));
  }

  /** Unified diff of the update for one file; empty when nothing would change. */
  async diffFile(
    file: string,
    source: string,
    oldVersion: string,
    newVersion: string,
    label = file,
  ): Promise<string> {
    const { diff } = await preview(file, source, oldVersion, newVersion, label);
    return diff;
  }

  /**
   * Write the diff of a directory-wide update to `out` without touching any
   * file. File names are shown relative to `root`.
   *
   * @throws {DiffToolError} when the external renderer fails
   */
  async writeDiff(
    out: DiffSink,
    root: string,
    source: string,
    oldVersion: string,
    newVersion: string,
    options: DiffOptions = {},
  ): Promise<DirectoryResult> {
    const result: DirectoryResult = { files: new Map(), errors: [] };

    for (const file of await listTerraformFiles(root)) {
      let change: Preview;
      try {
        change = await preview(file, source, oldVersion, newVersion, relative(root, file));
      } catch (err) {
        result.errors.push({ file, error: toError(err) });
        continue;
      }
      if (change.count === 0) continue;

      const rendered = options.tool
        ? await runDiffTool(options.tool, change.diff, { timeoutMs: options.timeoutMs })
        : change.diff;
      out.write(rendered);
      result.files.set(file, change.count);
    }

    return result;
  }

  private async walk(
    root: string,
    visit: (file: string) => Promise<number>,
  ): Promise<DirectoryResult> {
    const result: DirectoryResult = { files: new Map(), errors: [] };

    for (const file of await listTerraformFiles(root)) {
      try {
        const count = await visit(file);
        if (count > 0) result.files.set(file, count);
      } catch (err) {
        result.errors.push({ file, error: toError(err) });
      }
    }

    return result;
  }
}

interface Preview {
  diff: string;
  count: number;
}

async function preview(
  file: string,
  source: string,
  oldVersion: string,
  newVersion: string,
  label: string,
): Promise<Preview> {
  const content = await readText(file);
  const { content: updated, count } = replaceVersion(content, source, oldVersion, newVersion);
  return { diff: formatUnifiedDiff(label, content, updated), count };
}

async function readText(file: string): Promise<string> {
  try {
    return await readFile(file, "utf8");
  } catch (err) {
    throw new ReadFailureError(file, { cause: err });
  }
}

async function writeAtomically(file: string, content: string): Promise<void> {
  const temp = join(dirname(file), `.${basename(file)}.${randomUUID()}.tmp`);

  try {
    const { mode } = await stat(file);
    const handle = await open(temp, "wx");
    try {
      await handle.writeFile(content, "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await chmod(temp, mode & 0o7777);
    await rename(temp, file);
  } catch (err) {
    await rm(temp, { force: true });
    throw new WriteFailureError(file, { cause: err });
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
