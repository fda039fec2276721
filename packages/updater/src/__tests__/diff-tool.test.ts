import { describe, expect, it } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DiffToolError } from "../errors.js";
import { parseCommand, runDiffTool } from "../diff-tool.js";

describe("parseCommand", () => {
  it("splits on runs of whitespace", () => {
    expect(parseCommand("  delta   --paging=never\t--dark ")).toEqual([
      "delta",
      "--paging=never",
      "--dark",
    ]);
  });
});

describe("runDiffTool", () => {
  it("pipes the input through the command", async () => {
    await expect(runDiffTool("cat", "--- a\n+++ a\n")).resolves.toBe("--- a\n+++ a\n");
  });

  it("passes arguments", async () => {
    await expect(runDiffTool("tr a-z A-Z", "-old\n+new\n")).resolves.toBe("-OLD\n+NEW\n");
  });

  it("rejects an empty command", async () => {
    await expect(runDiffTool("   ", "x")).rejects.toThrow("diff tool failed: command is empty");
  });

  it("rejects when the command cannot be started", async () => {
    await expect(runDiffTool("modbump-no-such-diff-tool", "x")).rejects.toThrow(DiffToolError);
  });

  it("rejects on a non-zero exit", async () => {
    await expect(runDiffTool("false", "x")).rejects.toThrow("diff tool failed: exited with code 1");
  });

  it("kills the command after the timeout", async () => {
    await expect(runDiffTool("sleep 5", "x", { timeoutMs: 50 })).rejects.toThrow(
      "diff tool failed: timed out after 50ms",
    );
  });

  it("rejects at the deadline even when the command ignores SIGTERM", async () => {
    const dir = await mkdtemp(join(tmpdir(), "modbump-difftool-"));
    const script = join(dir, "stubborn.sh");
    await writeFile(script, 'trap "" TERM\nexec sleep 5\n');

    try {
      const started = Date.now();
      await expect(runDiffTool(`sh ${script}`, "x", { timeoutMs: 50 })).rejects.toThrow(
        "diff tool failed: timed out after 50ms",
      );
      expect(Date.now() - started).toBeLessThan(1_000);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
