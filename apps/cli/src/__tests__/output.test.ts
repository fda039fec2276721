import { describe, expect, it } from "vitest";
import yaml from "js-yaml";
import { buildSummary } from "@modbump/core";
import type { ApplyResult, CheckResult, ModuleUsage } from "@modbump/core";
import { InvalidSourceFormatError, resolveSource } from "@modbump/registry";
import type { RegistryModule, Source } from "@modbump/registry";
import { formatJson } from "../output/json.js";
import { buildReport } from "../output/report.js";
import { renderApplyResult, renderSummary, renderWarnings } from "../output/summary.js";
import { formatYaml } from "../output/yaml.js";

const ANSI = /\x1b\[[0-9;]*m/g;
const plain = (text: string) => text.replace(ANSI, "");

const usage = (source: string, version: string, line: number): ModuleUsage => ({
  source,
  version,
  file: "/repo/main.tf",
  directory: "/repo",
  blockName: "m",
  line,
});

function checkResult(): CheckResult {
  const usages = [
    usage("acme/vpc/aws", "1.0.0", 1),
    usage("acme/vpc/aws", "2.0.0", 5),
    usage("github.com/acme/tools", "v1", 9),
  ];
  const sources = new Map<string, Source>(
    ["acme/vpc/aws", "github.com/acme/tools"].map((raw) => [raw, resolveSource(raw)]),
  );
  const versions = new Map([["acme/vpc/aws", ["2.0.0", "1.0.0"]]]);
  return {
    usages,
    sources,
    versions,
    targets: new Map(),
    summary: buildSummary(usages, sources, versions),
    warnings: [
      {
        stage: "resolve",
        source: "registry.example.com/x",
        error: new InvalidSourceFormatError("registry.example.com/x", "registry"),
      },
    ],
  };
}

describe("buildReport", () => {
  it("flattens the summary and warnings", () => {
    const report = buildReport("/repo", checkResult());

    expect(report.totals).toEqual({ usages: 3, updates: 1, supported: 1, unsupported: 1 });
    expect(report.modules[0]).toMatchObject({
      source: "acme/vpc/aws",
      latestVersion: "2.0.0",
      targets: { "1.0.0": "2.0.0" },
      locations: ["/repo/main.tf:1", "/repo/main.tf:5"],
    });
    expect(report.modules[0]?.publishedAt).toBeUndefined();
    expect(report.warnings).toEqual([
      {
        stage: "resolve",
        source: "registry.example.com/x",
        message: "Invalid registry source format: registry.example.com/x",
      },
    ]);
  });

  it("adds the publish date of the latest version when metadata is known", () => {
    const module: RegistryModule = {
      source: "acme/vpc/aws",
      versions: [
        {
          version: "2.0.0",
          root: { providers: [] },
          info: { source: "https://example.com/acme/vpc", published_at: "2024-01-02T00:00:00Z" },
        },
        { version: "1.0.0", root: { providers: [] } },
      ],
    };
    const report = buildReport("/repo", checkResult(), new Map([["acme/vpc/aws", module]]));
    expect(report.modules[0]?.publishedAt).toBe("2024-01-02T00:00:00Z");
  });

  it("renders the same data as json and yaml", () => {
    const report = buildReport("/repo", checkResult());
    const json = formatJson(report);

    expect(json.endsWith("}\n")).toBe(true);
    expect(yaml.load(formatYaml(report))).toEqual(JSON.parse(json));
  });
});

describe("renderSummary", () => {
  it("lists every current version with the kind of bump, unsupported sources and the change histogram", () => {
    const lines = plain(renderSummary(buildReport("/repo", checkResult()))).split("\n");

    expect(lines).toEqual([
      "",
      "  modbump: 3 module calls in /repo",
      "",
      "  Registry modules (1)",
      `    ${"acme/vpc/aws".padEnd(21)}  1.0.0 → 2.0.0 (major)  1 usage`,
      `    ${"acme/vpc/aws".padEnd(21)}  2.0.0 ✓  1 usage`,
      "",
      "  Not updated (1)",
      "    github.com/acme/tools  github    1 usage",
      "",
      "  Changes",
      "    1.0.0 → 2.0.0  1 usage",
      "",
      "  1 update available across 1 module (1 not supported)",
      "",
    ]);
  });
});

describe("renderWarnings", () => {
  const { warnings } = buildReport("/repo", checkResult());

  it("summarizes unless verbose", () => {
    expect(renderWarnings(warnings, false).map(plain)).toEqual([
      "⚠  1 module could not be checked (use --verbose for details)",
    ]);
    expect(renderWarnings([], false)).toEqual([]);
  });

  it("prints each warning when verbose", () => {
    expect(renderWarnings(warnings, true).map(plain)).toEqual([
      "⚠  registry.example.com/x (resolve): Invalid registry source format: registry.example.com/x",
    ]);
  });
});

describe("renderApplyResult", () => {
  const change = { source: "acme/vpc/aws", from: "1.0.0", to: "2.0.0" };
  const result: ApplyResult = {
    changes: [{ ...change, file: "/repo/envs/main.tf", count: 2 }],
    failures: [{ ...change, file: "/repo/b.tf", error: new Error("disk full") }],
    filesChanged: 1,
    totalChanges: 2,
  };

  it("lists files, failures and the tally", () => {
    expect(renderApplyResult("/repo", result, false).map(plain)).toEqual([
      "  envs/main.tf: acme/vpc/aws 1.0.0 → 2.0.0 (×2)",
      "✗ b.tf: disk full",
      "✓ Updated 2 module calls in 1 file",
      "✗ 1 file update failed",
    ]);
  });

  it("words the tally as a forecast on a dry run", () => {
    const lines = renderApplyResult("/repo", { ...result, failures: [] }, true).map(plain);
    expect(lines.at(-1)).toBe("Would update 2 module calls in 1 file");
  });
});
