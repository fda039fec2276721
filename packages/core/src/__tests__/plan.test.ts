import { describe, expect, it } from "vitest";
import { resolveSource } from "@modbump/registry";
import type { Source } from "@modbump/registry";
import { buildSummary, plannedChanges } from "../plan.js";
import type { ModuleUsage } from "../types.js";

const usage = (source: string, version: string, file = "/repo/main.tf", line = 1): ModuleUsage => ({
  source,
  version,
  file,
  directory: "/repo",
  blockName: "m",
  line,
});

const sourcesOf = (...raw: string[]) => new Map<string, Source>(raw.map((r) => [r, resolveSource(r)]));

describe("buildSummary", () => {
  const usages = [
    usage("acme/vpc/aws", "1.0.0", "/repo/a.tf", 3),
    usage("acme/vpc/aws", "1.0.0", "/repo/b.tf", 7),
    usage("acme/vpc/aws", "2.0.0"),
    usage("acme/dns/aws", "3.1.0"),
    usage("github.com/acme/tools", "v1"),
  ];
  const sources = sourcesOf("acme/vpc/aws", "acme/dns/aws", "github.com/acme/tools");
  const versions = new Map([
    ["acme/vpc/aws", ["2.0.0", "1.1.0", "1.0.0"]],
    ["acme/dns/aws", ["3.1.0"]],
  ]);

  it("moves everything to the newest version without targets", () => {
    const summary = buildSummary(usages, sources, versions);

    expect(summary.modules.map((m) => m.source)).toEqual(["acme/dns/aws", "acme/vpc/aws"]);
    expect(summary.modules[1]).toEqual({
      source: "acme/vpc/aws",
      type: "terraform-registry",
      supported: true,
      currentVersions: { "1.0.0": 2, "2.0.0": 1 },
      latestVersion: "2.0.0",
      targets: { "1.0.0": "2.0.0" },
      totalUsages: 3,
      updateCount: 2,
      locations: ["/repo/a.tf:3", "/repo/b.tf:7", "/repo/main.tf:1"],
    });
    expect(summary.modules[0]?.updateCount).toBe(0);
    expect(summary.unsupported).toEqual([{ source: "github.com/acme/tools", type: "github", count: 1 }]);
    expect(summary).toMatchObject({
      totalUsages: 5,
      totalUpdates: 2,
      supportedCount: 2,
      unsupportedCount: 1,
      byVersionChange: { "1.0.0 → 2.0.0": 2 },
    });
  });

  it("uses explicit targets per current version", () => {
    const targets = new Map([["acme/vpc/aws", new Map([["1.0.0", "1.1.0"]])]]);
    const summary = buildSummary(usages, sources, versions, targets);

    const vpc = summary.modules.find((m) => m.source === "acme/vpc/aws");
    expect(vpc?.targets).toEqual({ "1.0.0": "1.1.0" });
    expect(vpc?.latestVersion).toBe("2.0.0");
    expect(summary.byVersionChange).toEqual({ "1.0.0 → 1.1.0": 2 });
    expect(plannedChanges(summary)).toEqual([{ source: "acme/vpc/aws", from: "1.0.0", to: "1.1.0" }]);
  });

  it("lists sources that could not be resolved as unknown", () => {
    const summary = buildSummary([usage("not-a-source", "1.0.0")], new Map(), new Map());
    expect(summary.unsupported).toEqual([{ source: "not-a-source", type: "unknown", count: 1 }]);
    expect(summary.modules).toEqual([]);
  });

  it("leaves modules without fetched versions unchanged", () => {
    const summary = buildSummary([usage("acme/vpc/aws", "1.0.0")], sources, new Map());
    expect(summary.modules[0]).toMatchObject({ latestVersion: undefined, targets: {}, updateCount: 0 });
  });

  it("caps recorded locations", () => {
    const many = Array.from({ length: 150 }, (_, i) => usage("acme/dns/aws", "3.1.0", `/repo/f${i}.tf`));
    const summary = buildSummary(many, sources, versions);
    expect(summary.modules[0]?.locations).toHaveLength(100);
    expect(summary.modules[0]?.totalUsages).toBe(150);
  });
});
