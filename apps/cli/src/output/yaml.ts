// apps/cli/src/output/yaml.ts: YAML output formatter
import yaml from "js-yaml";
import type { Report } from "./report.js";

export function formatYaml(report: Report): string {
  const output = yaml.dump(report, { lineWidth: 120, noRefs: true });
  return output.endsWith("\n") ? output : output + "\n";
}
