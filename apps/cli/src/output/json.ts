// apps/cli/src/output/json.ts: JSON output formatter
import type { Report } from "./report.js";

export function formatJson(report: Report): string {
  return JSON.stringify(report, null, 2) + "\n";
}
