import type { SourceType } from "@modbump/registry";

/** A module block found in a `.tf` file. */
export interface ModuleCall {
  name: string;
  source: string;
  /** Version attribute as written; empty when the block has none */
  version: string;
  file: string;
  line: number;
}

/** One module call in a configuration tree. */
export interface ModuleUsage {
  source: string;
  version: string;
  file: string;
  /** Directory holding the file, i.e. the Terraform module the call belongs to */
  directory: string;
  blockName: string;
  line: number;
}

// ---------------------------------------------------------------------------
// Update plan
// ---------------------------------------------------------------------------

export interface ModuleReport {
  source: string;
  type: SourceType;
  supported: boolean;
  /** Version as written → number of usages */
  currentVersions: Record<string, number>;
  latestVersion: string | undefined;
  /** Version as written → version it will be moved to; only versions that change */
  targets: Record<string, string>;
  totalUsages: number;
  updateCount: number;
  /** `file:line` of usages, at most {@link MAX_LOCATIONS} */
  locations: string[];
}

export interface UnsupportedModule {
  source: string;
  type: SourceType;
  count: number;
}

export interface UpdateSummary {
  modules: ModuleReport[];
  unsupported: UnsupportedModule[];
  totalUsages: number;
  totalUpdates: number;
  supportedCount: number;
  unsupportedCount: number;
  /** `"1.0.0 → 2.0.0"` → number of usages making that move */
  byVersionChange: Record<string, number>;
}

export const MAX_LOCATIONS = 100;
