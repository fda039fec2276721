// @modbump/core: finds module calls, plans version updates and applies them

export {
  loadConfig,
  defaultConfigPath,
  defaultCacheDir,
  APP_NAME,
  DEFAULT_CACHE_TTL_MS,
  DEFAULT_WORKERS,
  DEFAULT_TIMEOUT_MS,
} from "./config.js";
export type { Settings, ConfigFile, LoadConfigOptions } from "./config.js";
export { parseDuration, formatDuration } from "./duration.js";
export {
  ModuleFilter,
  createMatcher,
  parseModulePattern,
  buildModuleFilter,
} from "./filter.js";
export type { Matcher, ModuleRule, FilterFlags } from "./filter.js";
export { loadConstraints, parseConstraintFile } from "./constraints.js";
export type { ConstraintFlags } from "./constraints.js";
export { inspectDirectory } from "./inspector.js";
export { findModules } from "./finder.js";
export type { FindOptions } from "./finder.js";
export { buildSummary, plannedChanges, changeKey } from "./plan.js";
export type { TargetMap, PlannedChange } from "./plan.js";
export { checkModules, applyUpdates } from "./check.js";
export type {
  CheckStage,
  CheckWarning,
  CheckOptions,
  CheckResult,
  AppliedChange,
  ApplyFailure,
  ApplyResult,
  ApplyOptions,
} from "./check.js";
export { UsageError, ConfigError, InvalidDurationError } from "./errors.js";
export { MAX_LOCATIONS } from "./types.js";
export type {
  ModuleCall,
  ModuleUsage,
  ModuleReport,
  UnsupportedModule,
  UpdateSummary,
} from "./types.js";
