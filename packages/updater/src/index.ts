export { scanModuleBlocks } from "./blocks.js";
export type { ModuleBlock, AttributeValue, Span } from "./blocks.js";
export { countMatches, replaceVersion } from "./replacer.js";
export type { Replacement } from "./replacer.js";
export { FileUpdater, IGNORED_DIRECTORIES, listTerraformFiles } from "./updater.js";
export type { DirectoryResult, FileError, DiffOptions, DiffSink } from "./updater.js";
export { formatUnifiedDiff, DEFAULT_DIFF_CONTEXT } from "./diff.js";
export { runDiffTool, parseCommand, DIFF_TOOL_TIMEOUT_MS } from "./diff-tool.js";
export type { DiffToolOptions } from "./diff-tool.js";
export { ReadFailureError, WriteFailureError, InvalidRootError, DiffToolError } from "./errors.js";
