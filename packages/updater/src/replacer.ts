import { scanModuleBlocks } from "./blocks.js";
import type { ModuleBlock, Span } from "./blocks.js";

export interface Replacement {
  content: string;
  /** Number of version attributes rewritten */
  count: number;
}

function matchingVersionSpans(text: string, source: string, oldVersion: string): Span[] {
  return scanModuleBlocks(text)
    .filter((block): block is ModuleBlock & { version: NonNullable<ModuleBlock["version"]> } =>
      block.source?.value === source && block.version?.value === oldVersion,
    )
    .map((block) => block.version.span);
}

/** Number of module blocks with this source pinned to `oldVersion`. */
export function countMatches(text: string, source: string, oldVersion: string): number {
  return matchingVersionSpans(text, source, oldVersion).length;
}

/**
 * Rewrite the version literal of every module block with this source that
 * is pinned to `oldVersion`. Everything outside those literals is kept
 * byte for byte.
 */
export function replaceVersion(
  text: string,
  source: string,
  oldVersion: string,
  newVersion: string,
): Replacement {
  const spans = matchingVersionSpans(text, source, oldVersion);
  if (spans.length === 0 || oldVersion === newVersion) {
    return { content: text, count: 0 };
  }

  let content = "";
  let cursor = 0;
  for (const span of spans) {
    content += text.slice(cursor, span.start) + newVersion;
    cursor = span.end;
  }
  content += text.slice(cursor);

  return { content, count: spans.length };
}
