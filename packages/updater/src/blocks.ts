// ---------------------------------------------------------------------------
// Module block scanner
//
// Walks HCL text once, tracking brace depth while stepping over strings
// (escapes and ${...} / %{...} templates), heredocs and comments, so that
// braces inside any of those never open or close a block.
// ---------------------------------------------------------------------------

/** Half-open character range `[start, end)`. */
export interface Span {
  start: number;
  end: number;
}

export interface AttributeValue {
  /** Raw text between the quotes */
  value: string;
  /** Position of that text, quotes excluded */
  span: Span;
}

export interface ModuleBlock {
  name: string;
  /** From the `module` keyword through the closing brace */
  span: Span;
  source?: AttributeValue | undefined;
  version?: AttributeValue | undefined;
}

const MODULE_HEADER = /module[ \t]+(?:"((?:[^"\\\n]|\\.)*)"|([A-Za-z_][\w-]*))[ \t]*\{/y;
const HEREDOC_START = /<<-?([A-Za-z_][\w-]*)[ \t]*\r?\n/y;
const TRACKED_ATTRIBUTES = new Set(["source", "version"]);

interface StringToken {
  end: number;
  terminated: boolean;
  interpolated: boolean;
}

export function scanModuleBlocks(text: string): ModuleBlock[] {
  const blocks: ModuleBlock[] = [];
  let depth = 0;
  let i = 0;

  while (i < text.length) {
    const skipped = skipTrivia(text, i);
    if (skipped !== i) {
      i = skipped;
      continue;
    }

    const ch = text.charAt(i);
    if (ch === "{") {
      depth++;
      i++;
    } else if (ch === "}") {
      depth = Math.max(0, depth - 1);
      i++;
    } else if (isIdentStart(ch)) {
      if (depth === 0 && !isIdentChar(text.charAt(i - 1))) {
        MODULE_HEADER.lastIndex = i;
        const header = MODULE_HEADER.exec(text);
        if (header) {
          const block = readBlock(text, i, header[0].length, header[1] ?? header[2] ?? "");
          blocks.push(block);
          i = block.span.end;
          continue;
        }
      }
      i = identEnd(text, i);
    } else {
      i++;
    }
  }

  return blocks;
}

function readBlock(text: string, start: number, headerLength: number, name: string): ModuleBlock {
  const block: ModuleBlock = { name, span: { start, end: text.length } };
  let depth = 1;
  let i = start + headerLength;

  while (i < text.length) {
    const ch = text.charAt(i);

    if (depth === 1 && isIdentStart(ch) && !isIdentChar(text.charAt(i - 1))) {
      const end = identEnd(text, i);
      const attribute = text.slice(i, end);
      i = end;
      if (!TRACKED_ATTRIBUTES.has(attribute)) continue;

      const valueStart = stringAfterAssignment(text, i);
      if (valueStart === -1) continue;

      const token = readString(text, valueStart);
      i = token.end;
      if (!token.terminated || token.interpolated) continue;

      const span = { start: valueStart + 1, end: token.end - 1 };
      const value = { value: text.slice(span.start, span.end), span };
      if (attribute === "source") {
        block.source ??= value;
      } else {
        block.version ??= value;
      }
      continue;
    }

    const skipped = skipTrivia(text, i);
    if (skipped !== i) {
      i = skipped;
      continue;
    }

    if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) {
        block.span.end = i + 1;
        return block;
      }
    }
    i++;
  }

  return block;
}

// Position of the opening quote in `<ws>=<ws>"`, or -1.
function stringAfterAssignment(text: string, from: number): number {
  let i = skipBlanks(text, from);
  if (text.charAt(i) !== "=" || text.charAt(i + 1) === "=") return -1;
  i = skipBlanks(text, i + 1);
  return text.charAt(i) === '"' ? i : -1;
}

/** Index after a comment, string or heredoc starting at `i`; `i` when none does. */
function skipTrivia(text: string, i: number): number {
  const ch = text.charAt(i);
  const next = text.charAt(i + 1);

  if (ch === "#" || (ch === "/" && next === "/")) {
    const newline = text.indexOf("\n", i);
    return newline === -1 ? text.length : newline;
  }
  if (ch === "/" && next === "*") {
    const close = text.indexOf("*/", i + 2);
    return close === -1 ? text.length : close + 2;
  }
  if (ch === '"') {
    return readString(text, i).end;
  }
  if (ch === "<" && next === "<") {
    return skipHeredoc(text, i);
  }
  return i;
}

function readString(text: string, quote: number): StringToken {
  let interpolated = false;
  let i = quote + 1;

  while (i < text.length) {
    const ch = text.charAt(i);
    if (ch === "\\") {
      i += 2;
    } else if (ch === '"') {
      return { end: i + 1, terminated: true, interpolated };
    } else if (ch === "\n") {
      return { end: i, terminated: false, interpolated };
    } else if ((ch === "$" || ch === "%") && text.charAt(i + 1) === ch && text.charAt(i + 2) === "{") {
      // $${ and %%{ are literal
      i += 3;
    } else if ((ch === "$" || ch === "%") && text.charAt(i + 1) === "{") {
      interpolated = true;
      i = skipTemplate(text, i + 2);
    } else {
      i++;
    }
  }

  return { end: text.length, terminated: false, interpolated };
}

function skipTemplate(text: string, from: number): number {
  let depth = 1;
  let i = from;
  while (i < text.length) {
    const ch = text.charAt(i);
    if (ch === '"') {
      i = readString(text, i).end;
      continue;
    }
    if (ch === "{") depth++;
    if (ch === "}" && --depth === 0) return i + 1;
    i++;
  }
  return text.length;
}

function skipHeredoc(text: string, i: number): number {
  HEREDOC_START.lastIndex = i;
  const start = HEREDOC_START.exec(text);
  if (!start) return i;

  const marker = start[1] ?? "";
  let lineStart = i + start[0].length;
  while (lineStart < text.length) {
    const newline = text.indexOf("\n", lineStart);
    const lineEnd = newline === -1 ? text.length : newline;
    if (text.slice(lineStart, lineEnd).trim() === marker) return lineEnd;
    lineStart = lineEnd + 1;
  }
  return text.length;
}

function skipBlanks(text: string, i: number): number {
  while (text.charAt(i) === " " || text.charAt(i) === "\t") i++;
  return i;
}

function identEnd(text: string, i: number): number {
  let end = i;
  while (end < text.length && isIdentChar(text.charAt(end))) end++;
  return end;
}

function isIdentStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isIdentChar(ch: string): boolean {
  return /[\w-]/.test(ch);
}
