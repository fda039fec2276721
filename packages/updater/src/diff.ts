export const DEFAULT_DIFF_CONTEXT = 3;

interface Hunk {
  start: number;
  end: number;
}

function splitLines(text: string): string[] {
  const lines = text.split("\n");
  if (lines.at(-1) === "") lines.pop();
  return lines;
}

/**
 * Line-based unified diff. Lines are compared position by position, which
 * is exact for in-place edits that never add or remove lines. Returns an
 * empty string when the texts are equal.
 */
export function formatUnifiedDiff(
  filename: string,
  before: string,
  after: string,
  context = DEFAULT_DIFF_CONTEXT,
): string {
  if (before === after) return "";

  const oldLines = splitLines(before);
  const newLines = splitLines(after);
  const total = Math.max(oldLines.length, newLines.length);

  const hunks: Hunk[] = [];
  for (let i = 0; i < total; i++) {
    if (oldLines[i] === newLines[i]) continue;

    const start = Math.max(0, i - context);
    const end = Math.min(total, i + context + 1);
    const last = hunks.at(-1);
    if (last && start <= last.end) {
      last.end = end;
    } else {
      hunks.push({ start, end });
    }
  }

  const out = [`--- ${filename}`, `+++ ${filename}`];
  for (const { start, end } of hunks) {
    const body: string[] = [];
    let oldCount = 0;
    let newCount = 0;

    for (let i = start; i < end; i++) {
      const oldLine = oldLines[i];
      const newLine = newLines[i];
      if (oldLine !== undefined) oldCount++;
      if (newLine !== undefined) newCount++;

      if (oldLine === newLine) {
        body.push(` ${oldLine ?? ""}`);
        continue;
      }
      if (oldLine !== undefined) body.push(`-${oldLine}`);
      if (newLine !== undefined) body.push(`+${newLine}`);
    }

    out.push(`@@ -${start + 1},${oldCount} +${start + 1},${newCount} @@`, ...body);
  }

  return `${out.join("\n")}\n`;
}
