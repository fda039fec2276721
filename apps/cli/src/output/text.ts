// apps/cli/src/output/text.ts: small text helpers for terminal output

export function plural(count: number, word: string, pluralWord = `${word}s`): string {
  return `${count} ${count === 1 ? word : pluralWord}`;
}

export function pad(str: string, len: number): string {
  return str.length >= len ? str : str + " ".repeat(len - str.length);
}
