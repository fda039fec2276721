import { InvalidDurationError } from "./errors.js";

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  "µs": 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const COMPONENT = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|ms|s|m|h)/y;

/**
 * Parse a duration such as `24h`, `1h30m`, `1.5s` or `250ms` into
 * milliseconds. A bare `0` is accepted; any other value needs a unit.
 */
export function parseDuration(value: string): number {
  const text = value.trim();
  if (text === "0") return 0;
  if (text === "") throw new InvalidDurationError(value);

  let total = 0;
  let index = 0;
  while (index < text.length) {
    COMPONENT.lastIndex = index;
    const match = COMPONENT.exec(text);
    if (!match) throw new InvalidDurationError(value);

    const [, amount = "", unit = ""] = match;
    const factor = UNIT_MS[unit];
    if (factor === undefined) throw new InvalidDurationError(value);
    total += Number(amount) * factor;
    index = COMPONENT.lastIndex;
  }
  return total;
}

/** Inverse of {@link parseDuration} for whole milliseconds, e.g. `1h30m`. */
export function formatDuration(ms: number): string {
  if (ms === 0) return "0s";
  const parts: string[] = [];
  let rest = Math.round(ms);
  for (const [unit, size] of [
    ["h", 3_600_000],
    ["m", 60_000],
    ["s", 1000],
  ] as const) {
    const amount = Math.floor(rest / size);
    if (amount > 0) parts.push(`${amount}${unit}`);
    rest -= amount * size;
  }
  if (rest > 0) parts.push(`${rest}ms`);
  return parts.join("");
}
