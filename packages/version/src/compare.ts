import semver from "semver";
import type { SemVer } from "semver";
import { InvalidVersionError } from "./errors.js";

// Registries and constraint literals sometimes omit trailing components ("1", "1.2").
const PARTIAL_VERSION = /^v?(\d+)(?:\.(\d+))?$/;

/**
 * Parse a version string, accepting an optional leading "v" and partial
 * versions padded with zeros. Returns null when the string is not a
 * semantic version.
 */
export function parseVersion(input: string): SemVer | null {
  const trimmed = input.trim();
  if (trimmed === "") return null;

  const full = semver.parse(trimmed);
  if (full) return full;

  const partial = PARTIAL_VERSION.exec(trimmed);
  if (!partial) return null;
  return semver.parse(`${partial[1] ?? "0"}.${partial[2] ?? "0"}.0`);
}

export function isValidVersion(input: string): boolean {
  return parseVersion(input) !== null;
}

function mustParse(input: string): SemVer {
  const parsed = parseVersion(input);
  if (!parsed) throw new InvalidVersionError(input);
  return parsed;
}

/**
 * Compare two versions. Pre-releases sort below their release; build
 * metadata does not participate in ordering.
 *
 * @throws {InvalidVersionError} if either input is not a semantic version
 */
export function compareVersions(a: string, b: string): -1 | 0 | 1 {
  return semver.compare(mustParse(a), mustParse(b));
}

/** True if `b` is newer than `a`. */
export function isNewer(a: string, b: string): boolean {
  return compareVersions(a, b) < 0;
}

/** True if `b` is the same as or newer than `a`. */
export function isSameOrNewer(a: string, b: string): boolean {
  return compareVersions(a, b) <= 0;
}

function sortParsed(entries: { raw: string; parsed: SemVer }[]): string[] {
  return entries
    .sort((x, y) => semver.rcompare(x.parsed, y.parsed))
    .map((e) => e.raw);
}

/**
 * Sort versions latest-first. The input strings are returned as given,
 * only reordered.
 *
 * @throws {InvalidVersionError} on the first unparseable entry
 */
export function sortVersions(versions: readonly string[]): string[] {
  return sortParsed(versions.map((raw) => ({ raw, parsed: mustParse(raw) })));
}

/** Like {@link sortVersions}, but silently drops unparseable entries. */
export function sortValidVersions(versions: readonly string[]): string[] {
  const entries: { raw: string; parsed: SemVer }[] = [];
  for (const raw of versions) {
    const parsed = parseVersion(raw);
    if (parsed) entries.push({ raw, parsed });
  }
  return sortParsed(entries);
}

export function latestVersion(versions: readonly string[]): string {
  const [latest] = sortVersions(versions);
  if (latest === undefined) {
    throw new Error("No versions provided");
  }
  return latest;
}

/**
 * Kind of bump between two versions, or undefined when they are equal or
 * either is not a semantic version.
 */
export function classifyChange(
  oldVersion: string,
  newVersion: string,
): "major" | "minor" | "patch" | undefined {
  const from = parseVersion(oldVersion);
  const to = parseVersion(newVersion);
  if (!from || !to) return undefined;
  const diff = semver.diff(from, to);
  if (!diff) return undefined;
  if (diff === "major" || diff === "premajor") return "major";
  if (diff === "minor" || diff === "preminor") return "minor";
  return "patch";
}
