import { parseVersion } from "./compare.js";
import { constraintsMatchString } from "./constraints.js";
import type { Constraints } from "./constraints.js";
import {
  InvalidVersionError,
  NoMatchingMajorError,
  NoMatchingVersionError,
  UnknownStrategyError,
} from "./errors.js";

export const STRATEGIES = ["minor", "latest"] as const;

export type Strategy = (typeof STRATEGIES)[number];

export function isValidStrategy(value: string): value is Strategy {
  return (STRATEGIES as readonly string[]).includes(value);
}

/**
 * Choose the target version for a module.
 *
 * `available` must already be sorted latest-first. Constraints narrow the
 * candidates before the strategy is applied:
 * - `latest` takes the newest candidate
 * - `minor` takes the newest candidate sharing the current major version
 */
export function selectVersion(
  currentVersion: string,
  available: readonly string[],
  strategy: string,
  constraints: Constraints = [],
): string {
  if (available.length === 0) {
    throw new NoMatchingVersionError("No available versions");
  }

  const candidates =
    constraints.length > 0
      ? available.filter((v) => constraintsMatchString(constraints, v))
      : [...available];
  if (candidates.length === 0) {
    throw new NoMatchingVersionError("No versions satisfy the constraints");
  }

  switch (strategy) {
    case "latest": {
      const [latest] = candidates;
      if (latest === undefined) {
        throw new NoMatchingVersionError("No versions satisfy the constraints");
      }
      return latest;
    }
    case "minor":
      return selectSameMajor(currentVersion, candidates);
    default:
      throw new UnknownStrategyError(strategy);
  }
}

function selectSameMajor(currentVersion: string, candidates: readonly string[]): string {
  const current = parseVersion(currentVersion);
  if (!current) throw new InvalidVersionError(currentVersion);

  for (const candidate of candidates) {
    if (parseVersion(candidate)?.major === current.major) {
      return candidate;
    }
  }
  throw new NoMatchingMajorError(current.major);
}
