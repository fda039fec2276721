import { isValidStrategy } from "@modbump/version";
import type { Strategy } from "@modbump/version";
import { UsageError } from "./errors.js";

const REGEX_METACHARACTERS = /[*+?[\](){}^$|\\.]/;

export interface Matcher {
  pattern: string;
  mode: "exact" | "regex";
  matches(source: string): boolean;
}

/**
 * Patterns containing a regular-expression metacharacter are compiled as
 * an unanchored regex; anything else must equal the source exactly.
 */
export function createMatcher(pattern: string): Matcher {
  if (!REGEX_METACHARACTERS.test(pattern)) {
    return { pattern, mode: "exact", matches: (source) => source === pattern };
  }

  let regex: RegExp;
  try {
    regex = new RegExp(pattern);
  } catch (err) {
    throw new UsageError(
      `Invalid module pattern "${pattern}": ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return { pattern, mode: "regex", matches: (source) => regex.test(source) };
}

export interface ModuleRule {
  matcher: Matcher;
  strategy: Strategy;
}

/** Chooses the update strategy of a module source; the first matching rule wins. */
export class ModuleFilter {
  private constructor(
    private readonly rules: readonly ModuleRule[],
    readonly globalStrategy: Strategy | undefined,
  ) {}

  static global(strategy: Strategy): ModuleFilter {
    return new ModuleFilter([], strategy);
  }

  static fromPatterns(patterns: readonly string[]): ModuleFilter {
    return new ModuleFilter(patterns.map(parseModulePattern), undefined);
  }

  /** Strategy for this source, or undefined when no rule matches it. */
  strategyFor(source: string): Strategy | undefined {
    if (this.globalStrategy) return this.globalStrategy;
    return this.rules.find((rule) => rule.matcher.matches(source))?.strategy;
  }
}

/** Parse `pattern=strategy` as given to `--module`. */
export function parseModulePattern(value: string): ModuleRule {
  const separator = value.lastIndexOf("=");
  if (separator === -1) {
    throw new UsageError(`Invalid module pattern "${value}": expected pattern=strategy`);
  }

  const pattern = value.slice(0, separator).trim();
  const strategy = value.slice(separator + 1).trim();
  if (pattern === "") {
    throw new UsageError(`Invalid module pattern "${value}": pattern is empty`);
  }
  if (!isValidStrategy(strategy)) {
    throw new UsageError(
      `Invalid strategy "${strategy}" in "${value}": must be 'minor' or 'latest'`,
    );
  }
  return { matcher: createMatcher(pattern), strategy };
}

export interface FilterFlags {
  modules?: readonly string[] | undefined;
  strategy?: string | undefined;
}

/**
 * Build the filter from `--module` and `--strategy`. Resolves to undefined
 * when neither is given, meaning every module is selected.
 */
export function buildModuleFilter(flags: FilterFlags): ModuleFilter | undefined {
  const modules = flags.modules ?? [];
  const { strategy } = flags;

  if (modules.length > 0 && strategy !== undefined) {
    throw new UsageError("Cannot use both --module and --strategy");
  }
  if (strategy !== undefined) {
    if (!isValidStrategy(strategy)) {
      throw new UsageError(`Invalid strategy "${strategy}": must be 'minor' or 'latest'`);
    }
    return ModuleFilter.global(strategy);
  }
  return modules.length > 0 ? ModuleFilter.fromPatterns(modules) : undefined;
}
