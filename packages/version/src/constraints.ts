import semver from "semver";
import type { SemVer } from "semver";
import { parseVersion } from "./compare.js";
import { InvalidConstraintError } from "./errors.js";

export type ConstraintOperator = "=" | "!=" | ">" | ">=" | "<" | "<=" | "~>";

export interface Constraint {
  operator: ConstraintOperator;
  version: SemVer;
  /** Version literal exactly as written, e.g. "1.2" in "~> 1.2" */
  literal: string;
}

/** AND-combined constraints; an empty list matches every version. */
export type Constraints = readonly Constraint[];

const OPERATORS: readonly ConstraintOperator[] = ["=", "!=", ">", ">=", "<", "<=", "~>"];

// Longest operators first so ">=" is not read as ">".
const CONSTRAINT_PATTERN = /^(~>|!=|>=|<=|=|>|<)\s*(.*)$/;

function isOperator(value: string | undefined): value is ConstraintOperator {
  return OPERATORS.some((op) => op === value);
}

export function parseConstraint(expr: string): Constraint {
  const trimmed = expr.trim();
  if (trimmed === "") {
    throw new InvalidConstraintError(expr, "empty constraint expression");
  }

  const match = CONSTRAINT_PATTERN.exec(trimmed);
  const operator = match?.[1];
  if (!match || !isOperator(operator)) {
    throw new InvalidConstraintError(trimmed, "missing or unknown operator");
  }

  const literal = (match[2] ?? "").trim();
  if (literal === "") {
    throw new InvalidConstraintError(trimmed, "missing version");
  }

  const version = parseVersion(literal);
  if (!version) {
    throw new InvalidConstraintError(trimmed, `"${literal}" is not a semantic version`);
  }

  return { operator, version, literal };
}

/**
 * Parse a comma-separated list such as ">= 1.0, < 2.0". The first invalid
 * clause rejects the whole expression.
 */
export function parseConstraints(expr: string): Constraint[] {
  if (expr.trim() === "") {
    throw new InvalidConstraintError(expr, "empty constraints expression");
  }
  return expr.split(",").map((clause) => parseConstraint(clause));
}

/**
 * Number of release components in the literal as written ("1" → 1,
 * "1.2" → 2, "1.2.3-rc.1" → 3).
 */
function literalPrecision(literal: string): number {
  const release = literal.replace(/^v/, "").split(/[-+]/, 1)[0] ?? "";
  return release.split(".").length;
}

function pessimisticUpperBound(constraint: Constraint): SemVer {
  const { major, minor } = constraint.version;
  const bound =
    literalPrecision(constraint.literal) === 1
      ? `${major + 1}.0.0`
      : `${major}.${minor + 1}.0`;
  return new semver.SemVer(bound);
}

export function constraintMatches(constraint: Constraint, version: SemVer): boolean {
  const cmp = semver.compare(version, constraint.version);

  switch (constraint.operator) {
    case "=":
      return cmp === 0;
    case "!=":
      return cmp !== 0;
    case ">":
      return cmp > 0;
    case ">=":
      return cmp >= 0;
    case "<":
      return cmp < 0;
    case "<=":
      return cmp <= 0;
    case "~>":
      return cmp >= 0 && semver.lt(version, pessimisticUpperBound(constraint));
  }
}

export function constraintsMatch(constraints: Constraints, version: SemVer): boolean {
  return constraints.every((c) => constraintMatches(c, version));
}

/** Unparseable version strings never match. */
export function constraintsMatchString(constraints: Constraints, version: string): boolean {
  const parsed = parseVersion(version);
  if (!parsed) return false;
  return constraintsMatch(constraints, parsed);
}

export function formatConstraint(constraint: Constraint): string {
  return `${constraint.operator} ${constraint.version.version}`;
}

export function formatConstraints(constraints: Constraints): string {
  return constraints.map(formatConstraint).join(", ");
}
