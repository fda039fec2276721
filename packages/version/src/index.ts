// @modbump/version: semantic versions, constraints and selection strategies

export {
  parseVersion,
  isValidVersion,
  compareVersions,
  isNewer,
  isSameOrNewer,
  sortVersions,
  sortValidVersions,
  latestVersion,
  classifyChange,
} from "./compare.js";

export {
  parseConstraint,
  parseConstraints,
  constraintMatches,
  constraintsMatch,
  constraintsMatchString,
  formatConstraint,
  formatConstraints,
} from "./constraints.js";
export type { Constraint, Constraints, ConstraintOperator } from "./constraints.js";

export { STRATEGIES, isValidStrategy, selectVersion } from "./strategy.js";
export type { Strategy } from "./strategy.js";

export {
  InvalidVersionError,
  InvalidConstraintError,
  UnknownStrategyError,
  NoMatchingVersionError,
  NoMatchingMajorError,
} from "./errors.js";
