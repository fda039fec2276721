export class InvalidVersionError extends Error {
  readonly code = "INVALID_VERSION";

  constructor(
    readonly version: string,
    options?: ErrorOptions,
  ) {
    super(`Invalid version "${version}": not a semantic version`, options);
    this.name = "InvalidVersionError";
  }
}

export class InvalidConstraintError extends Error {
  readonly code = "INVALID_CONSTRAINT";

  constructor(
    readonly expression: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Invalid constraint "${expression}": ${reason}`, options);
    this.name = "InvalidConstraintError";
  }
}

export class UnknownStrategyError extends Error {
  readonly code = "UNKNOWN_STRATEGY";

  constructor(readonly strategy: string) {
    super(`Unknown version strategy "${strategy}" (expected "minor" or "latest")`);
    this.name = "UnknownStrategyError";
  }
}

export class NoMatchingVersionError extends Error {
  readonly code = "NO_MATCHING_VERSION";

  constructor(message: string) {
    super(message);
    this.name = "NoMatchingVersionError";
  }
}

export class NoMatchingMajorError extends Error {
  readonly code = "NO_MATCHING_MAJOR";

  constructor(readonly major: number) {
    super(`No version found matching major version ${major}`);
    this.name = "NoMatchingMajorError";
  }
}
