/** Invalid command-line usage: conflicting or malformed options. */
export class UsageError extends Error {
  readonly code = "USAGE";

  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export class ConfigError extends Error {
  readonly code = "CONFIG";

  constructor(
    readonly path: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`${path}: ${message}`, options);
    this.name = "ConfigError";
  }
}

export class InvalidDurationError extends Error {
  readonly code = "INVALID_DURATION";

  constructor(readonly value: string) {
    super(`Invalid duration "${value}": expected a value like 24h, 1h30m or 500ms`);
    this.name = "InvalidDurationError";
  }
}
