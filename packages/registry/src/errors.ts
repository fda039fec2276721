export class EmptySourceError extends Error {
  readonly code = "EMPTY_SOURCE";

  constructor() {
    super("Empty source string");
    this.name = "EmptySourceError";
  }
}

export class InvalidSourceFormatError extends Error {
  readonly code = "INVALID_SOURCE_FORMAT";

  constructor(
    readonly source: string,
    kind: "github" | "registry",
  ) {
    super(`Invalid ${kind} source format: ${source}`);
    this.name = "InvalidSourceFormatError";
  }
}

export class UnsupportedSourceError extends Error {
  readonly code = "UNSUPPORTED_SOURCE";

  constructor(readonly source: string) {
    super(`Cannot fetch versions for ${source}: only registry sources are supported`);
    this.name = "UnsupportedSourceError";
  }
}

export class RegistryError extends Error {
  readonly code: "REGISTRY_ERROR" | "TIMEOUT" = "REGISTRY_ERROR";
  readonly url: string;
  readonly status: number | undefined;

  constructor(message: string, details: { url: string; status?: number; cause?: unknown }) {
    super(message, { cause: details.cause });
    this.name = "RegistryError";
    this.url = details.url;
    this.status = details.status;
  }
}

export class RegistryTimeoutError extends RegistryError {
  override readonly code = "TIMEOUT";

  constructor(
    url: string,
    readonly timeoutMs: number,
    cause?: unknown,
  ) {
    super(`Registry request timed out after ${timeoutMs}ms: ${url}`, { url, cause });
    this.name = "RegistryTimeoutError";
  }
}

export class CancelledError extends Error {
  readonly code = "CANCELLED";

  constructor(detail?: string) {
    super(detail ? `Cancelled: ${detail}` : "Cancelled");
    this.name = "CancelledError";
  }
}
