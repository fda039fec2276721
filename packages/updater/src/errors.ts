export class ReadFailureError extends Error {
  readonly code = "READ_FAILURE";

  constructor(
    readonly file: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to read ${file}`, options);
    this.name = "ReadFailureError";
  }
}

export class WriteFailureError extends Error {
  readonly code = "WRITE_FAILURE";

  constructor(
    readonly file: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to write ${file}`, options);
    this.name = "WriteFailureError";
  }
}

export class InvalidRootError extends Error {
  readonly code = "INVALID_ROOT";

  constructor(readonly root: string) {
    super(`Not a directory: ${root}`);
    this.name = "InvalidRootError";
  }
}

export class DiffToolError extends Error {
  readonly code = "DIFF_TOOL_FAILED";

  constructor(message: string, options?: ErrorOptions) {
    super(`diff tool failed: ${message}`, options);
    this.name = "DiffToolError";
  }
}
