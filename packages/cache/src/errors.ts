export class InvalidKeyError extends Error {
  readonly code = "INVALID_KEY";

  constructor() {
    super("Cache key cannot be empty");
    this.name = "InvalidKeyError";
  }
}

export class CacheWriteError extends Error {
  readonly code = "CACHE_WRITE_FAILED";

  constructor(
    readonly key: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to persist cache entry "${key}"`, options);
    this.name = "CacheWriteError";
  }
}
