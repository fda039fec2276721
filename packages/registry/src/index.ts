export {
  RegistryClient,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_CACHE_TTL_MS,
  versionsCacheKey,
  infoCacheKey,
} from "./client.js";
export type {
  RegistryClientOptions,
  RequestOptions,
  ModuleInfoResult,
  VersionInfoError,
} from "./client.js";
export { VersionFetcher, DEFAULT_WORKERS } from "./fetcher.js";
export type { VersionFetcherOptions } from "./fetcher.js";
export { Semaphore } from "./semaphore.js";
export { resolveSource, SourceResolver, isRegistrySource, registryPath, sourceKey } from "./source.js";
export {
  EmptySourceError,
  InvalidSourceFormatError,
  UnsupportedSourceError,
  RegistryError,
  RegistryTimeoutError,
  CancelledError,
} from "./errors.js";
export { TERRAFORM_REGISTRY_HOST } from "./types.js";
export type {
  Source,
  SourceType,
  RegistrySource,
  UnsupportedSource,
  ModuleRef,
  ModuleInfo,
  ModuleVersion,
  RegistryModule,
} from "./types.js";
