import { EmptySourceError, InvalidSourceFormatError } from "./errors.js";
import { TERRAFORM_REGISTRY_HOST } from "./types.js";
import type { ModuleRef, RegistrySource, Source, UnsupportedSource } from "./types.js";

const GITHUB_PREFIX = "github.com/";

// Local paths, forced getters and URL addresses (git::, s3::, https://...)
// are never registry addresses.
const LOCAL_PATH = /^\.{1,2}[\\/]/;
const FORCED_GETTER = /^[a-z0-9]+::/i;
const URL_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Classify a module source string.
 *
 *   github.com/org/repo[//sub]            → github (unsupported)
 *   namespace/name/provider[//sub]        → terraform-registry
 *   host[/...]/namespace/name/provider    → custom-registry
 *
 * @throws {EmptySourceError} for an empty string
 * @throws {InvalidSourceFormatError} when the address has too few segments
 */
export function resolveSource(raw: string): Source {
  if (raw === "") throw new EmptySourceError();

  if (raw.startsWith(GITHUB_PREFIX)) {
    return resolveGitHub(raw);
  }

  if (LOCAL_PATH.test(raw) || FORCED_GETTER.test(raw) || URL_SCHEME.test(raw)) {
    return unsupported(raw, "unknown", { path: raw });
  }

  const separator = raw.indexOf("//");
  const modulePath = separator === -1 ? raw : raw.slice(0, separator);
  const subPath = separator === -1 ? "" : raw.slice(separator + 2);
  const segments = modulePath.split("/");

  if (segments.length === 3) {
    const [namespace = "", name = "", provider = ""] = segments;
    return registry(raw, { host: TERRAFORM_REGISTRY_HOST, namespace, name, provider, path: subPath });
  }

  if (segments.length >= 4) {
    // host/namespace/name/provider; segments past the provider are ignored.
    const [host = "", namespace = "", name = "", provider = ""] = segments;
    return registry(raw, { host, namespace, name, provider, path: subPath });
  }

  throw new InvalidSourceFormatError(raw, "registry");
}

/** Memoizing resolver: each distinct source string is classified once. */
export class SourceResolver {
  private readonly resolved = new Map<string, Source>();

  resolve(raw: string): Source {
    const cached = this.resolved.get(raw);
    if (cached) return cached;

    const source = resolveSource(raw);
    this.resolved.set(raw, source);
    return source;
  }
}

export function isRegistrySource(source: Source): source is RegistrySource {
  return source.supported;
}

/** `namespace/name/provider` path used in registry URLs. */
export function registryPath(ref: ModuleRef): string {
  return `${ref.namespace}/${ref.name}/${ref.provider}`;
}

/** Identity used to key fetch results and errors. */
export function sourceKey(source: Source): string {
  return source.original;
}

function resolveGitHub(raw: string): UnsupportedSource {
  const rest = raw.slice(GITHUB_PREFIX.length);
  const separator = rest.indexOf("//");
  const repoPath = separator === -1 ? rest : rest.slice(0, separator);
  const segments = repoPath.split("/").filter((s) => s !== "");

  if (segments.length < 2) {
    throw new InvalidSourceFormatError(raw, "github");
  }

  return unsupported(raw, "github", { host: "github.com", path: repoPath });
}

function registry(
  original: string,
  fields: Omit<RegistrySource, "original" | "type" | "supported">,
): RegistrySource {
  const source: RegistrySource = {
    original,
    type: fields.host === TERRAFORM_REGISTRY_HOST ? "terraform-registry" : "custom-registry",
    supported: true,
    ...fields,
  };
  return Object.freeze(source);
}

function unsupported(
  original: string,
  type: UnsupportedSource["type"],
  fields: { host?: string; path: string },
): UnsupportedSource {
  const source: UnsupportedSource = {
    original,
    type,
    supported: false,
    host: fields.host ?? "",
    namespace: "",
    name: "",
    provider: "",
    path: fields.path,
  };
  return Object.freeze(source);
}
