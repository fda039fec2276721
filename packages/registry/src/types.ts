import { z } from "zod";

// ---------------------------------------------------------------------------
// Sources
// ---------------------------------------------------------------------------

export const TERRAFORM_REGISTRY_HOST = "registry.terraform.io";

export type SourceType = "terraform-registry" | "custom-registry" | "github" | "unknown";

interface SourceBase {
  /** Source string exactly as written in the module block */
  readonly original: string;
  readonly host: string;
  readonly namespace: string;
  readonly name: string;
  readonly provider: string;
  /** Subdirectory after "//" for registries, repository path for GitHub */
  readonly path: string;
}

export interface RegistrySource extends SourceBase {
  readonly type: "terraform-registry" | "custom-registry";
  readonly supported: true;
}

export interface UnsupportedSource extends SourceBase {
  readonly type: "github" | "unknown";
  readonly supported: false;
}

export type Source = RegistrySource | UnsupportedSource;

/** Coordinates of a module in a registry. */
export interface ModuleRef {
  host: string;
  namespace: string;
  name: string;
  provider: string;
}

// ---------------------------------------------------------------------------
// Registry wire format
// ---------------------------------------------------------------------------

const ProviderSchema = z.object({
  name: z.string(),
  version: z.string().default(""),
});

export const ModuleInfoSchema = z.object({
  source: z.string().default(""),
  published_at: z.string().default(""),
});

const ModuleVersionSchema = z.object({
  version: z.string(),
  root: z
    .object({ providers: z.array(ProviderSchema).default([]) })
    .default({ providers: [] }),
  info: ModuleInfoSchema.optional(),
});

export const RegistryModuleSchema = z.object({
  source: z.string().default(""),
  versions: z.array(ModuleVersionSchema),
});

export const VersionsResponseSchema = z.object({
  modules: z.array(RegistryModuleSchema),
});

export type ModuleInfo = z.infer<typeof ModuleInfoSchema>;
export type ModuleVersion = z.infer<typeof ModuleVersionSchema>;
export type RegistryModule = z.infer<typeof RegistryModuleSchema>;
