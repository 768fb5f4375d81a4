import type { ResolutionError } from "../core/errors.js";
import type { ResolvedVariant } from "../pipeline/variant.js";
import type { DependencyManifest, InstalledTree, LockFile } from "../types/manifest.js";

export type ResolveRequest = {
  manifest: DependencyManifest;
  lock: LockFile | null;
  variant: ResolvedVariant;
  includeDev: boolean;
  prefix: string;
};

export type ResolveResult = { ok: true; tree: InstalledTree } | { ok: false; error: ResolutionError };

/**
 * Narrow seam around the package manager: manifest + lock + variant in, installed tree
 * or a resolution error out. Engines only call it when the install layer misses the cache.
 */
export interface Resolver {
  readonly name: string;
  resolve(request: ResolveRequest): Promise<ResolveResult>;
}
