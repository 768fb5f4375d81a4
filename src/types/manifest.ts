/** Dependency manifest + lock file model (Poetry pyproject.toml / poetry.lock). */
export type DependencySpec = {
  name: string;
  constraint: string;
  source: string | null;
  group: string;
  optional: boolean;
};

export type PackageSource = {
  name: string;
  url: string;
  priority: string;
};

export type DependencyManifest = {
  name: string;
  version: string;
  pythonConstraint: string | null;
  dependencies: DependencySpec[];
  sources: PackageSource[];
};

export type LockedPackage = {
  name: string;
  version: string;
  groups: string[];
  source: { reference: string; url: string } | null;
};

export type LockFile = {
  lockVersion: string;
  contentHash: string | null;
  packages: LockedPackage[];
};

export type InstalledPackage = {
  name: string;
  version: string;
  source: string;
  accelerator: boolean;
  native: boolean;
};

/** Files produced by installing a manifest into a fixed prefix. */
export type InstalledTree = {
  prefix: string;
  floating: boolean;
  packages: InstalledPackage[];
};
