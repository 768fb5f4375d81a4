import fs from "node:fs";
import { normalizePackageName } from "../manifest/pyproject.js";
import { ConfigError } from "../core/errors.js";
import type { SchemaRegistry } from "../schema/registry.js";

export type IndexRelease = {
  version: string;
  accelerator?: boolean;
  native?: boolean;
};

export type IndexSource = {
  name: string;
  url: string;
  default?: boolean;
  packages: Record<string, IndexRelease[]>;
};

export type PackageIndexData = {
  sources: IndexSource[];
};

/**
 * Snapshot of the package sources a resolver may draw from.
 * Package names are looked up PEP 503-normalized.
 */
export class PackageIndex {
  private readonly sources: IndexSource[];

  constructor(data: PackageIndexData) {
    this.sources = data.sources.map((s) => ({
      ...s,
      url: stripSlash(s.url),
      packages: Object.fromEntries(Object.entries(s.packages).map(([name, rels]) => [normalizePackageName(name), rels])),
    }));
  }

  sourceByName(name: string): IndexSource | undefined {
    return this.sources.find((s) => s.name === name);
  }

  sourceByUrl(url: string): IndexSource | undefined {
    const wanted = stripSlash(url);
    return this.sources.find((s) => s.url === wanted);
  }

  /** The source packages come from when the manifest does not route them elsewhere. */
  defaultSource(): IndexSource | undefined {
    return this.sources.find((s) => s.default === true) ?? this.sources[0];
  }

  releases(source: IndexSource, packageName: string): IndexRelease[] {
    return source.packages[normalizePackageName(packageName)] ?? [];
  }
}

function stripSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/** Read a package index snapshot, validated against the package-index schema. */
export async function loadPackageIndex(filePath: string, registry: SchemaRegistry): Promise<PackageIndex> {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Package index not found: ${filePath}`, { path: filePath });
  }
  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  const validate = await registry.getValidator("package-index");
  if (!validate(data)) {
    throw new ConfigError(`Package index invalid (${filePath}): ${registry.errorsText(validate.errors)}`, { path: filePath });
  }
  return new PackageIndex(data);
}
