import fs from "node:fs";
import path from "node:path";
import { parse } from "smol-toml";
import { computeSha256FromContent } from "../artifact-writer/checksum.js";
import { ManifestError, errorMessage } from "../core/errors.js";
import type { DependencyManifest, DependencySpec, LockFile, LockedPackage, PackageSource } from "../types/manifest.js";

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return value !== null && typeof value === "object" && !Array.isArray(value) && !(value instanceof Date);
}

function table(parent: Table, key: string): Table | null {
  const value = parent[key];
  return isTable(value) ? value : null;
}

function str(parent: Table, key: string): string | null {
  const value = parent[key];
  return typeof value === "string" ? value : null;
}

function parseToml(text: string, file: string): Table {
  try {
    return parse(text);
  } catch (e) {
    throw new ManifestError(`Invalid TOML in ${file}: ${errorMessage(e)}`, { file });
  }
}

/** PEP 503 name normalization: "Typing_Extensions" → "typing-extensions". */
export function normalizePackageName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, "-");
}

function parseDependencyTable(deps: Table, group: string): DependencySpec[] {
  const result: DependencySpec[] = [];
  for (const [name, value] of Object.entries(deps)) {
    if (group === "main" && name.toLowerCase() === "python") continue;

    if (typeof value === "string") {
      result.push({ name: normalizePackageName(name), constraint: value, source: null, group, optional: false });
      continue;
    }
    if (isTable(value)) {
      const constraint = str(value, "version");
      if (constraint === null) {
        throw new ManifestError(`Dependency "${name}" has no version constraint`, { dependency: name });
      }
      result.push({
        name: normalizePackageName(name),
        constraint,
        source: str(value, "source"),
        group,
        optional: value.optional === true,
      });
      continue;
    }
    throw new ManifestError(`Unsupported dependency declaration for "${name}"`, { dependency: name });
  }
  return result;
}

/** Parse a Poetry pyproject.toml into a DependencyManifest. */
export function parseManifest(text: string): DependencyManifest {
  const doc = parseToml(text, "pyproject.toml");
  const poetry = table(table(doc, "tool") ?? {}, "poetry");
  if (!poetry) {
    throw new ManifestError("pyproject.toml has no [tool.poetry] table");
  }

  const mainDeps = table(poetry, "dependencies") ?? {};
  const dependencies = parseDependencyTable(mainDeps, "main");

  // Legacy [tool.poetry.dev-dependencies] maps onto the "dev" group.
  const legacyDev = table(poetry, "dev-dependencies");
  if (legacyDev) dependencies.push(...parseDependencyTable(legacyDev, "dev"));

  for (const [group, def] of Object.entries(table(poetry, "group") ?? {})) {
    if (!isTable(def)) continue;
    dependencies.push(...parseDependencyTable(table(def, "dependencies") ?? {}, group));
  }

  const rawSources = poetry.source;
  const sources: PackageSource[] = [];
  if (Array.isArray(rawSources)) {
    for (const entry of rawSources) {
      if (!isTable(entry)) continue;
      const name = str(entry, "name");
      const url = str(entry, "url");
      if (!name || !url) {
        throw new ManifestError("Every [[tool.poetry.source]] needs a name and a url");
      }
      sources.push({ name, url, priority: str(entry, "priority") ?? "primary" });
    }
  }

  const pythonDep = mainDeps.python;
  return {
    name: str(poetry, "name") ?? "",
    version: str(poetry, "version") ?? "0.0.0",
    pythonConstraint: typeof pythonDep === "string" ? pythonDep : null,
    dependencies,
    sources,
  };
}

/** Parse a poetry.lock file. Packages without `groups` belong to "main". */
export function parseLockFile(text: string): LockFile {
  const doc = parseToml(text, "poetry.lock");
  const packages: LockedPackage[] = [];
  const rawPackages = doc.package;

  if (Array.isArray(rawPackages)) {
    for (const entry of rawPackages) {
      if (!isTable(entry)) continue;
      const name = str(entry, "name");
      const version = str(entry, "version");
      if (!name || !version) {
        throw new ManifestError("Lock entry without name or version");
      }
      const groups = Array.isArray(entry.groups)
        ? entry.groups.filter((g): g is string => typeof g === "string")
        : ["main"];
      const src = table(entry, "source");
      const reference = src ? str(src, "reference") : null;
      packages.push({
        name: normalizePackageName(name),
        version,
        groups,
        source: src && reference ? { reference, url: str(src, "url") ?? "" } : null,
      });
    }
  }

  const metadata = table(doc, "metadata") ?? {};
  return {
    lockVersion: str(metadata, "lock-version") ?? "2.0",
    contentHash: str(metadata, "content-hash"),
    packages,
  };
}

export type ProjectManifests = {
  manifest: DependencyManifest;
  lock: LockFile | null;
  manifestBytes: Buffer;
  lockBytes: Buffer | null;
};

/** Read and parse the manifest (required) and lock file (optional) from a build context. */
export function loadProjectManifests(contextDir: string, names: { manifest: string; lock: string }): ProjectManifests {
  const manifestPath = path.join(contextDir, names.manifest);
  if (!fs.existsSync(manifestPath)) {
    throw new ManifestError(`Dependency manifest not found: ${manifestPath}`, { path: manifestPath });
  }
  const manifestBytes = fs.readFileSync(manifestPath);
  const manifest = parseManifest(manifestBytes.toString("utf8"));

  const lockPath = path.join(contextDir, names.lock);
  if (!fs.existsSync(lockPath)) {
    return { manifest, lock: null, manifestBytes, lockBytes: null };
  }
  const lockBytes = fs.readFileSync(lockPath);
  return { manifest, lock: parseLockFile(lockBytes.toString("utf8")), manifestBytes, lockBytes };
}

/**
 * Key of the dependency-install layer: depends on manifest and lock bytes only,
 * never on application source.
 */
export function dependencyCacheKey(manifestBytes: Buffer | string, lockBytes: Buffer | string | null): string {
  const manifestHash = computeSha256FromContent(manifestBytes);
  const lockHash = lockBytes === null ? "no-lock" : computeSha256FromContent(lockBytes);
  return computeSha256FromContent(`${manifestHash}\n${lockHash}`);
}
