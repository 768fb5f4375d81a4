import { ResolutionError } from "../core/errors.js";
import { pickHighest, splitLocal } from "../manifest/constraints.js";
import type { InstalledPackage, LockedPackage } from "../types/manifest.js";
import { checkLockAgreement, directDependencies, selectedGroups } from "./lock-check.js";
import type { IndexRelease, IndexSource, PackageIndex } from "./package-index.js";
import type { ResolveRequest, ResolveResult, Resolver } from "./resolver.js";

/**
 * Resolves a manifest against a package index snapshot.
 *
 * With a lock file the locked versions are installed exactly and any disagreement with
 * the manifest is fatal. Without one, each direct dependency floats to the highest
 * version its constraint allows.
 */
export class IndexResolver implements Resolver {
  readonly name = "index";

  constructor(private readonly index: PackageIndex) {}

  async resolve(request: ResolveRequest): Promise<ResolveResult> {
    try {
      const packages = request.lock ? this.fromLock(request) : this.floating(request);
      packages.sort((a, b) => a.name.localeCompare(b.name));
      return { ok: true, tree: { prefix: request.prefix, floating: request.lock === null, packages } };
    } catch (e) {
      if (e instanceof ResolutionError) return { ok: false, error: e };
      throw e;
    }
  }

  private sourceFor(name: string, routed: string | null, request: ResolveRequest): IndexSource {
    const { variant } = request;
    let source: IndexSource | undefined;
    let label: string;

    if (name === variant.packageName) {
      if (variant.mechanism === "source") {
        label = variant.source.name;
        source = this.index.sourceByName(variant.source.name);
      } else {
        label = variant.indexUrl;
        source = this.index.sourceByUrl(variant.indexUrl);
      }
    } else if (routed) {
      label = routed;
      source = this.index.sourceByName(routed);
    } else {
      label = "default";
      source = this.index.defaultSource();
    }

    if (!source) {
      throw new ResolutionError(`Package source "${label}" for ${name} is not reachable`, { package: name, source: label });
    }
    return source;
  }

  private findRelease(source: IndexSource, name: string, version: string, matchPublic: boolean): IndexRelease | undefined {
    const releases = this.index.releases(source, name);
    const exact = releases.find((r) => r.version === version);
    if (exact || !matchPublic) return exact;
    const wanted = splitLocal(version).public;
    return releases.find((r) => splitLocal(r.version).public === wanted);
  }

  private installed(name: string, release: IndexRelease, source: IndexSource): InstalledPackage {
    return {
      name,
      version: release.version,
      source: source.name,
      accelerator: release.accelerator ?? false,
      native: release.native ?? false,
    };
  }

  private fromLock(request: ResolveRequest): InstalledPackage[] {
    const lock = request.lock;
    if (!lock) return [];
    checkLockAgreement(request.manifest, lock, request.variant, request.includeDev);

    const groups = selectedGroups(request.includeDev);
    return lock.packages
      .filter((entry) => entry.groups.some((g) => groups.has(g)))
      .map((entry) => this.installLocked(entry, request));
  }

  private installLocked(entry: LockedPackage, request: ResolveRequest): InstalledPackage {
    const isMl = entry.name === request.variant.packageName;
    const source = this.sourceFor(entry.name, entry.source?.reference ?? null, request);
    // An index-url install matches on the public version: ==2.3.1 accepts 2.3.1+cpu.
    const release = this.findRelease(source, entry.name, entry.version, isMl && request.variant.mechanism === "index-url");
    if (!release) {
      throw new ResolutionError(`${entry.name} ${entry.version} is not available from source "${source.name}"`, {
        package: entry.name,
        version: entry.version,
        source: source.name,
      });
    }
    return this.installed(entry.name, release, source);
  }

  private floating(request: ResolveRequest): InstalledPackage[] {
    const result: InstalledPackage[] = [];
    for (const dep of directDependencies(request.manifest, request.includeDev)) {
      const source = this.sourceFor(dep.name, dep.source, request);
      const releases = this.index.releases(source, dep.name);
      const version = pickHighest(
        releases.map((r) => r.version),
        dep.constraint,
      );
      const release = releases.find((r) => r.version === version);
      if (!release) {
        throw new ResolutionError(`No version of ${dep.name} satisfies ${dep.constraint} in source "${source.name}"`, {
          package: dep.name,
          constraint: dep.constraint,
          source: source.name,
        });
      }
      result.push(this.installed(dep.name, release, source));
    }
    return result;
  }
}
