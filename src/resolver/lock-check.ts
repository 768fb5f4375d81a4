import { ResolutionError } from "../core/errors.js";
import { satisfiesConstraint } from "../manifest/constraints.js";
import type { ResolvedVariant } from "../pipeline/variant.js";
import type { DependencyManifest, DependencySpec, LockFile } from "../types/manifest.js";

export function selectedGroups(includeDev: boolean): Set<string> {
  return new Set(includeDev ? ["main", "dev"] : ["main"]);
}

/** Non-optional direct dependencies in the installed groups. */
export function directDependencies(manifest: DependencyManifest, includeDev: boolean): DependencySpec[] {
  const groups = selectedGroups(includeDev);
  return manifest.dependencies.filter((d) => groups.has(d.group) && !d.optional);
}

/**
 * The lock must cover every direct dependency, within its constraint, and must pin the
 * ML package to the selected source. Any disagreement is fatal: the lock is regenerated,
 * never silently overridden.
 */
export function checkLockAgreement(
  manifest: DependencyManifest,
  lock: LockFile,
  variant: ResolvedVariant,
  includeDev: boolean,
): void {
  const locked = new Map(lock.packages.map((p) => [p.name, p]));

  for (const dep of directDependencies(manifest, includeDev)) {
    const entry = locked.get(dep.name);
    if (!entry) {
      throw new ResolutionError(
        `${dep.name} is in the manifest but not in the lock file; the lock file is out of date`,
        { package: dep.name },
        "LOCK_MISMATCH",
      );
    }
    if (!satisfiesConstraint(entry.version, dep.constraint)) {
      throw new ResolutionError(
        `Locked ${dep.name} ${entry.version} does not satisfy manifest constraint ${dep.constraint}`,
        { package: dep.name, locked: entry.version, constraint: dep.constraint },
        "LOCK_MISMATCH",
      );
    }
    if (dep.name === variant.packageName && variant.mechanism === "source" && entry.source?.reference !== variant.source.name) {
      throw new ResolutionError(
        `Locked ${dep.name} comes from ${entry.source ? `source "${entry.source.reference}"` : "the default index"}, expected "${variant.source.name}"`,
        { package: dep.name, locked: entry.source?.reference ?? null, expected: variant.source.name },
        "LOCK_MISMATCH",
      );
    }
  }
}
