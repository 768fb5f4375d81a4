import path from "node:path";
import { ClosureViolationError, VariantAssertionError } from "../core/errors.js";
import { normalizePackageName } from "../manifest/pyproject.js";
import type { MlRuntimeReport } from "../types/image.js";
import { isUnder, type Snapshot } from "./filesystem.js";

const COMPILER_BINARIES = new Set(["gcc", "g++", "cc", "c++", "make", "ld", "clang"]);
const BIN_DIRS = ["/usr/bin", "/usr/local/bin", "/bin"];

export type ClosureRules = {
  packageManagerHome: string;
  cachePaths: string[];
};

export type ClosureViolation = { path: string; reason: string };

/** Everything in the runtime closure that belongs to the build toolchain. */
export function findClosureViolations(snapshot: Snapshot, rules: ClosureRules): ClosureViolation[] {
  const violations: ClosureViolation[] = [];
  for (const [filePath, entry] of Object.entries(snapshot)) {
    if (entry.origin.startsWith("system-packages:toolchain:")) {
      violations.push({ path: filePath, reason: `toolchain file (${entry.origin.split(":")[2]})` });
    } else if (COMPILER_BINARIES.has(path.posix.basename(filePath)) && BIN_DIRS.includes(path.posix.dirname(filePath))) {
      violations.push({ path: filePath, reason: "compiler binary" });
    } else if (entry.origin === "package-manager" || isUnder(filePath, rules.packageManagerHome)) {
      violations.push({ path: filePath, reason: "package manager residue" });
    } else if (rules.cachePaths.some((c) => isUnder(filePath, c))) {
      violations.push({ path: filePath, reason: "package manager cache" });
    }
  }
  return violations.sort((a, b) => a.path.localeCompare(b.path));
}

export function checkRuntimeClosure(snapshot: Snapshot, rules: ClosureRules): void {
  const violations = findClosureViolations(snapshot, rules);
  if (violations.length > 0) {
    const sample = violations.slice(0, 5).map((v) => `${v.path} (${v.reason})`).join(", ");
    throw new ClosureViolationError(`Runtime image contains build-only files: ${sample}`, { violations });
  }
}

/**
 * "Import" the ML runtime from the installed tree: both its package directory and its
 * dist-info metadata must be present. Returns version and accelerator flag.
 */
export function inspectMlRuntime(snapshot: Snapshot, packageName: string, importName: string): MlRuntimeReport {
  const distPrefix = `${normalizePackageName(packageName).replace(/-/g, "_")}-`;
  let report: MlRuntimeReport | null = null;
  let importable = false;

  for (const [filePath, entry] of Object.entries(snapshot)) {
    const parts = filePath.split("/");
    const siteIdx = parts.indexOf("site-packages");
    if (siteIdx === -1) continue;
    const top = parts[siteIdx + 1] ?? "";

    if (top === importName && parts[siteIdx + 2] === "__init__.py") importable = true;
    if (top.startsWith(distPrefix) && top.endsWith(".dist-info") && parts[siteIdx + 2] === "METADATA" && entry.meta) {
      report = {
        package: entry.meta.name ?? packageName,
        version: entry.meta.version ?? "unknown",
        accelerator: entry.meta.accelerator === "true",
      };
    }
  }

  if (!importable || !report) {
    throw new VariantAssertionError(`Cannot import ${importName}: ${packageName} is not installed`, { package: packageName });
  }
  return report;
}
