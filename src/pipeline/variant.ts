import { VariantAmbiguityError, VariantSelectionError } from "../core/errors.js";
import { normalizePackageName } from "../manifest/pyproject.js";
import type { VariantSelectionConfig } from "../types/config.js";
import type { DependencyManifest, PackageSource } from "../types/manifest.js";

export const DEFAULT_INDEX_URL = "https://pypi.org/simple";
const EXPORTED_REQUIREMENTS = "/tmp/requirements.txt";

/** The one mechanism that selects the CPU-only build of the ML runtime for this build. */
export type ResolvedVariant =
  | { mechanism: "source"; packageName: string; source: PackageSource }
  | { mechanism: "index-url"; packageName: string; indexUrl: string };

/**
 * Check the configured mechanism against the manifest.
 *
 * A manifest that routes the ML package to a named source while the config asks for an
 * index-url flag has two mechanisms at once; that is an error, never a fallback.
 */
export function selectVariant(
  manifest: DependencyManifest,
  selection: VariantSelectionConfig,
  mlPackage: string,
): ResolvedVariant {
  const packageName = normalizePackageName(mlPackage);
  const dep = manifest.dependencies.find((d) => d.name === packageName && d.group === "main");
  if (!dep) {
    throw new VariantSelectionError(`ML runtime package "${packageName}" is not a main dependency of the manifest`, {
      package: packageName,
    });
  }

  if (selection.mechanism === "source") {
    const source = manifest.sources.find((s) => s.name === selection.source);
    if (!source) {
      throw new VariantSelectionError(`Package source "${selection.source}" is not declared in the manifest`, {
        source: selection.source,
      });
    }
    if (dep.source !== selection.source) {
      throw new VariantSelectionError(
        `"${packageName}" must be routed to source "${selection.source}" (manifest routes it to ${dep.source ? `"${dep.source}"` : "the default index"})`,
        { package: packageName, expected: selection.source, actual: dep.source },
      );
    }
    return { mechanism: "source", packageName, source };
  }

  if (dep.source !== null) {
    throw new VariantAmbiguityError(
      `"${packageName}" is routed to source "${dep.source}" and the build also selects index ${selection.index_url}; pick one mechanism`,
      { package: packageName, source: dep.source, indexUrl: selection.index_url },
    );
  }
  return { mechanism: "index-url", packageName, indexUrl: selection.index_url };
}

/** Short, stable label used in logs and layer descriptions. */
export function variantLabel(variant: ResolvedVariant): string {
  return variant.mechanism === "source" ? `source:${variant.source.name}` : `index-url:${variant.indexUrl}`;
}

export type InstallOptions = {
  includeDev: boolean;
  cachePaths: string[];
};

/**
 * Argument vectors of the dependency-install layer, run in order within one layer.
 * The trailing purge keeps package-manager caches out of the layer.
 */
export function installCommands(variant: ResolvedVariant, opts: InstallOptions): string[][] {
  const groupArgs = opts.includeDev ? ["--with", "dev"] : ["--only", "main"];
  const commands: string[][] = [];
  const purge = [...opts.cachePaths];

  if (variant.mechanism === "source") {
    commands.push(["poetry", "install", "--no-root", ...groupArgs]);
  } else {
    commands.push(["poetry", "export", ...groupArgs, "--without-hashes", "-f", "requirements.txt", "-o", EXPORTED_REQUIREMENTS]);
    commands.push([
      "pip",
      "install",
      "--no-cache-dir",
      "--index-url",
      variant.indexUrl,
      "--extra-index-url",
      DEFAULT_INDEX_URL,
      "-r",
      EXPORTED_REQUIREMENTS,
    ]);
    purge.push(EXPORTED_REQUIREMENTS);
  }

  if (purge.length > 0) commands.push(["rm", "-rf", ...purge]);
  return commands;
}
