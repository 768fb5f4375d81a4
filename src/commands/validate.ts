import fs from "node:fs";
import path from "node:path";
import { verifyManifestChecksums } from "../artifact-writer/manifest-builder.js";
import { errorMessage } from "../core/errors.js";
import { loadBuildPlan, projectPath, type BuildPlan } from "../pipeline/plan.js";
import { variantLabel } from "../pipeline/variant.js";
import { stageOrder } from "../pipeline/stages.js";
import { checkLockAgreement } from "../resolver/lock-check.js";
import { createRegistry, type SchemaName, type SchemaRegistry } from "../schema/registry.js";
import type { BuildManifest } from "../types/build-record.js";
import { diag, errorDiagnostic, type Diagnostic } from "./diagnostics.js";
import { EXIT, exitCodeFor, type ExitCode } from "./exit-codes.js";

export type ValidateOpts = {
  contextDir: string;
  configDir?: string;
  env?: string;
  processEnv?: NodeJS.ProcessEnv;
  /** Also check every record under builds_dir. */
  builds?: boolean;
  schemaDir?: string;
};

export type ValidateResult =
  | { ok: true; diagnostics: Diagnostic[] }
  | { ok: false; errors: Diagnostic[]; diagnostics: Diagnostic[]; exitCode: ExitCode };

/** Records a build directory may hold, with the schema each conforms to. */
const RECORD_SCHEMAS: [file: string, schema: SchemaName][] = [
  ["state.json", "build-state"],
  ["manifest.json", "build-manifest"],
  ["image.json", "image"],
  ["docker-image.json", "docker-image"],
];

function isWithinDir(rootDir: string, candidatePath: string): boolean {
  const rel = path.relative(rootDir, candidatePath);
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

function readJson(filePath: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(fs.readFileSync(filePath, "utf8")) };
  } catch (e) {
    return { ok: false, error: errorMessage(e) };
  }
}

/**
 * Check config, manifests, variant selection and the stage graph without building.
 * With `builds`, also check each build record against its schema and the manifest checksums.
 */
export async function validateProject(opts: ValidateOpts): Promise<ValidateResult> {
  const diagnostics: Diagnostic[] = [];

  let plan: BuildPlan;
  try {
    plan = await loadBuildPlan(opts);
  } catch (e) {
    const error = errorDiagnostic(e, "CONFIG_READ_FAILED");
    return { ok: false, errors: [error], diagnostics: [error], exitCode: exitCodeFor(e) };
  }

  const { manifests, variant, config } = plan;
  diagnostics.push(
    diag("info", "VARIANT_SELECTED", `${config.ml_runtime.package} via ${variantLabel(variant)}`),
    diag("info", "STAGES", `stages: ${stageOrder(plan.pipeline).join(" -> ")}`),
  );

  if (!manifests.lock) {
    diagnostics.push(diag("warn", "LOCK_MISSING", `No ${config.builder.lock}; dependency versions will float`));
  } else {
    try {
      checkLockAgreement(manifests.manifest, manifests.lock, variant, config.builder.include_dev);
    } catch (e) {
      const error = errorDiagnostic(e);
      return { ok: false, errors: [error], diagnostics: [...diagnostics, error], exitCode: exitCodeFor(e) };
    }
  }
  if (!config.builder.verify.enabled) {
    diagnostics.push(diag("warn", "VERIFY_DISABLED", "ML runtime verification is disabled"));
  } else if (!config.builder.verify.strict) {
    diagnostics.push(diag("warn", "VERIFY_LENIENT", "ML runtime verification only warns on an accelerator backend"));
  }

  if (opts.builds) {
    const registry = await createRegistry(opts.schemaDir);
    diagnostics.push(...(await validateBuilds(projectPath(plan, config.builds_dir), registry)));
  }

  const errors = diagnostics.filter((d) => d.level === "error");
  if (errors.length > 0) return { ok: false, errors, diagnostics, exitCode: EXIT.BUILD_FAILED };
  return { ok: true, diagnostics };
}

async function validateBuilds(buildsDir: string, registry: SchemaRegistry): Promise<Diagnostic[]> {
  if (!fs.existsSync(buildsDir)) {
    return [diag("info", "NO_BUILDS", `No builds directory: ${buildsDir}`, { path: buildsDir })];
  }

  const out: Diagnostic[] = [];
  for (const entry of fs.readdirSync(buildsDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    out.push(...(await validateBuild(path.join(buildsDir, entry.name), registry)));
  }
  return out;
}

async function validateBuild(buildDir: string, registry: SchemaRegistry): Promise<Diagnostic[]> {
  const out: Diagnostic[] = [];
  const id = path.basename(buildDir);
  let manifest: BuildManifest | null = null;

  for (const [file, schema] of RECORD_SCHEMAS) {
    const filePath = path.join(buildDir, file);
    if (!fs.existsSync(filePath)) {
      if (file === "state.json" || file === "manifest.json") {
        out.push(diag("error", "RECORD_MISSING", `${id}: missing ${file}`, { path: filePath }));
      }
      continue;
    }

    const parsed = readJson(filePath);
    if (!parsed.ok) {
      out.push(diag("error", "RECORD_JSON_INVALID", `${id}: invalid JSON in ${file}: ${parsed.error}`, { path: filePath }));
      continue;
    }

    const validate = await registry.getValidator(schema);
    if (!validate(parsed.value)) {
      out.push(
        diag("error", "RECORD_INVALID", `${id}: ${file} does not match ${schema}: ${registry.errorsText(validate.errors)}`, {
          path: filePath,
        }),
      );
    }
  }

  const manifestPath = path.join(buildDir, "manifest.json");
  if (out.length === 0 && fs.existsSync(manifestPath)) {
    const isManifest = await registry.getValidator("build-manifest");
    const parsed = readJson(manifestPath);
    if (parsed.ok && isManifest(parsed.value)) manifest = parsed.value;
  }

  if (!manifest) return out;

  for (const artifact of manifest.artifacts) {
    if (!isWithinDir(buildDir, path.resolve(buildDir, artifact.path))) {
      out.push(diag("error", "RECORD_PATH_ESCAPES_DIR", `${id}: manifest path escapes build dir: ${artifact.path}`));
    }
  }
  for (const m of verifyManifestChecksums(buildDir, manifest.artifacts)) {
    out.push(
      m.actual === null
        ? diag("error", "RECORD_FILE_MISSING", `${id}: missing artifact ${m.path}`, { path: m.path })
        : diag("error", "RECORD_SHA256_MISMATCH", `${id}: sha256 mismatch for ${m.path}`, {
            path: m.path,
            details: { expected: m.expected, actual: m.actual },
          }),
    );
  }
  if (out.length === 0) out.push(diag("info", "BUILD_RECORDS_OK", `${id}: records valid`));
  return out;
}
