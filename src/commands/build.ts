import path from "node:path";
import { ArtifactWriter } from "../artifact-writer/writer.js";
import { generateBuildId } from "../core/build-id.js";
import { ConfigError } from "../core/errors.js";
import { BuildOrchestrator, type EngineKind, type StepOutcome, type StepRunner } from "../core/orchestrator.js";
import { getStepTimeout, type BuildStep } from "../core/state-machine.js";
import { DockerEngine, checkImageContract, type ExecFn } from "../engine/docker-engine.js";
import { DiskLayerCache, type LayerCache } from "../engine/layer-cache.js";
import { LocalEngine, type LocalBuildSession } from "../engine/local-engine.js";
import { createComponentLogger, type Logger } from "../logging/logger.js";
import { dependencyCacheKey } from "../manifest/pyproject.js";
import { loadBuildPlan, projectPath, type BuildPlan } from "../pipeline/plan.js";
import { variantLabel } from "../pipeline/variant.js";
import { IndexResolver } from "../resolver/index-resolver.js";
import { loadPackageIndex } from "../resolver/package-index.js";
import type { Resolver } from "../resolver/resolver.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import { diag, errorDiagnostic, warningDiagnostic, type Diagnostic } from "./diagnostics.js";
import { exitCodeFor, exitCodeForError, type ExitCode } from "./exit-codes.js";

export type BuildOpts = {
  contextDir: string;
  configDir?: string;
  env?: string;
  engine?: EngineKind;
  /** Package index snapshot for the local engine; defaults to builder.index_file. */
  indexFile?: string;
  processEnv?: NodeJS.ProcessEnv;
  resolver?: Resolver;
  cache?: LayerCache;
  exec?: ExecFn;
  registry?: SchemaRegistry;
  logger?: Logger;
};

export type BuildCommandResult =
  | {
      ok: true;
      buildId: string;
      buildDir: string;
      imageId: string;
      diagnostics: Diagnostic[];
    }
  | {
      ok: false;
      buildId?: string;
      buildDir?: string;
      error: Diagnostic;
      diagnostics: Diagnostic[];
      exitCode: ExitCode;
    };

type Steps = Record<"base" | "builder" | "verify" | "runtime" | "export", () => Promise<StepOutcome>>;

/**
 * Build the project in `contextDir`: plan, then drive the engine through the build steps
 * and write the build records (state.json, image record, manifest.json).
 */
export async function build(opts: BuildOpts): Promise<BuildCommandResult> {
  const log = createComponentLogger("build", opts.logger);
  const engineKind = opts.engine ?? "local";

  let plan: BuildPlan;
  let registry: SchemaRegistry;
  let resolver: Resolver | null = null;
  try {
    plan = await loadBuildPlan(opts);
    registry = opts.registry ?? (await createRegistry());
    if (engineKind === "local") resolver = opts.resolver ?? (await indexResolver(plan, opts.indexFile, registry));
  } catch (e) {
    return { ok: false, error: errorDiagnostic(e, "INVALID_ARGS"), diagnostics: [], exitCode: exitCodeFor(e) };
  }

  const { config, manifests } = plan;
  const buildsDir = projectPath(plan, config.builds_dir);
  const depKey = dependencyCacheKey(manifests.manifestBytes, manifests.lockBytes);
  const buildId = generateBuildId(config.project, depKey, buildsDir);
  const writer = new ArtifactWriter(buildsDir, buildId);
  writer.init();

  log.info({ buildId, engine: engineKind, variant: variantLabel(plan.variant) }, "build started");

  let steps: Steps;
  if (resolver !== null) {
    const cache = opts.cache ?? new DiskLayerCache(projectPath(plan, config.cache_dir));
    steps = localSteps(plan, writer, new LocalEngine({ resolver, cache, logger: opts.logger }));
  } else {
    steps = dockerSteps(plan, writer, buildId, new DockerEngine({ exec: opts.exec, logger: opts.logger }));
  }

  const stepRunner: StepRunner = (step) => steps[step]();
  const orchestrator = new BuildOrchestrator(
    buildsDir,
    { verify: config.builder.verify.enabled, timeouts: config.timeouts },
    stepRunner,
    opts.logger,
  );
  const result = await orchestrator.run({ buildId, project: config.project, engine: engineKind, dependencyCacheKey: depKey });

  writer.track("state.json", "build-state", "orchestrator");
  writer.writeManifest({ status: result.final_status, engine: engineKind, schema_versions: registry.versions() });

  const diagnostics: Diagnostic[] = [];
  if (!manifests.lock) {
    diagnostics.push(diag("warn", "LOCK_MISSING", `No ${config.builder.lock}; dependency versions float within manifest constraints`));
  }
  for (const record of Object.values(result.step_results)) {
    for (const w of record.warnings ?? []) {
      const d = warningDiagnostic(w);
      if (d.code !== "LOCK_MISSING") diagnostics.push(d);
    }
  }

  const buildDir = writer.getBuildDir();
  if (!result.success) {
    const error = result.error ?? { code: "BUILD_FAILED", message: `Build ended in ${result.final_status}` };
    return {
      ok: false,
      buildId,
      buildDir,
      error: diag("error", error.code, `${result.final_status}: ${error.message}`),
      diagnostics,
      exitCode: exitCodeForError(error.code),
    };
  }

  const exported = result.step_results.export?.outputs?.image_id;
  return { ok: true, buildId, buildDir, imageId: typeof exported === "string" ? exported : "", diagnostics };
}

async function indexResolver(plan: BuildPlan, indexFile: string | undefined, registry: SchemaRegistry): Promise<Resolver> {
  const file = indexFile ?? plan.config.builder.index_file;
  if (!file) {
    throw new ConfigError("The local engine needs a package index snapshot (--index or builder.index_file)");
  }
  return new IndexResolver(await loadPackageIndex(path.resolve(plan.contextDir, file), registry));
}

function localSteps(plan: BuildPlan, writer: ArtifactWriter, engine: LocalEngine): Steps {
  const session: LocalBuildSession = engine.session(plan.pipeline, plan.contextDir, plan.manifests);

  const tracked = async (work: () => Promise<Record<string, unknown>>): Promise<StepOutcome> => {
    const before = session.getWarnings().length;
    const outputs = await work();
    const warnings = session.getWarnings().slice(before);
    return { outputs, ...(warnings.length ? { warnings } : {}) };
  };

  return {
    base: () => tracked(async () => {
      await session.runStage("base");
      return {};
    }),
    builder: () => tracked(async () => {
      await session.runStage("builder", (op) => op.kind !== "verify-ml-runtime");
      return { ...session.getStats() };
    }),
    verify: () => tracked(async () => {
      await session.runStage("builder");
      return {};
    }),
    runtime: () => tracked(async () => {
      await session.runStage("runtime");
      session.checkClosure(plan.closure);
      return { ...session.getStats() };
    }),
    export: () => tracked(async () => {
      const image = session.image();
      writer.writeArtifact({ relativePath: "image.json", content: image, schema: "image", producedBy: "local-engine" });
      return { image_id: image.id, ...(image.ml_runtime ? { ml_runtime: image.ml_runtime } : {}) };
    }),
  };
}

function dockerSteps(plan: BuildPlan, writer: ArtifactWriter, buildId: string, engine: DockerEngine): Steps {
  const buildDir = writer.getBuildDir();
  const dockerfile = path.join(buildDir, "Dockerfile");
  const tag = `${plan.config.project}:${buildId}`;
  // Docker children share their step's timeout.
  const timeoutMs = (step: BuildStep) => getStepTimeout(step, { timeouts: plan.config.timeouts }) * 1000;

  return {
    base: async () => {
      engine.render(plan.pipeline, buildDir);
      writer.track("Dockerfile", "dockerfile", "docker-engine");
      return { outputs: { dockerfile } };
    },
    builder: async () => {
      await engine.buildTarget("builder", {
        dockerfile,
        contextDir: plan.contextDir,
        tag: `${tag}-builder`,
        timeoutMs: timeoutMs("builder"),
      });
      return {};
    },
    // The verification RUN is part of the builder target.
    verify: async () => ({ outputs: { verified_in: "builder" } }),
    runtime: async () => {
      await engine.buildTarget(plan.pipeline.target, {
        dockerfile,
        contextDir: plan.contextDir,
        tag,
        timeoutMs: timeoutMs("runtime"),
      });
      return { outputs: { tag } };
    },
    export: async () => {
      const image = await engine.inspect(tag, plan.contextDir, timeoutMs("export"));
      checkImageContract(image, plan.pipeline);
      writer.writeArtifact({
        relativePath: "docker-image.json",
        content: { tag, ...image },
        schema: "docker-image",
        producedBy: "docker-engine",
      });
      return { outputs: { image_id: image.id, tag } };
    },
  };
}
