import { StageGraphError } from "../core/errors.js";
import { normalizePackageName } from "../manifest/pyproject.js";
import type { SlimstageConfig } from "../types/config.js";
import type { ImageMetadata } from "../types/image.js";
import type { BaseEnvironment } from "./base-env.js";
import { entrypointCommand, healthcheckSpec, CONTRACT } from "./contract.js";
import { installCommands, variantLabel, type ResolvedVariant } from "./variant.js";

export type ContextSource = { path: string; optional: boolean };

/** One build operation; each op produces exactly one layer. */
export type LayerOp =
  | { kind: "env"; vars: Readonly<Record<string, string>> }
  | { kind: "workdir"; path: string }
  | { kind: "system-packages"; purpose: "toolchain" | "probe"; packages: string[] }
  | { kind: "package-manager"; name: "poetry"; version: string; home: string }
  | {
      kind: "copy-context";
      purpose: "dependency-manifests" | "app-source";
      sources: ContextSource[];
      dest: string;
      ignore: string[];
    }
  | {
      kind: "install-dependencies";
      variant: ResolvedVariant;
      includeDev: boolean;
      prefix: string;
      commands: string[][];
      cachePaths: string[];
      /** Top-level module of a package whose import name differs from its distribution name. */
      importNames: Readonly<Record<string, string>>;
    }
  | { kind: "verify-ml-runtime"; package: string; importName: string; strict: boolean }
  | { kind: "copy-from-stage"; from: string; path: string };

export type Stage = Readonly<{
  name: string;
  /** Parent stage, or null when the stage starts from an external image. */
  parent: string | null;
  from: string;
  ops: readonly LayerOp[];
}>;

export type Pipeline = Readonly<{
  base: BaseEnvironment;
  stages: readonly Stage[];
  target: string;
  metadata: ImageMetadata;
}>;

export type PipelineOptions = Pick<SlimstageConfig, "builder" | "ml_runtime" | "runtime" | "entrypoint">;

function freezeStage(stage: Stage): Stage {
  return Object.freeze({ ...stage, ops: Object.freeze([...stage.ops]) });
}

/**
 * The single parameterized pipeline: base → builder, base → runtime, and runtime
 * importing the builder's install prefix. The variant mechanism is the parameter that
 * used to be duplicated across two recipes.
 */
/** The package manager's own venv, under its home. */
export function packageManagerVenv(home: string): string {
  return `${home}/venv`;
}

export function definePipeline(options: PipelineOptions, base: BaseEnvironment, variant: ResolvedVariant): Pipeline {
  const { builder, runtime, ml_runtime: ml } = options;

  const baseStage: Stage = {
    name: "base",
    parent: null,
    from: base.image,
    ops: [
      { kind: "env", vars: base.env },
      { kind: "workdir", path: base.workdir },
    ],
  };

  const builderOps: LayerOp[] = [
    { kind: "system-packages", purpose: "toolchain", packages: [...builder.toolchain] },
    {
      kind: "package-manager",
      name: builder.package_manager.name,
      version: builder.package_manager.version,
      home: builder.package_manager.home,
    },
    // Manifests land before any application source so the install layer's key
    // depends on them alone.
    {
      kind: "copy-context",
      purpose: "dependency-manifests",
      sources: [
        { path: builder.manifest, optional: false },
        { path: builder.lock, optional: true },
      ],
      dest: base.workdir,
      ignore: [],
    },
    {
      kind: "install-dependencies",
      variant,
      includeDev: builder.include_dev,
      prefix: builder.install_prefix,
      commands: installCommands(variant, { includeDev: builder.include_dev, cachePaths: builder.cache_paths }),
      cachePaths: [...builder.cache_paths],
      importNames: { [normalizePackageName(ml.package)]: ml.import_name },
    },
  ];
  if (builder.verify.enabled) {
    builderOps.push({ kind: "verify-ml-runtime", package: ml.package, importName: ml.import_name, strict: builder.verify.strict });
  }

  const runtimeStage: Stage = {
    name: "runtime",
    parent: "base",
    from: "base",
    ops: [
      { kind: "system-packages", purpose: "probe", packages: [...runtime.probe_packages] },
      { kind: "copy-from-stage", from: "builder", path: builder.install_prefix },
      {
        kind: "copy-context",
        purpose: "app-source",
        sources: [{ path: runtime.app_source, optional: false }],
        dest: runtime.app_dest,
        ignore: [...runtime.ignore],
      },
    ],
  };

  const pipeline: Pipeline = {
    base,
    stages: [
      freezeStage(baseStage),
      freezeStage({ name: "builder", parent: "base", from: "base", ops: builderOps }),
      freezeStage(runtimeStage),
    ],
    target: "runtime",
    metadata: {
      exposedPorts: [CONTRACT.port],
      healthcheck: healthcheckSpec(),
      command: entrypointCommand(options.entrypoint.app),
      env: { ...base.env },
      workdir: base.workdir,
    },
  };

  validateStageGraph(pipeline);
  return Object.freeze(pipeline);
}

/** Stages this stage copies artifacts from (cross edges, not parents). */
export function stageImports(stage: Stage): string[] {
  const imports: string[] = [];
  for (const op of stage.ops) {
    if (op.kind === "copy-from-stage" && !imports.includes(op.from)) imports.push(op.from);
  }
  return imports;
}

function dependenciesOf(stage: Stage): string[] {
  return stage.parent === null ? stageImports(stage) : [stage.parent, ...stageImports(stage)];
}

export function getStage(pipeline: Pipeline, name: string): Stage {
  const stage = pipeline.stages.find((s) => s.name === name);
  if (!stage) throw new StageGraphError(`Unknown stage: ${name}`, { stage: name });
  return stage;
}

/** Every edge must point at a declared stage and the graph must be acyclic. */
export function validateStageGraph(pipeline: Pipeline): void {
  const names = new Set<string>();
  for (const stage of pipeline.stages) {
    if (names.has(stage.name)) throw new StageGraphError(`Duplicate stage name: ${stage.name}`, { stage: stage.name });
    names.add(stage.name);
  }

  for (const stage of pipeline.stages) {
    for (const dep of dependenciesOf(stage)) {
      if (!names.has(dep)) {
        throw new StageGraphError(`Stage "${stage.name}" depends on unknown stage "${dep}"`, { stage: stage.name, dependency: dep });
      }
      if (dep === stage.name) {
        throw new StageGraphError(`Stage "${stage.name}" depends on itself`, { stage: stage.name });
      }
    }
  }

  if (!names.has(pipeline.target)) {
    throw new StageGraphError(`Target stage "${pipeline.target}" is not declared`, { target: pipeline.target });
  }

  stageOrder(pipeline);
}

/** Topological order; among ready stages the declaration order wins. */
export function stageOrder(pipeline: Pipeline): string[] {
  return buildLevels(pipeline).flat();
}

/**
 * Waves of stages whose dependencies are all in earlier waves. Stages in one wave may be
 * built concurrently by an engine that supports it.
 */
export function buildLevels(pipeline: Pipeline): string[][] {
  const remaining = new Map(pipeline.stages.map((s) => [s.name, dependenciesOf(s)]));
  const done = new Set<string>();
  const levels: string[][] = [];

  while (remaining.size > 0) {
    const wave = [...remaining.entries()].filter(([, deps]) => deps.every((d) => done.has(d))).map(([name]) => name);
    if (wave.length === 0) {
      throw new StageGraphError(`Stage graph has a cycle among: ${[...remaining.keys()].join(", ")}`, {
        stages: [...remaining.keys()],
      });
    }
    for (const name of wave) {
      remaining.delete(name);
      done.add(name);
    }
    levels.push(wave);
  }

  return levels;
}

/** One-line description of an op for reports. */
export function describeOp(op: LayerOp): string {
  switch (op.kind) {
    case "env":
      return `env ${Object.keys(op.vars).join(",")}`;
    case "workdir":
      return `workdir ${op.path}`;
    case "system-packages":
      return `system-packages(${op.purpose}) ${op.packages.join(" ")}`;
    case "package-manager":
      return `package-manager ${op.name}==${op.version}`;
    case "copy-context":
      return `copy ${op.sources.map((s) => s.path).join(" ")} -> ${op.dest}`;
    case "install-dependencies":
      return `install-dependencies ${variantLabel(op.variant)}${op.includeDev ? " +dev" : ""}`;
    case "verify-ml-runtime":
      return `verify-ml-runtime ${op.importName}${op.strict ? " (strict)" : ""}`;
    case "copy-from-stage":
      return `copy --from=${op.from} ${op.path}`;
  }
}
