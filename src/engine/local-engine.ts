import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import { canonicalJson, chainDigest, computeSha256FromContent } from "../artifact-writer/checksum.js";
import { EngineError, StageGraphError, VariantAssertionError } from "../core/errors.js";
import { createComponentLogger, type Logger } from "../logging/logger.js";
import { dependencyCacheKey, normalizePackageName, type ProjectManifests } from "../manifest/pyproject.js";
import { describeOp, getStage, packageManagerVenv, stageOrder, type LayerOp, type Pipeline, type Stage } from "../pipeline/stages.js";
import type { Resolver } from "../resolver/resolver.js";
import type { Image, LayerReport, MlRuntimeReport } from "../types/image.js";
import type { InstalledTree } from "../types/manifest.js";
import { checkRuntimeClosure, inspectMlRuntime, type ClosureRules } from "./closure.js";
import {
  PACKAGE_MANAGER_CACHE,
  baseImageSnapshot,
  filesUnder,
  syntheticEntry,
  systemPackageFiles,
  withFiles,
  withoutDirs,
  type FileEntry,
  type Snapshot,
} from "./filesystem.js";
import type { CachedLayer, LayerCache, LayerOutputs } from "./layer-cache.js";

type StageHead = {
  key: string;
  snapshot: Snapshot;
  executed: number;
};

export type BuildStats = {
  hits: number;
  misses: number;
  resolverCalls: number;
};

export type LocalEngineDeps = {
  resolver: Resolver;
  cache: LayerCache;
  logger?: Logger;
};

export type BuildOutcome = {
  image: Image;
  stats: BuildStats;
  warnings: string[];
};

/**
 * One build of a pipeline by the in-process engine.
 *
 * Every op becomes a layer keyed by (parent key, op, op inputs). A key found in the
 * cache is restored without executing the op, which is what keeps the dependency
 * install from re-running when only application source changes.
 */
export class LocalBuildSession {
  private readonly heads = new Map<string, StageHead>();
  private readonly layers: LayerReport[] = [];
  private readonly warnings: string[] = [];
  private readonly stats: BuildStats = { hits: 0, misses: 0, resolverCalls: 0 };
  private readonly log: Logger;
  private tree: InstalledTree | null = null;
  private mlRuntime: MlRuntimeReport | null = null;

  constructor(
    private readonly pipeline: Pipeline,
    private readonly contextDir: string,
    private readonly manifests: ProjectManifests,
    private readonly deps: LocalEngineDeps,
  ) {
    this.log = createComponentLogger("local-engine", deps.logger);
  }

  /** Run the not-yet-executed ops of a stage that match `filter`, in declaration order. */
  async runStage(name: string, filter: (op: LayerOp) => boolean = () => true): Promise<void> {
    const stage = getStage(this.pipeline, name);
    let head = this.heads.get(name) ?? this.startStage(stage);

    while (head.executed < stage.ops.length && filter(stage.ops[head.executed])) {
      head = await this.applyOp(stage, stage.ops[head.executed], head);
      this.heads.set(name, head);
    }
    this.heads.set(name, head);
  }

  isComplete(name: string): boolean {
    const head = this.heads.get(name);
    return head !== undefined && head.executed === getStage(this.pipeline, name).ops.length;
  }

  /** Fail when the target closure carries toolchain, package manager or cache files. */
  checkClosure(rules: ClosureRules): void {
    checkRuntimeClosure(this.requireHead(this.pipeline.target).snapshot, rules);
  }

  snapshot(name: string): Snapshot {
    return this.requireHead(name).snapshot;
  }

  getStats(): BuildStats {
    return { ...this.stats };
  }

  getWarnings(): string[] {
    return [...this.warnings];
  }

  /** Assemble the image record from the finished target stage. */
  image(): Image {
    const head = this.requireHead(this.pipeline.target);
    if (!this.isComplete(this.pipeline.target)) {
      throw new EngineError(`Target stage "${this.pipeline.target}" has not finished`);
    }
    return {
      id: `sha256:${head.key}`,
      created_at: new Date().toISOString(),
      target: this.pipeline.target,
      base_image: this.pipeline.base.image,
      dependency_cache_key: dependencyCacheKey(this.manifests.manifestBytes, this.manifests.lockBytes),
      metadata: this.pipeline.metadata,
      layers: [...this.layers],
      packages: this.tree?.packages ?? [],
      floating: this.tree?.floating ?? this.manifests.lock === null,
      ml_runtime: this.mlRuntime,
      files: Object.keys(head.snapshot).sort(),
    };
  }

  private requireHead(name: string): StageHead {
    const head = this.heads.get(name);
    if (!head) throw new EngineError(`Stage "${name}" has not been built`);
    return head;
  }

  private startStage(stage: Stage): StageHead {
    if (stage.parent === null) {
      return {
        key: chainDigest("from", stage.from),
        snapshot: baseImageSnapshot(stage.from, this.pipeline.base.pythonVersion),
        executed: 0,
      };
    }
    if (!this.isComplete(stage.parent)) {
      throw new StageGraphError(`Stage "${stage.name}" started before its parent "${stage.parent}" finished`, {
        stage: stage.name,
        parent: stage.parent,
      });
    }
    const parent = this.requireHead(stage.parent);
    return { key: parent.key, snapshot: parent.snapshot, executed: 0 };
  }

  private async applyOp(stage: Stage, op: LayerOp, head: StageHead): Promise<StageHead> {
    const description = describeOp(op);
    const key = chainDigest(head.key, canonicalJson(op), this.inputDigest(stage, op));

    const cached = await this.deps.cache.get(key);
    if (cached) {
      this.stats.hits++;
      this.layers.push({ stage: stage.name, op: description, key, cached: true });
      this.absorb(cached.outputs);
      this.log.debug({ stage: stage.name, op: description, key }, "layer cache hit");
      return { key, snapshot: cached.snapshot, executed: head.executed + 1 };
    }

    this.stats.misses++;
    this.log.info({ stage: stage.name, op: description }, "executing layer");
    const { snapshot, outputs } = await this.execute(stage, op, head.snapshot);

    const layer: CachedLayer = { key, description, created_at: new Date().toISOString(), snapshot, outputs };
    await this.deps.cache.put(layer);
    this.layers.push({ stage: stage.name, op: description, key, cached: false });
    this.absorb(outputs);
    return { key, snapshot, executed: head.executed + 1 };
  }

  private absorb(outputs: LayerOutputs): void {
    if (outputs.tree) this.tree = outputs.tree;
    if (outputs.mlRuntime) this.mlRuntime = outputs.mlRuntime;
    for (const w of outputs.warnings ?? []) {
      this.warnings.push(w);
      this.log.warn(w);
    }
  }

  private inputDigest(stage: Stage, op: LayerOp): string {
    if (op.kind === "copy-context") {
      const files = this.contextFiles(op.sources, op.ignore);
      return chainDigest(...files.map((f) => `${f.rel}:${computeSha256FromContent(f.content)}`));
    }
    if (op.kind === "copy-from-stage") {
      if (!this.isComplete(op.from)) {
        throw new StageGraphError(`Stage "${stage.name}" copies from "${op.from}" before it finished`, {
          stage: stage.name,
          from: op.from,
        });
      }
      return this.requireHead(op.from).key;
    }
    return "";
  }

  /** Files a context copy would send, sorted by path; missing optional sources are skipped. */
  private contextFiles(sources: { path: string; optional: boolean }[], ignore: string[]): { rel: string; content: Buffer }[] {
    const result: { rel: string; content: Buffer }[] = [];
    for (const source of sources) {
      const abs = path.join(this.contextDir, source.path);
      if (!fs.existsSync(abs)) {
        if (source.optional) continue;
        throw new EngineError(`Build context has no ${source.path}`, { path: abs });
      }
      if (fs.statSync(abs).isFile()) {
        result.push({ rel: source.path, content: fs.readFileSync(abs) });
        continue;
      }
      for (const rel of walk(abs)) {
        if (ignore.some((pattern) => minimatch(rel, pattern, { dot: true }))) continue;
        result.push({ rel: path.posix.join(source.path, rel), content: fs.readFileSync(path.join(abs, rel)) });
      }
    }
    return result.sort((a, b) => a.rel.localeCompare(b.rel));
  }

  private async execute(stage: Stage, op: LayerOp, snapshot: Snapshot): Promise<{ snapshot: Snapshot; outputs: LayerOutputs }> {
    const pyVersion = this.pipeline.base.pythonVersion;

    switch (op.kind) {
      case "env":
      case "workdir":
        return { snapshot, outputs: {} };

      case "system-packages": {
        const files: Record<string, FileEntry> = {};
        for (const pkg of op.packages) {
          for (const f of systemPackageFiles(pkg)) {
            files[f] = syntheticEntry(f, `system-packages:${op.purpose}:${pkg}`, pkg);
          }
        }
        return { snapshot: withFiles(snapshot, files), outputs: {} };
      }

      case "package-manager": {
        const files: Record<string, FileEntry> = {};
        const venv = packageManagerVenv(op.home);
        for (const f of [
          `${venv}/bin/${op.name}`,
          `${venv}/bin/python`,
          `${venv}/lib/python${pyVersion}/site-packages/${op.name}/__init__.py`,
          `/usr/bin/${op.name}`,
        ]) {
          files[f] = syntheticEntry(f, "package-manager", `${op.name}==${op.version}`);
        }
        return { snapshot: withFiles(snapshot, files), outputs: {} };
      }

      case "copy-context": {
        const files: Record<string, FileEntry> = {};
        for (const f of this.contextFiles(op.sources, op.ignore)) {
          const rel = op.purpose === "app-source" ? path.posix.relative(op.sources[0].path, f.rel) : path.posix.basename(f.rel);
          const target = path.posix.join(op.dest, rel);
          files[target] = {
            digest: computeSha256FromContent(f.content),
            size: f.content.length,
            origin: `context:${op.purpose}`,
          };
        }
        return { snapshot: withFiles(snapshot, files), outputs: {} };
      }

      case "install-dependencies":
        return this.install(op, snapshot, pyVersion);

      case "verify-ml-runtime": {
        const report = inspectMlRuntime(snapshot, op.package, op.importName);
        this.log.info({ ...report }, "ml runtime verified");
        if (!report.accelerator) return { snapshot, outputs: { mlRuntime: report } };

        const message = `${report.package} ${report.version} reports an accelerator backend in a CPU-only build`;
        if (op.strict) {
          throw new VariantAssertionError(message, { ...report });
        }
        return { snapshot, outputs: { mlRuntime: report, warnings: [`VARIANT_DRIFT: ${message}`] } };
      }

      case "copy-from-stage": {
        const source = this.requireHead(op.from).snapshot;
        return { snapshot: withFiles(snapshot, filesUnder(source, op.path)), outputs: {} };
      }
    }
  }

  private async install(
    op: Extract<LayerOp, { kind: "install-dependencies" }>,
    snapshot: Snapshot,
    pyVersion: string,
  ): Promise<{ snapshot: Snapshot; outputs: LayerOutputs }> {
    this.stats.resolverCalls++;
    const result = await this.deps.resolver.resolve({
      manifest: this.manifests.manifest,
      lock: this.manifests.lock,
      variant: op.variant,
      includeDev: op.includeDev,
      prefix: op.prefix,
    });
    if (!result.ok) throw result.error;

    const site = `${op.prefix}/lib/python${pyVersion}/site-packages`;
    const files: Record<string, FileEntry> = {};
    for (const pkg of result.tree.packages) {
      const key = normalizePackageName(pkg.name);
      const dist = key.replace(/-/g, "_");
      const module = Object.hasOwn(op.importNames, key) ? op.importNames[key] : dist;
      const origin = `install:${pkg.name}`;
      const id = `${pkg.name}==${pkg.version}`;
      files[`${site}/${module}/__init__.py`] = syntheticEntry(`${site}/${module}/__init__.py`, origin, id);
      if (pkg.native) {
        files[`${site}/${module}/_native.so`] = syntheticEntry(`${site}/${module}/_native.so`, origin, id);
      }
      const metadata = `${site}/${dist}-${pkg.version}.dist-info/METADATA`;
      files[metadata] = syntheticEntry(metadata, origin, id, {
        name: pkg.name,
        version: pkg.version,
        source: pkg.source,
        accelerator: String(pkg.accelerator),
      });
      const wheel = `${PACKAGE_MANAGER_CACHE}/artifacts/${dist}-${pkg.version}.whl`;
      files[wheel] = syntheticEntry(wheel, "install-cache", id);
    }

    const warnings = result.tree.floating
      ? ["LOCK_MISSING: no lock file; dependency versions float within manifest constraints"]
      : [];
    const installed = withoutDirs(withFiles(snapshot, files), op.cachePaths);
    return { snapshot: installed, outputs: { tree: result.tree, warnings } };
  }
}

function walk(dir: string, prefix = ""): string[] {
  const out: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) out.push(...walk(path.join(dir, entry.name), rel));
    else if (entry.isFile()) out.push(rel);
  }
  return out;
}

/** Builds a whole pipeline in stage order with the in-process engine. */
export class LocalEngine {
  constructor(private readonly deps: LocalEngineDeps) {}

  session(pipeline: Pipeline, contextDir: string, manifests: ProjectManifests): LocalBuildSession {
    return new LocalBuildSession(pipeline, contextDir, manifests, this.deps);
  }

  async build(pipeline: Pipeline, contextDir: string, manifests: ProjectManifests, closure: ClosureRules): Promise<BuildOutcome> {
    const session = this.session(pipeline, contextDir, manifests);
    for (const name of stageOrder(pipeline)) {
      await session.runStage(name);
    }
    session.checkClosure(closure);
    return { image: session.image(), stats: session.getStats(), warnings: session.getWarnings() };
  }
}
