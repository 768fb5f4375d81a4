import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { StageGraphError, VariantAssertionError } from "../src/core/errors.js";
import { checkRuntimeClosure, findClosureViolations, inspectMlRuntime } from "../src/engine/closure.js";
import { baseImageSnapshot, syntheticEntry, withFiles } from "../src/engine/filesystem.js";
import { DiskLayerCache, MemoryLayerCache, type LayerCache } from "../src/engine/layer-cache.js";
import { LocalEngine } from "../src/engine/local-engine.js";
import { loadBuildPlan, type BuildPlan } from "../src/pipeline/plan.js";
import { IndexResolver } from "../src/resolver/index-resolver.js";
import { loadPackageIndex } from "../src/resolver/package-index.js";
import { createRegistry } from "../src/schema/registry.js";
import {
  CONFIG_DIR,
  EMPTY_ENV,
  INDEX_FIXTURE,
  SCHEMA_DIR,
  copyProject,
  editFile,
  makeTmpDir,
  writeAcceleratedIndex,
} from "./helpers.js";

const SITE = "/usr/local/lib/python3.12/site-packages";
const DRIFT = "torch 2.3.1+cpu reports an accelerator backend in a CPU-only build";

async function engineFor(cache: LayerCache, indexFile = INDEX_FIXTURE): Promise<LocalEngine> {
  const index = await loadPackageIndex(indexFile, await createRegistry(SCHEMA_DIR));
  return new LocalEngine({ resolver: new IndexResolver(index), cache });
}

async function planFor(project: string, env?: string): Promise<BuildPlan> {
  return loadBuildPlan({ contextDir: project, configDir: CONFIG_DIR, env, processEnv: EMPTY_ENV });
}

async function buildOnce(project: string, cache: LayerCache, opts: { env?: string; indexFile?: string } = {}) {
  const plan = await planFor(project, opts.env);
  const engine = await engineFor(cache, opts.indexFile);
  return engine.build(plan.pipeline, plan.contextDir, plan.manifests, plan.closure);
}

describe("LocalEngine", () => {
  let tmpDir: string;
  let project: string;

  beforeEach(() => {
    tmpDir = makeTmpDir("engine");
    project = copyProject(tmpDir);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("produces a runtime closure of interpreter, installed packages and app source", async () => {
    const { image, stats, warnings } = await buildOnce(project, new MemoryLayerCache());

    expect(image.files).toEqual([
      "/app/app/__init__.py",
      "/app/app/main.py",
      "/bin/sh",
      "/etc/os-release",
      "/usr/bin/apt-get",
      "/usr/bin/curl",
      "/usr/local/bin/pip",
      "/usr/local/bin/python",
      "/usr/local/bin/python3",
      "/usr/local/lib/python3.12/os.py",
      `${SITE}/fastapi-0.110.3.dist-info/METADATA`,
      `${SITE}/fastapi/__init__.py`,
      `${SITE}/torch-2.3.1+cpu.dist-info/METADATA`,
      `${SITE}/torch/__init__.py`,
      `${SITE}/torch/_native.so`,
      `${SITE}/uvicorn-0.29.0.dist-info/METADATA`,
      `${SITE}/uvicorn/__init__.py`,
    ]);
    expect(image.ml_runtime).toEqual({ package: "torch", version: "2.3.1+cpu", accelerator: false });
    expect(image.floating).toBe(false);
    expect(image.target).toBe("runtime");
    expect(image.base_image).toBe("python:3.12-slim");
    expect(image.id).toMatch(/^sha256:[a-f0-9]{64}$/);
    expect(image.layers).toHaveLength(10);
    expect(stats).toEqual({ hits: 0, misses: 10, resolverCalls: 1 });
    expect(warnings).toEqual([]);
  });

  it("reuses the install layer when only application source changes", async () => {
    const cache = new MemoryLayerCache();
    const first = await buildOnce(project, cache);

    editFile(path.join(project, "app", "main.py"), (text) => text + "\n# changed\n");
    const second = await buildOnce(project, cache);

    expect(second.stats).toEqual({ hits: 9, misses: 1, resolverCalls: 0 });
    expect(second.image.id).not.toBe(first.image.id);
    expect(second.image.packages).toEqual(first.image.packages);
    expect(second.image.ml_runtime).toEqual(first.image.ml_runtime);
    expect(second.image.layers.filter((l) => !l.cached).map((l) => l.op)).toEqual(["copy app -> /app/app"]);
  });

  it("re-runs the install when the lock changes", async () => {
    const cache = new MemoryLayerCache();
    await buildOnce(project, cache);

    editFile(path.join(project, "poetry.lock"), (text) => text.replace("# Placeholder lock for tests.", "# Regenerated."));
    const second = await buildOnce(project, cache);

    expect(second.stats.resolverCalls).toBe(1);
    expect(second.stats.hits).toBe(5);
  });

  it("builds identical images from identical inputs", async () => {
    const a = await buildOnce(project, new MemoryLayerCache());
    const b = await buildOnce(project, new MemoryLayerCache());
    expect(b.image.id).toBe(a.image.id);
    expect(b.image.files).toEqual(a.image.files);
  });

  it("fails a strict build that installed an accelerator backend and caches nothing after it", async () => {
    const cache = new MemoryLayerCache();
    const build = buildOnce(project, cache, { indexFile: writeAcceleratedIndex(tmpDir) });
    await expect(build).rejects.toThrow(VariantAssertionError);
    await expect(build).rejects.toThrow(DRIFT);
    expect(cache.size).toBe(6);
  });

  it("warns on an accelerator backend in a lenient build", async () => {
    const { image, warnings } = await buildOnce(project, new MemoryLayerCache(), {
      env: "lenient",
      indexFile: writeAcceleratedIndex(tmpDir),
    });
    expect(warnings).toEqual([`VARIANT_DRIFT: ${DRIFT}`]);
    expect(image.ml_runtime).toEqual({ package: "torch", version: "2.3.1+cpu", accelerator: true });
  });

  it("replays warnings from cached layers", async () => {
    const cache = new MemoryLayerCache();
    const indexFile = writeAcceleratedIndex(tmpDir);
    await buildOnce(project, cache, { env: "lenient", indexFile });
    const second = await buildOnce(project, cache, { env: "lenient", indexFile });
    expect(second.stats.misses).toBe(0);
    expect(second.warnings).toEqual([`VARIANT_DRIFT: ${DRIFT}`]);
  });

  it("installs the ML runtime under its configured import name", async () => {
    const plan = await loadBuildPlan({
      contextDir: project,
      configDir: CONFIG_DIR,
      processEnv: { SLIMSTAGE_ML_RUNTIME__IMPORT_NAME: "torch_cpu" },
    });
    const engine = await engineFor(new MemoryLayerCache());
    const { image } = await engine.build(plan.pipeline, plan.contextDir, plan.manifests, plan.closure);

    expect(image.ml_runtime).toEqual({ package: "torch", version: "2.3.1+cpu", accelerator: false });
    expect(image.files).toContain(`${SITE}/torch_cpu/__init__.py`);
    expect(image.files).toContain(`${SITE}/torch-2.3.1+cpu.dist-info/METADATA`);
    expect(image.files).not.toContain(`${SITE}/torch/__init__.py`);
  });

  it("floats dependency versions without a lock", async () => {
    fs.rmSync(path.join(project, "poetry.lock"));
    const { image, warnings } = await buildOnce(project, new MemoryLayerCache());
    expect(warnings).toEqual(["LOCK_MISSING: no lock file; dependency versions float within manifest constraints"]);
    expect(image.floating).toBe(true);
    expect(image.ml_runtime?.version).toBe("2.4.0+cpu");
  });

  it("refuses to start a stage before its parent finished", async () => {
    const plan = await planFor(project);
    const session = (await engineFor(new MemoryLayerCache())).session(plan.pipeline, plan.contextDir, plan.manifests);
    await expect(session.runStage("runtime")).rejects.toThrow(StageGraphError);
    await expect(session.runStage("runtime")).rejects.toThrow('Stage "runtime" started before its parent "base" finished');
  });

  it("refuses to copy from a stage that has not finished", async () => {
    const plan = await planFor(project);
    const session = (await engineFor(new MemoryLayerCache())).session(plan.pipeline, plan.contextDir, plan.manifests);
    await session.runStage("base");
    await expect(session.runStage("runtime")).rejects.toThrow('Stage "runtime" copies from "builder" before it finished');
  });

  it("runs a stage in parts when filtered", async () => {
    const plan = await planFor(project);
    const session = (await engineFor(new MemoryLayerCache())).session(plan.pipeline, plan.contextDir, plan.manifests);
    await session.runStage("base");
    await session.runStage("builder", (op) => op.kind !== "verify-ml-runtime");
    expect(session.isComplete("builder")).toBe(false);
    await session.runStage("builder");
    expect(session.isComplete("builder")).toBe(true);
    expect(session.getStats()).toEqual({ hits: 0, misses: 7, resolverCalls: 1 });
  });

  it("leaves toolchain and package manager files in the builder only", async () => {
    const plan = await planFor(project);
    const session = (await engineFor(new MemoryLayerCache())).session(plan.pipeline, plan.contextDir, plan.manifests);
    for (const stage of ["base", "builder", "runtime"]) await session.runStage(stage);

    const builderViolations = findClosureViolations(session.snapshot("builder"), plan.closure);
    expect(builderViolations).toContainEqual({ path: "/usr/bin/gcc", reason: "toolchain file (build-essential)" });
    expect(builderViolations).toContainEqual({ path: "/opt/poetry/venv/bin/poetry", reason: "package manager residue" });
    expect(findClosureViolations(session.snapshot("runtime"), plan.closure)).toEqual([]);
  });
});

describe("closure checks", () => {
  const rules = { packageManagerHome: "/opt/poetry", cachePaths: ["/root/.cache/pip"] };

  it("flags cache files and compiler binaries", () => {
    const snapshot = withFiles(baseImageSnapshot("python:3.12-slim", "3.12"), {
      "/root/.cache/pip/wheels/x.whl": syntheticEntry("/root/.cache/pip/wheels/x.whl", "install-cache", "x"),
      "/usr/local/bin/cc": syntheticEntry("/usr/local/bin/cc", "copied", "cc"),
    });
    expect(findClosureViolations(snapshot, rules)).toEqual([
      { path: "/root/.cache/pip/wheels/x.whl", reason: "package manager cache" },
      { path: "/usr/local/bin/cc", reason: "compiler binary" },
    ]);
    expect(() => checkRuntimeClosure(snapshot, rules)).toThrow(
      "Runtime image contains build-only files: /root/.cache/pip/wheels/x.whl (package manager cache), /usr/local/bin/cc (compiler binary)",
    );
  });

  it("cannot import an ML runtime that is not installed", () => {
    expect(() => inspectMlRuntime(baseImageSnapshot("python:3.12-slim", "3.12"), "torch", "torch")).toThrow(
      "Cannot import torch: torch is not installed",
    );
  });
});

describe("DiskLayerCache", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTmpDir("cache");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("stores layers across instances", async () => {
    const key = "a".repeat(64);
    const layer = { key, description: "workdir /app", created_at: "2026-01-01T00:00:00.000Z", snapshot: {}, outputs: {} };
    await new DiskLayerCache(tmpDir).put(layer);
    expect(await new DiskLayerCache(tmpDir).get(key)).toEqual(layer);
    expect(fs.readdirSync(path.join(tmpDir, "layers"))).toEqual([`${key}.json`]);
  });

  it("misses unknown keys", async () => {
    expect(await new DiskLayerCache(tmpDir).get("b".repeat(64))).toBeUndefined();
  });

  it("rejects keys that are not digests", async () => {
    await expect(new DiskLayerCache(tmpDir).get("../escape")).rejects.toThrow("Invalid layer key: ../escape");
  });

  it("serves a second build entirely from disk", async () => {
    const project = copyProject(tmpDir);
    const cacheDir = path.join(tmpDir, "cache");
    await buildOnce(project, new DiskLayerCache(cacheDir));
    const second = await buildOnce(project, new DiskLayerCache(cacheDir));
    expect(second.stats).toEqual({ hits: 10, misses: 0, resolverCalls: 0 });
  });
});
