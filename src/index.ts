export * from "./core/errors.js";
export { BUILD_STEPS, getEffectiveSteps, nextState, type BuildStatus, type BuildStep } from "./core/state-machine.js";
export { BuildOrchestrator, type BuildResult, type BuildState, type StepRunner } from "./core/orchestrator.js";
export { generateBuildId, parseBuildId } from "./core/build-id.js";
export { loadConfig, deepMerge } from "./config/loader.js";
export { validateConfig } from "./config/validator.js";
export { parseManifest, parseLockFile, loadProjectManifests, dependencyCacheKey } from "./manifest/pyproject.js";
export { FIXED_ENV, createBaseEnvironment, type BaseEnvironment } from "./pipeline/base-env.js";
export { CONTRACT, entrypointCommand, healthUrl, healthcheckSpec, probeStartSeconds } from "./pipeline/contract.js";
export { selectVariant, installCommands, variantLabel, type ResolvedVariant } from "./pipeline/variant.js";
export {
  definePipeline,
  validateStageGraph,
  stageOrder,
  buildLevels,
  type LayerOp,
  type Pipeline,
  type Stage,
} from "./pipeline/stages.js";
export { renderDockerfile, renderDockerignore } from "./pipeline/dockerfile.js";
export { loadBuildPlan, type BuildPlan } from "./pipeline/plan.js";
export { IndexResolver } from "./resolver/index-resolver.js";
export { PackageIndex, loadPackageIndex } from "./resolver/package-index.js";
export type { Resolver, ResolveRequest, ResolveResult } from "./resolver/resolver.js";
export { LocalEngine, type BuildOutcome } from "./engine/local-engine.js";
export { DockerEngine, checkImageContract, type ExecFn } from "./engine/docker-engine.js";
export { MemoryLayerCache, DiskLayerCache, type LayerCache } from "./engine/layer-cache.js";
export { checkRuntimeClosure, findClosureViolations } from "./engine/closure.js";
export { nextHealth, INITIAL_HEALTH, type HealthState, type HealthStatus } from "./health/state-machine.js";
export { simulateHealth, type HealthTimeline } from "./health/simulate.js";
export { httpProbe, type ProbeResult } from "./health/probe.js";
export { HealthMonitor } from "./health/monitor.js";
export { createRegistry, SchemaRegistry } from "./schema/registry.js";
export type { Image, ImageMetadata } from "./types/image.js";
export type { SlimstageConfig } from "./types/config.js";
