import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { ConfigError } from "../core/errors.js";
import type { ClosureRules } from "../engine/closure.js";
import { loadProjectManifests, type ProjectManifests } from "../manifest/pyproject.js";
import type { SlimstageConfig } from "../types/config.js";
import { createBaseEnvironment } from "./base-env.js";
import { definePipeline, type Pipeline } from "./stages.js";
import { selectVariant, type ResolvedVariant } from "./variant.js";

export type PlanOptions = {
  contextDir: string;
  configDir?: string;
  env?: string;
  processEnv?: NodeJS.ProcessEnv;
};

/** Everything a build needs, derived from config + project before any layer runs. */
export type BuildPlan = {
  config: SlimstageConfig;
  contextDir: string;
  manifests: ProjectManifests;
  variant: ResolvedVariant;
  pipeline: Pipeline;
  closure: ClosureRules;
};

export async function loadValidConfig(opts: Omit<PlanOptions, "contextDir">): Promise<SlimstageConfig> {
  const raw = loadConfig(opts.env, opts.configDir, opts.processEnv);
  const res = await validateConfig(raw);
  if (!res.valid) {
    throw new ConfigError(`Config invalid: ${res.errors}`);
  }
  return res.config;
}

export async function loadBuildPlan(opts: PlanOptions): Promise<BuildPlan> {
  const config = await loadValidConfig(opts);
  const contextDir = path.resolve(opts.contextDir);
  const base = createBaseEnvironment(config);
  const manifests = loadProjectManifests(contextDir, { manifest: config.builder.manifest, lock: config.builder.lock });
  const variant = selectVariant(manifests.manifest, config.builder.variant, config.ml_runtime.package);

  return {
    config,
    contextDir,
    manifests,
    variant,
    pipeline: definePipeline(config, base, variant),
    closure: { packageManagerHome: config.builder.package_manager.home, cachePaths: [...config.builder.cache_paths] },
  };
}

/** builds_dir and cache_dir are relative to the build context unless absolute. */
export function projectPath(plan: Pick<BuildPlan, "contextDir">, configured: string): string {
  return path.resolve(plan.contextDir, configured);
}
