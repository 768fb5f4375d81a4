import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { SlimstageConfig } from "../types/config.js";

const CONFIG_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../config");
const ENV_PREFIX = "SLIMSTAGE_";

/** Keys whose values are replaced wholesale instead of merged: a variant is one mechanism. */
const ATOMIC_KEYS = new Set(["variant"]);

type ConfigTree = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigTree {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays and atomic keys are replaced, not merged.
 */
export function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined) continue;
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current) && !ATOMIC_KEYS.has(key)) {
      result[key] = deepMerge(current, val);
    } else {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): ConfigTree {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  return isPlainObject(parsed) ? parsed : {};
}

/**
 * Apply SLIMSTAGE_ prefixed environment variable overrides.
 * SLIMSTAGE_BUILDS_DIR → builds_dir, SLIMSTAGE_BUILDER__VERIFY__STRICT → builder.verify.strict.
 * Values are parsed as YAML scalars so "false" and "3" keep their types.
 */
function applyEnvOverrides(config: ConfigTree, env: NodeJS.ProcessEnv): ConfigTree {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    if (key === `${ENV_PREFIX}LOG_LEVEL`) continue;

    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__");
    const leaf = segments[segments.length - 1];
    let override: ConfigTree = { [leaf]: parseScalar(value) };
    for (let i = segments.length - 2; i >= 0; i--) {
      override = { [segments[i]]: override };
    }
    result = deepMerge(result, override);
  }
  return result;
}

function parseScalar(value: string): unknown {
  try {
    const parsed: unknown = YAML.parse(value);
    return parsed === null || typeof parsed === "object" ? value : parsed;
  } catch {
    return value;
  }
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← environment variables.
 * The result is unvalidated; run it through validateConfig before use.
 *
 * @param envName - Optional environment name (e.g., "lenient", "index-url").
 * @param configDir - Optional config directory path override.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): ConfigTree {
  const dir = configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  return applyEnvOverrides(merged, env);
}

export type { SlimstageConfig };
