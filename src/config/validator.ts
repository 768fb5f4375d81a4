import { loadAjv } from "../schema/ajv.js";
import type { SlimstageConfig } from "../types/config.js";

const STRING_LIST = { type: "array", items: { type: "string", minLength: 1 } };

/** Config schema — a variant record carries exactly one selection mechanism. */
const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "project", "builds_dir", "cache_dir", "base", "builder", "ml_runtime", "runtime", "entrypoint"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    project: { type: "string", pattern: "^[a-z0-9][a-z0-9._-]*$" },
    builds_dir: { type: "string", minLength: 1 },
    cache_dir: { type: "string", minLength: 1 },
    base: {
      type: "object",
      required: ["image", "workdir"],
      properties: {
        image: { type: "string", minLength: 1 },
        workdir: { type: "string", pattern: "^/" },
        env: { type: "object", additionalProperties: { type: "string" } },
      },
      additionalProperties: false,
    },
    builder: {
      type: "object",
      required: ["toolchain", "package_manager", "manifest", "lock", "install_prefix", "include_dev", "variant", "verify", "cache_paths"],
      properties: {
        toolchain: STRING_LIST,
        package_manager: {
          type: "object",
          required: ["name", "version", "home"],
          properties: {
            name: { const: "poetry" },
            version: { type: "string", minLength: 1 },
            home: { type: "string", pattern: "^/" },
          },
          additionalProperties: false,
        },
        manifest: { type: "string", minLength: 1 },
        lock: { type: "string", minLength: 1 },
        install_prefix: { type: "string", pattern: "^/" },
        include_dev: { type: "boolean" },
        variant: {
          oneOf: [
            {
              type: "object",
              required: ["mechanism", "source"],
              properties: { mechanism: { const: "source" }, source: { type: "string", minLength: 1 } },
              additionalProperties: false,
            },
            {
              type: "object",
              required: ["mechanism", "index_url"],
              properties: { mechanism: { const: "index-url" }, index_url: { type: "string", format: "uri" } },
              additionalProperties: false,
            },
          ],
        },
        verify: {
          type: "object",
          required: ["enabled", "strict"],
          properties: { enabled: { type: "boolean" }, strict: { type: "boolean" } },
          additionalProperties: false,
        },
        cache_paths: STRING_LIST,
        index_file: { type: "string", minLength: 1 },
      },
      additionalProperties: false,
    },
    ml_runtime: {
      type: "object",
      required: ["package", "import_name"],
      properties: {
        package: { type: "string", minLength: 1 },
        import_name: { type: "string", pattern: "^[A-Za-z_][A-Za-z0-9_]*$" },
      },
      additionalProperties: false,
    },
    runtime: {
      type: "object",
      required: ["probe_packages", "app_source", "app_dest", "ignore"],
      properties: {
        probe_packages: { ...STRING_LIST, minItems: 1 },
        app_source: { type: "string", minLength: 1 },
        app_dest: { type: "string", pattern: "^/" },
        ignore: STRING_LIST,
      },
      additionalProperties: false,
    },
    entrypoint: {
      type: "object",
      required: ["app"],
      properties: { app: { type: "string", pattern: "^[A-Za-z_][\\w.]*:[A-Za-z_]\\w*$" } },
      additionalProperties: false,
    },
    timeouts: { type: "object", additionalProperties: { type: "integer", minimum: 1 } },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: SlimstageConfig; errors: null }
  | { valid: false; config: null; errors: string };

/** Validate a loaded config against the config schema. */
export async function validateConfig(raw: unknown): Promise<ConfigValidationResult> {
  const ajv = await loadAjv();
  const validate = ajv.compile<SlimstageConfig>(CONFIG_SCHEMA);
  if (validate(raw)) {
    return { valid: true, config: raw, errors: null };
  }
  return { valid: false, config: null, errors: ajv.errorsText(validate.errors) };
}
