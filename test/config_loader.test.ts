import { describe, expect, it } from "vitest";
import { deepMerge, loadConfig } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";
import { CONFIG_DIR, EMPTY_ENV } from "./helpers.js";

describe("config loader", () => {
  it("loads base config with all required fields", () => {
    const config = loadConfig(undefined, CONFIG_DIR, EMPTY_ENV);
    expect(config.schema_version).toBe("1.0.0");
    expect(config.project).toBe("ml-service");
    expect(config.builds_dir).toBe(".slimstage/builds");
    expect(config).toMatchObject({
      builder: { variant: { mechanism: "source", source: "torch-cpu" }, verify: { enabled: true, strict: true } },
      timeouts: { builder: 1800 },
    });
  });

  it("merges env-specific config over base", () => {
    const config = loadConfig("lenient", CONFIG_DIR, EMPTY_ENV);
    expect(config).toMatchObject({
      builder: { verify: { enabled: true, strict: false }, toolchain: ["build-essential"] },
    });
  });

  it("replaces the variant record wholesale", () => {
    const config = loadConfig("index-url", CONFIG_DIR, EMPTY_ENV);
    expect(config).toHaveProperty("builder.variant", {
      mechanism: "index-url",
      index_url: "https://download.pytorch.org/whl/cpu",
    });
  });

  it("applies environment variable overrides with nested keys and scalar types", () => {
    const config = loadConfig(undefined, CONFIG_DIR, {
      SLIMSTAGE_BUILDS_DIR: "/tmp/override",
      SLIMSTAGE_BUILDER__VERIFY__STRICT: "false",
      SLIMSTAGE_TIMEOUTS__BUILDER: "900",
    });
    expect(config.builds_dir).toBe("/tmp/override");
    expect(config).toMatchObject({ builder: { verify: { strict: false } }, timeouts: { builder: 900 } });
  });

  it("env vars override env-specific yaml", () => {
    const config = loadConfig("lenient", CONFIG_DIR, { SLIMSTAGE_BUILDER__VERIFY__STRICT: "true" });
    expect(config).toMatchObject({ builder: { verify: { strict: true } } });
  });

  it("does not treat the log level variable as config", () => {
    const config = loadConfig(undefined, CONFIG_DIR, { SLIMSTAGE_LOG_LEVEL: "debug" });
    expect(config).not.toHaveProperty("log_level");
  });

  it("returns base config when env yaml does not exist", () => {
    const config = loadConfig("nonexistent-env", CONFIG_DIR, EMPTY_ENV);
    expect(config.builds_dir).toBe(".slimstage/builds");
  });

  it("deepMerge replaces arrays instead of concatenating", () => {
    const merged = deepMerge({ a: [1, 2], b: { c: 1, d: 2 } }, { a: [3], b: { d: 4 } });
    expect(merged).toEqual({ a: [3], b: { c: 1, d: 4 } });
  });
});

describe("config validator", () => {
  it("validates every bundled overlay", async () => {
    for (const env of [undefined, "lenient", "index-url"]) {
      const { valid, errors } = await validateConfig(loadConfig(env, CONFIG_DIR, EMPTY_ENV));
      expect(valid).toBe(true);
      expect(errors).toBeNull();
    }
  });

  it("rejects config missing required fields", async () => {
    const { valid, errors } = await validateConfig({ project: "ml-service" });
    expect(valid).toBe(false);
    expect(errors).toContain("must have required property");
  });

  it("rejects a variant that names both mechanisms", async () => {
    const config = deepMerge(loadConfig(undefined, CONFIG_DIR, EMPTY_ENV), {
      builder: {
        variant: { mechanism: "source", source: "torch-cpu", index_url: "https://download.pytorch.org/whl/cpu" },
      },
    });
    const { valid } = await validateConfig(config);
    expect(valid).toBe(false);
  });

  it("rejects a package manager other than poetry", async () => {
    const config = deepMerge(loadConfig(undefined, CONFIG_DIR, EMPTY_ENV), {
      builder: { package_manager: { name: "pipenv" } },
    });
    const { valid, errors } = await validateConfig(config);
    expect(valid).toBe(false);
    expect(errors).toContain("/builder/package_manager/name");
  });

  it("rejects non-integer timeouts", async () => {
    const config = deepMerge(loadConfig(undefined, CONFIG_DIR, EMPTY_ENV), { timeouts: { builder: 0 } });
    const { valid } = await validateConfig(config);
    expect(valid).toBe(false);
  });
});
