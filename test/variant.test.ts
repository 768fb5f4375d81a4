import { describe, expect, it } from "vitest";
import { VariantAmbiguityError, VariantSelectionError } from "../src/core/errors.js";
import { parseManifest } from "../src/manifest/pyproject.js";
import { DEFAULT_INDEX_URL, installCommands, selectVariant, variantLabel } from "../src/pipeline/variant.js";
import { readFixture } from "./helpers.js";

const CPU_URL = "https://download.pytorch.org/whl/cpu";

const routed = parseManifest(readFixture("project/pyproject.toml"));

const unrouted = parseManifest(
  [
    "[tool.poetry.dependencies]",
    'python = "^3.12"',
    'torch = "^2.3.1"',
    "",
    "[[tool.poetry.source]]",
    'name = "torch-cpu"',
    `url = "${CPU_URL}"`,
    'priority = "explicit"',
  ].join("\n"),
);

describe("selectVariant", () => {
  it("selects the named source the manifest routes the ML package to", () => {
    const variant = selectVariant(routed, { mechanism: "source", source: "torch-cpu" }, "torch");
    expect(variant).toEqual({
      mechanism: "source",
      packageName: "torch",
      source: { name: "torch-cpu", url: CPU_URL, priority: "explicit" },
    });
    expect(variantLabel(variant)).toBe("source:torch-cpu");
  });

  it("selects an index url when the manifest does not route the package", () => {
    const variant = selectVariant(unrouted, { mechanism: "index-url", index_url: CPU_URL }, "torch");
    expect(variant).toEqual({ mechanism: "index-url", packageName: "torch", indexUrl: CPU_URL });
    expect(variantLabel(variant)).toBe(`index-url:${CPU_URL}`);
  });

  it("rejects two mechanisms at once", () => {
    const select = () => selectVariant(routed, { mechanism: "index-url", index_url: CPU_URL }, "torch");
    expect(select).toThrow(VariantAmbiguityError);
    expect(select).toThrow(`"torch" is routed to source "torch-cpu" and the build also selects index ${CPU_URL}; pick one mechanism`);
  });

  it("rejects a source the manifest does not declare", () => {
    expect(() => selectVariant(routed, { mechanism: "source", source: "cuda" }, "torch")).toThrow(
      'Package source "cuda" is not declared in the manifest',
    );
  });

  it("rejects a package that is not routed to the configured source", () => {
    expect(() => selectVariant(unrouted, { mechanism: "source", source: "torch-cpu" }, "torch")).toThrow(
      '"torch" must be routed to source "torch-cpu" (manifest routes it to the default index)',
    );
  });

  it("requires the ML package to be a main dependency", () => {
    const select = () => selectVariant(routed, { mechanism: "source", source: "torch-cpu" }, "tensorflow");
    expect(select).toThrow(VariantSelectionError);
    expect(select).toThrow('ML runtime package "tensorflow" is not a main dependency of the manifest');
  });
});

describe("installCommands", () => {
  it("installs through the package manager when a source is selected", () => {
    const variant = selectVariant(routed, { mechanism: "source", source: "torch-cpu" }, "torch");
    expect(installCommands(variant, { includeDev: false, cachePaths: ["/root/.cache/pypoetry", "/root/.cache/pip"] })).toEqual([
      ["poetry", "install", "--no-root", "--only", "main"],
      ["rm", "-rf", "/root/.cache/pypoetry", "/root/.cache/pip"],
    ]);
  });

  it("exports requirements and passes the index url to pip", () => {
    const variant = selectVariant(unrouted, { mechanism: "index-url", index_url: CPU_URL }, "torch");
    expect(installCommands(variant, { includeDev: true, cachePaths: [] })).toEqual([
      ["poetry", "export", "--with", "dev", "--without-hashes", "-f", "requirements.txt", "-o", "/tmp/requirements.txt"],
      [
        "pip",
        "install",
        "--no-cache-dir",
        "--index-url",
        CPU_URL,
        "--extra-index-url",
        DEFAULT_INDEX_URL,
        "-r",
        "/tmp/requirements.txt",
      ],
      ["rm", "-rf", "/tmp/requirements.txt"],
    ]);
  });

  it("adds no purge when there is nothing to remove", () => {
    const variant = selectVariant(routed, { mechanism: "source", source: "torch-cpu" }, "torch");
    expect(installCommands(variant, { includeDev: false, cachePaths: [] })).toEqual([
      ["poetry", "install", "--no-root", "--only", "main"],
    ]);
  });
});
