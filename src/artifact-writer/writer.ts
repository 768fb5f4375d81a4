import fs from "node:fs";
import path from "node:path";
import { computeSha256 } from "./checksum.js";
import { buildManifest } from "./manifest-builder.js";
import type { BuildArtifact, BuildManifest } from "../types/build-record.js";

export type WriteArtifactInput = {
  /** Relative path within the build directory (e.g., "image.json"). */
  relativePath: string;
  /** JSON content to write. */
  content: unknown;
  /** Schema name this artifact conforms to. */
  schema: string;
  /** Component that produced it (e.g., "local-engine"). */
  producedBy: string;
};

/**
 * Artifact writer for one build directory.
 * Writes individual records and generates the final manifest.
 */
export class ArtifactWriter {
  private artifacts: BuildArtifact[] = [];
  private readonly buildDir: string;

  constructor(
    baseDir: string,
    private readonly buildId: string,
  ) {
    this.buildDir = path.join(baseDir, buildId);
  }

  init(): void {
    fs.mkdirSync(this.buildDir, { recursive: true });
  }

  /** Write a single artifact file and track it. */
  writeArtifact(input: WriteArtifactInput): string {
    const fullPath = path.join(this.buildDir, input.relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });

    fs.writeFileSync(fullPath, JSON.stringify(input.content, null, 2), "utf8");
    this.track(input.relativePath, input.schema, input.producedBy);
    return fullPath;
  }

  /** Track a file some other component already wrote (e.g., the rendered Dockerfile). */
  track(relativePath: string, schema: string, producedBy: string): void {
    const fullPath = path.join(this.buildDir, relativePath);
    this.artifacts = this.artifacts.filter((a) => a.path !== relativePath);
    this.artifacts.push({
      path: relativePath,
      schema,
      sha256: computeSha256(fullPath),
      produced_by: producedBy,
      produced_at: new Date().toISOString(),
    });
  }

  /** Generate and write manifest.json. */
  writeManifest(opts: {
    status: string;
    engine: BuildManifest["engine"];
    schema_versions: Record<string, string>;
  }): BuildManifest {
    const manifest = buildManifest({
      build_id: this.buildId,
      status: opts.status,
      engine: opts.engine,
      schema_registry: opts.schema_versions,
      artifacts: this.artifacts,
    });

    fs.writeFileSync(path.join(this.buildDir, "manifest.json"), JSON.stringify(manifest, null, 2), "utf8");
    return manifest;
  }

  getBuildDir(): string {
    return this.buildDir;
  }

  getArtifacts(): BuildArtifact[] {
    return [...this.artifacts];
  }
}
