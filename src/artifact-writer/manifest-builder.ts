import fs from "node:fs";
import path from "node:path";
import { computeSha256 } from "./checksum.js";
import type { BuildArtifact, BuildManifest } from "../types/build-record.js";

export type ManifestBuildInput = Omit<BuildManifest, "created_at">;

export function buildManifest(input: ManifestBuildInput): BuildManifest {
  return {
    build_id: input.build_id,
    created_at: new Date().toISOString(),
    status: input.status,
    engine: input.engine,
    schema_registry: input.schema_registry,
    artifacts: input.artifacts,
  };
}

export type ChecksumMismatch = {
  path: string;
  expected: string;
  actual: string | null;
};

/** Re-hash every artifact listed in a manifest; missing files report `actual: null`. */
export function verifyManifestChecksums(buildDir: string, artifacts: BuildArtifact[]): ChecksumMismatch[] {
  const mismatches: ChecksumMismatch[] = [];
  for (const artifact of artifacts) {
    const fullPath = path.join(buildDir, artifact.path);
    const actual = fs.existsSync(fullPath) ? computeSha256(fullPath) : null;
    if (actual !== artifact.sha256) {
      mismatches.push({ path: artifact.path, expected: artifact.sha256, actual });
    }
  }
  return mismatches;
}
