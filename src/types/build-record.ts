/** Records written per build under {builds_dir}/{build-id}/. */
export type BuildArtifact = {
  path: string;
  schema: string;
  sha256: string;
  produced_by: string;
  produced_at: string;
};

export type BuildManifest = {
  build_id: string;
  created_at: string;
  status: string;
  engine: "local" | "docker";
  schema_registry: Record<string, string>;
  artifacts: BuildArtifact[];
};
