import type { InstalledPackage } from "./manifest.js";

/** Image record — the Runtime stage's closure plus its declared metadata. */
export type HealthcheckSpec = {
  test: string[];
  interval_s: number;
  timeout_s: number;
  retries: number;
};

export type ImageMetadata = {
  exposedPorts: number[];
  healthcheck: HealthcheckSpec;
  command: string[];
  env: Record<string, string>;
  workdir: string;
};

export type LayerReport = {
  stage: string;
  op: string;
  key: string;
  cached: boolean;
};

export type MlRuntimeReport = {
  package: string;
  version: string;
  accelerator: boolean;
};

export type Image = {
  id: string;
  created_at: string;
  target: string;
  base_image: string;
  dependency_cache_key: string;
  metadata: ImageMetadata;
  layers: LayerReport[];
  packages: InstalledPackage[];
  floating: boolean;
  ml_runtime: MlRuntimeReport | null;
  files: string[];
};
