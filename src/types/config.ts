/** Configuration types — layered config system (base.yaml ← env.yaml ← SLIMSTAGE_*). */
export type VariantSelectionConfig =
  | { mechanism: "source"; source: string }
  | { mechanism: "index-url"; index_url: string };

export type BaseConfig = {
  image: string;
  workdir: string;
  env?: Record<string, string>;
};

export type PackageManagerConfig = {
  name: "poetry";
  version: string;
  home: string;
};

export type VerifyConfig = {
  enabled: boolean;
  strict: boolean;
};

export type BuilderConfig = {
  toolchain: string[];
  package_manager: PackageManagerConfig;
  manifest: string;
  lock: string;
  install_prefix: string;
  include_dev: boolean;
  variant: VariantSelectionConfig;
  verify: VerifyConfig;
  cache_paths: string[];
  index_file?: string;
};

export type MlRuntimeConfig = {
  package: string;
  import_name: string;
};

export type RuntimeConfig = {
  probe_packages: string[];
  app_source: string;
  app_dest: string;
  ignore: string[];
};

export type EntrypointConfig = {
  app: string;
};

export type SlimstageConfig = {
  schema_version: string;
  project: string;
  builds_dir: string;
  cache_dir: string;
  base: BaseConfig;
  builder: BuilderConfig;
  ml_runtime: MlRuntimeConfig;
  runtime: RuntimeConfig;
  entrypoint: EntrypointConfig;
  timeouts?: Record<string, number>;
};
