/** Recipe types: the layered configuration describing one image pipeline. */
export type PackageManager = "apk" | "apt";

export type PortProtocol = "tcp" | "udp";

export type SourceSpec = {
  repository: string;
  subdirectory: string;
  ref?: string;
  filter: string;
  pin: boolean;
};

export type BuilderSpec = {
  name: string;
  base_image: string;
  package_manager: PackageManager;
  packages: string[];
  workdir: string;
  build_command: string[];
  /** Binary path relative to the project subdirectory. */
  artifact: string;
};

export type RuntimeSpec = {
  base_image: string;
  package_manager: PackageManager;
  trust_roots: boolean;
  extra_packages: string[];
  install_path: string;
  port: number;
  protocol: PortProtocol;
};

export type EngineSpec = {
  command: string;
  /** 0 disables the timeout. */
  timeout_seconds: number;
};

export type RecipeConfig = {
  schema_version: string;
  runs_dir: string;
  image: { tag: string };
  platform?: string;
  source: SourceSpec;
  builder: BuilderSpec;
  runtime: RuntimeSpec;
  engine: EngineSpec;
};
