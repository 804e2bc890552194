import type { RecipeConfig } from "../src/types/recipe.js";
import type { BuildOutcome, BuildRequest, ContainerEngine, ImageInspect } from "../src/engine/engine.js";

export const COMMIT = "0123456789abcdef0123456789abcdef01234567";

/** Mirrors config/base.yaml. */
export function makeRecipe(patch: {
  source?: Partial<RecipeConfig["source"]>;
  builder?: Partial<RecipeConfig["builder"]>;
  runtime?: Partial<RecipeConfig["runtime"]>;
  platform?: string;
} = {}): RecipeConfig {
  return {
    schema_version: "1.0.0",
    runs_dir: ".imagesmith/runs",
    image: { tag: "cc-remote:latest" },
    platform: patch.platform,
    source: {
      repository: "https://github.com/cyb0124/CCRemote.git",
      subdirectory: "server",
      filter: "blob:none",
      pin: false,
      ...patch.source,
    },
    builder: {
      name: "builder",
      base_image: "rust:alpine3.22",
      package_manager: "apk",
      packages: ["git", "musl-dev", "openssl-dev", "pkgconfig", "build-base"],
      workdir: "/usr/src",
      build_command: ["cargo", "build", "--release"],
      artifact: "target/release/cc-remote",
      ...patch.builder,
    },
    runtime: {
      base_image: "alpine:3.22",
      package_manager: "apk",
      trust_roots: true,
      extra_packages: [],
      install_path: "/usr/local/bin/cc-remote",
      port: 1847,
      protocol: "tcp",
      ...patch.runtime,
    },
    engine: { command: "docker", timeout_seconds: 0 },
  };
}

export const GOOD_IMAGE: ImageInspect = {
  Id: "sha256:feedface",
  Os: "linux",
  Architecture: "amd64",
  Config: {
    ExposedPorts: { "1847/tcp": {} },
    Entrypoint: ["/usr/local/bin/cc-remote"],
    Cmd: null,
  },
};

const OK: BuildOutcome = { ok: true, exitCode: 0, output: "#1 DONE 0.1s\n" };

/** In-process stand-in for the docker CLI. `tags` holds the tags that currently exist. */
export class FakeEngine implements ContainerEngine {
  readonly builds: BuildRequest[] = [];
  readonly inspected: string[] = [];
  readonly tags = new Set<string>();

  constructor(
    private readonly outcomes: {
      builder?: BuildOutcome;
      runtime?: BuildOutcome;
      image?: ImageInspect | null;
    } = {},
  ) {}

  async build(req: BuildRequest): Promise<BuildOutcome> {
    this.builds.push(req);
    const outcome = (req.target ? this.outcomes.builder : this.outcomes.runtime) ?? OK;
    if (outcome.ok && req.tag) this.tags.add(req.tag);
    return outcome;
  }

  async tag(source: string, target: string): Promise<void> {
    if (!this.tags.has(source)) throw new Error(`No such image: ${source}`);
    this.tags.add(target);
  }

  async untag(tag: string): Promise<void> {
    if (!this.tags.delete(tag)) throw new Error(`No such image: ${tag}`);
  }

  async inspect(tag: string): Promise<ImageInspect | null> {
    this.inspected.push(tag);
    return this.outcomes.image === undefined ? GOOD_IMAGE : this.outcomes.image;
  }
}

export const fixedFetcher = {
  resolveRevision: async (): Promise<string> => COMMIT,
};
