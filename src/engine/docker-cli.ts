import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { EngineSpec } from "../types/recipe.js";
import { sanitizeEnv } from "../core/security.js";
import type { BuildOutcome, BuildRequest, ContainerEngine, ImageInspect } from "./engine.js";

const pExecFile = promisify(execFile);

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

type ExecError = { code?: number | string; stdout?: string; stderr?: string; message?: string };

function asExecError(e: unknown): ExecError {
  if (!(e instanceof Error)) return { message: String(e) };
  return {
    message: e.message,
    code: "code" in e && (typeof e.code === "number" || typeof e.code === "string") ? e.code : undefined,
    stdout: "stdout" in e && typeof e.stdout === "string" ? e.stdout : undefined,
    stderr: "stderr" in e && typeof e.stderr === "string" ? e.stderr : undefined,
  };
}

function isImageInspect(value: unknown): value is ImageInspect {
  if (typeof value !== "object" || value === null) return false;
  if (!("Id" in value && "Os" in value && "Architecture" in value && "Config" in value)) return false;
  return (
    typeof value.Id === "string" &&
    typeof value.Os === "string" &&
    typeof value.Architecture === "string" &&
    typeof value.Config === "object" &&
    value.Config !== null
  );
}

/** Build arguments for `buildx build`; exported for tests. */
export function buildArgs(req: BuildRequest): string[] {
  const args = ["buildx", "build", "--platform", req.platform, "--file", req.dockerfile, "--progress", "plain"];
  if (req.target) args.push("--target", req.target);
  if (req.tag) args.push("--tag", req.tag, "--load");
  args.push(req.context);
  return args;
}

/** Docker CLI engine: `buildx build` and `image inspect` through execFile. */
export class DockerCliEngine implements ContainerEngine {
  constructor(private readonly config: EngineSpec) {}

  private execOptions() {
    return {
      encoding: "utf8" as const,
      timeout: this.config.timeout_seconds * 1000,
      maxBuffer: MAX_OUTPUT_BYTES,
      env: { ...sanitizeEnv(process.env), DOCKER_BUILDKIT: "1" },
    };
  }

  async build(req: BuildRequest): Promise<BuildOutcome> {
    try {
      const { stdout, stderr } = await pExecFile(this.config.command, buildArgs(req), this.execOptions());
      return { ok: true, exitCode: 0, output: stdout + stderr };
    } catch (e: unknown) {
      const err = asExecError(e);
      const output = (err.stdout ?? "") + (err.stderr ?? "");
      return {
        ok: false,
        exitCode: typeof err.code === "number" ? err.code : 1,
        output: output.length > 0 ? output : err.message ?? "engine failed",
      };
    }
  }

  async tag(source: string, target: string): Promise<void> {
    await this.run(["image", "tag", source, target], "Image tag");
  }

  async untag(tag: string): Promise<void> {
    await this.run(["image", "rm", tag], "Image removal");
  }

  async inspect(tag: string): Promise<ImageInspect | null> {
    let stdout: string;
    try {
      ({ stdout } = await pExecFile(this.config.command, ["image", "inspect", tag], this.execOptions()));
    } catch (e: unknown) {
      const err = asExecError(e);
      if (/no such image/i.test(err.stderr ?? "")) return null;
      throw new Error(`Image inspect failed: ${err.stderr || err.message || String(e)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(stdout);
    } catch (e: unknown) {
      throw new Error(`Image inspect returned malformed JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
    if (!Array.isArray(parsed)) throw new Error("Image inspect returned a non-array payload");
    if (parsed.length === 0) return null;
    const first: unknown = parsed[0];
    if (!isImageInspect(first)) throw new Error("Image inspect payload lacks Id, Os, Architecture or Config");
    return first;
  }

  private async run(args: string[], what: string): Promise<void> {
    try {
      await pExecFile(this.config.command, args, this.execOptions());
    } catch (e: unknown) {
      const err = asExecError(e);
      throw new Error(`${what} failed: ${err.stderr || err.message || String(e)}`);
    }
  }
}
