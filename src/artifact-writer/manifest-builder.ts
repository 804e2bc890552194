import { createHash } from "node:crypto";
import type { BuildStatus } from "../core/state-machine.js";

export type ArtifactKind = "dockerfile" | "plan" | "log" | "inspect";

export type ManifestArtifact = {
  path: string;
  kind: ArtifactKind;
  sha256: string;
  bytes: number;
  produced_by: string;
  produced_at: string;
};

/** Run manifest: integrity anchor for every file a build run wrote. */
export type RunManifest = {
  run_id: string;
  created_at: string;
  status: BuildStatus;
  platform: string;
  tag: string;
  source_commit: string | null;
  remote_head: string | null;
  image_id: string | null;
  artifacts: ManifestArtifact[];
};

/** Hex SHA-256 of an artifact body exactly as written to disk. */
export function artifactDigest(body: string | Buffer): string {
  return createHash("sha256").update(body).digest("hex");
}

export type ManifestBuildInput = Omit<RunManifest, "created_at">;

/** Artifacts every successful run must have produced. */
export const REQUIRED_ARTIFACTS = ["Dockerfile", "plan.json", "build-builder.log", "build-runtime.log", "image.json"];

export function buildManifest(input: ManifestBuildInput): RunManifest {
  return {
    run_id: input.run_id,
    created_at: new Date().toISOString(),
    status: input.status,
    platform: input.platform,
    tag: input.tag,
    source_commit: input.source_commit,
    remote_head: input.remote_head,
    image_id: input.image_id,
    artifacts: [...input.artifacts].sort((a, b) => a.path.localeCompare(b.path)),
  };
}

/** Required artifacts a manifest does not list. */
export function missingArtifacts(manifest: RunManifest): string[] {
  const present = new Set(manifest.artifacts.map((a) => a.path));
  return REQUIRED_ARTIFACTS.filter((p) => !present.has(p));
}
