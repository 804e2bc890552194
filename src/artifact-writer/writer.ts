import fs from "node:fs";
import path from "node:path";
import {
  artifactDigest,
  buildManifest,
  type ArtifactKind,
  type ManifestArtifact,
  type ManifestBuildInput,
  type RunManifest,
} from "./manifest-builder.js";
import { sanitizePathComponent } from "../core/security.js";

export type WriteArtifactInput = {
  /** Relative path within the run directory (e.g., "plan.json"). */
  relativePath: string;
  kind: ArtifactKind;
  /** Text is written as-is; anything else as pretty JSON. */
  content: unknown;
  /** Step that produced this artifact (e.g., "render"). */
  producedBy: string;
};

/**
 * Artifact Writer: manages the directory of one build run.
 * Writes individual artifacts and generates the final manifest.
 */
export class ArtifactWriter {
  private artifacts: ManifestArtifact[] = [];
  private readonly runDir: string;

  constructor(
    baseDir: string,
    private readonly runId: string,
  ) {
    this.runDir = path.join(baseDir, sanitizePathComponent(runId));
  }

  /** Ensure the run directory exists. */
  init(): void {
    fs.mkdirSync(this.runDir, { recursive: true });
  }

  /** Write a single artifact file and track it. Rewriting a path replaces its entry. */
  writeArtifact(input: WriteArtifactInput): string {
    const fullPath = path.join(this.runDir, input.relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });

    const body = typeof input.content === "string" ? input.content : JSON.stringify(input.content, null, 2) + "\n";
    fs.writeFileSync(fullPath, body, "utf8");

    const artifact: ManifestArtifact = {
      path: input.relativePath,
      kind: input.kind,
      sha256: artifactDigest(body),
      bytes: Buffer.byteLength(body, "utf8"),
      produced_by: input.producedBy,
      produced_at: new Date().toISOString(),
    };

    this.artifacts = [...this.artifacts.filter((a) => a.path !== input.relativePath), artifact];
    return fullPath;
  }

  /** Generate and write manifest.json. Returns the manifest. */
  writeManifest(opts: Omit<ManifestBuildInput, "run_id" | "artifacts">): RunManifest {
    const manifest = buildManifest({ ...opts, run_id: this.runId, artifacts: this.artifacts });
    fs.writeFileSync(path.join(this.runDir, "manifest.json"), JSON.stringify(manifest, null, 2) + "\n", "utf8");
    return manifest;
  }

  getRunDir(): string {
    return this.runDir;
  }

  getArtifacts(): ManifestArtifact[] {
    return [...this.artifacts];
  }
}
