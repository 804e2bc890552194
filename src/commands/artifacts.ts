import fs from "node:fs";
import path from "node:path";
import { artifactDigest, missingArtifacts, type RunManifest } from "../artifact-writer/manifest-builder.js";
import { sanitizePathComponent } from "../core/security.js";

export type ArtifactEntry = {
  path: string;
  size: number;
  /** null when the manifest does not list the file. */
  intact: boolean | null;
};

export type ArtifactsResult =
  | {
      ok: true;
      files: ArtifactEntry[];
      /** Required artifacts the manifest of a finished run does not list. */
      missing: string[];
    }
  | { ok: false; error: string };

function readManifest(dir: string): RunManifest | null {
  const manifestPath = path.join(dir, "manifest.json");
  if (!fs.existsSync(manifestPath)) return null;
  return JSON.parse(fs.readFileSync(manifestPath, "utf8")) as RunManifest;
}

/**
 * List files of a build run, checking each against the SHA-256 recorded in manifest.json.
 */
export function listArtifacts(opts: { runsDir: string; runId: string }): ArtifactsResult {
  let dir: string;
  try {
    dir = path.join(opts.runsDir, sanitizePathComponent(opts.runId));
  } catch (e: unknown) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
  }

  if (!fs.existsSync(dir)) {
    return { ok: false, error: `No artifacts found for: ${opts.runId}` };
  }

  let manifest: RunManifest | null;
  try {
    manifest = readManifest(dir);
  } catch (e: unknown) {
    return { ok: false, error: `Failed to read manifest: ${e instanceof Error ? e.message : String(e)}` };
  }

  const hashes = new Map<string, string>();
  for (const a of manifest?.artifacts ?? []) hashes.set(a.path, a.sha256);

  const files: ArtifactEntry[] = [];
  collectFiles(dir, dir, files, hashes);

  return {
    ok: true,
    files: files.sort((a, b) => a.path.localeCompare(b.path)),
    missing: manifest?.status === "done" ? missingArtifacts(manifest) : [],
  };
}

function collectFiles(baseDir: string, currentDir: string, out: ArtifactEntry[], hashes: Map<string, string>): void {
  const entries = fs.readdirSync(currentDir, { withFileTypes: true });
  for (const entry of entries) {
    const fullPath = path.join(currentDir, entry.name);
    if (entry.isDirectory()) {
      collectFiles(baseDir, fullPath, out, hashes);
    } else if (entry.isFile()) {
      const rel = path.relative(baseDir, fullPath).split(path.sep).join("/");
      const expected = hashes.get(rel);
      out.push({
        path: rel,
        size: fs.statSync(fullPath).size,
        intact: expected === undefined ? null : artifactDigest(fs.readFileSync(fullPath)) === expected,
      });
    }
  }
}
