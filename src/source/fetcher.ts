import fs from "node:fs";
import path from "node:path";
import { simpleGit } from "simple-git";
import type { SourceSpec } from "../types/recipe.js";
import { isCommitSha, redactRepositoryUrl, repositoryDirName } from "./repository.js";

/** The subset of simple-git the fetcher drives. */
export interface GitClient {
  clone(repoPath: string, localPath: string, options?: string[]): Promise<string>;
  raw(commands: string[]): Promise<string>;
  listRemote(args?: string[]): Promise<string>;
  revparse(options: string[]): Promise<string>;
}

export type GitFactory = (baseDir?: string) => GitClient;

export type FetchedSource = {
  /** Clone root. */
  path: string;
  /** The project subdirectory inside the clone. */
  projectDir: string;
  commit: string;
};

/** Raised for every failure to obtain source: unreachable remote, unknown ref, missing subdirectory. */
export class FetchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FetchError";
  }
}

const FULL_SHA = /^[0-9a-f]{40}$/i;

function describe(e: unknown): string {
  return redactRepositoryUrl(e instanceof Error ? e.message : String(e));
}

/**
 * Partial source fetch: blob-filtered, sparse clone restricted to one
 * subdirectory. Wraps simple-git so tests can swap the client.
 */
export class SourceFetcher {
  private readonly git: GitFactory;

  constructor(git?: GitFactory) {
    this.git = git ?? ((baseDir) => simpleGit(baseDir));
  }

  /**
   * Resolve `ref` (default HEAD) on the remote to a commit SHA. A full SHA is
   * returned as is. An abbreviated SHA that names no remote ref is returned
   * unresolved once ls-remote has shown the remote is reachable; remotes do
   * not advertise commits, so only the checkout can expand it.
   */
  async resolveRevision(source: SourceSpec): Promise<string> {
    const ref = source.ref ?? "HEAD";
    if (FULL_SHA.test(ref)) return ref.toLowerCase();

    let listing: string;
    try {
      listing = await this.git().listRemote([source.repository, ref]);
    } catch (e: unknown) {
      throw new FetchError(`Source repository unreachable: ${describe(e)}`);
    }

    const candidates = [ref, `refs/heads/${ref}`, `refs/tags/${ref}^{}`, `refs/tags/${ref}`];
    const refs = new Map<string, string>();
    for (const line of listing.split("\n")) {
      const [sha, name] = line.trim().split(/\s+/);
      if (sha && name) refs.set(name, sha);
    }
    for (const name of candidates) {
      const sha = refs.get(name);
      if (sha) return sha;
    }
    if (isCommitSha(ref)) return ref.toLowerCase();
    throw new FetchError(`Ref '${ref}' not found in ${redactRepositoryUrl(source.repository)}`);
  }

  /** Clone `source` into `destDir/<repo name>` and check out only the project subdirectory. */
  async fetch(source: SourceSpec, destDir: string): Promise<FetchedSource> {
    const clonePath = path.join(destDir, repositoryDirName(source.repository));
    if (fs.existsSync(clonePath)) {
      throw new FetchError(`Checkout directory already exists: ${clonePath}`);
    }
    fs.mkdirSync(destDir, { recursive: true });

    try {
      await this.git(destDir).clone(source.repository, clonePath, [`--filter=${source.filter}`, "--sparse"]);
      const repo = this.git(clonePath);
      await repo.raw(["sparse-checkout", "set", source.subdirectory]);
      if (source.ref) await repo.raw(["checkout", source.ref]);
    } catch (e: unknown) {
      throw new FetchError(`Fetch failed: ${describe(e)}`);
    }

    const projectDir = path.join(clonePath, source.subdirectory);
    if (!fs.existsSync(projectDir) || !fs.statSync(projectDir).isDirectory()) {
      throw new FetchError(`Sparse-checkout path '${source.subdirectory}' not found in ${redactRepositoryUrl(source.repository)}`);
    }

    const commit = (await this.git(clonePath).revparse(["HEAD"])).trim();
    return { path: clonePath, projectDir, commit };
  }
}
