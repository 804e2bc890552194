import path from "node:path";
import { Orchestrator, type OrchestratorResult } from "../core/orchestrator.js";
import { DockerCliEngine } from "../engine/docker-cli.js";
import type { ContainerEngine } from "../engine/engine.js";
import { SourceFetcher } from "../source/fetcher.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { loadRecipe, pickPlatform, type RecipeOptions } from "./load-recipe.js";

export type BuildOptions = RecipeOptions & {
  platform?: string;
  tag?: string;
  runsRoot?: string;
  engine?: ContainerEngine;
  fetcher?: Pick<SourceFetcher, "resolveRevision">;
  onEvent?: (event: Diagnostic) => void;
};

export type BuildResult =
  | { ok: true; result: OrchestratorResult }
  | { ok: false; exitCode: ExitCode; errors: Diagnostic[]; result?: OrchestratorResult };

export function exitCodeFor(result: OrchestratorResult): ExitCode {
  if (result.success) return EXIT.SUCCESS;
  return result.failure?.kind === "verify" ? EXIT.VERIFY_FAILED : EXIT.BUILD_FAILED;
}

/** Run the full two-stage pipeline once. */
export async function build(opts: BuildOptions): Promise<BuildResult> {
  const loaded = loadRecipe(opts);
  if (!loaded.ok) return { ok: false, exitCode: EXIT.INVALID_CONFIG, errors: loaded.errors };
  const { recipe } = loaded;

  const platform = pickPlatform(recipe, opts.platform);
  if (!platform.ok) return { ok: false, exitCode: EXIT.INVALID_ARGS, errors: [platform.error] };

  const runsDir = path.resolve(process.cwd(), opts.runsRoot ?? recipe.runs_dir);
  const orchestrator = new Orchestrator(runsDir, recipe, {
    engine: opts.engine ?? new DockerCliEngine(recipe.engine),
    fetcher: opts.fetcher ?? new SourceFetcher(),
    onEvent: opts.onEvent,
  });

  const result = await orchestrator.run({ platform: platform.platform, tag: opts.tag });
  if (result.success) return { ok: true, result };

  const failure = result.failure;
  return {
    ok: false,
    exitCode: exitCodeFor(result),
    errors: [
      {
        level: "error",
        code: failure ? `${failure.kind.toUpperCase()}_FAILED` : "BUILD_FAILED",
        message: failure?.message ?? `Build ended in ${result.final_status}`,
        path: result.run_dir,
        details: failure?.detail ? { detail: failure.detail } : undefined,
      },
    ],
    result,
  };
}
