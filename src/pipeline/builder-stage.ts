import path from "node:path";
import type { RecipeConfig } from "../types/recipe.js";
import { quoteShellArg, shellCommand } from "../dockerfile/shell.js";
import { repositoryDirName } from "../source/repository.js";
import { installCommands } from "./package-manager.js";
import { PLATFORM_ARG, PLATFORM_EXPR, step, type Stage } from "./stage.js";

export type BuilderStage = Stage & {
  role: "builder";
  alias: string;
  /** Directory the build command runs in. */
  projectDir: string;
  /** The only path the runtime stage reads from this stage. */
  artifactPath: string;
};

/**
 * Builder stage: provision the toolchain, fetch a sparse partial clone of
 * the source restricted to the project subdirectory, compile in release mode.
 *
 * When `commit` is given and the source is pinned, the checkout is moved to
 * that commit so repeated builds compile the same tree.
 */
export function buildBuilderStage(recipe: RecipeConfig, opts: { commit?: string } = {}): BuilderStage {
  const { builder, source } = recipe;
  const checkoutDir = repositoryDirName(source.repository);
  const cloneRoot = path.posix.join(builder.workdir, checkoutDir);
  const projectDir = path.posix.join(cloneRoot, source.subdirectory);
  const artifactPath = path.posix.join(projectDir, builder.artifact);

  const fetch = [
    `git clone --filter=${quoteShellArg(source.filter)} --sparse ${quoteShellArg(source.repository)}`,
    `cd ${quoteShellArg(checkoutDir)}`,
    `git sparse-checkout set ${quoteShellArg(source.subdirectory)}`,
  ];
  const checkoutRef = source.pin && opts.commit ? opts.commit : source.ref;
  if (checkoutRef) fetch.push(`git checkout ${quoteShellArg(checkoutRef)}`);

  const steps = [
    step("platform", { kind: "from", image: builder.base_image, platform: PLATFORM_EXPR, alias: builder.name }),
    step("platform", { kind: "arg", name: PLATFORM_ARG }),
  ];
  if (builder.packages.length > 0) {
    steps.push(step("provision", { kind: "run", commands: installCommands(builder.package_manager, builder.packages) }));
  }
  steps.push(
    step("workdir", { kind: "workdir", path: builder.workdir }),
    step("fetch", { kind: "run", commands: fetch }),
    step("workdir", { kind: "workdir", path: projectDir }),
    step("compile", { kind: "run", commands: [shellCommand(builder.build_command)] }),
  );

  return { role: "builder", alias: builder.name, steps, projectDir, artifactPath };
}
