import type { RecipeConfig } from "../types/recipe.js";
import { diag, type Diagnostic } from "../types/diagnostic.js";
import { installCommands } from "./package-manager.js";
import { PLATFORM_EXPR, step, type Stage } from "./stage.js";

export const TRUST_ROOTS_PACKAGE = "ca-certificates";

/** Single-ownership transfer of the compiled binary between stages. */
export type ArtifactHandoff = {
  fromStage: string;
  sourcePath: string;
  destinationPath: string;
};

export type RuntimeStage = Stage & { role: "runtime" };

/**
 * Runtime stage: minimal base, trust roots, the handed-off binary, and image
 * metadata. Nothing from the builder besides `handoff.sourcePath` is read.
 */
export function buildRuntimeStage(
  recipe: RecipeConfig,
  handoff: ArtifactHandoff,
): { stage: RuntimeStage; warnings: Diagnostic[] } {
  const { runtime } = recipe;
  const warnings: Diagnostic[] = [];

  const packages = runtime.trust_roots
    ? [TRUST_ROOTS_PACKAGE, ...runtime.extra_packages.filter((p) => p !== TRUST_ROOTS_PACKAGE)]
    : runtime.extra_packages;
  if (!runtime.trust_roots) {
    warnings.push(
      diag("warn", "TRUST_ROOTS_DISABLED", "Runtime image has no TLS trust roots; outbound TLS from the binary will fail", {
        path: "runtime.trust_roots",
      }),
    );
  }

  const steps = [step("platform", { kind: "from", image: runtime.base_image, platform: PLATFORM_EXPR })];
  if (packages.length > 0) {
    steps.push(step("trust-roots", { kind: "run", commands: installCommands(runtime.package_manager, packages) }));
  }
  steps.push(
    step("handoff", {
      kind: "copy",
      from: handoff.fromStage,
      source: handoff.sourcePath,
      destination: handoff.destinationPath,
    }),
    step("metadata", { kind: "expose", port: runtime.port, protocol: runtime.protocol }),
    step("metadata", { kind: "entrypoint", argv: [handoff.destinationPath] }),
  );

  return { stage: { role: "runtime", steps }, warnings };
}
