import type { RecipeConfig, SourceSpec } from "../types/recipe.js";
import { diag, type Diagnostic } from "../types/diagnostic.js";
import { formatPlatform, isSupported, type TargetPlatform } from "../platform/platform.js";
import { renderDockerfile, renderInstruction } from "../dockerfile/render.js";
import { redactRepositoryUrl } from "../source/repository.js";
import { buildBuilderStage, type BuilderStage } from "./builder-stage.js";
import { buildRuntimeStage, type ArtifactHandoff, type RuntimeStage } from "./runtime-stage.js";
import { stageInstructions, type StageRole, type StepPurpose } from "./stage.js";

export type BuildPlan = {
  platform: TargetPlatform;
  tag: string;
  source: SourceSpec & { commit: string | null };
  stages: [BuilderStage, RuntimeStage];
  handoff: ArtifactHandoff;
  port: { number: number; protocol: "tcp" | "udp" };
  entrypoint: string[];
  warnings: Diagnostic[];
};

export type PlanStepView = {
  stage: StageRole;
  index: number;
  purpose: StepPurpose;
  text: string;
};

/** Assemble the two-stage plan for one build invocation. */
export function createPlan(
  recipe: RecipeConfig,
  opts: { platform: TargetPlatform; tag?: string; sourceCommit?: string },
): BuildPlan {
  const builder = buildBuilderStage(recipe, { commit: opts.sourceCommit });
  const handoff: ArtifactHandoff = {
    fromStage: builder.alias,
    sourcePath: builder.artifactPath,
    destinationPath: recipe.runtime.install_path,
  };
  const runtime = buildRuntimeStage(recipe, handoff);

  const warnings = [...runtime.warnings];
  if (recipe.source.pin && !opts.sourceCommit) {
    warnings.push(diag("warn", "SOURCE_NOT_PINNED", "source.pin is set but no commit was resolved; the fetch follows the remote ref"));
  }

  return {
    platform: opts.platform,
    tag: opts.tag ?? recipe.image.tag,
    // Only a pinned source checks the commit out; otherwise the clone follows the ref.
    source: { ...recipe.source, commit: recipe.source.pin ? (opts.sourceCommit ?? null) : null },
    stages: [builder, runtime.stage],
    handoff,
    port: { number: recipe.runtime.port, protocol: recipe.runtime.protocol },
    entrypoint: [handoff.destinationPath],
    warnings,
  };
}

export function renderPlan(plan: BuildPlan): string {
  return renderDockerfile(plan.stages.map(stageInstructions));
}

/** Flattened steps with their rendered instruction text. */
export function describeSteps(plan: BuildPlan): PlanStepView[] {
  return plan.stages.flatMap((stage) =>
    stage.steps.map((s, index) => ({
      stage: stage.role,
      index,
      purpose: s.purpose,
      text: renderInstruction(s.instruction),
    })),
  );
}

const BUILD_ONLY_PURPOSES: ReadonlySet<StepPurpose> = new Set(["provision", "fetch", "compile"]);

/** Check the cross-stage invariants of a plan. Returns error and warning diagnostics. */
export function checkPlan(plan: BuildPlan): Diagnostic[] {
  const out: Diagnostic[] = [];
  const [builder, runtime] = plan.stages;

  if (!isSupported(plan.platform)) {
    out.push(
      diag("error", "PLATFORM_UNSUPPORTED", `Target platform ${formatPlatform(plan.platform)} is not published by the base images`),
    );
  }

  const platformExprs = new Set<string>();
  for (const stage of plan.stages) {
    const from = stage.steps[0]?.instruction;
    if (!from || from.kind !== "from") {
      out.push(diag("error", "STAGE_WITHOUT_FROM", `The ${stage.role} stage does not start with FROM`));
      continue;
    }
    platformExprs.add(from.platform ?? "");
  }
  if (platformExprs.size > 1) {
    out.push(diag("error", "PLATFORM_MISMATCH", "Builder and runtime stages must use the same target platform"));
  }

  if (plan.handoff.fromStage !== builder.alias) {
    out.push(diag("error", "HANDOFF_STAGE", `Handoff reads from '${plan.handoff.fromStage}', builder stage is '${builder.alias}'`));
  }
  if (plan.handoff.sourcePath !== builder.artifactPath) {
    out.push(
      diag("error", "HANDOFF_PATH", `Handoff source ${plan.handoff.sourcePath} is not the builder artifact ${builder.artifactPath}`),
    );
  }

  const leaked = runtime.steps.filter((s) => BUILD_ONLY_PURPOSES.has(s.purpose));
  if (leaked.length > 0) {
    out.push(
      diag("error", "RUNTIME_BUILD_STEP", `Runtime stage contains build-only steps: ${leaked.map((s) => s.purpose).join(", ")}`),
    );
  }

  const copies = runtime.steps.filter((s) => s.instruction.kind === "copy");
  if (copies.length !== 1) {
    out.push(diag("error", "HANDOFF_COUNT", `Runtime stage must copy exactly one artifact, found ${copies.length}`));
  }

  if (plan.entrypoint.length !== 1 || plan.entrypoint[0] !== plan.handoff.destinationPath) {
    out.push(diag("error", "ENTRYPOINT", "Entrypoint must be the installed binary with no arguments"));
  }

  return [...out, ...plan.warnings];
}

/** Plan as written to plan.json: credentials in the repository URL are redacted. */
export function planRecord(plan: BuildPlan): Record<string, unknown> {
  return {
    platform: formatPlatform(plan.platform),
    tag: plan.tag,
    source: { ...plan.source, repository: redactRepositoryUrl(plan.source.repository) },
    handoff: plan.handoff,
    port: plan.port,
    entrypoint: plan.entrypoint,
    steps: describeSteps(plan).map((s) => ({ ...s, text: redactRepositoryUrl(s.text) })),
    warnings: plan.warnings,
  };
}
