import fs from "node:fs";
import path from "node:path";
import type { RecipeConfig } from "../types/recipe.js";
import type { Diagnostic } from "../types/diagnostic.js";
import type { ContainerEngine } from "../engine/engine.js";
import type { SourceFetcher } from "../source/fetcher.js";
import { FetchError } from "../source/fetcher.js";
import { formatPlatform, type TargetPlatform } from "../platform/platform.js";
import { checkPlan, createPlan, planRecord, renderPlan, type BuildPlan } from "../pipeline/plan.js";
import { classifyBuildFailure, type PipelineFailure } from "../failures/classify.js";
import { verifyImage } from "../verify/image.js";
import { ArtifactWriter } from "../artifact-writer/writer.js";
import { ProgressLog } from "./progress-log.js";
import { makeRunId } from "./run-id.js";
import { redactSensitiveInfo } from "./security.js";
import { BUILD_STEPS, isBuildStep, isTerminal, nextState, type BuildStatus, type BuildStep } from "./state-machine.js";

/** Persistent run state stored in runs/{id}/state.json */
export type BuildRunState = {
  run_id: string;
  platform: string;
  tag: string;
  current_step: BuildStatus;
  started_at: string;
  updated_at: string;
  step_started_at: string | null;
  /** Commit the builder stage checks out; null when the clone follows the ref. */
  source_commit: string | null;
  /** What `ref` pointed at on the remote when the run resolved it. */
  remote_head: string | null;
  image_id: string | null;
  step_results: Partial<Record<BuildStep, { status: "success" | "failed"; duration_ms: number; error?: string }>>;
  failure: PipelineFailure | null;
};

export type OrchestratorResult = {
  success: boolean;
  run_id: string;
  run_dir: string;
  final_status: BuildStatus;
  step_results: BuildRunState["step_results"];
  warnings: Diagnostic[];
  image_id: string | null;
  failure?: PipelineFailure;
};

export type OrchestratorDeps = {
  engine: ContainerEngine;
  fetcher: Pick<SourceFetcher, "resolveRevision">;
  /** Receives one event per step transition; the CLI prints them. */
  onEvent?: (event: Diagnostic) => void;
};

type StepOutcome = { ok: true } | { ok: false; failure: PipelineFailure };

/** Mutable context threaded through the steps of one run. */
type RunContext = {
  state: BuildRunState;
  platform: TargetPlatform;
  writer: ArtifactWriter;
  plan: BuildPlan | null;
  dockerfilePath: string;
  contextDir: string;
  warnings: Diagnostic[];
};

/** Run-scoped tag the runtime build loads under until verification passes. */
export function candidateTag(runId: string): string {
  return `imagesmith-candidate:${runId.toLowerCase()}`;
}

function redactFailure(failure: PipelineFailure): PipelineFailure {
  return {
    ...failure,
    message: redactSensitiveInfo(failure.message),
    step: failure.step === undefined ? undefined : redactSensitiveInfo(failure.step),
    detail: failure.detail === undefined ? undefined : redactSensitiveInfo(failure.detail),
  };
}

/**
 * Orchestrator: drives one build through the linear step sequence.
 *
 * Main loop: execute step → persist → advance. The first failure ends the
 * run; the runtime stage is never built unless the builder stage succeeded.
 * The runtime build loads under a candidate tag, and the requested tag is
 * applied only once the image verifies. Every invocation is a new run.
 */
export class Orchestrator {
  constructor(
    private readonly runsDir: string,
    private readonly recipe: RecipeConfig,
    private readonly deps: OrchestratorDeps,
  ) {}

  async run(opts: { platform: TargetPlatform; tag?: string; runId?: string }): Promise<OrchestratorResult> {
    const runId = opts.runId ?? makeRunId();
    const writer = new ArtifactWriter(this.runsDir, runId);
    writer.init();
    const runDir = writer.getRunDir();
    const statePath = path.join(runDir, "state.json");
    const log = new ProgressLog(path.join(runDir, "progress.log"), runId);

    const now = new Date().toISOString();
    const ctx: RunContext = {
      state: {
        run_id: runId,
        platform: formatPlatform(opts.platform),
        tag: opts.tag ?? this.recipe.image.tag,
        current_step: BUILD_STEPS[0],
        started_at: now,
        updated_at: now,
        step_started_at: null,
        source_commit: null,
        remote_head: null,
        image_id: null,
        step_results: {},
        failure: null,
      },
      platform: opts.platform,
      writer,
      plan: null,
      dockerfilePath: path.join(runDir, "Dockerfile"),
      contextDir: path.join(runDir, "context"),
      warnings: [],
    };
    const { state } = ctx;
    this.saveState(statePath, state);

    while (!isTerminal(state.current_step)) {
      const step = state.current_step;
      if (!isBuildStep(step)) break;

      state.step_started_at = new Date().toISOString();
      state.updated_at = state.step_started_at;
      this.saveState(statePath, state);
      log.write(step, "started");
      this.emit({ level: "info", code: `${step.toUpperCase()}_STARTED`, message: `${step} started` });

      const stepStart = Date.now();
      let outcome: StepOutcome;
      try {
        outcome = await this.execute(step, ctx);
      } catch (e: unknown) {
        const message = redactSensitiveInfo(e instanceof Error ? e.message : String(e));
        outcome = { ok: false, failure: { kind: "engine", stage: null, message } };
      }
      const duration_ms = Date.now() - stepStart;

      if (outcome.ok) {
        state.step_results[step] = { status: "success", duration_ms };
        state.current_step = nextState(step, "success");
        log.write(step, `ok duration_ms=${duration_ms}`);
        this.emit({ level: "info", code: `${step.toUpperCase()}_OK`, message: `${step} OK` });
      } else {
        state.step_results[step] = { status: "failed", duration_ms, error: outcome.failure.message };
        state.current_step = nextState(step, "failure");
        state.failure = outcome.failure;
        log.write(step, `failed kind=${outcome.failure.kind} ${outcome.failure.message}`);
        this.emit({
          level: "error",
          code: `${outcome.failure.kind.toUpperCase()}_FAILED`,
          message: outcome.failure.message,
          details: { step, stage: outcome.failure.stage, instruction: outcome.failure.step ?? null },
        });
      }

      state.step_started_at = null;
      state.updated_at = new Date().toISOString();
      this.saveState(statePath, state);
    }

    writer.writeManifest({
      status: state.current_step,
      platform: state.platform,
      tag: state.tag,
      source_commit: state.source_commit,
      remote_head: state.remote_head,
      image_id: state.image_id,
    });

    return {
      success: state.current_step === "done",
      run_id: runId,
      run_dir: runDir,
      final_status: state.current_step,
      step_results: state.step_results,
      warnings: ctx.warnings,
      image_id: state.image_id,
      failure: state.failure ?? undefined,
    };
  }

  private async execute(step: BuildStep, ctx: RunContext): Promise<StepOutcome> {
    switch (step) {
      case "plan":
        return this.checkPlanStep(ctx);
      case "resolve_source":
        return this.resolveSource(ctx);
      case "render":
        return this.render(ctx);
      case "build_builder":
        return this.buildStage(ctx, "builder");
      case "build_runtime":
        return this.buildStage(ctx, "runtime");
      case "verify":
        return this.verify(ctx);
    }
  }

  /** Fail fast on invariant violations before touching the network. */
  private checkPlanStep(ctx: RunContext): StepOutcome {
    const draft = createPlan(this.recipe, { platform: ctx.platform, tag: ctx.state.tag });
    const diagnostics = checkPlan(draft);
    const errors = diagnostics.filter((d) => d.level === "error");
    ctx.warnings.push(...diagnostics.filter((d) => d.level === "warn" && d.code !== "SOURCE_NOT_PINNED"));
    for (const w of ctx.warnings) this.emit(w);

    if (errors.length === 0) return { ok: true };
    const platformOnly = errors.every((d) => d.code.startsWith("PLATFORM_"));
    return {
      ok: false,
      failure: {
        kind: platformOnly ? "platform" : "config",
        stage: null,
        message: errors.map((d) => d.message).join("; "),
      },
    };
  }

  private async resolveSource(ctx: RunContext): Promise<StepOutcome> {
    try {
      const head = await this.deps.fetcher.resolveRevision(this.recipe.source);
      ctx.state.remote_head = head;
      ctx.state.source_commit = this.recipe.source.pin ? head : null;
      return { ok: true };
    } catch (e: unknown) {
      if (e instanceof FetchError) {
        return { ok: false, failure: { kind: "fetch", stage: "builder", message: e.message } };
      }
      throw e;
    }
  }

  private render(ctx: RunContext): StepOutcome {
    const plan = createPlan(this.recipe, {
      platform: ctx.platform,
      tag: ctx.state.tag,
      sourceCommit: ctx.state.source_commit ?? undefined,
    });
    ctx.plan = plan;
    ctx.writer.writeArtifact({ relativePath: "Dockerfile", kind: "dockerfile", content: renderPlan(plan), producedBy: "render" });
    ctx.writer.writeArtifact({ relativePath: "plan.json", kind: "plan", content: planRecord(plan), producedBy: "render" });
    // The Dockerfile needs nothing from the host; the context stays empty.
    fs.mkdirSync(ctx.contextDir, { recursive: true });
    return { ok: true };
  }

  private async buildStage(ctx: RunContext, stage: "builder" | "runtime"): Promise<StepOutcome> {
    const plan = this.requirePlan(ctx);
    const outcome = await this.deps.engine.build({
      dockerfile: ctx.dockerfilePath,
      context: ctx.contextDir,
      platform: formatPlatform(plan.platform),
      target: stage === "builder" ? plan.stages[0].alias : undefined,
      tag: stage === "runtime" ? candidateTag(ctx.state.run_id) : undefined,
    });
    ctx.writer.writeArtifact({
      relativePath: `build-${stage}.log`,
      kind: "log",
      content: redactSensitiveInfo(outcome.output),
      producedBy: `build_${stage}`,
    });

    if (outcome.ok) return { ok: true };
    return { ok: false, failure: redactFailure(classifyBuildFailure(plan, stage, outcome.output)) };
  }

  /**
   * Inspect the candidate image. Only a conforming image receives the
   * requested tag; a non-conforming one is removed with its candidate tag.
   */
  private async verify(ctx: RunContext): Promise<StepOutcome> {
    const plan = this.requirePlan(ctx);
    const { engine } = this.deps;
    const candidate = candidateTag(ctx.state.run_id);
    const image = await engine.inspect(candidate);
    ctx.writer.writeArtifact({ relativePath: "image.json", kind: "inspect", content: image, producedBy: "verify" });

    const problems = verifyImage(plan, image, candidate);
    if (problems.length === 0) {
      await engine.tag(candidate, plan.tag);
      await engine.untag(candidate);
      ctx.state.image_id = image?.Id ?? null;
      return { ok: true };
    }

    if (image) await engine.untag(candidate);
    return {
      ok: false,
      failure: {
        kind: "verify",
        stage: "runtime",
        message: problems.map((d) => d.message).join("; "),
        detail: problems.map((d) => d.code).join(","),
      },
    };
  }

  private requirePlan(ctx: RunContext): BuildPlan {
    if (!ctx.plan) throw new Error("Plan not rendered before build");
    return ctx.plan;
  }

  private emit(event: Diagnostic): void {
    this.deps.onEvent?.(event);
  }

  private saveState(statePath: string, state: BuildRunState): void {
    fs.writeFileSync(statePath, JSON.stringify(state, null, 2) + "\n", "utf8");
  }
}
