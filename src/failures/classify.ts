import type { StageRole, StepPurpose } from "../pipeline/stage.js";
import { describeSteps, type BuildPlan, type PlanStepView } from "../pipeline/plan.js";

export type FailureKind = "config" | "platform" | "fetch" | "provision" | "compile" | "copy" | "verify" | "engine";

/** A fatal pipeline error. There is no retry; the first one ends the run. */
export type PipelineFailure = {
  kind: FailureKind;
  stage: StageRole | null;
  message: string;
  /** Rendered instruction that failed, when it could be identified. */
  step?: string;
  detail?: string;
};

const KIND_BY_PURPOSE: Record<StepPurpose, FailureKind> = {
  platform: "platform",
  provision: "provision",
  "trust-roots": "provision",
  workdir: "engine",
  fetch: "fetch",
  compile: "compile",
  handoff: "copy",
  metadata: "engine",
};

const PLATFORM_MISMATCH = /no match for platform|exec format error|does not match the specified platform/i;
const NOT_FOUND = /not found|no such file or directory/i;
const TAIL_LINES = 20;
const MATCHABLE: ReadonlySet<StepPurpose> = new Set(["provision", "trust-roots", "fetch", "compile", "handoff"]);

/** First line of a rendered instruction, minus the keyword: what BuildKit echoes in its step headers. */
function instructionHead(text: string): string {
  return text.split("\n")[0].replace(/\s*\\$/, "").replace(/^[A-Z]+\s+/, "");
}

function tail(output: string): string {
  return output.trimEnd().split("\n").slice(-TAIL_LINES).join("\n");
}

/** The failing step: the last ERROR line that quotes one of the stage's instructions. */
function findFailingStep(steps: PlanStepView[], output: string): PlanStepView | undefined {
  const errorLines = output.split("\n").filter((l) => /error/i.test(l));
  for (const line of errorLines.reverse()) {
    const match = steps.find((s) => MATCHABLE.has(s.purpose) && line.includes(instructionHead(s.text)));
    if (match) return match;
  }
  return undefined;
}

/**
 * Map engine output of a failed stage build onto the error taxonomy:
 * fetch, provision, compile or copy by the instruction that failed;
 * platform for architecture mismatches; otherwise compile for the
 * builder stage and engine for the runtime stage.
 */
export function classifyBuildFailure(plan: BuildPlan, stage: StageRole, output: string): PipelineFailure {
  const steps = describeSteps(plan).filter((s) => s.stage === stage);
  const detail = tail(output);

  if (PLATFORM_MISMATCH.test(output)) {
    return { kind: "platform", stage, message: `The ${stage} stage cannot run on the target platform`, detail };
  }

  const failing = findFailingStep(steps, output);
  if (failing) {
    const kind = KIND_BY_PURPOSE[failing.purpose];
    return { kind, stage, message: `${kind} failed in the ${stage} stage`, step: failing.text, detail };
  }

  if (stage === "runtime" && NOT_FOUND.test(output) && output.includes(plan.handoff.sourcePath)) {
    const copy = steps.find((s) => s.purpose === "handoff");
    return { kind: "copy", stage, message: `Binary missing at ${plan.handoff.sourcePath}`, step: copy?.text, detail };
  }

  const kind: FailureKind = stage === "builder" ? "compile" : "engine";
  return { kind, stage, message: `The ${stage} stage failed`, detail };
}
