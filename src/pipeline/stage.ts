import type { Instruction } from "../dockerfile/instructions.js";

export type StepPurpose =
  | "platform"
  | "provision"
  | "workdir"
  | "fetch"
  | "compile"
  | "trust-roots"
  | "handoff"
  | "metadata";

export type StageStep = { purpose: StepPurpose; instruction: Instruction };

export type StageRole = "builder" | "runtime";

export type Stage = {
  role: StageRole;
  alias?: string;
  steps: StageStep[];
};

/** Build argument BuildKit fills from `--platform`; both stages read it. */
export const PLATFORM_ARG = "TARGETPLATFORM";
export const PLATFORM_EXPR = `$${PLATFORM_ARG}`;

export function step(purpose: StepPurpose, instruction: Instruction): StageStep {
  return { purpose, instruction };
}

export function stageInstructions(stage: Stage): Instruction[] {
  return stage.steps.map((s) => s.instruction);
}
