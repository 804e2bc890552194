/**
 * Build steps in execution order. The pipeline is strictly linear: every
 * step must succeed before the next starts, and there are no retries.
 */
export const BUILD_STEPS = [
  "plan",
  "resolve_source",
  "render",
  "build_builder",
  "build_runtime",
  "verify",
] as const;

export type BuildStep = (typeof BUILD_STEPS)[number];

export type BuildStatus = BuildStep | "done" | `failed_${BuildStep}`;

export type TransitionEvent = "success" | "failure";

/**
 * Pure function: given current step + event, return next state.
 */
export function nextState(current: BuildStep, event: TransitionEvent): BuildStatus {
  if (event === "failure") return `failed_${current}`;

  const idx = BUILD_STEPS.indexOf(current);
  if (idx >= BUILD_STEPS.length - 1) return "done";
  return BUILD_STEPS[idx + 1];
}

export function isTerminal(status: BuildStatus): boolean {
  return status === "done" || status.startsWith("failed_");
}

export function isBuildStep(status: BuildStatus): status is BuildStep {
  return BUILD_STEPS.some((s) => s === status);
}
