/**
 * All build steps in order.
 */
export const BUILD_STEPS = ["base", "builder", "verify", "runtime", "export"] as const;

export type BuildStep = (typeof BUILD_STEPS)[number];

/**
 * Terminal and error states. A failed build stays failed; a new build is a new invocation.
 */
export type BuildStatus = BuildStep | "done" | `failed_${BuildStep}` | `timeout_${BuildStep}`;

export type TransitionEvent = "success" | "failure" | "timeout";

export type StepOptions = {
  verify?: boolean;
  timeouts?: Record<string, number>;
};

/**
 * Determine the effective step list; verification is dropped when disabled.
 */
export function getEffectiveSteps(opts: StepOptions = {}): BuildStep[] {
  return BUILD_STEPS.filter((s) => s !== "verify" || opts.verify !== false);
}

/**
 * Pure function: given current step + event, return next state.
 */
export function nextState(current: BuildStep, event: TransitionEvent, opts: StepOptions = {}): BuildStatus {
  if (event === "failure") return `failed_${current}`;
  if (event === "timeout") return `timeout_${current}`;

  const effective = getEffectiveSteps(opts);
  const idx = effective.indexOf(current);
  if (idx === -1) return `failed_${current}`;
  if (idx >= effective.length - 1) return "done";
  return effective[idx + 1];
}

export function isTerminal(status: BuildStatus): boolean {
  return status === "done" || status.startsWith("failed_") || status.startsWith("timeout_");
}

export function isBuildStep(value: string): value is BuildStep {
  return BUILD_STEPS.some((s) => s === value);
}

/**
 * Get the timeout for a step in seconds.
 */
export function getStepTimeout(step: BuildStep, opts: StepOptions = {}): number {
  const defaults: Record<BuildStep, number> = {
    base: 60,
    builder: 1800,
    verify: 120,
    runtime: 300,
    export: 60,
  };
  return opts.timeouts?.[step] ?? defaults[step];
}
