import fs from "node:fs";
import path from "node:path";
import { createComponentLogger, type Logger } from "../logging/logger.js";
import { PipelineError, errorMessage } from "./errors.js";
import {
  type BuildStatus,
  type BuildStep,
  type StepOptions,
  getEffectiveSteps,
  getStepTimeout,
  isBuildStep,
  isTerminal,
  nextState,
} from "./state-machine.js";

export type EngineKind = "local" | "docker";

export type StepError = { code: string; message: string };

export type StepRecord = {
  status: "ok" | "failed" | "timeout";
  duration_ms: number;
  error?: StepError;
  warnings?: string[];
  outputs?: Record<string, unknown>;
};

/** Persistent build state stored in {builds_dir}/{id}/state.json */
export type BuildState = {
  build_id: string;
  project: string;
  engine: EngineKind;
  dependency_cache_key: string;
  started_at: string;
  updated_at: string;
  current_step: BuildStatus;
  step_started_at: string | null;
  step_results: Partial<Record<BuildStep, StepRecord>>;
  error: StepError | null;
};

export type BuildResult = {
  success: boolean;
  build_id: string;
  final_status: BuildStatus;
  step_results: BuildState["step_results"];
  error?: StepError;
};

export type StepOutcome = {
  outputs?: Record<string, unknown>;
  warnings?: string[];
};

/** Executes one step; throws (preferably a PipelineError) on failure. */
export type StepRunner = (step: BuildStep, state: BuildState) => Promise<StepOutcome>;

class StepTimeout extends Error {}

/**
 * Drives a build through the step state machine.
 *
 * Main loop: execute step → persist → advance. There is no resume and no retry:
 * a failed build is terminal and the next attempt is a new build id.
 */
export class BuildOrchestrator {
  private readonly log: Logger;

  constructor(
    private readonly buildsDir: string,
    private readonly options: StepOptions,
    private readonly stepRunner: StepRunner,
    logger?: Logger,
  ) {
    this.log = createComponentLogger("orchestrator", logger);
  }

  statePath(buildId: string): string {
    return path.join(this.buildsDir, buildId, "state.json");
  }

  async run(opts: { buildId: string; project: string; engine: EngineKind; dependencyCacheKey: string }): Promise<BuildResult> {
    const statePath = this.statePath(opts.buildId);
    if (fs.existsSync(statePath)) {
      throw new Error(`Build ${opts.buildId} already exists; builds are never resumed`);
    }
    fs.mkdirSync(path.dirname(statePath), { recursive: true });

    const steps = getEffectiveSteps(this.options);
    const state: BuildState = {
      build_id: opts.buildId,
      project: opts.project,
      engine: opts.engine,
      dependency_cache_key: opts.dependencyCacheKey,
      started_at: new Date().toISOString(),
      updated_at: new Date().toISOString(),
      current_step: steps[0],
      step_started_at: null,
      step_results: {},
      error: null,
    };
    this.saveState(statePath, state);

    while (!isTerminal(state.current_step)) {
      const step = state.current_step;
      if (!isBuildStep(step)) break;

      const timeoutMs = getStepTimeout(step, this.options) * 1000;
      state.step_started_at = new Date().toISOString();
      state.updated_at = state.step_started_at;
      this.saveState(statePath, state);
      this.log.info({ build: opts.buildId, step }, "step started");

      const stepStart = Date.now();
      try {
        const outcome = await withTimeout(this.stepRunner(step, state), timeoutMs);
        state.step_results[step] = {
          status: "ok",
          duration_ms: Date.now() - stepStart,
          ...(outcome.warnings?.length ? { warnings: outcome.warnings } : {}),
          ...(outcome.outputs ? { outputs: outcome.outputs } : {}),
        };
        state.current_step = nextState(step, "success", this.options);
      } catch (e) {
        const duration_ms = Date.now() - stepStart;
        if (e instanceof StepTimeout) {
          const error = { code: "STEP_TIMEOUT", message: `Timeout at step ${step} after ${timeoutMs} ms` };
          state.step_results[step] = { status: "timeout", duration_ms, error };
          state.current_step = nextState(step, "timeout", this.options);
          state.error = error;
        } else {
          const error = {
            code: e instanceof PipelineError ? e.code : "STEP_FAILED",
            message: errorMessage(e),
          };
          state.step_results[step] = { status: "failed", duration_ms, error };
          state.current_step = nextState(step, "failure", this.options);
          state.error = error;
        }
        this.log.error({ build: opts.buildId, step, error: state.error }, "step failed");
      }

      state.step_started_at = null;
      state.updated_at = new Date().toISOString();
      this.saveState(statePath, state);
    }

    return {
      success: state.current_step === "done",
      build_id: opts.buildId,
      final_status: state.current_step,
      step_results: state.step_results,
      ...(state.error ? { error: state.error } : {}),
    };
  }

  private saveState(statePath: string, state: BuildState): void {
    fs.writeFileSync(statePath, JSON.stringify(state, null, 2) + "\n", "utf8");
  }
}

async function withTimeout<T>(work: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new StepTimeout()), ms);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
