export type ErrorCategory = "configuration" | "resolution" | "variant-assertion" | "closure" | "engine";

export type PipelineErrorCode =
  | "CONFIG_INVALID"
  | "MANIFEST_INVALID"
  | "STAGE_GRAPH_INVALID"
  | "VARIANT_SELECTION"
  | "VARIANT_AMBIGUOUS"
  | "RESOLUTION_FAILED"
  | "LOCK_MISMATCH"
  | "VARIANT_ASSERTION"
  | "CLOSURE_VIOLATION"
  | "ENGINE_FAILED";

/**
 * Base class for every failure the build pipeline reports.
 * `code` is stable and is what lands in state.json and jsonl output.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly category: ErrorCategory;
  readonly details: Record<string, unknown>;

  constructor(
    code: PipelineErrorCode,
    category: ErrorCategory,
    message: string,
    details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.category = category;
    this.details = details;
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CONFIG_INVALID", "configuration", message, details);
  }
}

export class ManifestError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("MANIFEST_INVALID", "configuration", message, details);
  }
}

export class StageGraphError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("STAGE_GRAPH_INVALID", "configuration", message, details);
  }
}

export class VariantSelectionError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("VARIANT_SELECTION", "configuration", message, details);
  }
}

/** Two variant-selection mechanisms are active at once. */
export class VariantAmbiguityError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("VARIANT_AMBIGUOUS", "configuration", message, details);
  }
}

/** Unsatisfiable constraints or a manifest/lock disagreement. Fatal, never retried. */
export class ResolutionError extends PipelineError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    code: "RESOLUTION_FAILED" | "LOCK_MISMATCH" = "RESOLUTION_FAILED",
  ) {
    super(code, "resolution", message, details);
  }
}

/** The installed ML runtime reports an accelerator backend in a CPU-only build. */
export class VariantAssertionError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("VARIANT_ASSERTION", "variant-assertion", message, details);
  }
}

export class ClosureViolationError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CLOSURE_VIOLATION", "closure", message, details);
  }
}

export class EngineError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("ENGINE_FAILED", "engine", message, details);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
