import { PipelineError } from "../core/errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  BUILD_FAILED: 1,
  RESOLUTION_FAILED: 2,
  VARIANT_ASSERTION: 3,
  INVALID_ARGS: 4,
  UNHEALTHY: 5,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

/** Exit code for an error code recorded by a build or thrown before one starts. */
export function exitCodeForError(code: string): ExitCode {
  switch (code) {
    case "RESOLUTION_FAILED":
    case "LOCK_MISMATCH":
      return EXIT.RESOLUTION_FAILED;
    case "VARIANT_ASSERTION":
      return EXIT.VARIANT_ASSERTION;
    case "CONFIG_INVALID":
    case "MANIFEST_INVALID":
    case "STAGE_GRAPH_INVALID":
    case "VARIANT_SELECTION":
    case "VARIANT_AMBIGUOUS":
      return EXIT.INVALID_ARGS;
    default:
      return EXIT.BUILD_FAILED;
  }
}

export function exitCodeFor(err: unknown): ExitCode {
  return err instanceof PipelineError ? exitCodeForError(err.code) : EXIT.INVALID_ARGS;
}
