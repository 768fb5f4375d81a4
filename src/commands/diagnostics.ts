import { PipelineError, errorMessage } from "../core/errors.js";

export type OutputFormat = "human" | "jsonl";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

/** Error diagnostic for anything thrown; pipeline errors keep their code and details. */
export function errorDiagnostic(err: unknown, fallbackCode = "UNEXPECTED"): Diagnostic {
  if (err instanceof PipelineError) {
    return diag("error", err.code, err.message, Object.keys(err.details).length ? { details: err.details } : undefined);
  }
  return diag("error", fallbackCode, errorMessage(err));
}

/** "VARIANT_DRIFT: torch ..." → warn diagnostic with that code. */
export function warningDiagnostic(warning: string): Diagnostic {
  const m = /^([A-Z][A-Z_]+): (.*)$/s.exec(warning);
  return m ? diag("warn", m[1], m[2]) : diag("warn", "WARNING", warning);
}

export function formatDiagnostic(d: Diagnostic, format: OutputFormat): string {
  if (format === "jsonl") return JSON.stringify(d);
  const prefix = d.level === "info" ? "" : `${d.level}: `;
  return `${prefix}${d.message}${d.level === "info" ? "" : ` [${d.code}]`}`;
}
