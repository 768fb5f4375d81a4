import fs from "node:fs";
import path from "node:path";
import { loadBuildPlan } from "../pipeline/plan.js";
import { renderDockerfile, renderDockerignore } from "../pipeline/dockerfile.js";
import { errorDiagnostic, type Diagnostic } from "./diagnostics.js";
import { exitCodeFor, type ExitCode } from "./exit-codes.js";

export type RenderOpts = {
  contextDir: string;
  configDir?: string;
  env?: string;
  processEnv?: NodeJS.ProcessEnv;
  /** Directory to write Dockerfile + Dockerfile.dockerignore into; omitted = return only. */
  outDir?: string;
};

export type RenderResult =
  | { ok: true; dockerfile: string; dockerignore: string; written: string[] }
  | { ok: false; error: Diagnostic; exitCode: ExitCode };

export async function render(opts: RenderOpts): Promise<RenderResult> {
  try {
    const plan = await loadBuildPlan(opts);
    const dockerfile = renderDockerfile(plan.pipeline);
    const dockerignore = renderDockerignore(plan.pipeline);

    const written: string[] = [];
    if (opts.outDir) {
      fs.mkdirSync(opts.outDir, { recursive: true });
      const files: [string, string][] = [
        [path.join(opts.outDir, "Dockerfile"), dockerfile],
        [path.join(opts.outDir, "Dockerfile.dockerignore"), dockerignore],
      ];
      for (const [file, content] of files) {
        fs.writeFileSync(file, content, "utf8");
        written.push(file);
      }
    }
    return { ok: true, dockerfile, dockerignore, written };
  } catch (e) {
    return { ok: false, error: errorDiagnostic(e), exitCode: exitCodeFor(e) };
  }
}
