import type { HealthcheckSpec } from "../types/image.js";
import { stageOrder, getStage, packageManagerVenv, type LayerOp, type Pipeline } from "./stages.js";

const CONTINUATION = " \\\n";

function shellQuote(arg: string): string {
  return /^[A-Za-z0-9_./:=@%+,-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}

function shellJoin(argv: string[]): string {
  return argv.map(shellQuote).join(" ");
}

function run(commands: string[]): string {
  return `RUN ${commands.join(`${CONTINUATION} && `)}`;
}

function envValue(value: string): string {
  return /^[A-Za-z0-9_./:-]*$/.test(value) ? value : JSON.stringify(value);
}

/** Python one-liner that imports the ML package and reports version + accelerator flag. */
export function verifyScript(importName: string, strict: boolean): string {
  const report =
    `import importlib, sys; m = importlib.import_module('${importName}'); ` +
    `a = bool(getattr(getattr(m, 'cuda', None), 'is_available', lambda: False)()); ` +
    `print('${importName}', m.__version__, 'accelerator=' + str(a).lower()); `;
  const outcome = strict
    ? `sys.exit('accelerator backend present in a CPU-only build' if a else 0)`
    : `a and print('WARNING: accelerator backend present in a CPU-only build', file=sys.stderr)`;
  return report + outcome;
}

function renderOp(op: LayerOp): string {
  switch (op.kind) {
    case "env": {
      const lines = Object.entries(op.vars).map(([k, v]) => `${k}=${envValue(v)}`);
      return `ENV ${lines.join(`${CONTINUATION}    `)}`;
    }
    case "workdir":
      return `WORKDIR ${op.path}`;
    case "system-packages":
      return run([
        "apt-get update",
        `apt-get install -y --no-install-recommends ${op.packages.join(" ")}`,
        "rm -rf /var/lib/apt/lists/*",
      ]);
    case "package-manager": {
      // Poetry treats a venv under POETRY_HOME as its own, so installs go to the system interpreter.
      const venv = packageManagerVenv(op.home);
      return [
        `ENV POETRY_HOME=${op.home}`,
        run([
          `python -m venv ${venv}`,
          `${venv}/bin/pip install --no-cache-dir ${op.name}==${op.version}`,
          `ln -s ${venv}/bin/${op.name} /usr/bin/${op.name}`,
        ]),
      ].join("\n");
    }
    case "copy-context": {
      const sources = op.sources.map((s) => (s.optional ? `${s.path}*` : s.path));
      const dest = sources.length > 1 && !op.dest.endsWith("/") ? `${op.dest}/` : op.dest;
      return `COPY ${[...sources, dest].join(" ")}`;
    }
    case "install-dependencies":
      return run(op.commands.map(shellJoin));
    case "verify-ml-runtime":
      return `RUN python -c "${verifyScript(op.importName, op.strict)}"`;
    case "copy-from-stage":
      return `COPY --from=${op.from} ${op.path} ${op.path}`;
  }
}

function renderHealthcheck(spec: HealthcheckSpec): string {
  const [kind, ...rest] = spec.test;
  const command = kind === "CMD-SHELL" ? rest.join(" ") : JSON.stringify(rest);
  return (
    `HEALTHCHECK --interval=${spec.interval_s}s --timeout=${spec.timeout_s}s --retries=${spec.retries}` +
    `${CONTINUATION}  CMD ${command}`
  );
}

/** Render the pipeline as a multi-stage Dockerfile; image metadata goes on the target stage. */
export function renderDockerfile(pipeline: Pipeline): string {
  const blocks: string[] = ["# syntax=docker/dockerfile:1"];

  for (const name of stageOrder(pipeline)) {
    const stage = getStage(pipeline, name);
    const lines = [`FROM ${stage.from} AS ${stage.name}`, ...stage.ops.map(renderOp)];

    if (stage.name === pipeline.target) {
      const { metadata } = pipeline;
      lines.push(...metadata.exposedPorts.map((p) => `EXPOSE ${p}`));
      lines.push(renderHealthcheck(metadata.healthcheck));
      lines.push(`CMD ${JSON.stringify(metadata.command)}`);
    }
    blocks.push(lines.join("\n"));
  }

  return blocks.join("\n\n") + "\n";
}

/** Context exclusions mirroring the app-source ignore patterns. */
export function renderDockerignore(pipeline: Pipeline): string {
  const patterns = new Set<string>([".git", ".slimstage", "Dockerfile"]);
  for (const stage of pipeline.stages) {
    for (const op of stage.ops) {
      if (op.kind === "copy-context") op.ignore.forEach((p) => patterns.add(p));
    }
  }
  return [...patterns].join("\n") + "\n";
}
