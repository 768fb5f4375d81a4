#!/usr/bin/env node

import path from "node:path";
import { Command, Option } from "commander";
import { build } from "./commands/build.js";
import { formatDiagnostic, type Diagnostic, type OutputFormat } from "./commands/diagnostics.js";
import { EXIT } from "./commands/exit-codes.js";
import { parsePositiveSeconds, probe } from "./commands/probe.js";
import { render } from "./commands/render.js";
import { listBuilds, status } from "./commands/status.js";
import { validateProject } from "./commands/validate.js";
import { loadValidConfig } from "./pipeline/plan.js";

type CommonOpts = { context: string; config?: string; env?: string; format: OutputFormat };

const formatOption = () => new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human");

function emit(diagnostics: Diagnostic[], format: OutputFormat): void {
  for (const d of diagnostics) {
    const line = formatDiagnostic(d, format);
    if (format === "human" && d.level === "error") console.error(line);
    else process.stdout.write(line + "\n");
  }
}

function withCommon(cmd: Command): Command {
  return cmd
    .option("--context <path>", "Build context (project) directory", ".")
    .option("--config <path>", "Config directory (default: bundled config/)")
    .option("--env <name>", "Config overlay name (config/<name>.yaml)")
    .addOption(formatOption());
}

const program = new Command();

program
  .name("slimstage")
  .description("Multi-stage, CPU-only container builds for Python ML services")
  .version("0.1.0");

withCommon(program.command("validate"))
  .description("Validate config, manifests, variant selection and (optionally) build records")
  .option("--builds", "Also check records under builds_dir")
  .action(async (opts: CommonOpts & { builds?: boolean }) => {
    const res = await validateProject({ contextDir: opts.context, configDir: opts.config, env: opts.env, builds: opts.builds });
    emit(res.diagnostics, opts.format);
    if (!res.ok) process.exit(res.exitCode);
  });

withCommon(program.command("render"))
  .description("Render the pipeline as a Dockerfile")
  .option("--out <dir>", "Write Dockerfile and Dockerfile.dockerignore into this directory")
  .action(async (opts: CommonOpts & { out?: string }) => {
    const res = await render({ contextDir: opts.context, configDir: opts.config, env: opts.env, outDir: opts.out });
    if (!res.ok) {
      emit([res.error], opts.format);
      process.exit(res.exitCode);
    }
    if (res.written.length === 0) {
      process.stdout.write(res.dockerfile);
      return;
    }
    emit(
      res.written.map((file): Diagnostic => ({ level: "info", code: "WRITTEN", message: `wrote ${file}`, path: file })),
      opts.format,
    );
  });

withCommon(program.command("build"))
  .description("Build the image and write the build records")
  .addOption(new Option("--engine <engine>", "Build engine").choices(["local", "docker"]).default("local"))
  .option("--index <file>", "Package index snapshot for the local engine")
  .action(async (opts: CommonOpts & { engine: "local" | "docker"; index?: string }) => {
    const res = await build({
      contextDir: opts.context,
      configDir: opts.config,
      env: opts.env,
      engine: opts.engine,
      indexFile: opts.index,
    });
    emit(res.diagnostics, opts.format);
    if (!res.ok) {
      emit([{ ...res.error, ...(res.buildId ? { details: { build_id: res.buildId } } : {}) }], opts.format);
      process.exit(res.exitCode);
    }
    emit([{ level: "info", code: "BUILD_OK", message: `${res.buildId}: ${res.imageId}`, path: res.buildDir }], opts.format);
  });

withCommon(program.command("status"))
  .description("Show build status")
  .argument("[id]", "Build ID (omit to list all)")
  .action(async (id: string | undefined, opts: CommonOpts) => {
    const config = await loadValidConfig({ configDir: opts.config, env: opts.env });
    const buildsDir = path.resolve(opts.context, config.builds_dir);

    if (id) {
      const res = status({ buildsDir, buildId: id });
      if (!res.ok) {
        emit([{ level: "error", code: "BUILD_NOT_FOUND", message: res.error }], opts.format);
        process.exit(EXIT.INVALID_ARGS);
      }
      if (opts.format === "jsonl") process.stdout.write(JSON.stringify(res.state) + "\n");
      else console.log(JSON.stringify(res.state, null, 2));
      return;
    }

    const list = listBuilds(buildsDir);
    if (opts.format === "jsonl") {
      for (const item of list) process.stdout.write(JSON.stringify(item) + "\n");
    } else {
      if (list.length === 0) { console.log("No builds found."); return; }
      for (const item of list) console.log(`${item.id}  ${item.status}  ${item.engine}  ${item.updated_at}`);
    }
  });

program
  .command("probe")
  .description("Probe a running service with the image's health contract")
  .option("--url <url>", "Health endpoint (default: http://127.0.0.1:8000/health)")
  .option("--once", "Send a single probe")
  .option("--interval <seconds>", "Seconds between probes", parsePositiveSeconds)
  .addOption(formatOption())
  .action(async (opts: { url?: string; once?: boolean; interval?: number; format: OutputFormat }) => {
    const res = await probe({ url: opts.url, once: opts.once, interval_s: opts.interval });
    emit(res.diagnostics, opts.format);
    if (!res.ok) process.exit(res.exitCode);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.INVALID_ARGS);
});
