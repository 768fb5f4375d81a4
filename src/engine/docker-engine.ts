import { execFile } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { promisify } from "node:util";
import { EngineError, errorMessage } from "../core/errors.js";
import { createComponentLogger, type Logger } from "../logging/logger.js";
import { CONTRACT, healthcheckSpec } from "../pipeline/contract.js";
import { renderDockerfile, renderDockerignore } from "../pipeline/dockerfile.js";
import type { Pipeline } from "../pipeline/stages.js";

const pExecFile = promisify(execFile);

export type ExecResult = { stdout: string; stderr: string };

export type ExecFn = (command: string, args: string[], options: { cwd: string; timeout?: number }) => Promise<ExecResult>;

export const defaultExec: ExecFn = async (command, args, options) => {
  const { stdout, stderr } = await pExecFile(command, args, { ...options, maxBuffer: 64 * 1024 * 1024 });
  return { stdout, stderr };
};

export type DockerEngineDeps = {
  exec?: ExecFn;
  /** Docker CLI binary. */
  docker?: string;
  logger?: Logger;
};

export type RenderedContext = {
  dockerfile: string;
  dockerignore: string;
};

/** The parts of `docker image inspect` the contract check reads. */
export type InspectedImage = {
  id: string;
  exposedPorts: string[];
  healthcheck: { test: string[]; interval_ns: number; timeout_ns: number; retries: number } | null;
  command: string[];
  workdir: string;
};

const NS_PER_S = 1_000_000_000;

/**
 * Builds the rendered pipeline with the Docker CLI.
 *
 * The Dockerfile and its ignore file are written next to each other outside the
 * project (`Dockerfile.dockerignore` is picked up by BuildKit), so the build context
 * is never modified.
 */
export class DockerEngine {
  private readonly exec: ExecFn;
  private readonly docker: string;
  private readonly log: Logger;

  constructor(deps: DockerEngineDeps = {}) {
    this.exec = deps.exec ?? defaultExec;
    this.docker = deps.docker ?? "docker";
    this.log = createComponentLogger("docker-engine", deps.logger);
  }

  render(pipeline: Pipeline, outDir: string): RenderedContext {
    fs.mkdirSync(outDir, { recursive: true });
    const dockerfile = path.join(outDir, "Dockerfile");
    const dockerignore = path.join(outDir, "Dockerfile.dockerignore");
    fs.writeFileSync(dockerfile, renderDockerfile(pipeline), "utf8");
    fs.writeFileSync(dockerignore, renderDockerignore(pipeline), "utf8");
    return { dockerfile, dockerignore };
  }

  async buildTarget(
    target: string,
    opts: { dockerfile: string; contextDir: string; tag: string; timeoutMs?: number },
  ): Promise<void> {
    this.log.info({ target, tag: opts.tag }, "docker build");
    await this.run(["build", "--target", target, "-f", opts.dockerfile, "-t", opts.tag, opts.contextDir], opts.contextDir, opts.timeoutMs);
  }

  async inspect(tag: string, cwd: string, timeoutMs?: number): Promise<InspectedImage> {
    const { stdout } = await this.run(["image", "inspect", tag], cwd, timeoutMs);
    let raw: unknown;
    try {
      raw = JSON.parse(stdout);
    } catch (e) {
      throw new EngineError(`docker image inspect returned invalid JSON: ${errorMessage(e)}`, { tag });
    }
    return readInspect(raw, tag);
  }

  /** Render, build the target stage and check the resulting image against the runtime contract. */
  async build(
    pipeline: Pipeline,
    opts: { contextDir: string; outDir: string; tag: string },
  ): Promise<{ rendered: RenderedContext; image: InspectedImage }> {
    const rendered = this.render(pipeline, opts.outDir);
    await this.buildTarget(pipeline.target, { dockerfile: rendered.dockerfile, contextDir: opts.contextDir, tag: opts.tag });
    const image = await this.inspect(opts.tag, opts.contextDir);
    checkImageContract(image, pipeline);
    return { rendered, image };
  }

  private async run(args: string[], cwd: string, timeout?: number): Promise<ExecResult> {
    try {
      return await this.exec(this.docker, args, { cwd, ...(timeout ? { timeout } : {}) });
    } catch (e) {
      const stderr = stderrOf(e);
      const subcommand = args.slice(0, 2).filter((a) => !a.startsWith("-")).join(" ");
      throw new EngineError(`${this.docker} ${subcommand} failed: ${stderr || errorMessage(e)}`, {
        args,
        ...(stderr ? { stderr } : {}),
      });
    }
  }
}

function stderrOf(err: unknown): string {
  if (typeof err === "object" && err !== null && "stderr" in err && typeof err.stderr === "string") {
    return err.stderr.trim().split("\n").slice(-20).join("\n");
  }
  return "";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

function readInspect(raw: unknown, tag: string): InspectedImage {
  const entry = Array.isArray(raw) ? raw[0] : undefined;
  if (!isRecord(entry) || typeof entry.Id !== "string" || !isRecord(entry.Config)) {
    throw new EngineError(`docker image inspect returned no image for ${tag}`, { tag });
  }
  const config = entry.Config;
  const hc = config.Healthcheck;

  return {
    id: entry.Id,
    exposedPorts: isRecord(config.ExposedPorts) ? Object.keys(config.ExposedPorts).sort() : [],
    healthcheck: isRecord(hc)
      ? {
          test: stringArray(hc.Test),
          interval_ns: typeof hc.Interval === "number" ? hc.Interval : 0,
          timeout_ns: typeof hc.Timeout === "number" ? hc.Timeout : 0,
          retries: typeof hc.Retries === "number" ? hc.Retries : 0,
        }
      : null,
    command: stringArray(config.Cmd),
    workdir: typeof config.WorkingDir === "string" ? config.WorkingDir : "",
  };
}

/** Differences between a built image and the contract; empty when it conforms. */
export function contractMismatches(image: InspectedImage, pipeline: Pipeline): string[] {
  const problems: string[] = [];
  const expectedPorts = [`${CONTRACT.port}/tcp`];
  if (image.exposedPorts.join(",") !== expectedPorts.join(",")) {
    problems.push(`exposed ports are [${image.exposedPorts.join(", ")}], expected [${expectedPorts.join(", ")}]`);
  }

  const spec = healthcheckSpec();
  if (!image.healthcheck) {
    problems.push("image has no healthcheck");
  } else {
    if (image.healthcheck.test.join(" ") !== spec.test.join(" ")) {
      problems.push(`healthcheck test is ${JSON.stringify(image.healthcheck.test)}`);
    }
    if (image.healthcheck.interval_ns !== spec.interval_s * NS_PER_S) problems.push("healthcheck interval differs");
    if (image.healthcheck.timeout_ns !== spec.timeout_s * NS_PER_S) problems.push("healthcheck timeout differs");
    if (image.healthcheck.retries !== spec.retries) problems.push("healthcheck retries differ");
  }

  if (image.command.join(" ") !== pipeline.metadata.command.join(" ")) {
    problems.push(`command is ${JSON.stringify(image.command)}`);
  }
  return problems;
}

export function checkImageContract(image: InspectedImage, pipeline: Pipeline): void {
  const problems = contractMismatches(image, pipeline);
  if (problems.length > 0) {
    throw new EngineError(`Image ${image.id} violates the runtime contract: ${problems.join("; ")}`, { problems });
  }
}
