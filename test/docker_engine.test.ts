import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { EngineError } from "../src/core/errors.js";
import { DockerEngine, checkImageContract, contractMismatches, type ExecFn, type InspectedImage } from "../src/engine/docker-engine.js";
import { renderDockerfile } from "../src/pipeline/dockerfile.js";
import { loadBuildPlan } from "../src/pipeline/plan.js";
import type { Pipeline } from "../src/pipeline/stages.js";
import { CONFIG_DIR, EMPTY_ENV, IMAGE_ID, PROJECT_FIXTURE, inspectOutput, makeTmpDir } from "./helpers.js";

const HEALTH_TEST = ["CMD-SHELL", "curl -fsS http://127.0.0.1:8000/health || exit 1"];
const COMMAND = ["uvicorn", "app.main:app", "--host", "0.0.0.0", "--port", "8000"];

type Call = { command: string; args: string[]; cwd: string };

function fakeExec(calls: Call[], inspect = inspectOutput()): ExecFn {
  return async (command, args, options) => {
    calls.push({ command, args, cwd: options.cwd });
    return { stdout: args[0] === "image" ? inspect : "", stderr: "" };
  };
}

const compliant: InspectedImage = {
  id: IMAGE_ID,
  exposedPorts: ["8000/tcp"],
  healthcheck: { test: HEALTH_TEST, interval_ns: 30_000_000_000, timeout_ns: 3_000_000_000, retries: 3 },
  command: COMMAND,
  workdir: "/app",
};

describe("DockerEngine", () => {
  let tmpDir: string;
  let pipeline: Pipeline;

  beforeEach(async () => {
    tmpDir = makeTmpDir("docker");
    ({ pipeline } = await loadBuildPlan({ contextDir: PROJECT_FIXTURE, configDir: CONFIG_DIR, processEnv: EMPTY_ENV }));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes the Dockerfile and its ignore file outside the context", () => {
    const rendered = new DockerEngine({ exec: fakeExec([]) }).render(pipeline, tmpDir);
    expect(rendered).toEqual({
      dockerfile: path.join(tmpDir, "Dockerfile"),
      dockerignore: path.join(tmpDir, "Dockerfile.dockerignore"),
    });
    expect(fs.readFileSync(rendered.dockerfile, "utf8")).toBe(renderDockerfile(pipeline));
    expect(fs.existsSync(path.join(PROJECT_FIXTURE, "Dockerfile"))).toBe(false);
  });

  it("builds the target stage and checks the inspected image", async () => {
    const calls: Call[] = [];
    const engine = new DockerEngine({ exec: fakeExec(calls) });
    const { image } = await engine.build(pipeline, { contextDir: PROJECT_FIXTURE, outDir: tmpDir, tag: "ml-service:test" });

    expect(calls).toEqual([
      {
        command: "docker",
        args: ["build", "--target", "runtime", "-f", path.join(tmpDir, "Dockerfile"), "-t", "ml-service:test", PROJECT_FIXTURE],
        cwd: PROJECT_FIXTURE,
      },
      { command: "docker", args: ["image", "inspect", "ml-service:test"], cwd: PROJECT_FIXTURE },
    ]);
    expect(image).toEqual(compliant);
  });

  it("uses the configured docker binary", async () => {
    const calls: Call[] = [];
    await new DockerEngine({ exec: fakeExec(calls), docker: "podman" }).inspect("ml-service:test", tmpDir);
    expect(calls[0].command).toBe("podman");
  });

  it("passes the step timeout to the docker child process", async () => {
    const timeouts: (number | undefined)[] = [];
    const exec: ExecFn = async (_command, args, options) => {
      timeouts.push(options.timeout);
      return { stdout: args[0] === "image" ? inspectOutput() : "", stderr: "" };
    };
    const engine = new DockerEngine({ exec });
    await engine.buildTarget("builder", {
      dockerfile: path.join(tmpDir, "Dockerfile"),
      contextDir: PROJECT_FIXTURE,
      tag: "ml-service:test-builder",
      timeoutMs: 1_800_000,
    });
    await engine.inspect("ml-service:test", PROJECT_FIXTURE, 60_000);
    await engine.inspect("ml-service:test", PROJECT_FIXTURE);
    expect(timeouts).toEqual([1_800_000, 60_000, undefined]);
  });

  it("reports the tail of stderr when a build fails", async () => {
    const exec: ExecFn = async () => {
      throw Object.assign(new Error("Command failed: docker build"), { stderr: "step 1\nERROR: failed to solve\n" });
    };
    const build = new DockerEngine({ exec }).buildTarget("builder", {
      dockerfile: path.join(tmpDir, "Dockerfile"),
      contextDir: tmpDir,
      tag: "ml-service:test-builder",
    });
    await expect(build).rejects.toThrow(EngineError);
    await expect(build).rejects.toThrow("docker build failed: step 1\nERROR: failed to solve");
  });

  it("falls back to the error message without stderr", async () => {
    const exec: ExecFn = async () => {
      throw new Error("spawn docker ENOENT");
    };
    await expect(new DockerEngine({ exec }).inspect("ml-service:test", tmpDir)).rejects.toThrow(
      "docker image inspect failed: spawn docker ENOENT",
    );
  });

  it("rejects inspect output that is not JSON", async () => {
    const engine = new DockerEngine({ exec: fakeExec([], "not json") });
    await expect(engine.inspect("ml-service:test", tmpDir)).rejects.toThrow(/^docker image inspect returned invalid JSON: /);
  });

  it("rejects an empty inspect result", async () => {
    const engine = new DockerEngine({ exec: fakeExec([], "[]") });
    await expect(engine.inspect("ml-service:test", tmpDir)).rejects.toThrow(
      "docker image inspect returned no image for ml-service:test",
    );
  });

  it("reads a missing healthcheck as null", async () => {
    const engine = new DockerEngine({ exec: fakeExec([], inspectOutput({ Healthcheck: undefined, ExposedPorts: null })) });
    const image = await engine.inspect("ml-service:test", tmpDir);
    expect(image.healthcheck).toBeNull();
    expect(image.exposedPorts).toEqual([]);
  });
});

describe("runtime contract check", () => {
  let pipeline: Pipeline;

  beforeEach(async () => {
    ({ pipeline } = await loadBuildPlan({ contextDir: PROJECT_FIXTURE, configDir: CONFIG_DIR, processEnv: EMPTY_ENV }));
  });

  it("accepts a compliant image", () => {
    expect(contractMismatches(compliant, pipeline)).toEqual([]);
    expect(() => checkImageContract(compliant, pipeline)).not.toThrow();
  });

  it("lists every difference", () => {
    const drifted: InspectedImage = {
      ...compliant,
      exposedPorts: ["80/tcp", "8000/tcp"],
      healthcheck: { test: ["NONE"], interval_ns: 10_000_000_000, timeout_ns: 3_000_000_000, retries: 5 },
      command: ["gunicorn", "app.main:app"],
    };
    expect(contractMismatches(drifted, pipeline)).toEqual([
      "exposed ports are [80/tcp, 8000/tcp], expected [8000/tcp]",
      'healthcheck test is ["NONE"]',
      "healthcheck interval differs",
      "healthcheck retries differ",
      'command is ["gunicorn","app.main:app"]',
    ]);
  });

  it("requires a healthcheck", () => {
    expect(() => checkImageContract({ ...compliant, healthcheck: null }, pipeline)).toThrow(
      `Image ${IMAGE_ID} violates the runtime contract: image has no healthcheck`,
    );
  });
});
