import { describe, expect, it } from "vitest";
import { renderDockerfile, renderDockerignore, verifyScript } from "../src/pipeline/dockerfile.js";
import { loadBuildPlan, loadValidConfig } from "../src/pipeline/plan.js";
import { definePipeline } from "../src/pipeline/stages.js";
import { CONFIG_DIR, EMPTY_ENV, PROJECT_FIXTURE } from "./helpers.js";

describe("verifyScript", () => {
  it("exits non-zero on an accelerator when strict", () => {
    const script = verifyScript("torch", true);
    expect(script).toBe(
      "import importlib, sys; m = importlib.import_module('torch'); " +
        "a = bool(getattr(getattr(m, 'cuda', None), 'is_available', lambda: False)()); " +
        "print('torch', m.__version__, 'accelerator=' + str(a).lower()); " +
        "sys.exit('accelerator backend present in a CPU-only build' if a else 0)",
    );
  });

  it("only warns when lenient", () => {
    expect(verifyScript("torch", false).endsWith(
      "a and print('WARNING: accelerator backend present in a CPU-only build', file=sys.stderr)",
    )).toBe(true);
  });
});

describe("renderDockerfile", () => {
  it("renders the three-stage build with the runtime contract on the target", async () => {
    const { pipeline } = await loadBuildPlan({ contextDir: PROJECT_FIXTURE, configDir: CONFIG_DIR, processEnv: EMPTY_ENV });
    const expected = [
      "# syntax=docker/dockerfile:1",
      "",
      "FROM python:3.12-slim AS base",
      "ENV PYTHONDONTWRITEBYTECODE=1 \\",
      "    PYTHONUNBUFFERED=1 \\",
      "    PIP_DISABLE_PIP_VERSION_CHECK=1 \\",
      "    POETRY_NO_INTERACTION=1 \\",
      "    POETRY_VIRTUALENVS_CREATE=false",
      "WORKDIR /app",
      "",
      "FROM base AS builder",
      "RUN apt-get update \\",
      " && apt-get install -y --no-install-recommends build-essential \\",
      " && rm -rf /var/lib/apt/lists/*",
      "ENV POETRY_HOME=/opt/poetry",
      "RUN python -m venv /opt/poetry/venv \\",
      " && /opt/poetry/venv/bin/pip install --no-cache-dir poetry==1.8.3 \\",
      " && ln -s /opt/poetry/venv/bin/poetry /usr/bin/poetry",
      "COPY pyproject.toml poetry.lock* /app/",
      "RUN poetry install --no-root --only main \\",
      " && rm -rf /root/.cache/pypoetry /root/.cache/pip",
      `RUN python -c "${verifyScript("torch", true)}"`,
      "",
      "FROM base AS runtime",
      "RUN apt-get update \\",
      " && apt-get install -y --no-install-recommends curl \\",
      " && rm -rf /var/lib/apt/lists/*",
      "COPY --from=builder /usr/local /usr/local",
      "COPY app /app/app",
      "EXPOSE 8000",
      "HEALTHCHECK --interval=30s --timeout=3s --retries=3 \\",
      "  CMD curl -fsS http://127.0.0.1:8000/health || exit 1",
      'CMD ["uvicorn","app.main:app","--host","0.0.0.0","--port","8000"]',
      "",
    ].join("\n");
    expect(renderDockerfile(pipeline)).toBe(expected);
  });

  it("installs dependencies with the system interpreter into /usr/local", async () => {
    const { pipeline } = await loadBuildPlan({ contextDir: PROJECT_FIXTURE, configDir: CONFIG_DIR, processEnv: EMPTY_ENV });
    const builder = renderDockerfile(pipeline).split("\n\n")[2].split("\n");
    const poetryHome = builder.indexOf("ENV POETRY_HOME=/opt/poetry");
    const install = builder.indexOf("RUN poetry install --no-root --only main \\");

    // Poetry runs from a venv under POETRY_HOME; only the poetry entry point is linked onto PATH.
    expect(poetryHome).toBeGreaterThan(0);
    expect(install).toBeGreaterThan(poetryHome);
    expect(builder.filter((line) => line.includes("PATH="))).toEqual([]);
    expect(builder.filter((line) => line.includes("ln -s"))).toEqual([" && ln -s /opt/poetry/venv/bin/poetry /usr/bin/poetry"]);
    expect(pipeline.base.image).toBe("python:3.12-slim");
    expect(pipeline.stages.find((s) => s.name === "runtime")?.ops).toContainEqual({
      kind: "copy-from-stage",
      from: "builder",
      path: "/usr/local",
    });
  });

  it("renders the index-url install as export plus pip", async () => {
    const { pipeline } = await loadBuildPlan({ contextDir: PROJECT_FIXTURE, configDir: CONFIG_DIR, processEnv: EMPTY_ENV });
    const variant = { mechanism: "index-url" as const, packageName: "torch", indexUrl: "https://download.pytorch.org/whl/cpu" };
    const config = await loadValidConfig({ configDir: CONFIG_DIR, env: "index-url", processEnv: EMPTY_ENV });
    const dockerfile = renderDockerfile(definePipeline(config, pipeline.base, variant));
    expect(dockerfile).toContain(
      [
        "RUN poetry export --only main --without-hashes -f requirements.txt -o /tmp/requirements.txt \\",
        " && pip install --no-cache-dir --index-url https://download.pytorch.org/whl/cpu --extra-index-url https://pypi.org/simple -r /tmp/requirements.txt \\",
        " && rm -rf /root/.cache/pypoetry /root/.cache/pip /tmp/requirements.txt",
      ].join("\n"),
    );
  });
});

describe("renderDockerignore", () => {
  it("excludes build state and the app ignore patterns", async () => {
    const { pipeline } = await loadBuildPlan({ contextDir: PROJECT_FIXTURE, configDir: CONFIG_DIR, processEnv: EMPTY_ENV });
    expect(renderDockerignore(pipeline)).toBe([".git", ".slimstage", "Dockerfile", "**/__pycache__/**", "**/*.pyc", ""].join("\n"));
  });
});
