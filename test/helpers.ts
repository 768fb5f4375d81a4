import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

export const ROOT = fileURLToPath(new URL("..", import.meta.url));
export const CONFIG_DIR = path.join(ROOT, "config");
export const SCHEMA_DIR = path.join(ROOT, "schemas");
export const FIXTURES = path.join(ROOT, "test", "fixtures");
export const PROJECT_FIXTURE = path.join(FIXTURES, "project");
export const INDEX_FIXTURE = path.join(FIXTURES, "index.json");

export function makeTmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `slimstage-${prefix}-`));
}

/** Copy the fixture project into `dir` and return the copy's path. */
export function copyProject(dir: string): string {
  const dest = path.join(dir, "project");
  fs.cpSync(PROJECT_FIXTURE, dest, { recursive: true });
  return dest;
}

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(FIXTURES, name), "utf8");
}

/** Rewrite a file in place through `edit`. */
export function editFile(filePath: string, edit: (text: string) => string): void {
  fs.writeFileSync(filePath, edit(fs.readFileSync(filePath, "utf8")), "utf8");
}

/** Write a copy of the package index in which the CPU torch build reports an accelerator. */
export function writeAcceleratedIndex(dir: string): string {
  const file = path.join(dir, "index-accelerated.json");
  const text = fs
    .readFileSync(INDEX_FIXTURE, "utf8")
    .replace('{ "version": "2.3.1+cpu", "accelerator": false', '{ "version": "2.3.1+cpu", "accelerator": true');
  fs.writeFileSync(file, text, "utf8");
  return file;
}

export const EMPTY_ENV: NodeJS.ProcessEnv = {};

export const IMAGE_ID = `sha256:${"c".repeat(64)}`;

/** `docker image inspect` output for an image that honours the runtime contract. */
export function inspectOutput(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify([
    {
      Id: IMAGE_ID,
      Config: {
        ExposedPorts: { "8000/tcp": {} },
        Healthcheck: { Test: ["CMD-SHELL", "curl -fsS http://127.0.0.1:8000/health || exit 1"], Interval: 30_000_000_000, Timeout: 3_000_000_000, Retries: 3 },
        Cmd: ["uvicorn", "app.main:app", "--host", "0.0.0.0", "--port", "8000"],
        WorkingDir: "/app",
        ...overrides,
      },
    },
  ]);
}
