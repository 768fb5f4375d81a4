import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "../core/errors.js";
import type { BuildState } from "../core/orchestrator.js";

export type StatusResult =
  | { ok: true; state: BuildState }
  | { ok: false; error: string };

export type BuildSummary = { id: string; status: string; engine: string; updated_at: string };

/**
 * Read build state for a given ID.
 */
export function status(opts: { buildsDir: string; buildId: string }): StatusResult {
  const statePath = path.join(opts.buildsDir, opts.buildId, "state.json");

  if (!fs.existsSync(statePath)) {
    return { ok: false, error: `No build found: ${opts.buildId}` };
  }

  try {
    const state = JSON.parse(fs.readFileSync(statePath, "utf8")) as BuildState;
    return { ok: true, state };
  } catch (e) {
    return { ok: false, error: `Failed to read state: ${errorMessage(e)}` };
  }
}

function field(value: unknown, key: string): string {
  if (typeof value !== "object" || value === null || !(key in value)) return "";
  const v: unknown = Reflect.get(value, key);
  return typeof v === "string" ? v : "";
}

/**
 * List all builds with their current status, most recently updated first.
 */
export function listBuilds(buildsDir: string): BuildSummary[] {
  if (!fs.existsSync(buildsDir)) return [];

  const results: BuildSummary[] = [];
  for (const entry of fs.readdirSync(buildsDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    const statePath = path.join(buildsDir, entry.name, "state.json");
    if (!fs.existsSync(statePath)) continue;

    let state: unknown;
    try {
      state = JSON.parse(fs.readFileSync(statePath, "utf8"));
    } catch {
      results.push({ id: entry.name, status: "corrupted", engine: "", updated_at: "" });
      continue;
    }
    results.push({
      id: entry.name,
      status: field(state, "current_step") || "unknown",
      engine: field(state, "engine"),
      updated_at: field(state, "updated_at"),
    });
  }

  return results.sort((a, b) => b.updated_at.localeCompare(a.updated_at));
}
