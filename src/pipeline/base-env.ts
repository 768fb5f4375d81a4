import { ConfigError } from "../core/errors.js";
import type { SlimstageConfig } from "../types/config.js";

/**
 * Interpreter-wide flags shared by every stage. The container is the isolation
 * boundary, so the package manager never creates its own virtualenv.
 */
export const FIXED_ENV: Readonly<Record<string, string>> = Object.freeze({
  PYTHONDONTWRITEBYTECODE: "1",
  PYTHONUNBUFFERED: "1",
  PIP_DISABLE_PIP_VERSION_CHECK: "1",
  POETRY_NO_INTERACTION: "1",
  POETRY_VIRTUALENVS_CREATE: "false",
});

export type BaseEnvironment = Readonly<{
  image: string;
  workdir: string;
  pythonVersion: string;
  env: Readonly<Record<string, string>>;
}>;

/** "python:3.12-slim" → "3.12"; anything unrecognised → "3". */
export function pythonVersionFromImage(image: string): string {
  const tag = image.split(":")[1] ?? "";
  const m = /^(\d+)\.(\d+)/.exec(tag);
  return m ? `${m[1]}.${m[2]}` : "3";
}

export function createBaseEnvironment(config: Pick<SlimstageConfig, "base">): BaseEnvironment {
  const extra = config.base.env ?? {};
  for (const [key, value] of Object.entries(extra)) {
    const fixed = FIXED_ENV[key];
    if (fixed !== undefined && fixed !== value) {
      throw new ConfigError(`base.env.${key} must stay "${fixed}" (got "${value}")`, { key });
    }
  }

  return Object.freeze({
    image: config.base.image,
    workdir: config.base.workdir,
    pythonVersion: pythonVersionFromImage(config.base.image),
    env: Object.freeze({ ...FIXED_ENV, ...extra }),
  });
}
