import type { HealthcheckSpec } from "../types/image.js";

/** Runtime contract between the image and the orchestrator running it. Not configurable. */
export const CONTRACT = Object.freeze({
  port: 8000,
  bindHost: "0.0.0.0",
  probeHost: "127.0.0.1",
  healthPath: "/health",
  interval_s: 30,
  timeout_s: 3,
  retries: 3,
  server: "uvicorn",
});

export function healthUrl(host: string = CONTRACT.probeHost, port: number = CONTRACT.port): string {
  return `http://${host}:${port}${CONTRACT.healthPath}`;
}

/** Process argv that starts the ASGI server for `app` ("module:attribute"). */
export function entrypointCommand(app: string): string[] {
  return [CONTRACT.server, app, "--host", CONTRACT.bindHost, "--port", String(CONTRACT.port)];
}

export function healthcheckSpec(): HealthcheckSpec {
  return {
    test: ["CMD-SHELL", `curl -fsS ${healthUrl()} || exit 1`],
    interval_s: CONTRACT.interval_s,
    timeout_s: CONTRACT.timeout_s,
    retries: CONTRACT.retries,
  };
}

/**
 * Seconds after container start at which probe k (k ≥ 1) begins. Probes keep a fixed rate
 * but each starts one timeout ahead of its interval mark, so its verdict is in by that mark.
 */
export function probeStartSeconds(k: number, interval_s: number = CONTRACT.interval_s, timeout_s: number = CONTRACT.timeout_s): number {
  return k * interval_s - Math.min(timeout_s, interval_s);
}
