import { InvalidArgumentError } from "commander";
import { HealthMonitor } from "../health/monitor.js";
import { httpProbe, type Probe, type ProbeResult } from "../health/probe.js";
import type { HealthStatus } from "../health/state-machine.js";
import type { Logger } from "../logging/logger.js";
import { CONTRACT, healthUrl } from "../pipeline/contract.js";
import { diag, type Diagnostic } from "./diagnostics.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type ProbeOpts = {
  url?: string;
  /** Single probe instead of running the monitor until it settles. */
  once?: boolean;
  interval_s?: number;
  timeout_s?: number;
  retries?: number;
  probe?: Probe;
  logger?: Logger;
};

export type ProbeCommandResult = {
  ok: boolean;
  status: HealthStatus;
  diagnostics: Diagnostic[];
  exitCode: ExitCode;
};

/** Option parser for whole, positive second counts such as `--interval`. */
export function parsePositiveSeconds(value: string): number {
  if (!/^\d+$/.test(value.trim())) throw new InvalidArgumentError("Expected a whole number of seconds.");
  const seconds = Number.parseInt(value, 10);
  if (seconds <= 0) throw new InvalidArgumentError("Expected a positive number of seconds.");
  return seconds;
}

function describe(result: ProbeResult): string {
  return result.status === null ? (result.error ?? "no response") : `HTTP ${result.status} in ${result.duration_ms} ms`;
}

/**
 * Probe a running service with the image's health contract. Without `once` the monitor runs
 * until the service is first reported healthy or unhealthy.
 */
export async function probe(opts: ProbeOpts = {}): Promise<ProbeCommandResult> {
  const url = opts.url ?? healthUrl();
  const timeout_s = opts.timeout_s ?? CONTRACT.timeout_s;
  const probeFn = opts.probe ?? httpProbe;

  if (opts.once) {
    const result = await probeFn(url, timeout_s * 1000);
    const status: HealthStatus = result.success ? "healthy" : "unhealthy";
    return {
      ok: result.success,
      status,
      diagnostics: [
        result.success
          ? diag("info", "PROBE_OK", `${url}: ${describe(result)}`)
          : diag("error", "PROBE_FAILED", `${url}: ${describe(result)}`),
      ],
      exitCode: result.success ? EXIT.SUCCESS : EXIT.UNHEALTHY,
    };
  }

  const monitor = new HealthMonitor({
    url,
    interval_s: opts.interval_s,
    timeout_s,
    retries: opts.retries,
    probe: probeFn,
    logger: opts.logger,
  });
  const diagnostics: Diagnostic[] = [];

  const settled = new Promise<HealthStatus>((resolve) => {
    monitor.onTransition(({ from, to, probe: index, result }) => {
      const message = `probe ${index}: ${from} -> ${to} (${describe(result)})`;
      diagnostics.push(diag(to === "healthy" ? "info" : "error", `HEALTH_${to.toUpperCase()}`, message));
      resolve(to);
    });
  });

  monitor.start();
  const status = await settled;
  monitor.stop();

  return { ok: status === "healthy", status, diagnostics, exitCode: status === "healthy" ? EXIT.SUCCESS : EXIT.UNHEALTHY };
}
