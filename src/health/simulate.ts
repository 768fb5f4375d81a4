import { CONTRACT, probeStartSeconds } from "../pipeline/contract.js";
import { INITIAL_HEALTH, nextHealth, type HealthState, type HealthStatus } from "./state-machine.js";

/** How the service answers probe k: after `latency_s` seconds, or never (null). */
export type SimulatedResponse = {
  latency_s: number | null;
  status?: number;
};

export type SimulationOptions = {
  interval_s?: number;
  timeout_s?: number;
  retries?: number;
  /** Last instant (seconds after start) at which a probe may begin. */
  horizon_s?: number;
};

export type SimulatedProbe = {
  index: number;
  started_s: number;
  finished_s: number;
  success: boolean;
};

export type HealthTransition = {
  at_s: number;
  from: HealthStatus;
  to: HealthStatus;
  probe: number;
};

export type HealthTimeline = {
  probes: SimulatedProbe[];
  transitions: HealthTransition[];
  final: HealthState;
};

/**
 * Virtual-time run of the health check. Probe k (k ≥ 1) starts at k × interval − timeout;
 * its result lands when the response arrives or, at the latest, when the timeout expires.
 */
export function simulateHealth(respond: (probe: number) => SimulatedResponse, options: SimulationOptions = {}): HealthTimeline {
  const interval = options.interval_s ?? CONTRACT.interval_s;
  const timeout = options.timeout_s ?? CONTRACT.timeout_s;
  const retries = options.retries ?? CONTRACT.retries;
  const horizon = options.horizon_s ?? interval * (retries + 1);

  const probes: SimulatedProbe[] = [];
  const transitions: HealthTransition[] = [];
  let state = INITIAL_HEALTH;

  for (let k = 1; probeStartSeconds(k, interval, timeout) <= horizon; k++) {
    const started = probeStartSeconds(k, interval, timeout);
    const response = respond(k);
    const answered = response.latency_s !== null && response.latency_s <= timeout;
    const success = answered && (response.status ?? 200) < 400;
    const finished = started + Math.min(response.latency_s ?? timeout, timeout);
    probes.push({ index: k, started_s: started, finished_s: finished, success });

    const next = nextHealth(state, success, retries);
    if (next.status !== state.status) {
      transitions.push({ at_s: finished, from: state.status, to: next.status, probe: k });
    }
    state = next;
  }

  return { probes, transitions, final: state };
}
