import { errorMessage } from "../core/errors.js";
import { createComponentLogger, type Logger } from "../logging/logger.js";
import { CONTRACT, healthUrl, probeStartSeconds } from "../pipeline/contract.js";
import { httpProbe, type Probe, type ProbeResult } from "./probe.js";
import { INITIAL_HEALTH, nextHealth, type HealthState, type HealthStatus } from "./state-machine.js";

export type HealthMonitorOptions = {
  url?: string;
  interval_s?: number;
  timeout_s?: number;
  retries?: number;
  probe?: Probe;
  logger?: Logger;
};

export type TransitionListener = (event: { from: HealthStatus; to: HealthStatus; probe: number; result: ProbeResult }) => void;

/**
 * Timer-driven liveness loop on the `probeStartSeconds` schedule. Probes run at a fixed
 * rate and the monitor only observes, so a slow probe never delays the next one or touches the service.
 */
export class HealthMonitor {
  private state: HealthState = INITIAL_HEALTH;
  private timer: NodeJS.Timeout | null = null;
  private probes = 0;
  private readonly listeners: TransitionListener[] = [];
  private readonly url: string;
  private readonly intervalMs: number;
  private readonly timeoutMs: number;
  private readonly firstProbeMs: number;
  private readonly retries: number;
  private readonly probe: Probe;
  private readonly log: Logger;

  constructor(options: HealthMonitorOptions = {}) {
    this.url = options.url ?? healthUrl();
    const interval_s = options.interval_s ?? CONTRACT.interval_s;
    const timeout_s = options.timeout_s ?? CONTRACT.timeout_s;
    this.intervalMs = interval_s * 1000;
    this.timeoutMs = timeout_s * 1000;
    this.firstProbeMs = probeStartSeconds(1, interval_s, timeout_s) * 1000;
    this.retries = options.retries ?? CONTRACT.retries;
    this.probe = options.probe ?? httpProbe;
    this.log = createComponentLogger("health", options.logger);
  }

  onTransition(listener: TransitionListener): void {
    this.listeners.push(listener);
  }

  getState(): HealthState {
    return { ...this.state };
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.schedule(this.firstProbeMs);
  }

  stop(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.schedule(this.intervalMs);
      this.runProbe(++this.probes).catch((err: unknown) => {
        this.log.error({ err }, "health listener failed");
      });
    }, delayMs);
  }

  private async runProbe(index: number): Promise<void> {
    let result: ProbeResult;
    try {
      result = await this.probe(this.url, this.timeoutMs);
    } catch (err) {
      result = { success: false, status: null, duration_ms: 0, error: errorMessage(err) };
    }
    if (!this.timer) return;

    const previous = this.state;
    this.state = nextHealth(previous, result.success, this.retries);
    this.log.debug({ probe: index, ...result, health: this.state.status }, "health probe");

    if (this.state.status !== previous.status) {
      this.log.info({ from: previous.status, to: this.state.status, probe: index }, "health transition");
      for (const listener of this.listeners) {
        listener({ from: previous.status, to: this.state.status, probe: index, result });
      }
    }
  }
}
