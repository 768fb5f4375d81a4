import { errorMessage } from "../core/errors.js";

export type ProbeResult = {
  success: boolean;
  /** HTTP status, or null when no response arrived in time. */
  status: number | null;
  duration_ms: number;
  error?: string;
};

export type FetchFn = (url: string, init: { signal: AbortSignal }) => Promise<{ status: number }>;

export type Probe = (url: string, timeoutMs: number) => Promise<ProbeResult>;

/**
 * One liveness probe. Same acceptance rule as `curl -f`: any status below 400 passes,
 * anything else (including no answer within the timeout) fails.
 */
export async function httpProbe(url: string, timeoutMs: number, fetchFn: FetchFn = fetch): Promise<ProbeResult> {
  const started = Date.now();
  try {
    const response = await fetchFn(url, { signal: AbortSignal.timeout(timeoutMs) });
    return { success: response.status < 400, status: response.status, duration_ms: Date.now() - started };
  } catch (err) {
    const timedOut = err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
    return {
      success: false,
      status: null,
      duration_ms: Date.now() - started,
      error: timedOut ? `no response within ${timeoutMs} ms` : errorMessage(err),
    };
  }
}
