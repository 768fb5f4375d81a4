export type HealthStatus = "starting" | "healthy" | "unhealthy";

export type HealthState = {
  status: HealthStatus;
  /** Consecutive failed probes since the last success. */
  failingStreak: number;
};

export const INITIAL_HEALTH: HealthState = Object.freeze({ status: "starting", failingStreak: 0 });

/**
 * Apply one probe result.
 * A success always yields healthy and resets the streak, including from unhealthy.
 * A failure only changes the status once the streak reaches `retries`.
 */
export function nextHealth(state: HealthState, success: boolean, retries: number): HealthState {
  if (success) return { status: "healthy", failingStreak: 0 };
  const failingStreak = state.failingStreak + 1;
  return { status: failingStreak >= retries ? "unhealthy" : state.status, failingStreak };
}
