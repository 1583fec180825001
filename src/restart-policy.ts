import { RestartPolicy } from "./lib/types/service-descriptor";

export type RestartEvent =
  | { readonly kind: "exit"; readonly exitCode: number }
  | { readonly kind: "unhealthy" };

export interface RestartState {
  // Consecutive restarts since the service was last healthy
  readonly restartCount: number;
  // Set when an operator stopped the container
  readonly manuallyStopped: boolean;
}

const InitialRestartDelayMs = 100;
const MaxRestartDelayMs = 60_000;

/**
 * Decides whether the supervisor relaunches the service after an event
 */
export function shouldRestart(
  policy: RestartPolicy,
  event: RestartEvent,
  state: RestartState,
): boolean {
  switch (policy.name) {
    case "no":
      return false;
    case "always":
    case "unless-stopped":
      return !state.manuallyStopped;
    case "on-failure": {
      if (state.manuallyStopped) {
        return false;
      }
      const failed = event.kind === "unhealthy" || event.exitCode !== 0;
      if (!failed) {
        return false;
      }
      return policy.maxRetries === undefined || policy.maxRetries === 0 || state.restartCount < policy.maxRetries;
    }
  }
}

/**
 * Back-off before the n-th consecutive restart (0-based)
 */
export function restartDelay(attempt: number): number {
  return Math.min(InitialRestartDelayMs * 2 ** Math.max(0, attempt), MaxRestartDelayMs);
}
