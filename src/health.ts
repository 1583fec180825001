import { HealthCheck } from "./lib/types/service-descriptor";
import { HealthState, HealthStatus, ProbeResult } from "./lib/types/health";

// The runtime keeps the same number of entries in its health log
const MaxLogEntries = 5;

/**
 * Health state machine of a single container. Failures inside the start
 * period do not count until the first success.
 */
export class HealthTracker {
  private status: HealthStatus;
  private failingStreak = 0;
  private log: ProbeResult[] = [];

  constructor(
    private readonly check: HealthCheck | undefined,
    private startedAt: number,
  ) {
    this.status = this.initialStatus();
  }

  private initialStatus(): HealthStatus {
    return this.check === undefined || this.check.disabled ? "none" : "starting";
  }

  get state(): HealthState {
    return {
      status: this.status,
      failingStreak: this.failingStreak,
      log: [...this.log],
    };
  }

  /**
   * Feeds one probe result into the state machine
   */
  record(result: ProbeResult): HealthState {
    const check = this.check;
    if (check === undefined || check.disabled) {
      return this.state;
    }
    this.log = [...this.log, result].slice(-MaxLogEntries);
    if (result.exitCode === 0) {
      this.status = "healthy";
      this.failingStreak = 0;
      return this.state;
    }
    const inStartPeriod =
      this.status === "starting" && result.start - this.startedAt < check.startPeriodMs;
    if (!inStartPeriod) {
      this.failingStreak += 1;
      if (this.failingStreak >= check.retries) {
        this.status = "unhealthy";
      }
    }
    return this.state;
  }

  /**
   * Starts over after the container (re)started
   */
  reset(startedAt: number) {
    this.startedAt = startedAt;
    this.status = this.initialStatus();
    this.failingStreak = 0;
    this.log = [];
  }
}
