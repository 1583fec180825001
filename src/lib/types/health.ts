export type HealthStatus = 'none' | 'starting' | 'healthy' | 'unhealthy';

/**
 * Outcome of a single health probe, in the shape of the runtime's health log
 */
export interface ProbeResult {
  readonly start: number;
  readonly end: number;
  // 0 is healthy, -1 marks a probe that exceeded its timeout
  readonly exitCode: number;
  readonly output: string;
}

export interface HealthState {
  readonly status: HealthStatus;
  readonly failingStreak: number;
  readonly log: ProbeResult[];
}
