import Docker from "dockerode";
import { Mutex } from "async-mutex";
import { logger } from "./logger";
import { describeError } from "./errors";
import { HealthTracker } from "./health";
import { HealthProbe } from "./health-probe";
import { restartDelay, shouldRestart } from "./restart-policy";
import { HealthState, HealthStatus } from "./lib/types/health";
import { ServiceDescriptor } from "./lib/types/service-descriptor";

// Polling period for services that declare no health check
const DefaultPollIntervalMs = 30_000;

export interface SupervisorOptions {
  // Waits out the restart back-off
  readonly sleep?: (ms: number) => Promise<void>;
  readonly onStatusChange?: (state: HealthState, previous: HealthStatus) => void;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs the service's health check against its container and restarts the
 * container once it turns unhealthy, as far as the restart policy allows
 */
export class ServiceSupervisor {
  private readonly mutex = new Mutex();
  private readonly tracker: HealthTracker;
  private readonly sleep: (ms: number) => Promise<void>;
  // StartedAt of the container run currently tracked
  private startedAt?: string;
  private restartCount = 0;
  private manuallyStopped = false;
  private running = false;
  private loop?: Promise<void>;
  private wake?: () => void;

  constructor(
    private readonly docker: Docker,
    private readonly service: ServiceDescriptor,
    readonly containerName: string,
    private readonly probe: HealthProbe | null,
    private readonly options: SupervisorOptions = {},
  ) {
    this.tracker = new HealthTracker(service.healthcheck, 0);
    this.sleep = options.sleep ?? defaultSleep;
  }

  get state(): HealthState {
    return this.tracker.state;
  }

  get restarts(): number {
    return this.restartCount;
  }

  private get intervalMs(): number {
    const check = this.service.healthcheck;
    return check && !check.disabled ? check.intervalMs : DefaultPollIntervalMs;
  }

  /**
   * Inspects the container and runs one probe
   */
  async checkNow(): Promise<HealthState> {
    return this.mutex.runExclusive(() => this.check());
  }

  private async check(): Promise<HealthState> {
    const container = this.docker.getContainer(this.containerName);
    const info = await container.inspect();

    if (!info.State.Running) {
      // A stopped container the runtime is not restarting was stopped on purpose
      if (!info.State.Restarting && !this.manuallyStopped) {
        logger.info(
          { container: this.containerName, exitCode: info.State.ExitCode },
          "Container is stopped, pausing health checks",
        );
        this.manuallyStopped = true;
      }
      return this.tracker.state;
    }

    if (info.State.StartedAt !== this.startedAt) {
      logger.debug(
        { container: this.containerName, startedAt: info.State.StartedAt },
        "Tracking new container run",
      );
      this.startedAt = info.State.StartedAt;
      this.manuallyStopped = false;
      this.tracker.reset(Date.parse(info.State.StartedAt));
    }

    const check = this.service.healthcheck;
    if (!this.probe || !check || check.disabled) {
      return this.tracker.state;
    }

    const previous = this.tracker.state.status;
    const result = await this.probe.run(check.timeoutMs);
    if (result === null) {
      logger.trace({ container: this.containerName }, "No new health result");
      return this.tracker.state;
    }
    const state = this.tracker.record(result);
    logger.trace({ container: this.containerName, result }, "Health probe finished");

    if (state.status !== previous) {
      logger.info(
        { container: this.containerName, status: state.status, previous, output: result.output },
        "Health status changed",
      );
      this.options.onStatusChange?.(state, previous);
    }
    if (state.status === "healthy") {
      this.restartCount = 0;
    }
    if (state.status === "unhealthy") {
      await this.restartUnhealthy(state);
    }
    return this.tracker.state;
  }

  private async restartUnhealthy(state: HealthState) {
    const allowed = shouldRestart(
      this.service.restart,
      { kind: "unhealthy" },
      { restartCount: this.restartCount, manuallyStopped: this.manuallyStopped },
    );
    if (!allowed) {
      logger.warn(
        {
          container: this.containerName,
          policy: this.service.restart,
          restartCount: this.restartCount,
        },
        "Container is unhealthy, restart policy does not allow a restart",
      );
      return;
    }
    const delay = restartDelay(this.restartCount);
    this.restartCount += 1;
    logger.warn(
      {
        container: this.containerName,
        failingStreak: state.failingStreak,
        restartCount: this.restartCount,
        delay,
      },
      "Restarting unhealthy container",
    );
    await this.sleep(delay);
    await this.docker.getContainer(this.containerName).restart();
  }

  private pause(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = undefined;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = undefined;
        resolve();
      };
    });
  }

  private async run() {
    while (this.running) {
      await this.pause(this.intervalMs);
      if (!this.running) {
        break;
      }
      try {
        await this.checkNow();
      } catch (error) {
        logger.error(
          { container: this.containerName, ...describeError(error) },
          "Health supervision failed",
        );
      }
    }
  }

  /**
   * Checks the container every health-check interval until stopped
   */
  start() {
    if (this.loop) {
      return;
    }
    logger.info(
      { container: this.containerName, intervalMs: this.intervalMs },
      "Starting supervision",
    );
    this.running = true;
    this.loop = this.run();
  }

  async stop() {
    this.running = false;
    this.wake?.();
    await this.loop;
    this.loop = undefined;
    logger.info({ container: this.containerName }, "Stopped supervision");
  }
}
