import { ServiceSupervisor, SupervisorOptions } from "../supervisor";
import { ContainerHealthProbe } from "../health-probe";
import { logger } from "../logger";
import { ProbeResult } from "../lib/types/health";
import { ServiceDescriptor } from "../lib/types/service-descriptor";
import { extractorService } from "./fixtures";

jest.mock("../logger", () => ({
  logger: {
    trace: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const StartedAt = "2026-01-01T00:00:00.000Z";
const ContainerName = "extractor-pdf-extractor-1";

function probeResult(exitCode: number, offsetMs = 60_000): ProbeResult {
  const start = Date.parse(StartedAt) + offsetMs;
  return { start, end: start + 10, exitCode, output: exitCode === 0 ? "ok" : "connection refused" };
}

describe("ServiceSupervisor", () => {
  let mockDocker: any;
  let mockContainer: any;
  let mockProbe: any;
  let sleep: jest.Mock;

  function runningState(startedAt = StartedAt) {
    return { State: { Running: true, Restarting: false, StartedAt: startedAt, ExitCode: 0 } };
  }

  function createSupervisor(service: ServiceDescriptor = extractorService, options: SupervisorOptions = {}) {
    return new ServiceSupervisor(mockDocker, service, ContainerName, mockProbe, { sleep, ...options });
  }

  beforeEach(() => {
    jest.clearAllMocks();
    mockContainer = {
      inspect: jest.fn().mockResolvedValue(runningState()),
      restart: jest.fn().mockResolvedValue(undefined),
    };
    mockDocker = { getContainer: jest.fn().mockReturnValue(mockContainer) };
    mockProbe = { run: jest.fn() };
    sleep = jest.fn().mockResolvedValue(undefined);
  });

  it("should probe with the configured timeout", async () => {
    // Arrange
    mockProbe.run.mockResolvedValue(probeResult(0));
    const supervisor = createSupervisor();

    // Act
    const state = await supervisor.checkNow();

    // Assert
    expect(mockDocker.getContainer).toHaveBeenCalledWith(ContainerName);
    expect(mockProbe.run).toHaveBeenCalledWith(10_000);
    expect(state.status).toBe("healthy");
  });

  it("should restart the container once it turns unhealthy", async () => {
    // Arrange
    mockProbe.run.mockResolvedValue(probeResult(1));
    const supervisor = createSupervisor();

    // Act
    await supervisor.checkNow();
    await supervisor.checkNow();
    expect(mockContainer.restart).not.toHaveBeenCalled();
    const state = await supervisor.checkNow();

    // Assert
    expect(state.status).toBe("unhealthy");
    expect(state.failingStreak).toBe(3);
    expect(sleep).toHaveBeenCalledWith(100);
    expect(mockContainer.restart).toHaveBeenCalledTimes(1);
    expect(supervisor.restarts).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith(
      { container: ContainerName, failingStreak: 3, restartCount: 1, delay: 100 },
      "Restarting unhealthy container",
    );
  });

  it("should back off between consecutive restarts", async () => {
    // Arrange
    mockProbe.run.mockResolvedValue(probeResult(1));
    const supervisor = createSupervisor();

    // Act
    for (let i = 0; i < 5; i++) {
      await supervisor.checkNow();
    }

    // Assert
    expect(sleep.mock.calls).toEqual([[100], [200], [400]]);
    expect(supervisor.restarts).toBe(3);
  });

  it("should not count failures inside the start period", async () => {
    mockProbe.run.mockResolvedValue(probeResult(1, 2_000));
    const supervisor = createSupervisor();

    for (let i = 0; i < 4; i++) {
      await supervisor.checkNow();
    }

    expect(supervisor.state).toEqual(expect.objectContaining({ status: "starting", failingStreak: 0 }));
    expect(mockContainer.restart).not.toHaveBeenCalled();
  });

  it("should leave the container alone when the restart policy is no", async () => {
    // Arrange
    mockProbe.run.mockResolvedValue(probeResult(1));
    const supervisor = createSupervisor({ ...extractorService, restart: { name: "no" } });

    // Act
    for (let i = 0; i < 3; i++) {
      await supervisor.checkNow();
    }

    // Assert
    expect(supervisor.state.status).toBe("unhealthy");
    expect(mockContainer.restart).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith(
      { container: ContainerName, policy: { name: "no" }, restartCount: 0 },
      "Container is unhealthy, restart policy does not allow a restart",
    );
  });

  it("should stop restarting once on-failure retries are used up", async () => {
    mockProbe.run.mockResolvedValue(probeResult(1));
    const supervisor = createSupervisor({ ...extractorService, restart: { name: "on-failure", maxRetries: 1 } });

    for (let i = 0; i < 5; i++) {
      await supervisor.checkNow();
    }

    expect(mockContainer.restart).toHaveBeenCalledTimes(1);
    expect(supervisor.restarts).toBe(1);
  });

  it("should start over when the container was restarted", async () => {
    // Arrange
    mockProbe.run.mockResolvedValue(probeResult(1));
    const supervisor = createSupervisor();
    for (let i = 0; i < 3; i++) {
      await supervisor.checkNow();
    }
    mockContainer.inspect.mockResolvedValue(runningState("2026-01-01T00:05:00.000Z"));
    mockProbe.run.mockResolvedValue(probeResult(0, 360_000));

    // Act
    const state = await supervisor.checkNow();

    // Assert
    expect(state.status).toBe("healthy");
    expect(state.log).toHaveLength(1);
    expect(supervisor.restarts).toBe(0);
  });

  it("should record a runtime health entry only once", async () => {
    // Arrange
    const entry = {
      Start: "2026-01-01T00:01:00.000Z",
      End: "2026-01-01T00:01:01.000Z",
      ExitCode: 1,
      Output: "pg_isready: no response",
    };
    mockContainer.inspect.mockResolvedValue({
      State: {
        ...runningState().State,
        Health: { Status: "starting", FailingStreak: 1, Log: [entry] },
      },
    });
    const supervisor = new ServiceSupervisor(
      mockDocker,
      extractorService,
      ContainerName,
      new ContainerHealthProbe(mockDocker, ContainerName),
      { sleep },
    );

    // Act
    for (let i = 0; i < 3; i++) {
      await supervisor.checkNow();
    }

    // Assert
    expect(supervisor.state).toEqual(expect.objectContaining({ status: "starting", failingStreak: 1 }));
    expect(supervisor.state.log).toHaveLength(1);
    expect(mockContainer.restart).not.toHaveBeenCalled();
    expect(supervisor.restarts).toBe(0);
  });

  it("should skip recording while the probe has no result", async () => {
    mockProbe.run.mockResolvedValue(null);
    const supervisor = createSupervisor();

    const state = await supervisor.checkNow();

    expect(state).toEqual({ status: "starting", failingStreak: 0, log: [] });
  });

  it("should report status changes", async () => {
    // Arrange
    const onStatusChange = jest.fn();
    mockProbe.run.mockResolvedValueOnce(probeResult(0)).mockResolvedValueOnce(probeResult(0));
    const supervisor = createSupervisor(extractorService, { onStatusChange });

    // Act
    await supervisor.checkNow();
    await supervisor.checkNow();

    // Assert
    expect(onStatusChange).toHaveBeenCalledTimes(1);
    expect(onStatusChange).toHaveBeenCalledWith(
      expect.objectContaining({ status: "healthy", failingStreak: 0 }),
      "starting",
    );
  });

  it("should pause health checks while the container is stopped", async () => {
    // Arrange
    mockContainer.inspect.mockResolvedValue({
      State: { Running: false, Restarting: false, StartedAt, ExitCode: 137 },
    });
    const supervisor = createSupervisor();

    // Act
    await supervisor.checkNow();
    const state = await supervisor.checkNow();

    // Assert
    expect(state.status).toBe("starting");
    expect(mockProbe.run).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith(
      { container: ContainerName, exitCode: 137 },
      "Container is stopped, pausing health checks",
    );
  });

  it("should only watch the container when the service has no health check", async () => {
    const supervisor = createSupervisor({ ...extractorService, healthcheck: undefined });

    const state = await supervisor.checkNow();

    expect(state).toEqual({ status: "none", failingStreak: 0, log: [] });
    expect(mockProbe.run).not.toHaveBeenCalled();
  });

  it("should stop the supervision loop before the first check", async () => {
    // Arrange
    const supervisor = createSupervisor();

    // Act
    supervisor.start();
    await supervisor.stop();

    // Assert
    expect(mockContainer.inspect).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledWith({ container: ContainerName }, "Stopped supervision");
  });
});
