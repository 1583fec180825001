describe("config", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    // Save original environment and create a clean one for testing
    jest.resetModules();
    process.env = { ...originalEnv };
    delete process.env.DOCKWARDEN_COMPOSE_FILE;
    delete process.env.DOCKWARDEN_PROJECT;
    delete process.env.DOCKWARDEN_DOCKER_SOCKET;
    delete process.env.DOCKWARDEN_PROBE_HOST;
    delete process.env.DOCKWARDEN_LOG_LEVEL;
    delete process.env.DOCKWARDEN_LOG_FILE;
  });

  afterEach(() => {
    // Restore original environment
    process.env = originalEnv;
  });

  it("should load configuration from environment variables", () => {
    // Arrange - set environment variables
    process.env.DOCKWARDEN_COMPOSE_FILE = "deploy/compose.yml";
    process.env.DOCKWARDEN_PROJECT = "extractor";
    process.env.DOCKWARDEN_DOCKER_SOCKET = "/run/user/1000/docker.sock";
    process.env.DOCKWARDEN_PROBE_HOST = "10.0.0.5";
    process.env.DOCKWARDEN_LOG_LEVEL = "debug";
    process.env.DOCKWARDEN_LOG_FILE = "./dockwarden.log";

    // Act - import the config
    const { config } = require("../config");

    // Assert
    expect(config).toEqual({
      composeFile: "deploy/compose.yml",
      project: "extractor",
      dockerSocket: "/run/user/1000/docker.sock",
      probeHost: "10.0.0.5",
      logLevel: "debug",
      logFile: "./dockwarden.log",
    });
  });

  it("should use default values when environment variables are not set", () => {
    // Act - import the config
    const { config } = require("../config");

    // Assert
    expect(config).toEqual({
      composeFile: "docker-compose.yml",
      project: undefined,
      dockerSocket: "/var/run/docker.sock",
      probeHost: "localhost",
      logLevel: "info",
      logFile: undefined,
    });
  });

  it("should treat empty variables as unset", () => {
    // Arrange
    process.env.DOCKWARDEN_PROJECT = "";
    process.env.DOCKWARDEN_LOG_FILE = "";

    // Act
    const { config } = require("../config");

    // Assert
    expect(config.project).toBeUndefined();
    expect(config.logFile).toBeUndefined();
  });
});
