import { stat } from "node:fs/promises";
import Docker, { ContainerInspectInfo } from "dockerode";
import { logger } from "./logger";
import { dockerStatusCode } from "./errors";
import { containerName, getPortKey } from "./docker-spec";
import { formatRestartPolicy } from "./compose-writer";
import { ComposeProject, LogRotation, ServiceDescriptor } from "./lib/types/service-descriptor";

export type CheckStatus = "pass" | "fail" | "skip";

export interface AcceptanceFinding {
  readonly check: string;
  readonly status: CheckStatus;
  readonly detail: string;
}

export interface VerifyOptions {
  // Reads the size of a container log file, defaults to fs.stat
  readonly statFile?: (path: string) => Promise<{ size: number }>;
}

// A 16 KiB message chunk with every byte escaped as \u00XX, plus the JSON envelope
const MaxLogEntryBytes = 16 * 1024 * 6 + 1024;

interface Binding {
  readonly HostIp?: string;
  readonly HostPort?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function bindingsFor(portBindings: unknown, key: string): Binding[] {
  if (!isRecord(portBindings)) {
    return [];
  }
  const bindings = portBindings[key];
  if (!Array.isArray(bindings)) {
    return [];
  }
  return bindings.filter(isRecord).map((binding) => ({
    ...(typeof binding.HostIp === "string" ? { HostIp: binding.HostIp } : {}),
    ...(typeof binding.HostPort === "string" ? { HostPort: binding.HostPort } : {}),
  }));
}

function errnoCode(error: unknown): string | undefined {
  if (isRecord(error) && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function checkRunning(info: ContainerInspectInfo): AcceptanceFinding {
  return info.State.Running
    ? { check: "container-running", status: "pass", detail: `running since ${info.State.StartedAt}` }
    : { check: "container-running", status: "fail", detail: `container is ${info.State.Status}` };
}

function checkRestartPolicy(info: ContainerInspectInfo, service: ServiceDescriptor): AcceptanceFinding {
  const expected = service.restart;
  const policy = info.HostConfig.RestartPolicy;
  const name = policy?.Name || "no";
  const retries = policy?.MaximumRetryCount ?? 0;
  // on-failure without a count and on-failure:0 both mean unlimited
  const matches =
    name === expected.name && (name !== "on-failure" || retries === (expected.maxRetries ?? 0));
  const actual = name === "on-failure" && retries > 0 ? `${name}:${retries}` : name;
  return {
    check: "restart-policy",
    status: matches ? "pass" : "fail",
    detail: matches ? formatRestartPolicy(expected) : `expected ${formatRestartPolicy(expected)}, found ${actual}`,
  };
}

function checkPorts(info: ContainerInspectInfo, service: ServiceDescriptor): AcceptanceFinding {
  if (service.ports.length === 0) {
    return { check: "port-bindings", status: "skip", detail: "no published ports declared" };
  }
  const missing: string[] = [];
  for (const port of service.ports) {
    const key = getPortKey(port);
    const bindings = bindingsFor(info.HostConfig.PortBindings, key);
    const bound = bindings.some(
      (binding) =>
        (port.hostPort === undefined || binding.HostPort === String(port.hostPort)) &&
        (port.hostIp === undefined || binding.HostIp === port.hostIp),
    );
    if (!bound) {
      missing.push(`${port.hostPort ?? "*"}->${key}`);
    }
  }
  return missing.length === 0
    ? { check: "port-bindings", status: "pass", detail: `${service.ports.length} port(s) bound` }
    : { check: "port-bindings", status: "fail", detail: `missing bindings: ${missing.join(", ")}` };
}

function checkEnvironment(info: ContainerInspectInfo, service: ServiceDescriptor): AcceptanceFinding {
  const actual = new Set(info.Config.Env ?? []);
  const missing = Object.entries(service.environment)
    .filter(([key, value]) => !actual.has(`${key}=${value}`))
    .map(([key]) => key);
  return missing.length === 0
    ? {
        check: "environment",
        status: "pass",
        detail: `${Object.keys(service.environment).length} variable(s) set`,
      }
    : { check: "environment", status: "fail", detail: `missing or different: ${missing.join(", ")}` };
}

function checkLogConfig(info: ContainerInspectInfo, service: ServiceDescriptor): AcceptanceFinding {
  const logging = service.logging;
  if (!logging) {
    return { check: "log-config", status: "skip", detail: "no logging configuration declared" };
  }
  const actual = info.HostConfig.LogConfig;
  const problems: string[] = [];
  if (actual?.Type !== logging.driver) {
    problems.push(`driver ${actual?.Type ?? "unset"} instead of ${logging.driver}`);
  }
  const config: unknown = actual?.Config;
  for (const [key, value] of Object.entries(logging.options)) {
    const found = isRecord(config) ? config[key] : undefined;
    if (found !== value) {
      problems.push(`${key}=${String(found ?? "unset")} instead of ${value}`);
    }
  }
  return problems.length === 0
    ? { check: "log-config", status: "pass", detail: logging.driver }
    : { check: "log-config", status: "fail", detail: problems.join(", ") };
}

function checkHealth(info: ContainerInspectInfo, service: ServiceDescriptor): AcceptanceFinding {
  const check = service.healthcheck;
  if (!check || check.disabled) {
    return { check: "health-status", status: "skip", detail: "no health check declared" };
  }
  const health = info.State.Health;
  if (!health) {
    return { check: "health-status", status: "fail", detail: "runtime reports no health state" };
  }
  if (health.Status === "healthy") {
    return { check: "health-status", status: "pass", detail: "healthy" };
  }
  const latest = health.Log[health.Log.length - 1];
  const output = latest ? `: ${latest.Output.trim()}` : "";
  return {
    check: "health-status",
    status: "fail",
    detail: `${health.Status}, failing streak ${health.FailingStreak}${output}`,
  };
}

async function checkLogRotation(
  info: ContainerInspectInfo,
  rotation: LogRotation,
  statFile: (path: string) => Promise<{ size: number }>,
): Promise<AcceptanceFinding> {
  const logPath = info.LogPath;
  if (!logPath) {
    return { check: "log-rotation", status: "skip", detail: "runtime reports no log file" };
  }
  // Rotated files are <LogPath>.1 .. <LogPath>.(max-file - 1); probe one past it
  const candidates = [logPath];
  for (let i = 1; i <= rotation.maxFiles; i++) {
    candidates.push(`${logPath}.${i}`);
  }
  const sizes: { path: string; size: number }[] = [];
  for (const candidate of candidates) {
    try {
      sizes.push({ path: candidate, size: (await statFile(candidate)).size });
    } catch (error) {
      const code = errnoCode(error);
      if (code === "ENOENT" && candidate !== logPath) {
        continue;
      }
      if (code === "ENOENT" || code === "EACCES" || code === "EPERM") {
        return {
          check: "log-rotation",
          status: "skip",
          detail: `log files are not readable from this host (${code})`,
        };
      }
      throw error;
    }
  }
  const problems: string[] = [];
  if (sizes.length > rotation.maxFiles) {
    problems.push(`${sizes.length} files retained, limit is ${rotation.maxFiles}`);
  }
  // The driver rotates once a file has reached max-size, so a file may hold
  // one entry past it
  const sizeLimit = rotation.maxSizeBytes + MaxLogEntryBytes;
  for (const { path, size } of sizes) {
    if (size > sizeLimit) {
      problems.push(`${path} is ${size} bytes, limit is ${rotation.maxSizeBytes}`);
    }
  }
  const largest = Math.max(...sizes.map((s) => s.size));
  return problems.length === 0
    ? {
        check: "log-rotation",
        status: "pass",
        detail: `${sizes.length} file(s), largest ${largest} bytes`,
      }
    : { check: "log-rotation", status: "fail", detail: problems.join("; ") };
}

/**
 * Compares the running container with its descriptor
 */
export async function verifyDeployment(
  docker: Docker,
  project: ComposeProject,
  service: ServiceDescriptor,
  options: VerifyOptions = {},
): Promise<AcceptanceFinding[]> {
  const name = containerName(project, service);
  let info: ContainerInspectInfo;
  try {
    info = await docker.getContainer(name).inspect();
  } catch (error) {
    if (dockerStatusCode(error) === 404) {
      return [{ check: "container-running", status: "fail", detail: `container ${name} does not exist` }];
    }
    throw error;
  }

  const rotation = service.logging?.rotation;
  const findings: AcceptanceFinding[] = [
    checkRunning(info),
    checkRestartPolicy(info, service),
    checkPorts(info, service),
    checkEnvironment(info, service),
    checkLogConfig(info, service),
    checkHealth(info, service),
    rotation
      ? await checkLogRotation(info, rotation, options.statFile ?? ((file) => stat(file)))
      : { check: "log-rotation", status: "skip", detail: "no log rotation declared" },
  ];
  logger.debug({ name, findings }, "Verified deployment");
  return findings;
}
