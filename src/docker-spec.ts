import { createHash } from "node:crypto";
import { ContainerCreateOptions, HealthConfig } from "dockerode";
import { toNanoseconds } from "./units";
import { ComposeProject, PublishedPort, ServiceDescriptor } from "./lib/types/service-descriptor";

// Label marking containers managed by this tool
export const OrchestratorName = "dockwarden";

export interface PortBinding {
  readonly HostIp: string;
  readonly HostPort: string;
}

/**
 * Docker port key, e.g. "5000/tcp"
 */
export function getPortKey(port: PublishedPort): string {
  return `${port.containerPort}/${port.protocol}`;
}

export function imageName(project: ComposeProject, service: ServiceDescriptor): string {
  return service.image ?? `${project.name}-${service.name}`;
}

export function containerName(project: ComposeProject, service: ServiceDescriptor): string {
  return service.containerName ?? `${project.name}-${service.name}-1`;
}

/**
 * Generates an MD5 hash of the provided string
 */
function getHash(item: string): string {
  return createHash("md5").update(item).digest("hex");
}

export function getPortBindings(service: ServiceDescriptor): Record<string, PortBinding[]> {
  return service.ports.reduce((obj: Record<string, PortBinding[]>, port) => {
    const key = getPortKey(port);
    obj[key] = [
      ...(obj[key] ?? []),
      { HostIp: port.hostIp ?? "", HostPort: port.hostPort !== undefined ? String(port.hostPort) : "" },
    ];
    return obj;
  }, {});
}

function getHealthcheck(service: ServiceDescriptor): HealthConfig | undefined {
  const check = service.healthcheck;
  if (!check) {
    return undefined;
  }
  if (check.disabled) {
    return { Test: ["NONE"] };
  }
  return {
    Test: check.test,
    Interval: toNanoseconds(check.intervalMs),
    Timeout: toNanoseconds(check.timeoutMs),
    StartPeriod: toNanoseconds(check.startPeriodMs),
    Retries: check.retries,
  };
}

/**
 * Translates a service descriptor into the container-create request the
 * runtime would issue for it
 */
export function toContainerCreateOptions(
  project: ComposeProject,
  service: ServiceDescriptor,
): ContainerCreateOptions {
  const portBindings = getPortBindings(service);
  const healthcheck = getHealthcheck(service);
  const options: ContainerCreateOptions = {
    name: containerName(project, service),
    Image: imageName(project, service),
    Env: Object.entries(service.environment).map(([key, value]) => `${key}=${value}`),
    ExposedPorts: Object.keys(portBindings).reduce(
      (obj, binding) => ({ ...obj, [binding]: {} }),
      {},
    ),
    ...(healthcheck ? { Healthcheck: healthcheck } : {}),
    HostConfig: {
      PortBindings: portBindings,
      RestartPolicy: {
        Name: service.restart.name,
        ...(service.restart.name === "on-failure"
          ? { MaximumRetryCount: service.restart.maxRetries ?? 0 }
          : {}),
      },
      ...(service.logging
        ? { LogConfig: { Type: service.logging.driver, Config: service.logging.options } }
        : {}),
    },
  };
  return {
    ...options,
    Labels: {
      OrchestratorName,
      ProjectName: project.name,
      ServiceName: service.name,
      ConfigHash: getHash(JSON.stringify(options)),
    },
  };
}
