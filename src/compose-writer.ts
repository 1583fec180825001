import { dump as yamlDump } from "js-yaml";
import { formatDuration } from "./units";
import {
  ComposeProject,
  HealthCheck,
  PublishedPort,
  RestartPolicy,
  ServiceDescriptor,
} from "./lib/types/service-descriptor";

export function formatPort(port: PublishedPort): string {
  const suffix = port.protocol === "udp" ? "/udp" : "";
  if (port.hostIp !== undefined) {
    return `${port.hostIp}:${port.hostPort ?? ""}:${port.containerPort}${suffix}`;
  }
  if (port.hostPort !== undefined) {
    return `${port.hostPort}:${port.containerPort}${suffix}`;
  }
  return `${port.containerPort}${suffix}`;
}

export function formatRestartPolicy(policy: RestartPolicy): string {
  return policy.maxRetries !== undefined ? `${policy.name}:${policy.maxRetries}` : policy.name;
}

function renderHealthcheck(check: HealthCheck): Record<string, unknown> {
  return {
    test: check.test,
    interval: formatDuration(check.intervalMs),
    timeout: formatDuration(check.timeoutMs),
    retries: check.retries,
    start_period: formatDuration(check.startPeriodMs),
  };
}

function renderService(service: ServiceDescriptor): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (service.build) {
    out.build = service.build.dockerfile
      ? { context: service.build.context, dockerfile: service.build.dockerfile }
      : service.build.context;
  }
  if (service.image) {
    out.image = service.image;
  }
  if (service.containerName) {
    out.container_name = service.containerName;
  }
  if (service.ports.length > 0) {
    out.ports = service.ports.map(formatPort);
  }
  const environment = Object.entries(service.environment);
  if (environment.length > 0) {
    out.environment = environment.map(([key, value]) => `${key}=${value}`);
  }
  out.restart = formatRestartPolicy(service.restart);
  if (service.healthcheck) {
    out.healthcheck = renderHealthcheck(service.healthcheck);
  }
  if (service.logging) {
    out.logging = Object.keys(service.logging.options).length > 0
      ? { driver: service.logging.driver, options: service.logging.options }
      : { driver: service.logging.driver };
  }
  return out;
}

/**
 * Renders a project back to compose YAML
 */
export function renderCompose(project: ComposeProject): string {
  const document: Record<string, unknown> = {};
  if (project.version !== undefined) {
    document.version = project.version;
  }
  document.name = project.name;
  document.services = Object.fromEntries(
    project.services.map((service) => [service.name, renderService(service)]),
  );
  return yamlDump(document, { lineWidth: -1, noRefs: true });
}
