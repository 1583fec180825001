import path from "node:path";
import axios, { AxiosInstance } from "axios";
import Docker from "dockerode";
import { logger } from "./logger";
import { formatDuration } from "./units";
import { ProbeResult } from "./lib/types/health";
import { PublishedPort, ServiceDescriptor } from "./lib/types/service-descriptor";

// The runtime truncates probe output to this many characters
const MaxOutputLength = 4096;

const LoopbackHosts = new Set(["localhost", "127.0.0.1", "0.0.0.0", "[::1]"]);

export interface HealthProbe {
  // Resolves to null when there is no new result to record
  run(timeoutMs: number): Promise<ProbeResult | null>;
}

export interface HttpTarget {
  readonly url: string;
  // curl -f and wget treat HTTP errors as failures, plain curl does not
  readonly failOnHttpError: boolean;
  // wget follows redirects, curl only with -L
  readonly maxRedirects: number;
}

// Redirect limits the commands apply by default
const WgetMaxRedirects = 20;
const CurlMaxRedirects = 50;

function commandArguments(test: string[]): string[] | null {
  switch (test[0]) {
    case "CMD":
      return test.slice(1);
    case "CMD-SHELL": {
      const tokens = test.slice(1).join(" ").split(/\s+/).filter((t) => t.length > 0);
      const end = tokens.findIndex((t) => ["||", "&&", ";", "|"].includes(t));
      return (end === -1 ? tokens : tokens.slice(0, end)).map((t) => t.replace(/^['"]|['"]$/g, ""));
    }
    default:
      return null;
  }
}

function isFailFlag(arg: string): boolean {
  return arg === "--fail" || arg === "--fail-with-body" || /^-[a-zA-Z]*f[a-zA-Z]*$/.test(arg);
}

function isLocationFlag(arg: string): boolean {
  return arg === "--location" || arg === "--location-trusted" || /^-[a-zA-Z]*L[a-zA-Z]*$/.test(arg);
}

function redirectLimit(binary: string, args: string[]): number {
  if (binary === "wget") {
    return WgetMaxRedirects;
  }
  return args.some(isLocationFlag) ? CurlMaxRedirects : 0;
}

/**
 * Extracts the HTTP request a curl or wget health command performs, with
 * loopback addresses rewritten to the port published on `probeHost`.
 * Returns null when the command cannot be reproduced from the host.
 */
export function httpTargetFromTest(
  test: string[],
  ports: PublishedPort[],
  probeHost: string,
): HttpTarget | null {
  const args = commandArguments(test);
  if (!args || args.length === 0) {
    return null;
  }
  const [command, ...rest] = args;
  const binary = path.posix.basename(command);
  if (binary !== "curl" && binary !== "wget") {
    return null;
  }
  const target = rest.find((arg) => /^https?:\/\//.test(arg));
  if (target === undefined) {
    return null;
  }
  let url: URL;
  try {
    url = new URL(target);
  } catch {
    return null;
  }
  if (LoopbackHosts.has(url.hostname)) {
    const containerPort = url.port ? Number(url.port) : url.protocol === "https:" ? 443 : 80;
    const published = ports.find(
      (p) => p.containerPort === containerPort && p.protocol === "tcp" && p.hostPort !== undefined,
    );
    if (!published) {
      return null;
    }
    url.hostname = probeHost;
    url.port = String(published.hostPort);
  }
  return {
    url: url.toString(),
    failOnHttpError: binary === "wget" || rest.some(isFailFlag),
    maxRedirects: redirectLimit(binary, rest),
  };
}

/**
 * Performs the health command's HTTP request from the host
 */
export class HttpProbe implements HealthProbe {
  constructor(
    readonly target: HttpTarget,
    private readonly client: Pick<AxiosInstance, "get"> = axios,
  ) {}

  async run(timeoutMs: number): Promise<ProbeResult> {
    const start = Date.now();
    try {
      const response = await this.client.get<string>(this.target.url, {
        timeout: timeoutMs,
        maxRedirects: this.target.maxRedirects,
        responseType: "text",
        validateStatus: () => true,
      });
      if (this.target.failOnHttpError && response.status >= 400) {
        return {
          start,
          end: Date.now(),
          exitCode: 1,
          output: `The requested URL returned error: ${response.status}`,
        };
      }
      return {
        start,
        end: Date.now(),
        exitCode: 0,
        output: String(response.data ?? "").slice(0, MaxOutputLength),
      };
    } catch (error) {
      if (axios.isAxiosError(error) && (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT")) {
        return {
          start,
          end: Date.now(),
          exitCode: -1,
          output: `Health check exceeded timeout (${formatDuration(timeoutMs)})`,
        };
      }
      return {
        start,
        end: Date.now(),
        exitCode: 1,
        output: (error instanceof Error ? error.message : String(error)).slice(0, MaxOutputLength),
      };
    }
  }
}

/**
 * Reads the latest result of the health check the runtime runs inside the
 * container, for commands that cannot be reproduced from the host. Each
 * runtime result is returned once.
 */
export class ContainerHealthProbe implements HealthProbe {
  // Start time of the last runtime entry returned
  private lastStart?: string;

  constructor(
    private readonly docker: Docker,
    readonly containerName: string,
  ) {}

  async run(): Promise<ProbeResult | null> {
    const info = await this.docker.getContainer(this.containerName).inspect();
    const entries = info.State.Health?.Log ?? [];
    const latest = entries[entries.length - 1];
    if (latest === undefined || latest.Start === this.lastStart) {
      return null;
    }
    this.lastStart = latest.Start;
    return {
      start: Date.parse(latest.Start),
      end: Date.parse(latest.End),
      exitCode: latest.ExitCode,
      output: latest.Output,
    };
  }
}

/**
 * Picks the probe for a deployed service; null when it has no health check
 */
export function createProbe(
  docker: Docker,
  containerName: string,
  service: ServiceDescriptor,
  probeHost: string,
): HealthProbe | null {
  const check = service.healthcheck;
  if (!check || check.disabled) {
    return null;
  }
  const target = httpTargetFromTest(check.test, service.ports, probeHost);
  if (target) {
    logger.debug({ service: service.name, url: target.url }, "Probing health over HTTP");
    return new HttpProbe(target);
  }
  logger.debug(
    { service: service.name, test: check.test },
    "Health command cannot run from the host, reading runtime health log",
  );
  return new ContainerHealthProbe(docker, containerName);
}
