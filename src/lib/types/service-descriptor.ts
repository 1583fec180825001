/**
 * Supervisor behavior when the service process exits or turns unhealthy
 */
export interface RestartPolicy {
  readonly name: 'no' | 'always' | 'unless-stopped' | 'on-failure';
  // Only meaningful for 'on-failure' (e.g. "on-failure:5")
  readonly maxRetries?: number;
}

/**
 * Mapping of a container port onto the host's network
 */
export interface PublishedPort {
  readonly hostIp?: string;
  // Left unset when the runtime should pick an ephemeral host port
  readonly hostPort?: number;
  readonly containerPort: number;
  readonly protocol: 'tcp' | 'udp';
}

/**
 * Liveness probe run by the runtime inside the container
 */
export interface HealthCheck {
  // Runtime list form: ['CMD', ...args], ['CMD-SHELL', command] or ['NONE']
  readonly test: string[];
  readonly intervalMs: number;
  readonly timeoutMs: number;
  readonly startPeriodMs: number;
  readonly retries: number;
  readonly disabled: boolean;
}

export interface LogRotation {
  readonly maxSizeBytes: number;
  readonly maxFiles: number;
}

export interface LoggingConfig {
  readonly driver: string;
  readonly options: Record<string, string>;
  // Parsed from max-size / max-file for file based drivers
  readonly rotation?: LogRotation;
}

export interface BuildConfig {
  readonly context: string;
  readonly dockerfile?: string;
}

/**
 * Everything needed to build, run and supervise one service
 */
export interface ServiceDescriptor {
  readonly name: string;
  readonly build?: BuildConfig;
  readonly image?: string;
  readonly containerName?: string;
  readonly ports: PublishedPort[];
  readonly environment: Record<string, string>;
  readonly restart: RestartPolicy;
  readonly healthcheck?: HealthCheck;
  readonly logging?: LoggingConfig;
}

/**
 * A loaded compose file
 */
export interface ComposeProject {
  readonly version?: string;
  // Normalized project name, used as prefix for images and containers
  readonly name: string;
  readonly sourceFile?: string;
  readonly services: ServiceDescriptor[];
}
