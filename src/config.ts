export interface DockwardenConfig {
  readonly composeFile: string;
  // Overrides the project name derived from the compose file's directory
  readonly project?: string;
  readonly dockerSocket: string;
  // Host the supervisor uses to reach published ports
  readonly probeHost: string;
  readonly logLevel: string;
  readonly logFile?: string;
}

export const config: DockwardenConfig = {
  composeFile: process.env.DOCKWARDEN_COMPOSE_FILE || 'docker-compose.yml',
  project: process.env.DOCKWARDEN_PROJECT || undefined,
  dockerSocket: process.env.DOCKWARDEN_DOCKER_SOCKET || '/var/run/docker.sock',
  probeHost: process.env.DOCKWARDEN_PROBE_HOST || 'localhost',
  logLevel: process.env.DOCKWARDEN_LOG_LEVEL || 'info',
  logFile: process.env.DOCKWARDEN_LOG_FILE || undefined,
};
