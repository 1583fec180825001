import { ComposeProject, ServiceDescriptor } from "../lib/types/service-descriptor";

export const extractorService: ServiceDescriptor = {
  name: "pdf-extractor",
  build: { context: "." },
  ports: [{ hostPort: 5000, containerPort: 5000, protocol: "tcp" }],
  environment: { FLASK_ENV: "production", PYTHONUNBUFFERED: "1" },
  restart: { name: "unless-stopped" },
  healthcheck: {
    test: ["CMD", "curl", "-f", "http://localhost:5000/health"],
    intervalMs: 30_000,
    timeoutMs: 10_000,
    startPeriodMs: 10_000,
    retries: 3,
    disabled: false,
  },
  logging: {
    driver: "json-file",
    options: { "max-size": "10m", "max-file": "3" },
    rotation: { maxSizeBytes: 10_485_760, maxFiles: 3 },
  },
};

export const extractorProject: ComposeProject = {
  version: "3.8",
  name: "extractor",
  sourceFile: "/srv/extractor/docker-compose.yml",
  services: [extractorService],
};
