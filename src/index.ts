#!/usr/bin/env node
import Docker from "dockerode";
import { Command } from "commander";
import { logger } from "./logger";
import { config } from "./config";
import { ComposeValidationError, describeError } from "./errors";
import { loadComposeFile, resolveService } from "./compose-parser";
import { renderCompose } from "./compose-writer";
import { containerName, toContainerCreateOptions } from "./docker-spec";
import { deployService, removeOrphanedContainers, stopService } from "./containers";
import { createProbe } from "./health-probe";
import { ServiceSupervisor } from "./supervisor";
import { verifyDeployment } from "./acceptance";
import { ComposeProject, ServiceDescriptor } from "./lib/types/service-descriptor";

interface TargetOptions {
  project?: string;
  service?: string;
}

interface Target {
  readonly project: ComposeProject;
  readonly service: ServiceDescriptor;
}

async function loadTarget(file: string, options: TargetOptions): Promise<Target> {
  const projectName = options.project ?? config.project;
  const { project } = await loadComposeFile(file, projectName ? { projectName } : {});
  return { project, service: resolveService(project, options.service) };
}

function createDocker(): Docker {
  logger.debug({ socketPath: config.dockerSocket }, "Initializing docker connection");
  return new Docker({ socketPath: config.dockerSocket });
}

function print(line: string) {
  process.stdout.write(line.endsWith("\n") ? line : `${line}\n`);
}

function targetCommand(name: string, description: string): Command {
  return new Command(name)
    .description(description)
    .argument("[file]", "compose file", config.composeFile)
    .option("-p, --project <name>", "project name")
    .option("-s, --service <name>", "service to operate on");
}

export function createCLI(): Command {
  const program = new Command()
    .name("dockwarden")
    .description("Validate, deploy, supervise and verify a compose service");

  program.addCommand(
    targetCommand("validate", "Check that the compose file describes exactly one deployable service").action(
      async (file: string, options: TargetOptions) => {
        const { project, service } = await loadTarget(file, options);
        print(`${project.name}/${service.name}: valid`);
      },
    ),
  );

  program.addCommand(
    targetCommand("render", "Print the service as compose YAML or as a container-create request")
      .option("-f, --format <format>", "compose or docker", "compose")
      .action(async (file: string, options: TargetOptions & { format: string }) => {
        const { project, service } = await loadTarget(file, options);
        switch (options.format) {
          case "compose":
            print(renderCompose({ ...project, services: [service] }));
            break;
          case "docker":
            print(JSON.stringify(toContainerCreateOptions(project, service), null, 2));
            break;
          default:
            throw new Error(`Unknown format "${options.format}"`);
        }
      }),
  );

  program.addCommand(
    targetCommand("deploy", "Build or pull the image and start the container").action(
      async (file: string, options: TargetOptions) => {
        const { project, service } = await loadTarget(file, options);
        const docker = createDocker();
        const info = await deployService(docker, project, service);
        await removeOrphanedContainers(docker, project, new Set(project.services.map((s) => s.name)));
        print(`${info.Name.replace(/^\//, "")} ${info.Id}`);
      },
    ),
  );

  program.addCommand(
    targetCommand("supervise", "Deploy the service and restart it whenever it turns unhealthy").action(
      async (file: string, options: TargetOptions) => {
        const { project, service } = await loadTarget(file, options);
        const docker = createDocker();
        await deployService(docker, project, service);
        const name = containerName(project, service);
        const supervisor = new ServiceSupervisor(
          docker,
          service,
          name,
          createProbe(docker, name, service, config.probeHost),
        );
        supervisor.start();
        await new Promise<void>((resolve) => {
          const shutdown = (signal: NodeJS.Signals) => {
            logger.info({ signal }, "Shutting down");
            resolve();
          };
          process.once("SIGINT", shutdown);
          process.once("SIGTERM", shutdown);
        });
        await supervisor.stop();
      },
    ),
  );

  program.addCommand(
    targetCommand("verify", "Compare the running container with the compose file").action(
      async (file: string, options: TargetOptions) => {
        const { project, service } = await loadTarget(file, options);
        const findings = await verifyDeployment(createDocker(), project, service);
        for (const { check, status, detail } of findings) {
          print(`${status.toUpperCase().padEnd(4)} ${check}: ${detail}`);
        }
        if (findings.some((finding) => finding.status === "fail")) {
          process.exitCode = 1;
        }
      },
    ),
  );

  program.addCommand(
    targetCommand("stop", "Stop the service container").action(
      async (file: string, options: TargetOptions) => {
        const { project, service } = await loadTarget(file, options);
        await stopService(createDocker(), project, service);
      },
    ),
  );

  return program;
}

if (require.main === module) {
  createCLI()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      if (error instanceof ComposeValidationError) {
        for (const { path, message } of error.issues) {
          process.stderr.write(`${path || "(file)"}: ${message}\n`);
        }
      } else {
        logger.error(describeError(error), "Command failed");
      }
      process.exitCode = 1;
    });
}
