import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import Docker, { ContainerInfo, ContainerInspectInfo } from "dockerode";
import { logger } from "./logger";
import { DeploymentError, describeError, dockerStatusCode } from "./errors";
import {
  OrchestratorName,
  containerName,
  imageName,
  toContainerCreateOptions,
} from "./docker-spec";
import { ComposeProject, ServiceDescriptor } from "./lib/types/service-descriptor";

// Container Name -> Container Info
type ExistingContainers = Record<string, ContainerInfo>;

/**
 * Get the containers this tool deployed for a project
 */
async function getExistingContainers(
  docker: Docker,
  project: ComposeProject,
): Promise<ExistingContainers> {
  const containers: ContainerInfo[] = await docker.listContainers({
    all: true,
    filters: {
      label: [`OrchestratorName=${OrchestratorName}`, `ProjectName=${project.name}`],
    },
  });
  return containers.reduce((obj: ExistingContainers, container) => {
    logger.trace({ container }, "Found existing container");
    const [name] = container.Names;
    if (name !== undefined) {
      obj[name.replace(/^\//, "")] = container; // remove leading slash in name
    }
    return obj;
  }, {});
}

function buildContextDir(project: ComposeProject, context: string): string {
  const base = project.sourceFile ? path.dirname(path.resolve(project.sourceFile)) : process.cwd();
  return path.resolve(base, context);
}

/**
 * Lists every regular file of a build context, relative to it
 */
export async function listContextFiles(contextDir: string): Promise<string[]> {
  const entries = await readdir(contextDir, { recursive: true });
  const files: string[] = [];
  for (const entry of entries) {
    if ((await stat(path.join(contextDir, entry))).isFile()) {
      files.push(entry);
    }
  }
  return files.sort();
}

function progressError(entry: unknown): string | undefined {
  if (typeof entry === "object" && entry !== null && "error" in entry) {
    return String(entry.error);
  }
  return undefined;
}

/**
 * Waits for a build or pull stream and surfaces the errors it reports
 */
async function followProgress(
  docker: Docker,
  stream: NodeJS.ReadableStream,
  action: string,
): Promise<void> {
  const output = await new Promise<unknown[]>((resolve, reject) => {
    docker.modem.followProgress(stream, (error: Error | null, result: unknown[]) =>
      error ? reject(error) : resolve(result),
    );
  });
  const failure = output.map(progressError).find((message) => message !== undefined);
  if (failure !== undefined) {
    throw new DeploymentError(`${action} failed: ${failure}`);
  }
}

/**
 * Builds the service image from its context, or pulls it
 * @returns Image reference the container runs
 */
export async function ensureImage(
  docker: Docker,
  project: ComposeProject,
  service: ServiceDescriptor,
): Promise<string> {
  const image = imageName(project, service);
  try {
    if (service.build) {
      const context = buildContextDir(project, service.build.context);
      const src = await listContextFiles(context);
      logger.info({ image, context, fileCount: src.length }, "Building image");
      const stream = await docker.buildImage(
        { context, src },
        {
          t: image,
          ...(service.build.dockerfile ? { dockerfile: service.build.dockerfile } : {}),
        },
      );
      await followProgress(docker, stream, `Build of ${image}`);
    } else {
      logger.info({ image }, "Pulling image");
      const stream = await docker.pull(image);
      await followProgress(docker, stream, `Pull of ${image}`);
    }
  } catch (error) {
    logger.error({ image, ...describeError(error) }, "Failed to prepare image");
    if (error instanceof DeploymentError) {
      throw error;
    }
    throw new DeploymentError(`Failed to prepare image ${image}`, { cause: error });
  }
  return image;
}

/**
 * Builds or pulls the image and makes sure a container with the current
 * configuration is running, replacing an outdated one
 */
export async function deployService(
  docker: Docker,
  project: ComposeProject,
  service: ServiceDescriptor,
): Promise<ContainerInspectInfo> {
  const image = await ensureImage(docker, project, service);
  const imageId = (await docker.getImage(image).inspect()).Id;
  const options = toContainerCreateOptions(project, service);
  const name = containerName(project, service);
  const configHash = options.Labels?.ConfigHash;
  logger.trace({ name, configHash, options }, "Created container options");

  const existingContainers = await getExistingContainers(docker, project);
  const existingContainerInfo = existingContainers[name];
  if (existingContainerInfo !== undefined) {
    const existingContainer = docker.getContainer(existingContainerInfo.Id);
    if (
      existingContainerInfo.Labels.ConfigHash === configHash &&
      existingContainerInfo.ImageID === imageId &&
      existingContainerInfo.State === "running"
    ) {
      logger.debug({ name }, "Container config matches existing config");
      return await existingContainer.inspect();
    }
    logger.debug(
      { name, state: existingContainerInfo.State },
      "Removing outdated container",
    );
    try {
      await existingContainer.remove({ force: true });
    } catch (error) {
      logger.error({ name, ...describeError(error) }, "Failed to remove existing container");
      throw new DeploymentError(`Failed to remove container ${name}`, { cause: error });
    }
  }

  try {
    const container = await docker.createContainer(options);
    logger.debug({ name, id: container.id }, "Created container");
    await container.start();
    const info = await container.inspect();
    logger.info({ name, id: info.Id, image }, "Started container");
    return info;
  } catch (error) {
    logger.error({ name, ...describeError(error) }, "Failed to start container");
    throw new DeploymentError(`Failed to start container ${name}`, { cause: error });
  }
}

/**
 * Stops the service container. The stop counts as a manual stop for the
 * restart policy.
 */
export async function stopService(
  docker: Docker,
  project: ComposeProject,
  service: ServiceDescriptor,
): Promise<void> {
  const name = containerName(project, service);
  try {
    await docker.getContainer(name).stop();
    logger.info({ name }, "Stopped container");
  } catch (error) {
    const statusCode = dockerStatusCode(error);
    if (statusCode === 304) {
      logger.debug({ name }, "Container already stopped");
      return;
    }
    if (statusCode === 404) {
      logger.debug({ name }, "Container does not exist");
      return;
    }
    logger.error({ name, ...describeError(error) }, "Failed to stop container");
    throw new DeploymentError(`Failed to stop container ${name}`, { cause: error });
  }
}

export interface RemovalResult {
  readonly id: string;
  readonly name: string;
  readonly success: boolean;
  readonly error?: string;
}

/**
 * Removes containers of the project whose service is no longer declared
 */
export async function removeOrphanedContainers(
  docker: Docker,
  project: ComposeProject,
  activeServices: Set<string>,
): Promise<RemovalResult[]> {
  const removalResults: RemovalResult[] = [];
  try {
    logger.debug(
      { activeServices: Array.from(activeServices) },
      "Checking for orphaned containers",
    );
    const existingContainers = await getExistingContainers(docker, project);

    for (const [name, containerInfo] of Object.entries(existingContainers)) {
      const serviceName = containerInfo.Labels.ServiceName;
      if (activeServices.has(serviceName)) {
        continue;
      }
      logger.info(
        { containerId: containerInfo.Id, name, serviceName, state: containerInfo.State },
        "Removing orphaned container",
      );
      try {
        await docker.getContainer(containerInfo.Id).remove({ force: true });
        removalResults.push({ id: containerInfo.Id, name, success: true });
      } catch (error) {
        const fields = describeError(error);
        logger.error({ containerId: containerInfo.Id, name, ...fields }, "Failed to delete container");
        removalResults.push({ id: containerInfo.Id, name, success: false, error: fields.message });
      }
    }

    if (removalResults.length > 0) {
      logger.info(
        {
          removedCount: removalResults.length,
          successCount: removalResults.filter((r) => r.success).length,
          failCount: removalResults.filter((r) => !r.success).length,
        },
        "Container cleanup summary",
      );
    }
  } catch (error) {
    logger.error(describeError(error), "Error removing orphaned containers");
  }
  return removalResults;
}
