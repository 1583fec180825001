import { readFile } from "node:fs/promises";
import path from "node:path";
import { load as yamlLoad, YAMLException } from "js-yaml";
import { ZodError } from "zod";
import { logger } from "./logger";
import { ComposeValidationError } from "./errors";
import { composeFileSchema, Environment, KnownServiceKeys } from "./compose-schema";
import { ComposeProject, ServiceDescriptor } from "./lib/types/service-descriptor";

export interface ParseOptions {
  readonly sourceFile?: string;
  // Project name override; otherwise the file's `name` or its directory
  readonly projectName?: string;
  // Resolves bare environment keys, defaults to process.env
  readonly env?: Environment;
}

export interface ParseResult {
  readonly project: ComposeProject;
  readonly warnings: string[];
}

/**
 * Lowercases a project name and drops characters the runtime rejects
 */
export function normalizeProjectName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9_-]/g, "");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function unknownKeyWarnings(document: unknown): string[] {
  if (!isRecord(document) || !isRecord(document.services)) {
    return [];
  }
  const warnings: string[] = [];
  for (const [name, service] of Object.entries(document.services)) {
    if (!isRecord(service)) {
      continue;
    }
    for (const key of Object.keys(service)) {
      if (!KnownServiceKeys.includes(key)) {
        warnings.push(`services.${name}.${key} is not supported and was ignored`);
      }
    }
  }
  return warnings;
}

// YAML reads an unquoted 3.10 as the number 3.1
function numericVersionWarnings(document: unknown): string[] {
  if (isRecord(document) && typeof document.version === "number") {
    return [
      `version ${document.version} is not quoted and was read as a number, quote it to keep its exact text`,
    ];
  }
  return [];
}

function toIssues(error: ZodError) {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Parses and validates the text of a compose file
 */
export function parseCompose(text: string, options: ParseOptions = {}): ParseResult {
  let document: unknown;
  try {
    document = yamlLoad(text);
  } catch (error) {
    if (error instanceof YAMLException) {
      throw new ComposeValidationError([{ path: "", message: error.message }], options.sourceFile);
    }
    throw error;
  }

  const result = composeFileSchema(options.env ?? process.env).safeParse(document);
  if (!result.success) {
    throw new ComposeValidationError(toIssues(result.error), options.sourceFile);
  }

  const services: ServiceDescriptor[] = Object.entries(result.data.services).map(
    ([name, service]) => ({ name, ...service }),
  );
  const fallbackName = options.sourceFile
    ? path.basename(path.dirname(path.resolve(options.sourceFile)))
    : "default";
  const name = normalizeProjectName(options.projectName ?? result.data.name ?? fallbackName);
  if (name.length === 0) {
    throw new ComposeValidationError(
      [{ path: "name", message: "project name is empty after normalization" }],
      options.sourceFile,
    );
  }

  return {
    project: {
      ...(result.data.version !== undefined ? { version: result.data.version } : {}),
      name,
      ...(options.sourceFile ? { sourceFile: options.sourceFile } : {}),
      services,
    },
    warnings: [...numericVersionWarnings(document), ...unknownKeyWarnings(document)],
  };
}

/**
 * Reads and validates a compose file from disk
 */
export async function loadComposeFile(
  filePath: string,
  options: Omit<ParseOptions, "sourceFile"> = {},
): Promise<ParseResult> {
  logger.debug({ filePath }, "Loading compose file");
  const text = await readFile(filePath, "utf-8");
  const parsed = parseCompose(text, { ...options, sourceFile: filePath });
  for (const warning of parsed.warnings) {
    logger.warn({ filePath }, warning);
  }
  logger.info(
    {
      filePath,
      project: parsed.project.name,
      services: parsed.project.services.map((s) => s.name),
    },
    "Loaded compose file",
  );
  return parsed;
}

/**
 * Picks the service to operate on: the named one, or the only one declared
 */
export function resolveService(project: ComposeProject, name?: string): ServiceDescriptor {
  if (name !== undefined) {
    const service = project.services.find((s) => s.name === name);
    if (!service) {
      throw new ComposeValidationError(
        [{ path: "services", message: `service "${name}" is not declared` }],
        project.sourceFile,
      );
    }
    return service;
  }
  if (project.services.length !== 1) {
    throw new ComposeValidationError(
      [
        {
          path: "services",
          message: `expected exactly one service, found ${project.services.length} (${project.services
            .map((s) => s.name)
            .join(", ")})`,
        },
      ],
      project.sourceFile,
    );
  }
  return project.services[0];
}
