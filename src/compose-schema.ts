import { z } from "zod";
import { parseByteSize, parseDuration } from "./units";
import {
  BuildConfig,
  HealthCheck,
  LoggingConfig,
  LogRotation,
  PublishedPort,
  RestartPolicy,
  ServiceDescriptor,
} from "./lib/types/service-descriptor";

export type Environment = Record<string, string | undefined>;

// Keys of a service entry that this tool understands
export const KnownServiceKeys = [
  "build",
  "image",
  "container_name",
  "ports",
  "environment",
  "restart",
  "healthcheck",
  "logging",
];

const RestartPolicyNames: RestartPolicy["name"][] = ["no", "always", "unless-stopped", "on-failure"];

const DefaultIntervalMs = 30_000;
const DefaultTimeoutMs = 30_000;
const DefaultRetries = 3;

// Drivers that write rotated files on the host
const FileLogDrivers = new Set(["json-file", "local"]);

function parsePortNumber(text: string, spec: string): number {
  if (text.includes("-")) {
    throw new RangeError(`port ranges are not supported ("${spec}")`);
  }
  if (!/^\d+$/.test(text)) {
    throw new RangeError(`invalid port "${text}" in "${spec}"`);
  }
  const port = Number(text);
  if (port < 1 || port > 65535) {
    throw new RangeError(`port ${port} out of range in "${spec}"`);
  }
  return port;
}

/**
 * Parses "[IP:][HOST:]CONTAINER[/PROTO]" or a bare container port
 */
export function parsePortSpec(spec: string | number): PublishedPort {
  if (typeof spec === "number") {
    return { containerPort: parsePortNumber(String(spec), String(spec)), protocol: "tcp" };
  }
  const [mapping, protocol = "tcp", ...extra] = spec.trim().split("/");
  if (extra.length > 0 || (protocol !== "tcp" && protocol !== "udp")) {
    throw new RangeError(`invalid protocol in "${spec}"`);
  }
  const parts = mapping.split(":");
  switch (parts.length) {
    case 1:
      return { containerPort: parsePortNumber(parts[0], spec), protocol };
    case 2:
      return {
        hostPort: parsePortNumber(parts[0], spec),
        containerPort: parsePortNumber(parts[1], spec),
        protocol,
      };
    case 3: {
      const [hostIp, hostPort, containerPort] = parts;
      if (!hostIp) {
        throw new RangeError(`missing host IP in "${spec}"`);
      }
      return {
        hostIp,
        ...(hostPort === "" ? {} : { hostPort: parsePortNumber(hostPort, spec) }),
        containerPort: parsePortNumber(containerPort, spec),
        protocol,
      };
    }
    default:
      throw new RangeError(`invalid port mapping "${spec}"`);
  }
}

/**
 * Parses "no", "always", "unless-stopped", "on-failure" or "on-failure:N"
 */
export function parseRestartPolicy(text: string): RestartPolicy {
  const name = RestartPolicyNames.find((candidate) => candidate === text);
  if (name) {
    return { name };
  }
  const match = /^on-failure:(\d+)$/.exec(text);
  if (match) {
    return { name: "on-failure", maxRetries: Number(match[1]) };
  }
  throw new RangeError(`unknown restart policy "${text}"`);
}

function issueMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const durationSchema = z.string().transform((value, ctx) => {
  try {
    return parseDuration(value);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: issueMessage(error) });
    return z.NEVER;
  }
});

const portSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  try {
    return parsePortSpec(value);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: issueMessage(error) });
    return z.NEVER;
  }
});

const restartSchema = z.string().transform((value, ctx) => {
  try {
    return parseRestartPolicy(value);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: issueMessage(error) });
    return z.NEVER;
  }
});

const buildSchema = z
  .union([
    z.string().min(1),
    z.object({
      context: z.string().min(1).default("."),
      dockerfile: z.string().min(1).optional(),
    }),
  ])
  .transform((value): BuildConfig => (typeof value === "string" ? { context: value } : value));

function environmentSchema(env: Environment) {
  return z
    .union([
      z.array(z.string()),
      z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])),
    ])
    .transform((entries, ctx) => {
      const out: Record<string, string> = {};
      if (!Array.isArray(entries)) {
        for (const [key, value] of Object.entries(entries)) {
          const resolved = value === null ? env[key] : String(value);
          if (resolved !== undefined) {
            out[key] = resolved;
          }
        }
        return out;
      }
      entries.forEach((entry, index) => {
        const separator = entry.indexOf("=");
        const key = separator === -1 ? entry : entry.slice(0, separator);
        if (key.length === 0) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `invalid environment entry "${entry}"`,
            path: [index],
          });
          return;
        }
        if (separator !== -1) {
          out[key] = entry.slice(separator + 1);
          return;
        }
        // A bare KEY is taken from the loader's environment, when set
        const inherited = env[key];
        if (inherited !== undefined) {
          out[key] = inherited;
        }
      });
      return out;
    });
}

const healthcheckSchema = z
  .object({
    test: z.union([z.string().min(1), z.array(z.string()).min(1)]).optional(),
    interval: durationSchema.optional(),
    timeout: durationSchema.optional(),
    start_period: durationSchema.optional(),
    retries: z.number().int().positive().optional(),
    disable: z.boolean().optional(),
  })
  .transform((raw, ctx): HealthCheck => {
    const test = typeof raw.test === "string" ? ["CMD-SHELL", raw.test] : raw.test;
    const disabled = raw.disable === true || test?.[0] === "NONE";
    if (!disabled) {
      if (test === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "test is required", path: ["test"] });
      } else if (test[0] !== "CMD" && test[0] !== "CMD-SHELL") {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `test must start with CMD, CMD-SHELL or NONE, got "${test[0]}"`,
          path: ["test", 0],
        });
      } else if (test.length < 2) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${test[0]} requires a command`,
          path: ["test"],
        });
      }
    }
    for (const key of ["interval", "timeout"] as const) {
      const value = raw[key];
      // The runtime rejects intervals and timeouts below one millisecond
      if (value !== undefined && value < 1) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be at least 1ms", path: [key] });
      }
    }
    return {
      test: disabled ? ["NONE"] : test ?? [],
      intervalMs: raw.interval ?? DefaultIntervalMs,
      timeoutMs: raw.timeout ?? DefaultTimeoutMs,
      startPeriodMs: raw.start_period ?? 0,
      retries: raw.retries ?? DefaultRetries,
      disabled,
    };
  });

const loggingSchema = z
  .object({
    driver: z.string().min(1).default("json-file"),
    options: z.record(z.union([z.string(), z.number()]).transform(String)).default({}),
  })
  .transform((raw, ctx): LoggingConfig => {
    if (!FileLogDrivers.has(raw.driver)) {
      return { driver: raw.driver, options: raw.options };
    }
    const maxSize = raw.options["max-size"];
    const maxFile = raw.options["max-file"];
    let maxSizeBytes: number | undefined;
    let maxFiles: number | undefined;
    if (maxSize !== undefined) {
      try {
        maxSizeBytes = parseByteSize(maxSize);
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: issueMessage(error),
          path: ["options", "max-size"],
        });
      }
    }
    if (maxFile !== undefined) {
      if (/^\d+$/.test(maxFile) && Number(maxFile) > 0) {
        maxFiles = Number(maxFile);
      } else {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `max-file must be a positive integer, got "${maxFile}"`,
          path: ["options", "max-file"],
        });
      }
    }
    if (maxFiles !== undefined && maxFiles > 1 && maxSize === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "max-file greater than 1 requires max-size",
        path: ["options", "max-file"],
      });
    }
    const rotation: LogRotation | undefined =
      maxSizeBytes !== undefined ? { maxSizeBytes, maxFiles: maxFiles ?? 1 } : undefined;
    return { driver: raw.driver, options: raw.options, ...(rotation ? { rotation } : {}) };
  });

function serviceSchema(env: Environment) {
  return z
    .object({
      build: buildSchema.optional(),
      image: z.string().min(1).optional(),
      container_name: z.string().min(1).optional(),
      ports: z.array(portSchema).default([]),
      environment: environmentSchema(env).default({}),
      restart: restartSchema.default("no"),
      healthcheck: healthcheckSchema.optional(),
      logging: loggingSchema.optional(),
    })
    .superRefine((service, ctx) => {
      if (service.build === undefined && service.image === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "either build or image is required" });
      }
    })
    .transform(
      (service): Omit<ServiceDescriptor, "name"> => ({
        ...(service.build ? { build: service.build } : {}),
        ...(service.image ? { image: service.image } : {}),
        ...(service.container_name ? { containerName: service.container_name } : {}),
        ports: service.ports,
        environment: service.environment,
        restart: service.restart,
        ...(service.healthcheck ? { healthcheck: service.healthcheck } : {}),
        ...(service.logging ? { logging: service.logging } : {}),
      }),
    );
}

/**
 * Builds the schema of a compose file. Bare environment keys are resolved
 * against `env`.
 */
export function composeFileSchema(env: Environment) {
  return z.object({
    version: z
      .union([z.string(), z.number().transform(String)])
      .refine((version) => /^[23](\.\d+)*$/.test(version), {
        message: "unsupported schema version, expected 2.x or 3.x",
      })
      .optional(),
    name: z.string().min(1).optional(),
    services: z
      .record(
        z.string().regex(/^[a-zA-Z0-9._-]+$/, "invalid service name"),
        serviceSchema(env),
      )
      .refine((services) => Object.keys(services).length > 0, {
        message: "at least one service is required",
      }),
  });
}

export type ComposeFile = z.output<ReturnType<typeof composeFileSchema>>;
