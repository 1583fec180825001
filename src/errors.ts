export interface ValidationIssue {
  // Dotted location inside the compose file, e.g. "services.web.ports.0"
  readonly path: string;
  readonly message: string;
}

/**
 * Raised when a compose file does not describe a deployable service
 */
export class ComposeValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[], sourceFile?: string) {
    const where = sourceFile ? ` in ${sourceFile}` : "";
    super(
      `Invalid compose file${where}: ` +
        issues.map(({ path, message }) => (path ? `${path}: ${message}` : message)).join("; "),
    );
    this.name = "ComposeValidationError";
    this.issues = issues;
  }
}

/**
 * Raised when the container runtime rejects a build, pull or container operation
 */
export class DeploymentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DeploymentError";
  }
}

/**
 * Log fields for an error of unknown shape
 */
export function describeError(error: unknown): { error: unknown; message: string; stack?: string } {
  if (error instanceof Error) {
    return { error, message: error.message, stack: error.stack };
  }
  return { error, message: String(error) };
}

/**
 * Status code attached by the Docker client to failed API calls
 */
export function dockerStatusCode(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "statusCode" in error) {
    const { statusCode } = error;
    return typeof statusCode === "number" ? statusCode : undefined;
  }
  return undefined;
}
