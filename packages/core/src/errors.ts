/**
 * Deployment error taxonomy.
 *
 * Every failure that reaches the CLI is a DeploymentError. The `kind`
 * tells the caller whether the failure is a missing resource (which a
 * caller may treat as a valid terminal state), a configuration problem
 * (reported before any remote mutation), a failed remote call, or a
 * remote resource that reached a terminal failure status.
 */

export enum DeploymentErrorKind {
  NOT_FOUND = "NOT_FOUND",
  CONFIGURATION = "CONFIGURATION",
  REMOTE_OPERATION = "REMOTE_OPERATION",
  PROCESSING_FAILURE = "PROCESSING_FAILURE",
  CANCELLED = "CANCELLED",
}

/**
 * Classification of a failed remote call.
 */
export enum RemoteErrorType {
  AUTHENTICATION = "AUTHENTICATION",
  AUTHORIZATION = "AUTHORIZATION",
  NOT_FOUND = "NOT_FOUND",
  ALREADY_EXISTS = "ALREADY_EXISTS",
  THROTTLING = "THROTTLING",
  NETWORK = "NETWORK",
  UNKNOWN = "UNKNOWN",
}

export abstract class DeploymentError extends Error {
  abstract readonly kind: DeploymentErrorKind;

  constructor(message: string, public readonly suggestions: string[] = []) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A resource the caller required does not exist.
 */
export class ResourceNotFoundError extends DeploymentError {
  readonly kind = DeploymentErrorKind.NOT_FOUND;

  constructor(
    public readonly resourceType: string,
    public readonly resourceName: string,
    message?: string,
    suggestions: string[] = []
  ) {
    super(message ?? `${resourceType} "${resourceName}" not found`, suggestions);
  }
}

/**
 * Required configuration keys or environment variables are missing or invalid.
 */
export class ConfigurationError extends DeploymentError {
  readonly kind = DeploymentErrorKind.CONFIGURATION;

  constructor(
    message: string,
    public readonly missing: string[] = [],
    public readonly remediation?: string
  ) {
    super(message, remediation ? [remediation] : []);
  }
}

/**
 * A call to the cloud platform failed (transport, permissions, throttling...).
 */
export class RemoteOperationError extends DeploymentError {
  readonly kind = DeploymentErrorKind.REMOTE_OPERATION;

  constructor(
    public readonly operation: string,
    public readonly type: RemoteErrorType,
    message: string,
    public readonly cause?: unknown,
    suggestions: string[] = []
  ) {
    super(`${operation} failed: ${message}`, suggestions);
  }
}

/**
 * A remote resource reached a terminal failure status.
 */
export class ProcessingFailureError extends DeploymentError {
  readonly kind = DeploymentErrorKind.PROCESSING_FAILURE;

  constructor(
    public readonly resourceType: string,
    public readonly resourceName: string,
    public readonly status: string
  ) {
    super(`${resourceType} "${resourceName}" reached status ${status}`);
  }
}

/**
 * A long-running wait was aborted by the caller.
 */
export class OperationCancelledError extends DeploymentError {
  readonly kind = DeploymentErrorKind.CANCELLED;

  constructor(public readonly description: string) {
    super(`Cancelled while waiting for ${description}`);
  }
}

export function isDeploymentError(error: unknown): error is DeploymentError {
  return error instanceof DeploymentError;
}

/**
 * Format error message from any thrown value.
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
