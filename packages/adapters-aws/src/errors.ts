/**
 * AWS error handling
 *
 * Every SDK call made by the services in this package goes through
 * `callAws` or `findAws`. Failures leave this package as a
 * RemoteOperationError carrying a classification and suggestions; the
 * not-found codes of lookups become a null result instead.
 */

import { RemoteErrorType, RemoteOperationError, formatErrorMessage } from "@ebshield/core";

/** Error codes the services treat as "resource does not exist" */
const NOT_FOUND_CODES = new Set([
  "NoSuchEntity",
  "NoSuchEntityException",
  "NoSuchBucket",
  "NotFound",
  "ResourceNotFoundException",
  "LoadBalancerNotFound",
  "LoadBalancerNotFoundException",
  "ListenerNotFound",
  "ListenerNotFoundException",
  "RuleNotFound",
  "RuleNotFoundException",
  "TargetGroupNotFound",
  "TargetGroupNotFoundException",
]);

export interface ClassifiedError {
  type: RemoteErrorType;
  message: string;
  suggestions: string[];
}

export class AwsErrorHandler {
  /**
   * Extract the AWS error code (`name` on SDK v3 service exceptions).
   */
  static errorCode(error: unknown): string {
    if (error && typeof error === "object") {
      for (const key of ["Code", "code", "name"]) {
        const candidate: unknown = Reflect.get(error, key);
        if (typeof candidate === "string" && candidate !== "Error") {
          return candidate;
        }
      }
    }
    return "";
  }

  static isResourceNotFound(error: unknown): boolean {
    return NOT_FOUND_CODES.has(AwsErrorHandler.errorCode(error));
  }

  /**
   * Classify an SDK error and suggest a fix.
   */
  static classify(error: unknown): ClassifiedError {
    const code = AwsErrorHandler.errorCode(error);
    const message = formatErrorMessage(error);

    if (
      code.includes("CredentialsProviderError") ||
      code.includes("ExpiredToken") ||
      code.includes("InvalidClientTokenId") ||
      code.includes("UnrecognizedClient")
    ) {
      return {
        type: RemoteErrorType.AUTHENTICATION,
        message: "AWS credentials not configured or expired",
        suggestions: [
          "Run 'aws configure' or export AWS_PROFILE",
          "Check that your AWS access keys are valid",
        ],
      };
    }

    if (code.includes("AccessDenied") || code.includes("UnauthorizedOperation")) {
      return {
        type: RemoteErrorType.AUTHORIZATION,
        message: `Insufficient permissions: ${message}`,
        suggestions: ["Check your IAM policies for the permissions this step needs"],
      };
    }

    if (AwsErrorHandler.isResourceNotFound(error)) {
      return {
        type: RemoteErrorType.NOT_FOUND,
        message: `Resource not found: ${message}`,
        suggestions: ["Verify the resource exists in the configured region"],
      };
    }

    if (code.includes("AlreadyExists") || code.includes("EntityAlreadyExists") || code.includes("Duplicate")) {
      return {
        type: RemoteErrorType.ALREADY_EXISTS,
        message: `Resource already exists: ${message}`,
        suggestions: ["Check whether a previous run already created the resource"],
      };
    }

    if (code.includes("Throttl") || code.includes("LimitExceeded") || code.includes("TooMany")) {
      return {
        type: RemoteErrorType.THROTTLING,
        message: `Request throttled: ${message}`,
        suggestions: ["Wait a few minutes and try again"],
      };
    }

    if (code.includes("NetworkingError") || code.includes("TimeoutError") || code.startsWith("ECONN")) {
      return {
        type: RemoteErrorType.NETWORK,
        message: `Network error: ${message}`,
        suggestions: ["Check your internet connection and try again"],
      };
    }

    return {
      type: RemoteErrorType.UNKNOWN,
      message,
      suggestions: ["Run with DEBUG=1 for more information"],
    };
  }

  static wrap(operation: string, error: unknown): RemoteOperationError {
    if (error instanceof RemoteOperationError) {
      return error;
    }
    const classified = AwsErrorHandler.classify(error);
    return new RemoteOperationError(
      operation,
      classified.type,
      classified.message,
      error,
      classified.suggestions
    );
  }
}

/**
 * Run an SDK call, wrapping any failure with the operation name.
 */
export async function callAws<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw AwsErrorHandler.wrap(operation, error);
  }
}

/**
 * Run an SDK lookup. A not-found error code yields null; other failures are wrapped.
 */
export async function findAws<T>(operation: string, fn: () => Promise<T | null>): Promise<T | null> {
  try {
    return await fn();
  } catch (error) {
    if (AwsErrorHandler.isResourceNotFound(error)) {
      return null;
    }
    throw AwsErrorHandler.wrap(operation, error);
  }
}
