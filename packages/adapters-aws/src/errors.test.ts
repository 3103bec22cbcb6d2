import { describe, it, expect } from "vitest";
import { RemoteErrorType, RemoteOperationError } from "@ebshield/core";
import { AwsErrorHandler, callAws, findAws } from "./errors";

function sdkError(name: string, message: string): Error {
  return Object.assign(new Error(message), { name });
}

describe("AwsErrorHandler", () => {
  it("reads the code from Code, code or name", () => {
    expect(AwsErrorHandler.errorCode({ Code: "NoSuchBucket" })).toBe("NoSuchBucket");
    expect(AwsErrorHandler.errorCode({ code: "ECONNRESET" })).toBe("ECONNRESET");
    expect(AwsErrorHandler.errorCode(sdkError("AccessDenied", "no"))).toBe("AccessDenied");
    expect(AwsErrorHandler.errorCode(new Error("plain"))).toBe("");
    expect(AwsErrorHandler.errorCode("text")).toBe("");
  });

  it("classifies common failures", () => {
    expect(AwsErrorHandler.classify(sdkError("ExpiredToken", "expired")).type).toBe(
      RemoteErrorType.AUTHENTICATION
    );
    expect(AwsErrorHandler.classify(sdkError("AccessDeniedException", "denied"))).toMatchObject({
      type: RemoteErrorType.AUTHORIZATION,
      message: "Insufficient permissions: denied",
    });
    expect(AwsErrorHandler.classify(sdkError("ListenerNotFoundException", "gone")).type).toBe(
      RemoteErrorType.NOT_FOUND
    );
    expect(AwsErrorHandler.classify(sdkError("EntityAlreadyExists", "exists")).type).toBe(
      RemoteErrorType.ALREADY_EXISTS
    );
    expect(AwsErrorHandler.classify(sdkError("PriorityInUse", "taken"))).toMatchObject({
      type: RemoteErrorType.UNKNOWN,
      message: "taken",
    });
  });

  it("keeps an already wrapped error", () => {
    const wrapped = new RemoteOperationError("CreateRule", RemoteErrorType.UNKNOWN, "boom");

    expect(AwsErrorHandler.wrap("ModifyListener", wrapped)).toBe(wrapped);
  });
});

describe("callAws", () => {
  it("prefixes the failure with the operation", async () => {
    const failing = callAws("DescribeRules", () =>
      Promise.reject(sdkError("ThrottlingException", "Rate exceeded"))
    );

    await expect(failing).rejects.toThrow("DescribeRules failed: Request throttled: Rate exceeded");
    await expect(failing).rejects.toMatchObject({ type: RemoteErrorType.THROTTLING });
  });
});

describe("findAws", () => {
  it("turns a not-found code into null", async () => {
    const result = await findAws("GetRole", () => Promise.reject(sdkError("NoSuchEntity", "missing")));

    expect(result).toBeNull();
  });

  it("wraps any other failure", async () => {
    await expect(
      findAws("GetRole", () => Promise.reject(sdkError("AccessDenied", "denied")))
    ).rejects.toBeInstanceOf(RemoteOperationError);
  });
});
