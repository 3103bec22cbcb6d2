import os from "os";
import path from "path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigurationError, ProcessingFailureError } from "@ebshield/core";
import { createFakePlatform, seedEnvironment, type FakePlatform } from "../__tests__/fake-platform";
import { OIDC, createTestDeployer, testConfig, testSecret } from "../__tests__/fixtures";
import type { StepStatus } from "../types";

const BUCKET = "elasticbeanstalk-eu-west-1-demo";
const TRUST_POLICY = JSON.stringify({ Version: "2012-10-17", Statement: [] });

describe("DeploymentDriver", () => {
  let projectRoot: string;
  let platform: FakePlatform;
  let progress: Array<[string, StepStatus]>;
  const onProgress = (step: string, status: StepStatus) => progress.push([step, status]);

  beforeEach(async () => {
    projectRoot = await fs.mkdtemp(path.join(os.tmpdir(), "ebshield-deploy-"));
    await fs.outputFile(path.join(projectRoot, "policies", "eb-trust-policy.json"), TRUST_POLICY);
    await fs.outputFile(path.join(projectRoot, "policies", "ec2-trust-policy.json"), TRUST_POLICY);
    await fs.outputFile(path.join(projectRoot, "src", "main.py"), "print('hello')\n");
    platform = createFakePlatform();
    progress = [];
  });

  afterEach(async () => {
    await fs.remove(projectRoot);
  });

  it("runs every step for a new environment", async () => {
    const { driver } = createTestDeployer(platform, { projectRoot });

    const result = await driver.deploy(testConfig(), testSecret, onProgress);

    expect(result.bucket).toBe(BUCKET);
    expect(result.key).toBe(`app-${result.versionLabel}.zip`);
    expect(result.reconcile.action).toBe("created");
    expect(platform.storage.calls).toEqual([
      `createBucket:${BUCKET}:eu-west-1`,
      `uploadFile:${BUCKET}:${result.key}`,
    ]);
    expect(platform.environments.applications.has("demo")).toBe(true);
    expect(platform.environments.versions.get(result.versionLabel)?.status).toBe("PROCESSED");
    expect([...platform.identity.roles.keys()]).toEqual(["demo-eb-role", "demo-ec2-role"]);
    expect(platform.identity.profiles.get("demo-ec2-profile")?.roleNames).toEqual(["demo-ec2-role"]);
    expect(platform.environments.created[0].versionLabel).toBe(result.versionLabel);
    expect(progress.filter(([, status]) => status === "complete").map(([step]) => step)).toEqual([
      "bundle",
      "bucket",
      "upload",
      "application",
      "version",
      "iam",
      "environment",
    ]);
  });

  it("removes the local bundle after uploading", async () => {
    const { driver } = createTestDeployer(platform, { projectRoot });

    const result = await driver.deploy(testConfig(), testSecret);

    const bundlePath = platform.storage.objects.get(`${BUCKET}/${result.key}`);
    expect(bundlePath).toBeDefined();
    expect(await fs.pathExists(bundlePath ?? "")).toBe(false);
  });

  it("reuses an existing bucket and application", async () => {
    platform.storage.buckets.add(BUCKET);
    platform.environments.applications.add("demo");
    const createApplication = vi.spyOn(platform.environments, "createApplication");
    const { driver } = createTestDeployer(platform, { projectRoot });

    const result = await driver.deploy(testConfig(), testSecret);

    expect(platform.storage.calls).toEqual([`uploadFile:${BUCKET}:${result.key}`]);
    expect(createApplication).not.toHaveBeenCalled();
  });

  it("stops when the version fails to process", async () => {
    platform.environments.versionStatusSequence = ["PROCESSING", "FAILED"];
    const { driver } = createTestDeployer(platform, { projectRoot });

    await expect(driver.deploy(testConfig(), testSecret, onProgress)).rejects.toBeInstanceOf(
      ProcessingFailureError
    );
    expect(platform.identity.calls).toEqual([]);
    expect(platform.environments.created).toEqual([]);
    expect(progress[progress.length - 1]).toEqual(["version", "error"]);
  });

  it("checks the policy files before touching storage or the application", async () => {
    await fs.remove(path.join(projectRoot, "policies"));
    const bucketExists = vi.spyOn(platform.storage, "bucketExists");
    const { driver } = createTestDeployer(platform, { projectRoot });

    await expect(driver.deploy(testConfig(), testSecret, onProgress)).rejects.toBeInstanceOf(
      ConfigurationError
    );
    expect(bucketExists).not.toHaveBeenCalled();
    expect(platform.storage.calls).toEqual([]);
    expect(platform.environments.applications.size).toBe(0);
    expect(platform.environments.versions.size).toBe(0);
    expect(platform.identity.calls).toEqual([]);
    expect(progress).toEqual([
      ["bundle", "in_progress"],
      ["bundle", "error"],
    ]);
  });

  it("removes the local bundle when the upload fails", async () => {
    let uploadedPath = "";
    vi.spyOn(platform.storage, "uploadFile").mockImplementation(async (_bucket, _key, filePath) => {
      uploadedPath = filePath;
      throw new Error("upload failed");
    });
    const { driver } = createTestDeployer(platform, { projectRoot });

    await expect(driver.deploy(testConfig(), testSecret)).rejects.toThrow("upload failed");
    expect(uploadedPath).not.toBe("");
    expect(await fs.pathExists(uploadedPath)).toBe(false);
    expect(platform.environments.applications.size).toBe(0);
  });

  it("restores the auth gate when updating an existing environment", async () => {
    const { https } = seedEnvironment(platform, "demo-env");
    const { authGate, driver } = createTestDeployer(platform, { projectRoot });
    await authGate.configure("demo-env", OIDC, testSecret);
    platform.environments.onUpdate = () => {
      const listener = platform.loadBalancers.listeners.get(https.arn);
      if (listener) {
        listener.rules = listener.rules.filter((rule) => rule.isDefault);
      }
    };

    const result = await driver.deploy(testConfig(), testSecret);

    expect(result.reconcile.action).toBe("updated");
    expect(result.reconcile.restored?.domain).toBe("demo.example.test");
    expect(platform.loadBalancers.rulesOf(https.arn).filter((rule) => !rule.isDefault)).toHaveLength(1);
  });
});
