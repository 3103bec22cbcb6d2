import os from "os";
import path from "path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { ConfigurationError } from "@ebshield/core";
import { FakeIdentityService } from "../__tests__/fake-platform";
import { createLogCollector } from "../__tests__/fixtures";
import { IamProvisioner } from "./iam-provisioner";

const TRUST_POLICY = JSON.stringify({
  Version: "2012-10-17",
  Statement: [{ Effect: "Allow", Principal: { Service: "ec2.amazonaws.com" }, Action: "sts:AssumeRole" }],
});
const BUCKET_POLICY = JSON.stringify({
  Version: "2012-10-17",
  Statement: [{ Effect: "Allow", Action: "s3:GetObject", Resource: "*" }],
});
const MANAGED = "arn:aws:iam::aws:policy/AWSElasticBeanstalkWebTier";

describe("IamProvisioner", () => {
  let policiesDir: string;
  let identity: FakeIdentityService;
  let sleep: Mock<(ms: number) => Promise<void>>;
  let provisioner: IamProvisioner;

  beforeEach(async () => {
    policiesDir = await fs.mkdtemp(path.join(os.tmpdir(), "ebshield-policies-"));
    await fs.writeFile(path.join(policiesDir, "ec2-trust-policy.json"), TRUST_POLICY);
    await fs.writeFile(path.join(policiesDir, "s3-read.json"), BUCKET_POLICY);
    await fs.writeFile(path.join(policiesDir, "cloudwatch.json"), BUCKET_POLICY);
    identity = new FakeIdentityService();
    sleep = vi.fn(async (_ms: number) => {});
    provisioner = new IamProvisioner(identity, policiesDir, createLogCollector().log, {
      propagationDelayMs: 10_000,
      sleep,
    });
  });

  afterEach(async () => {
    await fs.remove(policiesDir);
  });

  describe("ensureRole", () => {
    it("creates a missing role with its trust policy and managed policies", async () => {
      const role = await provisioner.ensureRole(
        "demo-ec2-role",
        { trust_policy: "ec2-trust-policy.json", managed_policies: [MANAGED] },
        { tags: { Project: "demo" } }
      );

      expect(role.arn).toBe("arn:aws:iam::123456789012:role/demo-ec2-role");
      expect(identity.roles.get("demo-ec2-role")?.trustPolicy).toBe(TRUST_POLICY);
      expect(identity.attached.get("demo-ec2-role")).toEqual([MANAGED]);
    });

    it("only attaches managed policies that are missing", async () => {
      await identity.createRole("demo-ec2-role", TRUST_POLICY);
      identity.attached.set("demo-ec2-role", [MANAGED]);
      identity.calls.length = 0;

      await provisioner.ensureRole("demo-ec2-role", {
        trust_policy: "ec2-trust-policy.json",
        managed_policies: [MANAGED, "arn:aws:iam::aws:policy/CloudWatchAgentServerPolicy"],
      });

      expect(identity.calls).toEqual([
        "attachRolePolicy:demo-ec2-role:arn:aws:iam::aws:policy/CloudWatchAgentServerPolicy",
      ]);
    });

    it("puts every non-trust policy file when asked to", async () => {
      await provisioner.ensureRole(
        "demo-ec2-role",
        { trust_policy: "ec2-trust-policy.json", managed_policies: [] },
        { attachDirectoryPolicies: true }
      );

      expect([...(identity.inline.get("demo-ec2-role")?.keys() ?? [])]).toEqual(["cloudwatch", "s3-read"]);
    });

    it("puts only the listed custom policies", async () => {
      await provisioner.ensureRole(
        "demo-ec2-role",
        { trust_policy: "ec2-trust-policy.json", managed_policies: [], custom_policies: ["s3-read.json"] },
        { attachDirectoryPolicies: true }
      );

      expect([...(identity.inline.get("demo-ec2-role")?.keys() ?? [])]).toEqual(["s3-read"]);
      expect(identity.inline.get("demo-ec2-role")?.get("s3-read")).toBe(BUCKET_POLICY);
    });

    it("fails before any remote call when the trust policy file is missing", async () => {
      const error = await provisioner
        .ensureRole("demo-eb-role", { trust_policy: "eb-trust-policy.json", managed_policies: [] })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        message: `Policy file not found: ${path.join(policiesDir, "eb-trust-policy.json")}`,
      });
      expect(identity.calls).toEqual([]);
    });

    it("rejects a policy file that is not JSON", async () => {
      await fs.writeFile(path.join(policiesDir, "broken-trust-policy.json"), "{ not json");

      await expect(
        provisioner.ensureRole("demo-ec2-role", { trust_policy: "broken-trust-policy.json", managed_policies: [] })
      ).rejects.toBeInstanceOf(ConfigurationError);
    });
  });

  describe("ensureInstanceProfile", () => {
    it("creates the profile, adds the role and waits for propagation", async () => {
      const profile = await provisioner.ensureInstanceProfile("demo-ec2-profile", "demo-ec2-role");

      expect(profile.roleNames).toEqual(["demo-ec2-role"]);
      expect(identity.calls).toEqual([
        "createInstanceProfile:demo-ec2-profile",
        "addRoleToInstanceProfile:demo-ec2-profile:demo-ec2-role",
      ]);
      expect(sleep).toHaveBeenCalledWith(10_000);
    });

    it("leaves a correctly wired profile alone", async () => {
      await identity.createInstanceProfile("demo-ec2-profile");
      await identity.addRoleToInstanceProfile("demo-ec2-profile", "demo-ec2-role");
      identity.calls.length = 0;

      await provisioner.ensureInstanceProfile("demo-ec2-profile", "demo-ec2-role");

      expect(identity.calls).toEqual([]);
      expect(sleep).not.toHaveBeenCalled();
    });

    it("replaces a wrong role", async () => {
      await identity.createInstanceProfile("demo-ec2-profile");
      await identity.addRoleToInstanceProfile("demo-ec2-profile", "old-role");
      identity.calls.length = 0;

      const profile = await provisioner.ensureInstanceProfile("demo-ec2-profile", "demo-ec2-role");

      expect(profile.roleNames).toEqual(["demo-ec2-role"]);
      expect(identity.calls).toEqual([
        "removeRoleFromInstanceProfile:demo-ec2-profile:old-role",
        "addRoleToInstanceProfile:demo-ec2-profile:demo-ec2-role",
      ]);
      expect(identity.profiles.get("demo-ec2-profile")?.roleNames).toEqual(["demo-ec2-role"]);
    });
  });

  describe("listPolicyFiles", () => {
    it("returns an empty list when the directory is missing", async () => {
      const missing = new IamProvisioner(identity, path.join(policiesDir, "nope"), () => {});
      expect(await missing.listPolicyFiles()).toEqual([]);
    });
  });

  describe("validatePolicyFiles", () => {
    const iam = (overrides: { serviceCustom?: string[]; instanceCustom?: string[] } = {}) => ({
      service_role_name: "demo-eb-role",
      service_role_policies: {
        trust_policy: "ec2-trust-policy.json",
        managed_policies: [],
        custom_policies: overrides.serviceCustom,
      },
      instance_profile_name: "demo-ec2-profile",
      instance_role_name: "demo-ec2-role",
      instance_role_policies: {
        trust_policy: "ec2-trust-policy.json",
        managed_policies: [MANAGED],
        custom_policies: overrides.instanceCustom,
      },
    });

    it("accepts a complete policies directory without calling IAM", async () => {
      await expect(provisioner.validatePolicyFiles(iam())).resolves.toBeUndefined();
      expect(identity.calls).toEqual([]);
    });

    it("rejects a missing custom policy of the service role", async () => {
      await expect(provisioner.validatePolicyFiles(iam({ serviceCustom: ["eb-extra.json"] }))).rejects.toThrow(
        `Policy file not found: ${path.join(policiesDir, "eb-extra.json")}`
      );
    });

    it("rejects a malformed policy picked up from the directory", async () => {
      await fs.writeFile(path.join(policiesDir, "broken.json"), "{");

      const failure = provisioner.validatePolicyFiles(iam());

      await expect(failure).rejects.toBeInstanceOf(ConfigurationError);
      await expect(failure).rejects.toThrow(`Invalid JSON in ${path.join(policiesDir, "broken.json")}`);
    });

    it("only reads the listed custom policies of the instance role", async () => {
      await fs.writeFile(path.join(policiesDir, "broken.json"), "{");

      await expect(
        provisioner.validatePolicyFiles(iam({ instanceCustom: ["s3-read.json"] }))
      ).resolves.toBeUndefined();
    });
  });
});
