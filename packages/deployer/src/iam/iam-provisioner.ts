/**
 * IAM Provisioner
 *
 * Ensures the service role, the instance role and the instance profile
 * exist and are wired together. Policy documents are JSON files in the
 * project's policies/ directory.
 */

import path from "path";
import fs from "fs-extra";
import { glob } from "glob";
import type { IIdentityService, InstanceProfileInfo, RoleInfo } from "@ebshield/adapters-common";
import {
  ConfigurationError,
  INSTANCE_PROFILE_PROPAGATION_MS,
  formatErrorMessage,
  type IamConfig,
  type RolePolicies,
} from "@ebshield/core";
import { defaultSleep } from "../polling";
import type { LogCallback, SleepFn } from "../types";

const TRUST_POLICY_SUFFIX = "trust-policy.json";

export interface EnsureRoleOptions {
  description?: string;
  tags?: Record<string, string>;
  /**
   * When the role lists no custom_policies, put every non-trust policy
   * file of the policies directory on it.
   */
  attachDirectoryPolicies?: boolean;
}

export interface IamProvisionerOptions {
  propagationDelayMs?: number;
  sleep?: SleepFn;
}

export class IamProvisioner {
  private readonly propagationDelayMs: number;
  private readonly sleep: SleepFn;

  constructor(
    private readonly identity: IIdentityService,
    private readonly policiesDir: string,
    private readonly log: LogCallback,
    options: IamProvisionerOptions = {}
  ) {
    this.propagationDelayMs = options.propagationDelayMs ?? INSTANCE_PROFILE_PROPAGATION_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Create the role if missing, then attach missing managed policies and
   * put inline policies.
   */
  async ensureRole(
    roleName: string,
    policies: RolePolicies,
    options: EnsureRoleOptions = {}
  ): Promise<RoleInfo> {
    const trustPolicy = await this.readPolicyFile(policies.trust_policy);

    let role = await this.identity.getRole(roleName);
    if (role) {
      this.log(`Role ${roleName} already exists`);
    } else {
      this.log(`Creating role ${roleName}`);
      role = await this.identity.createRole(roleName, trustPolicy, {
        description: options.description,
        tags: options.tags,
      });
    }

    const attached = new Set(await this.identity.listAttachedPolicyArns(roleName));
    for (const policyArn of policies.managed_policies) {
      if (!attached.has(policyArn)) {
        this.log(`Attaching ${policyArn} to ${roleName}`);
        await this.identity.attachRolePolicy(roleName, policyArn);
      }
    }

    const inlineFiles =
      policies.custom_policies ?? (options.attachDirectoryPolicies ? await this.listPolicyFiles() : []);
    for (const fileName of inlineFiles) {
      const document = await this.readPolicyFile(fileName);
      const policyName = path.basename(fileName, ".json");
      this.log(`Putting inline policy ${policyName} on ${roleName}`);
      await this.identity.putRolePolicy(roleName, policyName, document);
    }

    return role;
  }

  /**
   * Read every policy file `ensureRole` will need for the two roles, so a
   * missing or malformed file fails before anything is created.
   *
   * @throws ConfigurationError naming the first bad file
   */
  async validatePolicyFiles(iam: IamConfig): Promise<void> {
    const instanceInline =
      iam.instance_role_policies.custom_policies ?? (await this.listPolicyFiles());
    const files = [
      iam.service_role_policies.trust_policy,
      ...(iam.service_role_policies.custom_policies ?? []),
      iam.instance_role_policies.trust_policy,
      ...instanceInline,
    ];
    for (const fileName of new Set(files)) {
      await this.readPolicyFile(fileName);
    }
  }

  /**
   * Make sure the profile exists and its first role is `roleName`.
   * A profile holding another role is emptied and given the right one.
   */
  async ensureInstanceProfile(profileName: string, roleName: string): Promise<InstanceProfileInfo> {
    const profile = await this.identity.getInstanceProfile(profileName);

    if (!profile) {
      this.log(`Creating instance profile ${profileName}`);
      const created = await this.identity.createInstanceProfile(profileName);
      await this.identity.addRoleToInstanceProfile(profileName, roleName);
      // A new profile is not visible to Elastic Beanstalk right away
      await this.sleep(this.propagationDelayMs);
      return { ...created, roleNames: [roleName] };
    }

    if (profile.roleNames[0] === roleName) {
      return profile;
    }

    this.log(`Attaching role ${roleName} to instance profile ${profileName}`);
    for (const existing of profile.roleNames) {
      await this.identity.removeRoleFromInstanceProfile(profileName, existing);
    }
    await this.identity.addRoleToInstanceProfile(profileName, roleName);
    return { ...profile, roleNames: [roleName] };
  }

  /**
   * Policy files of the policies directory that are not trust policies, sorted.
   */
  async listPolicyFiles(): Promise<string[]> {
    if (!(await fs.pathExists(this.policiesDir))) {
      return [];
    }
    const files = await glob("*.json", { cwd: this.policiesDir, nodir: true });
    return files.filter((file) => !file.endsWith(TRUST_POLICY_SUFFIX)).sort();
  }

  private async readPolicyFile(fileName: string): Promise<string> {
    const filePath = path.join(this.policiesDir, fileName);
    if (!(await fs.pathExists(filePath))) {
      throw new ConfigurationError(
        `Policy file not found: ${filePath}`,
        [filePath],
        `Create ${fileName} in the ${path.basename(this.policiesDir)}/ directory.`
      );
    }

    const content = await fs.readFile(filePath, "utf-8");
    try {
      JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${formatErrorMessage(error)}`, [filePath]);
    }
    return content;
  }
}
