import {
  IAMClient,
  GetRoleCommand,
  CreateRoleCommand,
  AttachRolePolicyCommand,
  ListAttachedRolePoliciesCommand,
  PutRolePolicyCommand,
  GetInstanceProfileCommand,
  CreateInstanceProfileCommand,
  AddRoleToInstanceProfileCommand,
  RemoveRoleFromInstanceProfileCommand,
  type Role,
  type InstanceProfile,
} from "@aws-sdk/client-iam";
import type { IIdentityService, InstanceProfileInfo, RoleInfo } from "@ebshield/adapters-common";
import { callAws, findAws } from "../errors";

export class IAMService implements IIdentityService {
  constructor(private readonly client: IAMClient) {}

  /**
   * Get a role by name.
   */
  async getRole(roleName: string): Promise<RoleInfo | null> {
    return findAws("GetRole", async () => {
      const result = await this.client.send(new GetRoleCommand({ RoleName: roleName }));
      return result.Role ? this.mapRole(result.Role) : null;
    });
  }

  /**
   * Create a new IAM role.
   */
  async createRole(
    roleName: string,
    trustPolicyDocument: string,
    options?: { description?: string; tags?: Record<string, string> }
  ): Promise<RoleInfo> {
    const tags = options?.tags
      ? Object.entries(options.tags).map(([Key, Value]) => ({ Key, Value }))
      : undefined;

    return callAws("CreateRole", async () => {
      const result = await this.client.send(
        new CreateRoleCommand({
          RoleName: roleName,
          AssumeRolePolicyDocument: trustPolicyDocument,
          Description: options?.description,
          Path: "/",
          Tags: tags,
        })
      );

      if (!result.Role) {
        throw new Error(`Failed to create role "${roleName}"`);
      }
      return this.mapRole(result.Role);
    });
  }

  /**
   * List the ARNs of managed policies attached to a role.
   */
  async listAttachedPolicyArns(roleName: string): Promise<string[]> {
    return callAws("ListAttachedRolePolicies", async () => {
      const arns: string[] = [];
      let marker: string | undefined;

      do {
        const result = await this.client.send(
          new ListAttachedRolePoliciesCommand({ RoleName: roleName, Marker: marker })
        );
        for (const policy of result.AttachedPolicies ?? []) {
          if (policy.PolicyArn) {
            arns.push(policy.PolicyArn);
          }
        }
        marker = result.IsTruncated ? result.Marker : undefined;
      } while (marker);

      return arns;
    });
  }

  async attachRolePolicy(roleName: string, policyArn: string): Promise<void> {
    await callAws("AttachRolePolicy", () =>
      this.client.send(new AttachRolePolicyCommand({ RoleName: roleName, PolicyArn: policyArn }))
    );
  }

  /**
   * Put an inline policy on a role, replacing any policy of the same name.
   */
  async putRolePolicy(roleName: string, policyName: string, policyDocument: string): Promise<void> {
    await callAws("PutRolePolicy", () =>
      this.client.send(
        new PutRolePolicyCommand({
          RoleName: roleName,
          PolicyName: policyName,
          PolicyDocument: policyDocument,
        })
      )
    );
  }

  async getInstanceProfile(profileName: string): Promise<InstanceProfileInfo | null> {
    return findAws("GetInstanceProfile", async () => {
      const result = await this.client.send(
        new GetInstanceProfileCommand({ InstanceProfileName: profileName })
      );
      return result.InstanceProfile ? this.mapInstanceProfile(result.InstanceProfile) : null;
    });
  }

  async createInstanceProfile(profileName: string): Promise<InstanceProfileInfo> {
    return callAws("CreateInstanceProfile", async () => {
      const result = await this.client.send(
        new CreateInstanceProfileCommand({ InstanceProfileName: profileName, Path: "/" })
      );
      if (!result.InstanceProfile) {
        throw new Error(`Failed to create instance profile "${profileName}"`);
      }
      return this.mapInstanceProfile(result.InstanceProfile);
    });
  }

  async addRoleToInstanceProfile(profileName: string, roleName: string): Promise<void> {
    await callAws("AddRoleToInstanceProfile", () =>
      this.client.send(
        new AddRoleToInstanceProfileCommand({ InstanceProfileName: profileName, RoleName: roleName })
      )
    );
  }

  async removeRoleFromInstanceProfile(profileName: string, roleName: string): Promise<void> {
    await callAws("RemoveRoleFromInstanceProfile", () =>
      this.client.send(
        new RemoveRoleFromInstanceProfileCommand({
          InstanceProfileName: profileName,
          RoleName: roleName,
        })
      )
    );
  }

  private mapRole(role: Role): RoleInfo {
    return {
      roleName: role.RoleName ?? "",
      arn: role.Arn ?? "",
      roleId: role.RoleId,
    };
  }

  private mapInstanceProfile(profile: InstanceProfile): InstanceProfileInfo {
    return {
      instanceProfileName: profile.InstanceProfileName ?? "",
      arn: profile.Arn ?? "",
      roleNames: (profile.Roles ?? []).flatMap((role) => (role.RoleName ? [role.RoleName] : [])),
    };
  }
}
