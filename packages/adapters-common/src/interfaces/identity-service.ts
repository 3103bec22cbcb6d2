/**
 * Identity Service Interface
 *
 * Roles, role policies and instance profiles.
 */

import type { InstanceProfileInfo, RoleInfo } from "../types/identity";

export interface IIdentityService {
  /**
   * @returns The role, or null if it does not exist
   */
  getRole(roleName: string): Promise<RoleInfo | null>;

  /**
   * Create a role.
   *
   * @param trustPolicyDocument - Assume-role policy as a JSON string
   */
  createRole(
    roleName: string,
    trustPolicyDocument: string,
    options?: { description?: string; tags?: Record<string, string> }
  ): Promise<RoleInfo>;

  listAttachedPolicyArns(roleName: string): Promise<string[]>;

  attachRolePolicy(roleName: string, policyArn: string): Promise<void>;

  /**
   * Create or replace an inline policy on a role.
   */
  putRolePolicy(roleName: string, policyName: string, policyDocument: string): Promise<void>;

  /**
   * @returns The profile, or null if it does not exist
   */
  getInstanceProfile(profileName: string): Promise<InstanceProfileInfo | null>;

  createInstanceProfile(profileName: string): Promise<InstanceProfileInfo>;

  addRoleToInstanceProfile(profileName: string, roleName: string): Promise<void>;

  removeRoleFromInstanceProfile(profileName: string, roleName: string): Promise<void>;
}
