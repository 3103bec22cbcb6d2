/**
 * Identity (IAM) type definitions.
 */

export interface RoleInfo {
  roleName: string;
  arn: string;
  roleId?: string;
}

export interface InstanceProfileInfo {
  instanceProfileName: string;
  arn: string;
  /** Roles attached to the profile, in platform order */
  roleNames: string[];
}
