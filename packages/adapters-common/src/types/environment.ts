/**
 * Managed environment type definitions.
 *
 * Shared types for the application-hosting platform (Elastic Beanstalk on AWS).
 */

/**
 * Lifecycle status reported by the platform for an environment.
 */
export type EnvironmentStatus =
  | "Aborting"
  | "Launching"
  | "LinkingFrom"
  | "LinkingTo"
  | "Ready"
  | "Terminated"
  | "Terminating"
  | "Updating";

/**
 * Snapshot of an environment as returned by a describe call.
 */
export interface EnvironmentInfo {
  /** Environment name (unique within the account and region) */
  name: string;
  /** Provider-assigned environment ID */
  id?: string;
  applicationName?: string;
  status: EnvironmentStatus;
  /** Coarse health colour (Green, Yellow, Red, Grey) */
  health?: string;
  versionLabel?: string;
  /** Public CNAME of the environment */
  cname?: string;
  solutionStackName?: string;
}

/**
 * A single configuration option of an environment.
 */
export interface OptionSetting {
  namespace: string;
  optionName: string;
  value: string;
}

export interface CreateEnvironmentRequest {
  applicationName: string;
  environmentName: string;
  versionLabel: string;
  solutionStackName: string;
  optionSettings: OptionSetting[];
  tags?: Record<string, string>;
}

export interface UpdateEnvironmentRequest {
  environmentName: string;
  versionLabel: string;
  optionSettings: OptionSetting[];
}

/**
 * Processing status of an application version.
 */
export type ApplicationVersionStatus =
  | "BUILDING"
  | "FAILED"
  | "PROCESSED"
  | "PROCESSING"
  | "UNPROCESSED";

export interface ApplicationVersionInfo {
  applicationName: string;
  versionLabel: string;
  status: ApplicationVersionStatus;
}

/**
 * Location of an uploaded source bundle.
 */
export interface SourceBundleLocation {
  bucket: string;
  key: string;
}
