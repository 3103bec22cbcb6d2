/**
 * Environment Service Interface
 *
 * Provides abstraction over the managed application-hosting platform.
 * Implemented by the AWS Elastic Beanstalk service and by in-memory fakes in tests.
 */

import type {
  ApplicationVersionInfo,
  CreateEnvironmentRequest,
  EnvironmentInfo,
  OptionSetting,
  SourceBundleLocation,
  UpdateEnvironmentRequest,
} from "../types/environment";

export interface IEnvironmentService {
  /**
   * Look up an environment by name, ignoring terminated ones.
   *
   * @returns The environment, or null if none exists
   */
  findEnvironment(environmentName: string): Promise<EnvironmentInfo | null>;

  /**
   * Read the current option settings of an environment.
   */
  getOptionSettings(applicationName: string, environmentName: string): Promise<OptionSetting[]>;

  createEnvironment(request: CreateEnvironmentRequest): Promise<EnvironmentInfo>;

  updateEnvironment(request: UpdateEnvironmentRequest): Promise<EnvironmentInfo>;

  applicationExists(applicationName: string): Promise<boolean>;

  createApplication(applicationName: string, description: string): Promise<void>;

  /**
   * Register a version from an uploaded bundle and request processing.
   */
  createApplicationVersion(
    applicationName: string,
    versionLabel: string,
    bundle: SourceBundleLocation
  ): Promise<ApplicationVersionInfo>;

  /**
   * @returns The version, or null if the label is unknown
   */
  findApplicationVersion(
    applicationName: string,
    versionLabel: string
  ): Promise<ApplicationVersionInfo | null>;
}
