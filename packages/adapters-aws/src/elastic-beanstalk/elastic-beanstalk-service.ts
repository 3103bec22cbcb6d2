import {
  ElasticBeanstalkClient,
  DescribeEnvironmentsCommand,
  DescribeConfigurationSettingsCommand,
  CreateEnvironmentCommand,
  UpdateEnvironmentCommand,
  DescribeApplicationsCommand,
  CreateApplicationCommand,
  CreateApplicationVersionCommand,
  DescribeApplicationVersionsCommand,
  type EnvironmentDescription,
  type ApplicationVersionDescription,
  type ConfigurationOptionSetting,
} from "@aws-sdk/client-elastic-beanstalk";
import type {
  IEnvironmentService,
  ApplicationVersionInfo,
  ApplicationVersionStatus,
  CreateEnvironmentRequest,
  EnvironmentInfo,
  EnvironmentStatus,
  OptionSetting,
  SourceBundleLocation,
  UpdateEnvironmentRequest,
} from "@ebshield/adapters-common";
import { callAws } from "../errors";

const ENVIRONMENT_STATUSES: readonly EnvironmentStatus[] = [
  "Aborting",
  "Launching",
  "LinkingFrom",
  "LinkingTo",
  "Ready",
  "Terminated",
  "Terminating",
  "Updating",
];

const VERSION_STATUSES: readonly ApplicationVersionStatus[] = [
  "BUILDING",
  "FAILED",
  "PROCESSED",
  "PROCESSING",
  "UNPROCESSED",
];

function isEnvironmentStatus(value: string | undefined): value is EnvironmentStatus {
  return ENVIRONMENT_STATUSES.some((status) => status === value);
}

function isVersionStatus(value: string | undefined): value is ApplicationVersionStatus {
  return VERSION_STATUSES.some((status) => status === value);
}

export class ElasticBeanstalkService implements IEnvironmentService {
  constructor(private readonly client: ElasticBeanstalkClient) {}

  /**
   * Look up a live environment by name.
   */
  async findEnvironment(environmentName: string): Promise<EnvironmentInfo | null> {
    return callAws("DescribeEnvironments", async () => {
      const result = await this.client.send(
        new DescribeEnvironmentsCommand({
          EnvironmentNames: [environmentName],
          IncludeDeleted: false,
        })
      );
      const environment = result.Environments?.[0];
      return environment ? this.mapEnvironment(environment) : null;
    });
  }

  async getOptionSettings(applicationName: string, environmentName: string): Promise<OptionSetting[]> {
    const result = await callAws("DescribeConfigurationSettings", () =>
      this.client.send(
        new DescribeConfigurationSettingsCommand({
          ApplicationName: applicationName,
          EnvironmentName: environmentName,
        })
      )
    );

    return (result.ConfigurationSettings?.[0]?.OptionSettings ?? []).flatMap((setting) =>
      setting.Namespace && setting.OptionName && setting.Value !== undefined
        ? [{ namespace: setting.Namespace, optionName: setting.OptionName, value: setting.Value }]
        : []
    );
  }

  async createEnvironment(request: CreateEnvironmentRequest): Promise<EnvironmentInfo> {
    return callAws("CreateEnvironment", async () => {
      const result = await this.client.send(
        new CreateEnvironmentCommand({
          ApplicationName: request.applicationName,
          EnvironmentName: request.environmentName,
          VersionLabel: request.versionLabel,
          SolutionStackName: request.solutionStackName,
          OptionSettings: request.optionSettings.map(toSdkOptionSetting),
          Tags: Object.entries(request.tags ?? {}).map(([Key, Value]) => ({ Key, Value })),
        })
      );
      return this.mapEnvironment(result);
    });
  }

  async updateEnvironment(request: UpdateEnvironmentRequest): Promise<EnvironmentInfo> {
    return callAws("UpdateEnvironment", async () => {
      const result = await this.client.send(
        new UpdateEnvironmentCommand({
          EnvironmentName: request.environmentName,
          VersionLabel: request.versionLabel,
          OptionSettings: request.optionSettings.map(toSdkOptionSetting),
        })
      );
      return this.mapEnvironment(result);
    });
  }

  async applicationExists(applicationName: string): Promise<boolean> {
    const result = await callAws("DescribeApplications", () =>
      this.client.send(new DescribeApplicationsCommand({ ApplicationNames: [applicationName] }))
    );
    return (result.Applications ?? []).length > 0;
  }

  async createApplication(applicationName: string, description: string): Promise<void> {
    await callAws("CreateApplication", () =>
      this.client.send(
        new CreateApplicationCommand({
          ApplicationName: applicationName,
          Description: description,
        })
      )
    );
  }

  async createApplicationVersion(
    applicationName: string,
    versionLabel: string,
    bundle: SourceBundleLocation
  ): Promise<ApplicationVersionInfo> {
    return callAws("CreateApplicationVersion", async () => {
      const result = await this.client.send(
        new CreateApplicationVersionCommand({
          ApplicationName: applicationName,
          VersionLabel: versionLabel,
          SourceBundle: { S3Bucket: bundle.bucket, S3Key: bundle.key },
          Process: true,
        })
      );
      const version = result.ApplicationVersion;
      if (!version) {
        throw new Error(`No description returned for application version "${versionLabel}"`);
      }
      return this.mapVersion(version, applicationName, versionLabel);
    });
  }

  async findApplicationVersion(
    applicationName: string,
    versionLabel: string
  ): Promise<ApplicationVersionInfo | null> {
    return callAws("DescribeApplicationVersions", async () => {
      const result = await this.client.send(
        new DescribeApplicationVersionsCommand({
          ApplicationName: applicationName,
          VersionLabels: [versionLabel],
        })
      );
      const version = result.ApplicationVersions?.[0];
      return version ? this.mapVersion(version, applicationName, versionLabel) : null;
    });
  }

  private mapEnvironment(environment: EnvironmentDescription): EnvironmentInfo {
    const status = environment.Status;
    if (!environment.EnvironmentName || !isEnvironmentStatus(status)) {
      throw new Error(
        `Unexpected environment description (name: ${environment.EnvironmentName}, status: ${status})`
      );
    }

    return {
      name: environment.EnvironmentName,
      id: environment.EnvironmentId,
      applicationName: environment.ApplicationName,
      status,
      health: environment.Health,
      versionLabel: environment.VersionLabel,
      cname: environment.CNAME,
      solutionStackName: environment.SolutionStackName,
    };
  }

  private mapVersion(
    version: ApplicationVersionDescription,
    applicationName: string,
    versionLabel: string
  ): ApplicationVersionInfo {
    const status = version.Status;
    if (!isVersionStatus(status)) {
      throw new Error(`Unexpected status "${status}" for application version "${versionLabel}"`);
    }

    return {
      applicationName: version.ApplicationName ?? applicationName,
      versionLabel: version.VersionLabel ?? versionLabel,
      status,
    };
  }
}

function toSdkOptionSetting(setting: OptionSetting): ConfigurationOptionSetting {
  return {
    Namespace: setting.namespace,
    OptionName: setting.optionName,
    Value: setting.value,
  };
}
