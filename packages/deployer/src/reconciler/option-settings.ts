import type { OptionSetting } from "@ebshield/adapters-common";
import type { DeploymentConfig } from "@ebshield/core";

export const NAMESPACES = {
  environment: "aws:elasticbeanstalk:environment",
  launchConfiguration: "aws:autoscaling:launchconfiguration",
  autoscalingGroup: "aws:autoscaling:asg",
  instances: "aws:ec2:instances",
} as const;

/**
 * Option settings derived from the configuration, for both create and update.
 */
export function buildOptionSettings(config: DeploymentConfig): OptionSetting[] {
  const settings: OptionSetting[] = [
    {
      namespace: NAMESPACES.launchConfiguration,
      optionName: "IamInstanceProfile",
      value: config.iam.instance_profile_name,
    },
    {
      namespace: NAMESPACES.environment,
      optionName: "ServiceRole",
      value: config.iam.service_role_name,
    },
    {
      namespace: NAMESPACES.environment,
      optionName: "EnvironmentType",
      value: "LoadBalanced",
    },
  ];

  const { instance } = config;
  if (instance.type) {
    settings.push({ namespace: NAMESPACES.instances, optionName: "InstanceTypes", value: instance.type });
  }
  if (instance.autoscaling) {
    settings.push(
      {
        namespace: NAMESPACES.autoscalingGroup,
        optionName: "MinSize",
        value: String(instance.autoscaling.min_instances),
      },
      {
        namespace: NAMESPACES.autoscalingGroup,
        optionName: "MaxSize",
        value: String(instance.autoscaling.max_instances),
      }
    );
  }
  if (instance.spot_options) {
    settings.push({
      namespace: NAMESPACES.instances,
      optionName: "EnableSpot",
      value: String(instance.spot_options.enabled),
    });
  }

  return settings;
}

/**
 * The load balancer type can only be chosen when the environment is created.
 */
export function loadBalancerTypeSetting(config: DeploymentConfig): OptionSetting {
  return {
    namespace: NAMESPACES.environment,
    optionName: "LoadBalancerType",
    value: config.instance.elb_type,
  };
}

/**
 * Desired settings whose value differs from (or is absent in) the current ones.
 */
export function diffOptionSettings(
  desired: readonly OptionSetting[],
  current: readonly OptionSetting[]
): OptionSetting[] {
  const currentValues = new Map(
    current.map((setting) => [`${setting.namespace}|${setting.optionName}`, setting.value])
  );
  return desired.filter(
    (setting) => currentValues.get(`${setting.namespace}|${setting.optionName}`) !== setting.value
  );
}
