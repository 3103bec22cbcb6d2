/**
 * Writes .elasticbeanstalk/config.yml so the EB CLI can be used against
 * the deployed environment.
 */

import path from "path";
import fs from "fs-extra";
import * as yaml from "js-yaml";
import {
  EB_CLI_CONFIG_DIR,
  EB_CLI_PLATFORM_PLACEHOLDER,
  toEbCliPlatformName,
  type DeploymentConfig,
} from "@ebshield/core";

type YamlMapping = { [key: string]: unknown };

function isMapping(value: unknown): value is YamlMapping {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function defaultEbCliConfig(config: DeploymentConfig): YamlMapping {
  return {
    "branch-defaults": {
      main: {
        environment: config.application.environment,
        group_suffix: null,
      },
    },
    global: {
      application_name: config.application.name,
      branch: null,
      default_ec2_keyname: null,
      default_platform: toEbCliPlatformName(config.aws.platform),
      default_region: config.aws.region,
      include_git_submodules: true,
      instance_profile: null,
      platform_name: null,
      platform_version: null,
      profile: null,
      repository: null,
      sc: "git",
      workspace_type: "Application",
    },
  };
}

/**
 * The EB CLI document: the `elasticbeanstalk_cli` section with the platform
 * placeholder filled in, or defaults when the section is absent.
 */
export function buildEbCliConfig(config: DeploymentConfig): YamlMapping {
  const section = config.elasticbeanstalk_cli;
  if (!section) {
    return defaultEbCliConfig(config);
  }

  const document: YamlMapping = { ...section };
  const global = document.global;
  if (isMapping(global)) {
    const platform = global.default_platform;
    if (typeof platform === "string" && platform.includes(EB_CLI_PLATFORM_PLACEHOLDER)) {
      document.global = { ...global, default_platform: toEbCliPlatformName(config.aws.platform) };
    }
  }
  return document;
}

/**
 * @returns Path of the written file
 */
export async function writeEbCliConfig(config: DeploymentConfig, projectRoot: string): Promise<string> {
  const dir = path.join(projectRoot, EB_CLI_CONFIG_DIR);
  await fs.ensureDir(dir);
  const filePath = path.join(dir, "config.yml");
  await fs.writeFile(filePath, yaml.dump(buildEbCliConfig(config), { sortKeys: true }));
  return filePath;
}
