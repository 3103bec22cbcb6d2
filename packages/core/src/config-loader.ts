/**
 * Configuration loader
 *
 * Reads config.yml, substitutes ${NAME} placeholders from the environment
 * record and validates the result against DeploymentConfigSchema.
 */

import fs from "fs-extra";
import path from "path";
import * as yaml from "js-yaml";
import dotenv from "dotenv";
import { validateDeploymentConfig, type DeploymentConfig } from "./config";
import { ConfigurationError, formatErrorMessage } from "./errors";
import { createEnvironmentRecord, type EnvironmentRecord } from "./environment";
import { DEFAULT_CONFIG_FILE, DEFAULT_ENV_FILE } from "./constants";

const PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export interface InterpolationResult {
  text: string;
  unresolved: string[];
}

/**
 * Replace ${NAME} placeholders. Unknown names become empty strings and are
 * reported in `unresolved`. Placeholders listed in `preserve` are left as is.
 */
export function interpolateVariables(
  text: string,
  env: EnvironmentRecord,
  preserve: readonly string[] = []
): InterpolationResult {
  const unresolved = new Set<string>();
  const result = text.replace(PLACEHOLDER, (match, name: string) => {
    if (preserve.includes(name)) {
      return match;
    }
    const value = env[name];
    if (value === undefined) {
      unresolved.add(name);
      return "";
    }
    return value;
  });
  return { text: result, unresolved: [...unresolved] };
}

/**
 * Freeze an object graph so the loaded configuration cannot be mutated.
 */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Parse the project's .env file. A missing file yields an empty record.
 */
export async function readDotenvFile(
  projectRoot: string,
  fileName: string = DEFAULT_ENV_FILE
): Promise<Record<string, string>> {
  const envPath = path.join(projectRoot, fileName);
  if (!(await fs.pathExists(envPath))) {
    return {};
  }
  return dotenv.parse(await fs.readFile(envPath, "utf-8"));
}

export interface LoadedConfiguration {
  config: Readonly<DeploymentConfig>;
  env: EnvironmentRecord;
  configPath: string;
  projectRoot: string;
  /** Placeholders that had no value in the environment */
  unresolved: string[];
}

export interface LoadConfigurationOptions {
  projectRoot: string;
  configPath?: string;
  processEnv?: Record<string, string | undefined>;
}

/**
 * Parse and validate a configuration document already read into memory.
 */
export function parseDeploymentConfig(
  source: string,
  env: EnvironmentRecord,
  sourceName: string = DEFAULT_CONFIG_FILE
): { config: Readonly<DeploymentConfig>; unresolved: string[] } {
  // EB_CLI_PLATFORM is derived from aws.platform when the EB CLI config is written
  const { text, unresolved } = interpolateVariables(source, env, ["EB_CLI_PLATFORM"]);

  let document: unknown;
  try {
    document = yaml.load(text);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse ${sourceName}\nYAML parse error: ${formatErrorMessage(error)}`
    );
  }

  if (!document || typeof document !== "object") {
    throw new ConfigurationError(`${sourceName} is empty or not a mapping`);
  }

  return { config: deepFreeze(validateDeploymentConfig(document)), unresolved };
}

/**
 * Load the environment record and the deployment configuration.
 *
 * @throws ConfigurationError if the file is missing, malformed or invalid
 */
export async function loadConfiguration(
  options: LoadConfigurationOptions
): Promise<LoadedConfiguration> {
  const projectRoot = path.resolve(options.projectRoot);
  const configPath = path.resolve(projectRoot, options.configPath ?? DEFAULT_CONFIG_FILE);

  const dotenvValues = await readDotenvFile(projectRoot);
  const env = createEnvironmentRecord(options.processEnv ?? {}, dotenvValues);

  if (!(await fs.pathExists(configPath))) {
    throw new ConfigurationError(
      `Configuration file not found: ${configPath}`,
      [configPath],
      "Create config.yml in the project root or pass --config <path>."
    );
  }

  const source = await fs.readFile(configPath, "utf-8");
  const { config, unresolved } = parseDeploymentConfig(source, env, path.basename(configPath));

  return { config, env, configPath, projectRoot, unresolved };
}
