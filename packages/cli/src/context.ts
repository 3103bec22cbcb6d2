import {
  PROJECT_NAME_ENV,
  loadConfiguration,
  type LoadedConfiguration,
} from "@ebshield/core";
import { DeployerFactory, type Deployer, type LogCallback } from "@ebshield/deployer";

export interface CommandOptions {
  config?: string;
}

/**
 * Load config.yml (or --config) relative to the working directory, with
 * the process environment layered over the project's .env file.
 */
export async function loadProject(options: CommandOptions): Promise<LoadedConfiguration> {
  return loadConfiguration({
    projectRoot: process.cwd(),
    configPath: options.config,
    processEnv: process.env,
  });
}

/** Name substituted for the wildcard of a certificate's domain */
export function resolveProjectName(project: LoadedConfiguration): string {
  return project.env[PROJECT_NAME_ENV] || project.config.application.name;
}

export function createDeployer(
  project: LoadedConfiguration,
  log: LogCallback,
  signal?: AbortSignal
): Deployer {
  return DeployerFactory.create({
    region: project.config.aws.region,
    projectRoot: project.projectRoot,
    projectName: resolveProjectName(project),
    log,
    signal,
  });
}

/**
 * An abort signal fired by the first Ctrl-C. A second one falls through
 * to Node's default handler and kills the process.
 */
export function interruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off("SIGINT", onInterrupt);
    },
  };
}
