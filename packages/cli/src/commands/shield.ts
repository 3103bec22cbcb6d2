import chalk from "chalk";
import {
  ConfigurationError,
  OIDC_ENV,
  formatOidcRemediation,
  resolveOidcSettings,
  validateOidcEnvironment,
  type EnvironmentRecord,
} from "@ebshield/core";
import { buildOidcActionConfig, createClientSecretProvider } from "@ebshield/deployer";
import { createDeployer, loadProject, type CommandOptions } from "../context";
import { ensureGitignoreEntry } from "../gitignore";
import { ProgressReporter } from "../output";
import { promptSecret } from "../prompt";

interface ShieldOptions extends CommandOptions {
  clientSecret?: string;
}

/**
 * Required OIDC variables that are still missing; an explicit secret
 * stands in for LB_OIDC_CLIENT_SECRET.
 */
export function missingOidcVariables(env: EnvironmentRecord, clientSecret?: string): string[] {
  const { missing } = validateOidcEnvironment(env);
  return clientSecret ? missing.filter((name) => name !== OIDC_ENV.CLIENT_SECRET) : missing;
}

export async function shield(options: ShieldOptions): Promise<void> {
  console.log(chalk.blue.bold("OIDC authentication gate\n"));

  const project = await loadProject(options);
  const settings = resolveOidcSettings(project.config, project.env);

  const missing = missingOidcVariables(project.env, options.clientSecret);
  if (missing.length > 0) {
    if (await ensureGitignoreEntry(project.projectRoot)) {
      console.log(chalk.gray("Added .env to .gitignore"));
    }
    throw new ConfigurationError(
      `Missing required OIDC configuration variables: ${missing.join(", ")}`,
      missing,
      formatOidcRemediation(missing)
    );
  }
  console.log(chalk.green("✓ OIDC configuration validated\n"));

  const reporter = new ProgressReporter();
  const { authGate } = createDeployer(project, reporter.log);
  const clientSecret = createClientSecretProvider(options.clientSecret, project.env, promptSecret);

  const result = await authGate.configure(
    project.config.application.environment,
    buildOidcActionConfig(settings),
    clientSecret
  );

  console.log();
  console.log(chalk.green.bold("✓ OIDC authentication configured"));
  console.log(chalk.white(`  URL:           ${chalk.cyan(`https://${result.domain}`)}`));
  console.log(chalk.white(`  Rules removed: ${result.rulesRemoved}`));
  console.log(
    chalk.white(`  HTTP redirect: ${result.httpRedirect ? chalk.green("enabled") : chalk.yellow("no HTTP listener")}`)
  );
}
