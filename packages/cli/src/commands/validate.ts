import path from "path";
import chalk from "chalk";
import fs from "fs-extra";
import {
  DEFAULT_POLICIES_DIR,
  formatOidcRemediation,
  validateOidcEnvironment,
  type LoadedConfiguration,
} from "@ebshield/core";
import { loadProject, type CommandOptions } from "../context";

export interface ValidationReport {
  configPath: string;
  unresolved: string[];
  /** null when the configuration has no oidc section */
  missingOidcVariables: string[] | null;
  missingPolicyFiles: string[];
  valid: boolean;
}

/**
 * Check a loaded configuration without any remote call: placeholders,
 * OIDC variables and the policy files it references.
 */
export async function buildValidationReport(project: LoadedConfiguration): Promise<ValidationReport> {
  const { config } = project;
  const policiesDir = path.join(project.projectRoot, DEFAULT_POLICIES_DIR);

  const referenced = [
    config.iam.service_role_policies.trust_policy,
    config.iam.instance_role_policies.trust_policy,
    ...(config.iam.service_role_policies.custom_policies ?? []),
    ...(config.iam.instance_role_policies.custom_policies ?? []),
  ];
  const missingPolicyFiles: string[] = [];
  for (const file of new Set(referenced)) {
    if (!(await fs.pathExists(path.join(policiesDir, file)))) {
      missingPolicyFiles.push(path.join(DEFAULT_POLICIES_DIR, file));
    }
  }

  const missingOidcVariables = config.oidc ? validateOidcEnvironment(project.env).missing : null;

  return {
    configPath: project.configPath,
    unresolved: project.unresolved,
    missingOidcVariables,
    missingPolicyFiles,
    valid: missingPolicyFiles.length === 0 && (missingOidcVariables ?? []).length === 0,
  };
}

export async function validate(options: CommandOptions): Promise<void> {
  console.log(chalk.blue.bold("Configuration check\n"));

  const report = await buildValidationReport(await loadProject(options));

  console.log(chalk.green(`✓ ${report.configPath} is valid`));
  if (report.unresolved.length > 0) {
    console.log(chalk.yellow(`⚠ Unset variables: ${report.unresolved.join(", ")}`));
  }

  if (report.missingPolicyFiles.length === 0) {
    console.log(chalk.green("✓ Policy files present"));
  } else {
    for (const file of report.missingPolicyFiles) {
      console.log(chalk.red(`✗ Policy file not found: ${file}`));
    }
  }

  if (report.missingOidcVariables === null) {
    console.log(chalk.gray("- No oidc section; the shield command is unavailable"));
  } else if (report.missingOidcVariables.length === 0) {
    console.log(chalk.green("✓ OIDC variables set"));
  } else {
    console.log(chalk.red(`✗ Missing OIDC variables: ${report.missingOidcVariables.join(", ")}`));
    console.log(chalk.gray(formatOidcRemediation(report.missingOidcVariables)));
  }

  if (!report.valid) {
    process.exitCode = 1;
  }
}
