import chalk from "chalk";
import { DEPLOY_STEPS, createClientSecretProvider, writeEbCliConfig } from "@ebshield/deployer";
import { createDeployer, interruptSignal, loadProject, type CommandOptions } from "../context";
import { ProgressReporter } from "../output";
import { promptSecret } from "../prompt";

interface DeployOptions extends CommandOptions {
  clientSecret?: string;
}

const STEP_LABELS: Record<string, string> = {
  [DEPLOY_STEPS.BUNDLE]: "Bundle application",
  [DEPLOY_STEPS.BUCKET]: "Prepare artifact bucket",
  [DEPLOY_STEPS.UPLOAD]: "Upload bundle",
  [DEPLOY_STEPS.APPLICATION]: "Ensure application",
  [DEPLOY_STEPS.VERSION]: "Register application version",
  [DEPLOY_STEPS.IAM]: "Provision IAM roles",
  [DEPLOY_STEPS.ENVIRONMENT]: "Reconcile environment",
};

export async function deploy(options: DeployOptions): Promise<void> {
  console.log(chalk.blue.bold("Elastic Beanstalk deployment\n"));

  const project = await loadProject(options);
  const { config } = project;
  if (project.unresolved.length > 0) {
    console.log(chalk.yellow(`Unset variables in ${project.configPath}: ${project.unresolved.join(", ")}\n`));
  }

  const ebCliConfig = await writeEbCliConfig(config, project.projectRoot);
  console.log(chalk.gray(`EB CLI configuration written to ${ebCliConfig}\n`));

  const reporter = new ProgressReporter(STEP_LABELS);
  const interrupt = interruptSignal();
  const { driver } = createDeployer(project, reporter.log, interrupt.signal);
  // Only reached when an existing auth gate has to be restored
  const clientSecret = createClientSecretProvider(options.clientSecret, project.env, (message) => {
    reporter.stop();
    return promptSecret(message);
  });

  try {
    const result = await driver.deploy(config, clientSecret, reporter.onProgress);

    console.log();
    console.log(chalk.green.bold("✓ Deployment complete"));
    console.log(chalk.white(`  Application: ${chalk.cyan(config.application.name)}`));
    console.log(chalk.white(`  Environment: ${chalk.cyan(config.application.environment)} (${result.reconcile.action})`));
    console.log(chalk.white(`  Version:     ${chalk.cyan(result.versionLabel)}`));
    if (result.reconcile.environment.cname) {
      console.log(chalk.white(`  URL:         ${chalk.cyan(`http://${result.reconcile.environment.cname}`)}`));
    }
    if (result.reconcile.restored) {
      console.log(chalk.white(`  Auth gate:   ${chalk.cyan(`https://${result.reconcile.restored.domain}`)} (restored)`));
    }
  } finally {
    reporter.stop();
    interrupt.dispose();
  }
}
