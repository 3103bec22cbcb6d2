import chalk from "chalk";
import ora from "ora";
import type { ListenerAction, ListenerInfo } from "@ebshield/adapters-common";
import { formatErrorMessage } from "@ebshield/core";
import { DeployerFactory, ResourceResolver } from "@ebshield/deployer";
import { loadProject, type CommandOptions } from "../context";

function describeAction(action: ListenerAction): string {
  switch (action.type) {
    case "authenticate-oidc":
      return `authenticate-oidc (${action.config.issuer})`;
    case "forward":
      return "forward";
    case "redirect":
      return `redirect ${action.protocol ?? ""}:${action.port ?? ""} ${action.statusCode}`;
    case "fixed-response":
      return `fixed-response ${action.statusCode}`;
  }
}

function describeActions(actions: ListenerAction[]): string {
  return actions.map(describeAction).join(" → ") || "none";
}

function printListener(label: string, listener: ListenerInfo | null): void {
  if (!listener) {
    console.log(chalk.white(`  ${label}: ${chalk.gray("none")}`));
    return;
  }
  console.log(chalk.white(`  ${label}: ${chalk.cyan(describeActions(listener.defaultActions))}`));
}

export async function status(options: CommandOptions): Promise<void> {
  const { config } = await loadProject(options);
  const environmentName = config.application.environment;

  console.log(chalk.blue.bold(`Status of ${environmentName}\n`));

  const services = DeployerFactory.createServices(config.aws.region);
  const resolver = new ResourceResolver(services.environments, services.loadBalancers, () => {});

  const spinner = ora("Looking up environment...").start();
  try {
    const environment = await resolver.findEnvironment(environmentName);
    if (!environment) {
      spinner.warn(`Environment ${environmentName} does not exist yet`);
      return;
    }
    spinner.stop();

    const healthColor =
      environment.health === "Green" ? chalk.green : environment.health === "Red" ? chalk.red : chalk.yellow;
    console.log(chalk.white(`Status:  ${chalk.cyan(environment.status)}`));
    console.log(chalk.white(`Health:  ${healthColor(environment.health ?? "unknown")}`));
    console.log(chalk.white(`Version: ${chalk.cyan(environment.versionLabel ?? "none")}`));
    if (environment.cname) {
      console.log(chalk.white(`CNAME:   ${chalk.cyan(environment.cname)}`));
    }
    console.log();

    const loadBalancer = await resolver.findLoadBalancer(environmentName);
    if (!loadBalancer) {
      console.log(chalk.yellow("No application load balancer tagged for this environment"));
      return;
    }
    console.log(chalk.white(`Load balancer: ${chalk.cyan(loadBalancer.name)}`));

    const listeners = await resolver.findListeners(loadBalancer.arn);
    printListener("HTTPS default", listeners?.https ?? null);
    printListener("HTTP default ", listeners?.http ?? null);

    if (listeners?.https) {
      const rules = (await services.loadBalancers.listRules(listeners.https.arn)).filter((rule) => !rule.isDefault);
      console.log();
      console.log(chalk.white("HTTPS rules:"));
      if (rules.length === 0) {
        console.log(chalk.gray("  none (no authentication gate)"));
      }
      for (const rule of rules) {
        const paths = rule.conditions.flatMap((condition) => condition.values).join(", ");
        console.log(chalk.white(`  ${rule.priority ?? "-"}  ${paths}  ${chalk.cyan(describeActions(rule.actions))}`));
      }
    }
  } catch (error) {
    spinner.fail(`Status check failed: ${formatErrorMessage(error)}`);
    throw error;
  }
}
