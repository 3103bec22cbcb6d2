#!/usr/bin/env node

import { Command, CommanderError } from "commander";
import { DEFAULT_CONFIG_FILE, EBSHIELD_VERSION } from "@ebshield/core";
import { deploy } from "./commands/deploy";
import { shield } from "./commands/shield";
import { status } from "./commands/status";
import { validate } from "./commands/validate";
import { reportError } from "./output";

const program = new Command();

program
  .name("ebshield")
  .description("Deploy to Elastic Beanstalk and guard the load balancer with OIDC authentication")
  .version(EBSHIELD_VERSION);

const CONFIG_FLAGS = "-c, --config <path>";
const CONFIG_DESCRIPTION = `Configuration file (default: ${DEFAULT_CONFIG_FILE})`;

program
  .command("deploy")
  .description("Bundle, upload and deploy the application, restoring the auth gate after an update")
  .option(CONFIG_FLAGS, CONFIG_DESCRIPTION)
  .option("--client-secret <secret>", "OIDC client secret, used if the auth gate must be restored")
  .action(deploy);

program
  .command("shield")
  .description("Put the OIDC authentication gate on the environment's HTTPS listener")
  .option(CONFIG_FLAGS, CONFIG_DESCRIPTION)
  .option("--client-secret <secret>", "OIDC client secret (default: LB_OIDC_CLIENT_SECRET or prompt)")
  .action(shield);

program
  .command("validate")
  .description("Check the configuration, OIDC variables and policy files without calling AWS")
  .option(CONFIG_FLAGS, CONFIG_DESCRIPTION)
  .action(validate);

program
  .command("status")
  .description("Show the environment, its load balancer and the HTTPS listener rules")
  .option(CONFIG_FLAGS, CONFIG_DESCRIPTION)
  .action(status);

program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander has already printed usage or the parse error
      process.exitCode = error.exitCode;
      return;
    }
    reportError(error);
    process.exitCode = 1;
  }
}

void main();
