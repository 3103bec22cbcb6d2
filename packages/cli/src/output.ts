import chalk from "chalk";
import ora, { type Ora } from "ora";
import {
  ConfigurationError,
  ResourceNotFoundError,
  formatErrorMessage,
  isDeploymentError,
} from "@ebshield/core";
import type { LogCallback, ProgressCallback } from "@ebshield/deployer";

/**
 * Renders a driver's steps as ora spinners and its log lines as spinner text.
 */
export class ProgressReporter {
  private readonly spinner: Ora = ora();
  private current = "";

  constructor(private readonly labels: Readonly<Record<string, string>> = {}) {}

  readonly log: LogCallback = (line) => {
    if (this.spinner.isSpinning) {
      this.spinner.text = `${this.current}: ${chalk.gray(line)}`;
    } else {
      console.log(chalk.gray(`  ${line}`));
    }
  };

  readonly onProgress: ProgressCallback = (step, status, message) => {
    const label = this.labels[step] ?? step;
    if (status === "in_progress") {
      this.current = label;
      this.spinner.start(`${label}...`);
    } else if (status === "complete") {
      this.spinner.succeed(label);
    } else if (status === "error") {
      this.spinner.fail(message ? `${label}: ${message}` : label);
    }
  };

  stop(): void {
    if (this.spinner.isSpinning) {
      this.spinner.stop();
    }
  }
}

/**
 * Lines shown to the operator for a fatal error: the message first,
 * then any remediation.
 */
export function describeFailure(error: unknown): string[] {
  const lines = [formatErrorMessage(error)];

  if (error instanceof ConfigurationError && error.missing.length > 0 && !error.remediation) {
    lines.push(`Missing: ${error.missing.join(", ")}`);
  }
  if (isDeploymentError(error)) {
    lines.push(...error.suggestions);
  }
  if (error instanceof ResourceNotFoundError && error.suggestions.length === 0) {
    lines.push(`Check that the ${error.resourceType.toLowerCase()} exists in the configured region.`);
  }
  return lines;
}

export function reportError(error: unknown): void {
  const [message, ...details] = describeFailure(error);
  console.error(chalk.red.bold("Error:"), chalk.red(message));
  for (const line of details) {
    console.error(chalk.yellow(line));
  }
  if (process.env.DEBUG && error instanceof Error) {
    console.error(chalk.gray(error.stack ?? ""));
  }
}
