/**
 * Environment Reconciler
 *
 * Creates the environment when it does not exist and updates it
 * otherwise. An update is wrapped in preserve/restore because it may
 * drop the authentication rule of the HTTPS listener.
 */

import type {
  EnvironmentInfo,
  EnvironmentStatus,
  IEnvironmentService,
  OptionSetting,
} from "@ebshield/adapters-common";
import {
  ENVIRONMENT_POLL_INTERVAL_MS,
  ProcessingFailureError,
  ResourceNotFoundError,
} from "@ebshield/core";
import type { StateSnapshot } from "../snapshot/state-snapshot";
import type { AuthGateResult } from "../auth-gate/auth-gate-configurator";
import { pollUntil } from "../polling";
import type { ClientSecretProvider, LogCallback, SleepFn } from "../types";
import { diffOptionSettings } from "./option-settings";

const FAILED_STATUSES: readonly EnvironmentStatus[] = ["Terminating", "Terminated"];

export interface DesiredEnvironment {
  applicationName: string;
  environmentName: string;
  solutionStackName: string;
  versionLabel: string;
  optionSettings: OptionSetting[];
  /** Only sent on create */
  loadBalancerType: OptionSetting;
  tags?: Record<string, string>;
}

export interface ReconcileResult {
  action: "created" | "updated";
  environment: EnvironmentInfo;
  /** The restored auth gate, when a snapshot was taken */
  restored: AuthGateResult | null;
}

export interface ReconcilerOptions {
  pollIntervalMs?: number;
  sleep?: SleepFn;
  signal?: AbortSignal;
}

export class EnvironmentReconciler {
  private readonly pollIntervalMs: number;

  constructor(
    private readonly environments: IEnvironmentService,
    private readonly snapshots: StateSnapshot,
    private readonly log: LogCallback,
    private readonly options: ReconcilerOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? ENVIRONMENT_POLL_INTERVAL_MS;
  }

  async reconcile(
    desired: DesiredEnvironment,
    clientSecret: ClientSecretProvider
  ): Promise<ReconcileResult> {
    const existing = await this.environments.findEnvironment(desired.environmentName);

    if (!existing) {
      this.log("Creating new environment...");
      await this.environments.createEnvironment({
        applicationName: desired.applicationName,
        environmentName: desired.environmentName,
        versionLabel: desired.versionLabel,
        solutionStackName: desired.solutionStackName,
        optionSettings: [...desired.optionSettings, desired.loadBalancerType],
        tags: desired.tags,
      });
      const environment = await this.waitForStatus(desired.environmentName, "Ready");
      return { action: "created", environment, restored: null };
    }

    this.log("Updating existing environment...");
    const snapshot = await this.snapshots.preserve(desired.environmentName);
    // Needed before the update, which may drop the gate
    const secret = snapshot ? await clientSecret() : null;

    const current = await this.environments.getOptionSettings(
      desired.applicationName,
      desired.environmentName
    );
    const changed = diffOptionSettings(desired.optionSettings, current);
    if (changed.length > 0) {
      this.log(`Changing ${changed.length} option settings`);
    }

    await this.environments.updateEnvironment({
      environmentName: desired.environmentName,
      versionLabel: desired.versionLabel,
      optionSettings: changed,
    });

    const environment = await this.waitForStatus(desired.environmentName, "Ready");
    const restored =
      snapshot && secret !== null
        ? await this.snapshots.restore(snapshot, () => Promise.resolve(secret))
        : null;
    return { action: "updated", environment, restored };
  }

  /**
   * Poll until the environment reports `target`. No timeout.
   *
   * @throws ProcessingFailureError if the environment starts terminating
   * @throws ResourceNotFoundError if the environment disappears
   * @throws OperationCancelledError if the abort signal fires
   */
  async waitForStatus(environmentName: string, target: EnvironmentStatus): Promise<EnvironmentInfo> {
    this.log(`Waiting for environment ${environmentName} to be ${target}...`);

    return pollUntil<EnvironmentInfo>(
      `environment ${environmentName} to be ${target}`,
      async () => {
        const environment = await this.environments.findEnvironment(environmentName);
        if (!environment) {
          throw new ResourceNotFoundError("Environment", environmentName);
        }
        if (environment.status === target) {
          return { done: true, value: environment };
        }
        if (FAILED_STATUSES.includes(environment.status)) {
          throw new ProcessingFailureError("Environment", environmentName, environment.status);
        }
        this.log(`Environment status: ${environment.status}`);
        return { done: false };
      },
      { intervalMs: this.pollIntervalMs, signal: this.options.signal, sleep: this.options.sleep }
    );
  }
}
