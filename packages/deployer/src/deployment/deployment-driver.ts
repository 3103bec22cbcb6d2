/**
 * Deployment Driver
 *
 * policy files check -> bundle -> bucket -> upload -> application -> version -> wait for
 * PROCESSED -> IAM -> reconcile (with preserve/restore on update).
 *
 * A failing step stops the run; later steps are never attempted.
 */

import fs from "fs-extra";
import type {
  ApplicationVersionInfo,
  IEnvironmentService,
  IObjectStorageService,
} from "@ebshield/adapters-common";
import { artifactBucketName } from "@ebshield/adapters-common";
import {
  DEFAULT_APPLICATION_DESCRIPTION,
  ProcessingFailureError,
  ResourceNotFoundError,
  VERSION_POLL_INTERVAL_MS,
  createVersionLabel,
  formatErrorMessage,
  type DeploymentConfig,
} from "@ebshield/core";
import type { BundleResult } from "../bundle/app-bundler";
import type { IamProvisioner } from "../iam/iam-provisioner";
import type { EnvironmentReconciler, ReconcileResult } from "../reconciler/environment-reconciler";
import { buildOptionSettings, loadBalancerTypeSetting } from "../reconciler/option-settings";
import { pollUntil } from "../polling";
import type { ClientSecretProvider, LogCallback, ProgressCallback, SleepFn } from "../types";

export const DEPLOY_STEPS = {
  BUNDLE: "bundle",
  BUCKET: "bucket",
  UPLOAD: "upload",
  APPLICATION: "application",
  VERSION: "version",
  IAM: "iam",
  ENVIRONMENT: "environment",
} as const;

export type DeployStep = (typeof DEPLOY_STEPS)[keyof typeof DEPLOY_STEPS];

export interface DeploymentDriverDeps {
  environments: IEnvironmentService;
  storage: IObjectStorageService;
  iam: IamProvisioner;
  reconciler: EnvironmentReconciler;
  /** Produces the zip of the project */
  bundle: () => Promise<BundleResult>;
  log: LogCallback;
}

export interface DeploymentDriverOptions {
  versionPollIntervalMs?: number;
  sleep?: SleepFn;
  signal?: AbortSignal;
  /** Version label to register (default: derived from the current time) */
  versionLabel?: string;
}

export interface DeploymentResult {
  versionLabel: string;
  bucket: string;
  key: string;
  reconcile: ReconcileResult;
}

export class DeploymentDriver {
  constructor(
    private readonly deps: DeploymentDriverDeps,
    private readonly options: DeploymentDriverOptions = {}
  ) {}

  async deploy(
    config: DeploymentConfig,
    clientSecret: ClientSecretProvider,
    onProgress?: ProgressCallback
  ): Promise<DeploymentResult> {
    const { environments, storage, iam, reconciler, log } = this.deps;
    const appName = config.application.name;
    const region = config.aws.region;
    const versionLabel = this.options.versionLabel ?? createVersionLabel();
    const bucket = artifactBucketName(region, appName);
    const key = `app-${versionLabel}.zip`;

    log(`Deploying ${appName} to region ${region}`);
    log(`Using platform: ${config.aws.platform}`);

    const bundle = await this.step(DEPLOY_STEPS.BUNDLE, onProgress, async () => {
      // Policy files are only used in the IAM step, but a bad one must stop the run here
      await iam.validatePolicyFiles(config.iam);
      return this.deps.bundle();
    });

    try {
      await this.step(DEPLOY_STEPS.BUCKET, onProgress, async () => {
        if (!(await storage.bucketExists(bucket))) {
          log(`Creating bucket ${bucket}`);
          await storage.createBucket(bucket, region);
        }
      });

      await this.step(DEPLOY_STEPS.UPLOAD, onProgress, () =>
        storage.uploadFile(bucket, key, bundle.path)
      );
    } finally {
      await fs.remove(bundle.path);
    }

    await this.step(DEPLOY_STEPS.APPLICATION, onProgress, async () => {
      if (!(await environments.applicationExists(appName))) {
        log(`Creating application ${appName}`);
        await environments.createApplication(
          appName,
          config.application.description ?? DEFAULT_APPLICATION_DESCRIPTION
        );
      }
    });

    await this.step(DEPLOY_STEPS.VERSION, onProgress, async () => {
      await environments.createApplicationVersion(appName, versionLabel, { bucket, key });
      await this.waitForVersion(appName, versionLabel);
    });

    await this.step(DEPLOY_STEPS.IAM, onProgress, async () => {
      await iam.ensureRole(config.iam.service_role_name, config.iam.service_role_policies, {
        description: `Elastic Beanstalk service role for ${appName}`,
        tags: config.aws.tags,
      });
      await iam.ensureRole(config.iam.instance_role_name, config.iam.instance_role_policies, {
        description: `Instance role for ${appName}`,
        tags: config.aws.tags,
        attachDirectoryPolicies: true,
      });
      await iam.ensureInstanceProfile(config.iam.instance_profile_name, config.iam.instance_role_name);
    });

    const reconcile = await this.step(DEPLOY_STEPS.ENVIRONMENT, onProgress, () =>
      reconciler.reconcile(
        {
          applicationName: appName,
          environmentName: config.application.environment,
          solutionStackName: config.aws.platform,
          versionLabel,
          optionSettings: buildOptionSettings(config),
          loadBalancerType: loadBalancerTypeSetting(config),
          tags: config.aws.tags,
        },
        clientSecret
      )
    );

    log(`Deployment of ${versionLabel} complete`);
    return { versionLabel, bucket, key, reconcile };
  }

  /**
   * Poll until the version is PROCESSED.
   *
   * @throws ProcessingFailureError if processing FAILED
   * @throws ResourceNotFoundError if the version is unknown
   */
  async waitForVersion(applicationName: string, versionLabel: string): Promise<ApplicationVersionInfo> {
    const { environments, log } = this.deps;
    log("Waiting for application version to be processed...");

    return pollUntil<ApplicationVersionInfo>(
      `application version ${versionLabel}`,
      async () => {
        const version = await environments.findApplicationVersion(applicationName, versionLabel);
        if (!version) {
          throw new ResourceNotFoundError("Application version", versionLabel);
        }
        log(`Version status: ${version.status}`);
        if (version.status === "PROCESSED") {
          return { done: true, value: version };
        }
        if (version.status === "FAILED") {
          throw new ProcessingFailureError("Application version", versionLabel, version.status);
        }
        return { done: false };
      },
      {
        intervalMs: this.options.versionPollIntervalMs ?? VERSION_POLL_INTERVAL_MS,
        signal: this.options.signal,
        sleep: this.options.sleep,
      }
    );
  }

  private async step<T>(
    name: DeployStep,
    onProgress: ProgressCallback | undefined,
    fn: () => Promise<T>
  ): Promise<T> {
    onProgress?.(name, "in_progress");
    try {
      const result = await fn();
      onProgress?.(name, "complete");
      return result;
    } catch (error) {
      onProgress?.(name, "error", formatErrorMessage(error));
      throw error;
    }
  }
}
