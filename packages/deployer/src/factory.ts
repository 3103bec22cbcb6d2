/**
 * Factory that wires AWS SDK clients into the services and managers.
 *
 * Single entry point: `DeployerFactory.create(config)`. Every SDK client is
 * created here and shared through constructor injection; tests build the
 * managers directly from in-memory services instead.
 */

import path from "path";
import { ElasticBeanstalkClient } from "@aws-sdk/client-elastic-beanstalk";
import { ElasticLoadBalancingV2Client } from "@aws-sdk/client-elastic-load-balancing-v2";
import { ACMClient } from "@aws-sdk/client-acm";
import { IAMClient } from "@aws-sdk/client-iam";
import { S3Client } from "@aws-sdk/client-s3";
import {
  CertificateService,
  ElasticBeanstalkService,
  IAMService,
  LoadBalancerService,
  S3StorageService,
} from "@ebshield/adapters-aws";
import type {
  ICertificateService,
  IEnvironmentService,
  IIdentityService,
  ILoadBalancerService,
  IObjectStorageService,
} from "@ebshield/adapters-common";
import { DEFAULT_POLICIES_DIR } from "@ebshield/core";
import { ResourceResolver } from "./resolver/resource-resolver";
import { AuthGateConfigurator } from "./auth-gate/auth-gate-configurator";
import { StateSnapshot } from "./snapshot/state-snapshot";
import { EnvironmentReconciler } from "./reconciler/environment-reconciler";
import { IamProvisioner } from "./iam/iam-provisioner";
import { DeploymentDriver } from "./deployment/deployment-driver";
import { createAppBundle } from "./bundle/app-bundler";
import type { LogCallback, SleepFn } from "./types";

/** Platform services the managers are built on */
export interface DeployerServices {
  environments: IEnvironmentService;
  loadBalancers: ILoadBalancerService;
  certificates: ICertificateService;
  identity: IIdentityService;
  storage: IObjectStorageService;
}

export interface Deployer {
  resolver: ResourceResolver;
  authGate: AuthGateConfigurator;
  snapshots: StateSnapshot;
  reconciler: EnvironmentReconciler;
  iam: IamProvisioner;
  driver: DeploymentDriver;
}

export interface DeployerFactoryConfig {
  region: string;
  projectRoot: string;
  projectName: string;
  log: LogCallback;
  signal?: AbortSignal;
  /** Poll intervals and delays, overridable for tests */
  timing?: {
    versionPollIntervalMs?: number;
    environmentPollIntervalMs?: number;
    propagationDelayMs?: number;
    sleep?: SleepFn;
  };
}

export class DeployerFactory {
  static createServices(region: string): DeployerServices {
    const clientConfig = { region };

    return {
      environments: new ElasticBeanstalkService(new ElasticBeanstalkClient(clientConfig)),
      loadBalancers: new LoadBalancerService(new ElasticLoadBalancingV2Client(clientConfig)),
      certificates: new CertificateService(new ACMClient(clientConfig)),
      identity: new IAMService(new IAMClient(clientConfig)),
      storage: new S3StorageService(new S3Client(clientConfig)),
    };
  }

  static createManagers(services: DeployerServices, config: DeployerFactoryConfig): Deployer {
    const { log, signal, timing = {} } = config;

    const resolver = new ResourceResolver(services.environments, services.loadBalancers, log);
    const authGate = new AuthGateConfigurator(
      resolver,
      services.loadBalancers,
      services.certificates,
      config.projectName,
      log
    );
    const snapshots = new StateSnapshot(resolver, services.loadBalancers, authGate, log);
    const reconciler = new EnvironmentReconciler(services.environments, snapshots, log, {
      pollIntervalMs: timing.environmentPollIntervalMs,
      sleep: timing.sleep,
      signal,
    });
    const iam = new IamProvisioner(
      services.identity,
      path.join(config.projectRoot, DEFAULT_POLICIES_DIR),
      log,
      { propagationDelayMs: timing.propagationDelayMs, sleep: timing.sleep }
    );
    const driver = new DeploymentDriver(
      {
        environments: services.environments,
        storage: services.storage,
        iam,
        reconciler,
        bundle: () => createAppBundle(config.projectRoot, { log }),
        log,
      },
      { versionPollIntervalMs: timing.versionPollIntervalMs, sleep: timing.sleep, signal }
    );

    return { resolver, authGate, snapshots, reconciler, iam, driver };
  }

  static create(config: DeployerFactoryConfig): Deployer {
    return DeployerFactory.createManagers(DeployerFactory.createServices(config.region), config);
  }
}
