import { validateDeploymentConfig, type DeploymentConfig } from "@ebshield/core";
import type { OidcActionConfig } from "../auth-gate/auth-gate-configurator";
import { DeployerFactory, type Deployer } from "../factory";
import type { FakePlatform } from "./fake-platform";
import type { SleepFn } from "../types";

export const noSleep: SleepFn = async () => {};

export const OIDC: OidcActionConfig = {
  issuer: "https://issuer.test",
  authorizationEndpoint: "https://issuer.test/authorize",
  tokenEndpoint: "https://issuer.test/token",
  userInfoEndpoint: "https://issuer.test/userinfo",
  clientId: "test-client",
  sessionCookieName: "federate_id_token",
  sessionTimeout: 3600,
  scope: "openid",
  onUnauthenticatedRequest: "authenticate",
};

export const testSecret = async (): Promise<string> => "test-secret";

export function createLogCollector(): { log: (line: string) => void; lines: string[] } {
  const lines: string[] = [];
  return { log: (line) => lines.push(line), lines };
}

export function testConfig(overrides: Record<string, unknown> = {}): DeploymentConfig {
  return validateDeploymentConfig({
    aws: {
      region: "eu-west-1",
      platform: "64bit Amazon Linux 2023 v4.3.0 running Docker",
      tags: { Project: "demo" },
    },
    application: { name: "demo", environment: "demo-env", description: "Demo Application" },
    instance: {
      type: "t4g.nano",
      elb_type: "application",
      autoscaling: { min_instances: 1, max_instances: 2 },
      spot_options: { enabled: true },
    },
    iam: {
      service_role_name: "demo-eb-role",
      service_role_policies: {
        trust_policy: "eb-trust-policy.json",
        managed_policies: ["arn:aws:iam::aws:policy/service-role/AWSElasticBeanstalkService"],
      },
      instance_profile_name: "demo-ec2-profile",
      instance_role_name: "demo-ec2-role",
      instance_role_policies: {
        trust_policy: "ec2-trust-policy.json",
        managed_policies: ["arn:aws:iam::aws:policy/AWSElasticBeanstalkWebTier"],
      },
    },
    ...overrides,
  });
}

/**
 * Managers wired to the fake platform with every delay set to zero.
 */
export function createTestDeployer(
  platform: FakePlatform,
  options: { projectRoot?: string; log?: (line: string) => void; signal?: AbortSignal } = {}
): Deployer {
  return DeployerFactory.createManagers(platform, {
    region: "eu-west-1",
    projectRoot: options.projectRoot ?? "/nonexistent-project",
    projectName: "demo",
    log: options.log ?? (() => {}),
    signal: options.signal,
    timing: {
      versionPollIntervalMs: 0,
      environmentPollIntervalMs: 0,
      propagationDelayMs: 0,
      sleep: noSleep,
    },
  });
}
