export type { LogCallback, ProgressCallback, StepStatus, SleepFn, ClientSecretProvider } from "./types";
export { pollUntil, defaultSleep } from "./polling";
export type { PollOutcome, PollOptions } from "./polling";

// Resolver
export { ResourceResolver } from "./resolver/resource-resolver";
export type { EnvironmentListeners } from "./resolver/resource-resolver";

// Auth gate
export {
  AuthGateConfigurator,
  AUTH_RULE_PATH,
  AUTH_RULE_PRIORITY,
  buildGateActions,
  buildOidcActionConfig,
} from "./auth-gate/auth-gate-configurator";
export type { AuthGateResult, GateTarget, OidcActionConfig } from "./auth-gate/auth-gate-configurator";
export { resolveClientSecret, createClientSecretProvider } from "./auth-gate/client-secret";
export type { SecretPrompt } from "./auth-gate/client-secret";

// Snapshot
export { StateSnapshot } from "./snapshot/state-snapshot";
export type { EnvironmentSnapshot, HttpsConfigSnapshot } from "./snapshot/state-snapshot";

// Reconciler
export { EnvironmentReconciler } from "./reconciler/environment-reconciler";
export type { DesiredEnvironment, ReconcileResult, ReconcilerOptions } from "./reconciler/environment-reconciler";
export {
  NAMESPACES,
  buildOptionSettings,
  diffOptionSettings,
  loadBalancerTypeSetting,
} from "./reconciler/option-settings";

// IAM
export { IamProvisioner } from "./iam/iam-provisioner";
export type { EnsureRoleOptions, IamProvisionerOptions } from "./iam/iam-provisioner";

// Bundle
export { createAppBundle, listBundleFiles, readIgnoreRules } from "./bundle/app-bundler";
export type { BundleOptions, BundleResult } from "./bundle/app-bundler";
export { parseIgnoreRules, isExcluded, globMatch } from "./bundle/ignore-rules";
export type { IgnoreRules } from "./bundle/ignore-rules";

// Deployment
export { DeploymentDriver, DEPLOY_STEPS } from "./deployment/deployment-driver";
export type {
  DeployStep,
  DeploymentDriverDeps,
  DeploymentDriverOptions,
  DeploymentResult,
} from "./deployment/deployment-driver";

// EB CLI
export { buildEbCliConfig, writeEbCliConfig } from "./eb-cli/eb-cli-config";

// Factory
export { DeployerFactory } from "./factory";
export type { Deployer, DeployerFactoryConfig, DeployerServices } from "./factory";
