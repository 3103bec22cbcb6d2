// Interfaces
export type {
  IEnvironmentService,
  ILoadBalancerService,
  ICertificateService,
  IIdentityService,
  IObjectStorageService,
} from "./interfaces";

// Types
export type {
  EnvironmentStatus,
  EnvironmentInfo,
  OptionSetting,
  CreateEnvironmentRequest,
  UpdateEnvironmentRequest,
  ApplicationVersionStatus,
  ApplicationVersionInfo,
  SourceBundleLocation,
} from "./types/environment";
export type {
  LoadBalancerInfo,
  AuthenticateOidcConfig,
  FixedResponseAction,
  RedirectAction,
  ForwardAction,
  AuthenticateOidcAction,
  ListenerAction,
  ListenerInfo,
  RuleCondition,
  ListenerRule,
  CreateRuleRequest,
  TargetGroupInfo,
} from "./types/loadbalancer";
export type { RoleInfo, InstanceProfileInfo } from "./types/identity";

// Utilities
export { sanitizeName, artifactBucketName } from "./utils/sanitize";
