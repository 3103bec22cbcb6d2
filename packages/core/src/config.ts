import { z } from "zod";
import { ConfigurationError } from "./errors";
import { DEFAULT_OIDC_SESSION } from "./constants";

const requiredString = (label: string) =>
  z
    .string({ required_error: `${label} is required`, invalid_type_error: `${label} is required` })
    .trim()
    .min(1, `${label} must not be empty`);

// An unset ${VAR} leaves an empty YAML value, which parses as null
const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

export const LoadBalancerType = z.enum(["application", "network", "classic"]);
export type LoadBalancerType = z.infer<typeof LoadBalancerType>;

export const AwsConfigSchema = z.object({
  region: requiredString("aws.region"),
  platform: requiredString("aws.platform"),
  tags: z.record(z.string()).default({}),
});

export type AwsConfig = z.infer<typeof AwsConfigSchema>;

export const ApplicationConfigSchema = z.object({
  name: requiredString("application.name"),
  environment: requiredString("application.environment"),
  description: z.string().optional(),
});

export type ApplicationConfig = z.infer<typeof ApplicationConfigSchema>;

export const InstanceConfigSchema = z.object({
  type: z.string().min(1).optional(),
  elb_type: LoadBalancerType,
  autoscaling: z
    .object({
      min_instances: z.number().int().min(0).default(1),
      max_instances: z.number().int().min(1).default(1),
    })
    .refine((value) => value.min_instances <= value.max_instances, {
      message: "min_instances must not exceed max_instances",
    })
    .optional(),
  spot_options: z
    .object({
      enabled: z.boolean().default(false),
    })
    .optional(),
});

export type InstanceConfig = z.infer<typeof InstanceConfigSchema>;

export const RolePoliciesSchema = z.object({
  trust_policy: requiredString("trust_policy"),
  managed_policies: z.array(z.string().min(1)).default([]),
  custom_policies: z.array(z.string().min(1)).optional(),
});

export type RolePolicies = z.infer<typeof RolePoliciesSchema>;

export const IamConfigSchema = z.object({
  service_role_name: requiredString("iam.service_role_name"),
  service_role_policies: RolePoliciesSchema,
  instance_profile_name: requiredString("iam.instance_profile_name"),
  instance_role_name: requiredString("iam.instance_role_name"),
  instance_role_policies: RolePoliciesSchema,
});

export type IamConfig = z.infer<typeof IamConfigSchema>;

export const OidcSessionSchema = z.object({
  cookie_name: z.string().min(1).default(DEFAULT_OIDC_SESSION.cookie_name),
  timeout: z.number().int().positive().default(DEFAULT_OIDC_SESSION.timeout),
  scope: z.string().min(1).default(DEFAULT_OIDC_SESSION.scope),
});

export type OidcSession = z.infer<typeof OidcSessionSchema>;

// Values may be empty here: environment variables override them and
// completeness is checked by validateOidcEnvironment.
export const OidcConfigSchema = z.object({
  client_id: optionalString,
  client_secret: optionalString,
  issuer: optionalString,
  endpoints: z
    .object({
      authorization: optionalString,
      token: optionalString,
      userinfo: optionalString,
    })
    .default({}),
  session: OidcSessionSchema.default({}),
});

export type OidcConfig = z.infer<typeof OidcConfigSchema>;

export const DeploymentConfigSchema = z.object({
  aws: AwsConfigSchema,
  application: ApplicationConfigSchema,
  instance: InstanceConfigSchema,
  iam: IamConfigSchema,
  oidc: OidcConfigSchema.optional(),
  elasticbeanstalk_cli: z.record(z.unknown()).optional(),
});

export type DeploymentConfig = z.infer<typeof DeploymentConfigSchema>;

/**
 * Validate a parsed configuration document.
 *
 * @throws ConfigurationError listing every failing key path
 */
export function validateDeploymentConfig(input: unknown): DeploymentConfig {
  const result = DeploymentConfigSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const problems = result.error.issues.map((issue) => {
    const path = issue.path.join(".") || "(root)";
    return `${path}: ${issue.message}`;
  });

  throw new ConfigurationError(
    `Invalid configuration:\n${problems.map((p) => `  - ${p}`).join("\n")}`,
    result.error.issues.map((issue) => issue.path.join(".")),
    "Fix the listed keys in config.yml or set the environment variables they reference."
  );
}
