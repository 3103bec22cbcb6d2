/**
 * Default values and platform identifiers.
 */

export const DEFAULT_CONFIG_FILE = "config.yml";
export const DEFAULT_IGNORE_FILE = ".ebignore";
export const DEFAULT_ENV_FILE = ".env";
export const DEFAULT_POLICIES_DIR = "policies";
export const EB_CLI_CONFIG_DIR = ".elasticbeanstalk";

export const DEFAULT_APPLICATION_DESCRIPTION = "Application created by ebshield";

/** Tag Elastic Beanstalk puts on every resource it creates for an environment */
export const ENVIRONMENT_NAME_TAG = "elasticbeanstalk:environment-name";

export const HTTPS_PORT = 443;
export const HTTP_PORT = 80;

/** Polling interval while an application version is processed */
export const VERSION_POLL_INTERVAL_MS = 5_000;

/** Polling interval while an environment is launched or updated */
export const ENVIRONMENT_POLL_INTERVAL_MS = 10_000;

/** Wait after creating an instance profile before it is usable */
export const INSTANCE_PROFILE_PROPAGATION_MS = 10_000;

export const DEFAULT_OIDC_SESSION = {
  cookie_name: "federate_id_token",
  timeout: 36000,
  scope: "openid",
} as const;

export const DENY_RESPONSE = {
  statusCode: "503",
  contentType: "text/plain",
  messageBody: "Unauthorized Access",
} as const;
