/**
 * Environment variable names read by the deployer.
 */

export const OIDC_ENV = {
  CLIENT_ID: "LB_OIDC_CLIENT_ID",
  CLIENT_SECRET: "LB_OIDC_CLIENT_SECRET",
  ISSUER: "LB_OIDC_ISSUER",
  AUTH_ENDPOINT: "LB_OIDC_AUTH_ENDPOINT",
  TOKEN_ENDPOINT: "LB_OIDC_TOKEN_ENDPOINT",
  USERINFO_ENDPOINT: "LB_OIDC_USERINFO_ENDPOINT",
} as const;

export type OidcEnvVariable = (typeof OIDC_ENV)[keyof typeof OIDC_ENV];

/** Required OIDC variables, in the order they are reported */
export const REQUIRED_OIDC_VARIABLES: readonly OidcEnvVariable[] = [
  OIDC_ENV.CLIENT_ID,
  OIDC_ENV.CLIENT_SECRET,
  OIDC_ENV.ISSUER,
  OIDC_ENV.AUTH_ENDPOINT,
  OIDC_ENV.TOKEN_ENDPOINT,
  OIDC_ENV.USERINFO_ENDPOINT,
];

/** Names used before the LB_ prefix was introduced */
export const LEGACY_OIDC_VARIABLES: Readonly<Record<string, OidcEnvVariable>> = {
  OIDC_CLIENT_ID: OIDC_ENV.CLIENT_ID,
  OIDC_CLIENT_SECRET: OIDC_ENV.CLIENT_SECRET,
  OIDC_ISSUER: OIDC_ENV.ISSUER,
  OIDC_AUTH_ENDPOINT: OIDC_ENV.AUTH_ENDPOINT,
  OIDC_TOKEN_ENDPOINT: OIDC_ENV.TOKEN_ENDPOINT,
  OIDC_USERINFO_ENDPOINT: OIDC_ENV.USERINFO_ENDPOINT,
};

export const PROJECT_NAME_ENV = "PROJECT_NAME";
export const EB_CLI_PLATFORM_PLACEHOLDER = "${EB_CLI_PLATFORM}";
