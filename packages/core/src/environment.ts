/**
 * Environment record handling.
 *
 * The deployer never reads or writes `process.env` directly. The CLI builds
 * one frozen EnvironmentRecord at startup (process environment layered over
 * the project's .env file, legacy names remapped) and hands it down.
 */

import {
  LEGACY_OIDC_VARIABLES,
  OIDC_ENV,
  REQUIRED_OIDC_VARIABLES,
  type OidcEnvVariable,
} from "./constants";
import type { DeploymentConfig, OidcSession } from "./config";
import { ConfigurationError } from "./errors";

export type EnvironmentRecord = Readonly<Record<string, string>>;

/**
 * Merge environment sources. Later sources win, undefined values are dropped.
 */
export function mergeEnvironment(
  ...sources: Array<Record<string, string | undefined>>
): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }
  return merged;
}

/**
 * Map legacy OIDC variable names onto their current names.
 *
 * A legacy value is only copied when the current name is absent or empty.
 * Returns a new frozen record; the input is not modified.
 */
export function remapLegacyVariables(env: Record<string, string>): EnvironmentRecord {
  const remapped: Record<string, string> = { ...env };
  for (const [legacyName, currentName] of Object.entries(LEGACY_OIDC_VARIABLES)) {
    const legacyValue = env[legacyName];
    if (legacyValue && !env[currentName]) {
      remapped[currentName] = legacyValue;
    }
  }
  return Object.freeze(remapped);
}

/**
 * Build the environment record the rest of the program reads from.
 */
export function createEnvironmentRecord(
  processEnv: Record<string, string | undefined>,
  dotenvValues: Record<string, string> = {}
): EnvironmentRecord {
  return remapLegacyVariables(mergeEnvironment(dotenvValues, processEnv));
}

/**
 * Required OIDC variables that are unset or empty, in reporting order.
 */
export function findMissingOidcVariables(env: EnvironmentRecord): OidcEnvVariable[] {
  return REQUIRED_OIDC_VARIABLES.filter((name) => !env[name]);
}

export interface OidcValidationResult {
  valid: boolean;
  missing: OidcEnvVariable[];
}

/**
 * Check that every required OIDC variable is present. Performs no I/O.
 */
export function validateOidcEnvironment(env: EnvironmentRecord): OidcValidationResult {
  const missing = findMissingOidcVariables(env);
  return { valid: missing.length === 0, missing };
}

/**
 * Example .env lines for the missing variables.
 */
export function formatOidcRemediation(missing: readonly string[]): string {
  const lines = missing.map((name) => `${name}=your-value-here`);
  return [
    "Set these variables in your .env file or environment.",
    "Example .env file format:",
    "----------------------------------------------------",
    ...lines,
    "----------------------------------------------------",
  ].join("\n");
}

/**
 * @throws ConfigurationError naming every missing variable
 */
export function assertOidcEnvironment(env: EnvironmentRecord): void {
  const { valid, missing } = validateOidcEnvironment(env);
  if (!valid) {
    throw new ConfigurationError(
      `Missing required OIDC configuration variables: ${missing.join(", ")}`,
      missing,
      formatOidcRemediation(missing)
    );
  }
}

/**
 * OIDC parameters of the authenticate action, without the client secret.
 */
export interface OidcSettings {
  clientId: string;
  issuer: string;
  authorizationEndpoint: string;
  tokenEndpoint: string;
  userInfoEndpoint: string;
  session: OidcSession;
}

/**
 * Resolve OIDC parameters: environment variables first, then config file values.
 *
 * @throws ConfigurationError if the config has no oidc section
 */
export function resolveOidcSettings(
  config: DeploymentConfig,
  env: EnvironmentRecord
): OidcSettings {
  const oidc = config.oidc;
  if (!oidc) {
    throw new ConfigurationError(
      "Missing 'oidc' section in configuration.",
      ["oidc"],
      "Add an oidc section to config.yml (see config.example.yml)."
    );
  }

  return {
    clientId: env[OIDC_ENV.CLIENT_ID] || oidc.client_id,
    issuer: env[OIDC_ENV.ISSUER] || oidc.issuer,
    authorizationEndpoint: env[OIDC_ENV.AUTH_ENDPOINT] || oidc.endpoints.authorization,
    tokenEndpoint: env[OIDC_ENV.TOKEN_ENDPOINT] || oidc.endpoints.token,
    userInfoEndpoint: env[OIDC_ENV.USERINFO_ENDPOINT] || oidc.endpoints.userinfo,
    session: oidc.session,
  };
}
