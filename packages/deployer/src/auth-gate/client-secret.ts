import { ConfigurationError, OIDC_ENV, type EnvironmentRecord } from "@ebshield/core";
import type { ClientSecretProvider } from "../types";

export type SecretPrompt = (message: string) => Promise<string>;

const LEGACY_CLIENT_SECRET = "OIDC_CLIENT_SECRET";

/**
 * Resolve the OIDC client secret, first match wins: the explicit value,
 * LB_OIDC_CLIENT_SECRET, the legacy OIDC_CLIENT_SECRET, then the prompt.
 *
 * @throws ConfigurationError when every source is empty
 */
export async function resolveClientSecret(
  explicit: string | undefined,
  env: EnvironmentRecord,
  prompt?: SecretPrompt
): Promise<string> {
  const secret =
    explicit ||
    env[OIDC_ENV.CLIENT_SECRET] ||
    env[LEGACY_CLIENT_SECRET] ||
    (prompt ? await prompt("Please enter your OIDC client secret:") : "");

  if (!secret) {
    throw new ConfigurationError(
      "OIDC client secret is required",
      [OIDC_ENV.CLIENT_SECRET],
      `Pass --client-secret or set ${OIDC_ENV.CLIENT_SECRET}.`
    );
  }
  return secret;
}

/**
 * A provider that resolves the secret on first use and reuses it afterwards.
 */
export function createClientSecretProvider(
  explicit: string | undefined,
  env: EnvironmentRecord,
  prompt?: SecretPrompt
): ClientSecretProvider {
  let pending: Promise<string> | undefined;
  return () => {
    if (!pending) {
      pending = resolveClientSecret(explicit, env, prompt);
    }
    return pending;
  };
}
