/**
 * State Snapshot
 *
 * An environment update may replace the load balancer's listener rules.
 * `preserve` captures the OIDC rule of the HTTPS listener before the
 * update; `restore` applies it again once the environment is Ready,
 * resolving the listener afresh through the environment tag.
 *
 * The client secret cannot be read back from a rule, so it is never part
 * of a snapshot. Restore asks the secret provider for it.
 */

import type { ILoadBalancerService, ListenerAction } from "@ebshield/adapters-common";
import type { ResourceResolver } from "../resolver/resource-resolver";
import type {
  AuthGateConfigurator,
  AuthGateResult,
  OidcActionConfig,
} from "../auth-gate/auth-gate-configurator";
import type { ClientSecretProvider, LogCallback } from "../types";

/**
 * Restore rebuilds the whole gate from `oidc`; the listener and the place
 * the action was found are kept for the log only.
 */
export interface HttpsConfigSnapshot {
  listenerArn: string;
  source: "rule" | "default-action";
  oidc: OidcActionConfig;
}

export interface EnvironmentSnapshot {
  environmentName: string;
  loadBalancerArn: string;
  https: HttpsConfigSnapshot;
}

function findOidcConfig(actions: ListenerAction[]): OidcActionConfig | null {
  for (const action of actions) {
    if (action.type === "authenticate-oidc") {
      const { config } = action;
      return {
        issuer: config.issuer,
        authorizationEndpoint: config.authorizationEndpoint,
        tokenEndpoint: config.tokenEndpoint,
        userInfoEndpoint: config.userInfoEndpoint,
        clientId: config.clientId,
        sessionCookieName: config.sessionCookieName,
        sessionTimeout: config.sessionTimeout,
        scope: config.scope,
        onUnauthenticatedRequest: config.onUnauthenticatedRequest,
        authenticationRequestExtraParams: config.authenticationRequestExtraParams,
      };
    }
  }
  return null;
}

export class StateSnapshot {
  constructor(
    private readonly resolver: ResourceResolver,
    private readonly loadBalancers: ILoadBalancerService,
    private readonly authGate: AuthGateConfigurator,
    private readonly log: LogCallback
  ) {}

  /**
   * Capture the OIDC configuration of the environment's HTTPS listener.
   *
   * @returns null when there is nothing to preserve (no load balancer,
   *   no HTTPS listener or no authenticate action)
   */
  async preserve(environmentName: string): Promise<EnvironmentSnapshot | null> {
    const loadBalancer = await this.resolver.findLoadBalancer(environmentName);
    if (!loadBalancer) {
      return null;
    }

    const listeners = await this.resolver.findListeners(loadBalancer.arn);
    const https = listeners?.https;
    if (!https) {
      this.log("No HTTPS listener to preserve");
      return null;
    }

    const rules = await this.loadBalancers.listRules(https.arn);
    for (const rule of rules) {
      if (rule.isDefault) continue;
      const oidc = findOidcConfig(rule.actions);
      if (oidc) {
        this.log(`Preserved OIDC configuration of rule ${rule.priority ?? "?"} on ${https.arn}`);
        return {
          environmentName,
          loadBalancerArn: loadBalancer.arn,
          https: { listenerArn: https.arn, source: "rule", oidc },
        };
      }
    }

    const defaultOidc = findOidcConfig(https.defaultActions);
    if (defaultOidc) {
      this.log(`Preserved OIDC configuration of the default action on ${https.arn}`);
      return {
        environmentName,
        loadBalancerArn: loadBalancer.arn,
        https: { listenerArn: https.arn, source: "default-action", oidc: defaultOidc },
      };
    }

    this.log("No OIDC configuration to preserve");
    return null;
  }

  /**
   * Re-apply a snapshot. A null snapshot is a no-op.
   *
   * Must run after the environment is Ready: the listener may not exist
   * during the update.
   *
   * @returns The applied gate, or null for a null snapshot
   * @throws ResourceNotFoundError if the HTTPS listener no longer exists
   */
  async restore(
    snapshot: EnvironmentSnapshot | null,
    clientSecret: ClientSecretProvider
  ): Promise<AuthGateResult | null> {
    if (!snapshot) {
      return null;
    }

    const origin = snapshot.https.source === "rule" ? "a listener rule" : "the default action";
    this.log(`Restoring HTTPS configuration preserved from ${origin}...`);
    const target = await this.authGate.resolveTarget(snapshot.environmentName);
    if (target.loadBalancer.arn !== snapshot.loadBalancerArn) {
      this.log(`Load balancer changed during the update: now ${target.loadBalancer.arn}`);
    } else if (target.https.arn !== snapshot.https.listenerArn) {
      this.log(`HTTPS listener changed during the update: now ${target.https.arn}`);
    }

    return this.authGate.apply(target, snapshot.https.oidc, clientSecret);
  }
}
