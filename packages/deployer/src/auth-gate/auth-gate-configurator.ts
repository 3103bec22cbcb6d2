/**
 * Auth Gate Configurator
 *
 * Puts an OIDC authentication gate in front of an environment's HTTPS
 * listener: deny by default, one catch-all rule that authenticates and
 * then forwards, and an HTTP listener that redirects to HTTPS.
 *
 * Non-default rules are always deleted and recreated, never patched, so
 * applying the gate twice leaves the same rule set.
 */

import type {
  AuthenticateOidcConfig,
  ICertificateService,
  ILoadBalancerService,
  ListenerAction,
  ListenerInfo,
  LoadBalancerInfo,
  TargetGroupInfo,
} from "@ebshield/adapters-common";
import { DENY_RESPONSE, ResourceNotFoundError, type OidcSettings } from "@ebshield/core";
import type { ResourceResolver } from "../resolver/resource-resolver";
import type { ClientSecretProvider, LogCallback } from "../types";

/** Priority of the catch-all authentication rule */
export const AUTH_RULE_PRIORITY = 1;
export const AUTH_RULE_PATH = "/*";

/** OIDC action parameters as stored and compared; the secret is added at write time */
export type OidcActionConfig = Omit<AuthenticateOidcConfig, "clientSecret">;

/** The listeners the gate is applied to */
export interface GateTarget {
  environmentName: string;
  loadBalancer: LoadBalancerInfo;
  https: ListenerInfo;
  http: ListenerInfo | null;
}

export interface AuthGateResult {
  listenerArn: string;
  ruleArn: string;
  domain: string;
  rulesRemoved: number;
  httpRedirect: boolean;
}

export function buildOidcActionConfig(settings: OidcSettings): OidcActionConfig {
  return {
    issuer: settings.issuer,
    authorizationEndpoint: settings.authorizationEndpoint,
    tokenEndpoint: settings.tokenEndpoint,
    userInfoEndpoint: settings.userInfoEndpoint,
    clientId: settings.clientId,
    sessionCookieName: settings.session.cookie_name,
    sessionTimeout: settings.session.timeout,
    scope: settings.session.scope,
    onUnauthenticatedRequest: "authenticate",
  };
}

export class AuthGateConfigurator {
  constructor(
    private readonly resolver: ResourceResolver,
    private readonly loadBalancers: ILoadBalancerService,
    private readonly certificates: ICertificateService,
    private readonly projectName: string,
    private readonly log: LogCallback
  ) {}

  /**
   * Resolve the environment's listeners and apply the gate.
   */
  async configure(
    environmentName: string,
    oidc: OidcActionConfig,
    clientSecret: ClientSecretProvider
  ): Promise<AuthGateResult> {
    this.log(`Configuring OIDC authentication for ${environmentName}`);
    const target = await this.resolveTarget(environmentName);
    return this.apply(target, oidc, clientSecret);
  }

  /**
   * Find the environment's load balancer and its HTTPS listener.
   *
   * @throws ResourceNotFoundError if the environment, load balancer or HTTPS listener is missing
   */
  async resolveTarget(environmentName: string): Promise<GateTarget> {
    this.log("Finding HTTPS listener");

    const environment = await this.resolver.findEnvironment(environmentName);
    if (!environment) {
      throw new ResourceNotFoundError("Environment", environmentName);
    }

    const loadBalancer = await this.resolver.findLoadBalancer(environmentName);
    if (!loadBalancer) {
      throw new ResourceNotFoundError(
        "Load balancer",
        environmentName,
        `No load balancer found for environment ${environmentName}`
      );
    }

    const listeners = await this.resolver.findListeners(loadBalancer.arn);
    if (!listeners?.https) {
      throw new ResourceNotFoundError(
        "HTTPS listener",
        loadBalancer.name,
        "HTTPS listener not found. Run the TLS setup step first.",
        ["Add an HTTPS listener with a certificate to the load balancer, then run `ebshield shield`"]
      );
    }

    return { environmentName, loadBalancer, https: listeners.https, http: listeners.http };
  }

  /**
   * Apply the gate to already resolved listeners.
   */
  async apply(
    target: GateTarget,
    oidc: OidcActionConfig,
    clientSecret: ClientSecretProvider
  ): Promise<AuthGateResult> {
    const { https, http } = target;

    const domain = await this.resolveDomain(https);
    const targetGroup = await this.resolveTargetGroup(https);
    const secret = await clientSecret();

    const rulesRemoved = await this.removeRules(https.arn);

    this.log("Setting default listener action to deny unauthorized access");
    await this.loadBalancers.setDefaultActions(https.arn, [
      {
        type: "fixed-response",
        statusCode: DENY_RESPONSE.statusCode,
        contentType: DENY_RESPONSE.contentType,
        messageBody: DENY_RESPONSE.messageBody,
      },
    ]);

    this.log("Creating authentication rule");
    const rule = await this.loadBalancers.createRule({
      listenerArn: https.arn,
      priority: AUTH_RULE_PRIORITY,
      conditions: [{ field: "path-pattern", values: [AUTH_RULE_PATH] }],
      actions: buildGateActions(oidc, secret, targetGroup.arn),
    });

    const httpRedirect = await this.redirectHttp(http);

    this.log(`OIDC authentication configured for https://${domain}`);
    return { listenerArn: https.arn, ruleArn: rule.arn, domain, rulesRemoved, httpRedirect };
  }

  private async resolveDomain(listener: ListenerInfo): Promise<string> {
    const certificateArn = listener.certificateArns[0];
    if (!certificateArn) {
      throw new ResourceNotFoundError(
        "Certificate",
        listener.arn,
        "HTTPS listener has no certificate attached"
      );
    }

    const domainName = await this.certificates.getDomainName(certificateArn);
    if (!domainName) {
      throw new ResourceNotFoundError("Certificate", certificateArn);
    }
    return domainName.replaceAll("*", this.projectName);
  }

  private async resolveTargetGroup(listener: ListenerInfo): Promise<TargetGroupInfo> {
    this.log("Finding target group");
    const targetGroup = await this.resolver.findTargetGroup(listener);
    if (!targetGroup) {
      throw new ResourceNotFoundError(
        "Target group",
        listener.loadBalancerArn,
        "No target groups found for load balancer"
      );
    }
    return targetGroup;
  }

  private async removeRules(listenerArn: string): Promise<number> {
    this.log("Removing existing listener rules");
    const rules = (await this.loadBalancers.listRules(listenerArn)).filter((rule) => !rule.isDefault);

    for (const rule of rules) {
      await this.loadBalancers.deleteRule(rule.arn);
    }

    this.log(rules.length > 0 ? `Removed ${rules.length} rules` : "No rules to remove");
    return rules.length;
  }

  private async redirectHttp(http: ListenerInfo | null): Promise<boolean> {
    if (!http) {
      this.log("HTTP listener not found");
      return false;
    }

    this.log("Configuring HTTP to HTTPS redirect");
    await this.loadBalancers.setDefaultActions(http.arn, [
      { type: "redirect", protocol: "HTTPS", port: "443", statusCode: "HTTP_301" },
    ]);
    return true;
  }
}

/**
 * Actions of the catch-all rule: authenticate first, then forward.
 */
export function buildGateActions(
  oidc: OidcActionConfig,
  clientSecret: string,
  targetGroupArn: string
): ListenerAction[] {
  return [
    { type: "authenticate-oidc", order: 1, config: { ...oidc, clientSecret } },
    { type: "forward", order: 2, targetGroupArn },
  ];
}
