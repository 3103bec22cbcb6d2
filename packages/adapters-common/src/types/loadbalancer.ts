/**
 * Load balancer type definitions.
 *
 * Listener, rule and action shapes used by the resource resolver and the
 * auth gate. Field names follow the platform's vocabulary but carry no SDK types.
 */

export interface LoadBalancerInfo {
  arn: string;
  name: string;
  /** application, network or gateway */
  type: string;
  dnsName?: string;
}

/**
 * OIDC parameters of an authenticate action.
 *
 * `clientSecret` is write-only on the platform: it is never present on
 * values read back from an existing rule.
 */
export interface AuthenticateOidcConfig {
  issuer: string;
  authorizationEndpoint: string;
  tokenEndpoint: string;
  userInfoEndpoint: string;
  clientId: string;
  clientSecret?: string;
  sessionCookieName?: string;
  /** Session lifetime in seconds */
  sessionTimeout?: number;
  scope?: string;
  onUnauthenticatedRequest?: "allow" | "authenticate" | "deny";
  authenticationRequestExtraParams?: Record<string, string>;
}

export interface FixedResponseAction {
  type: "fixed-response";
  order?: number;
  statusCode: string;
  contentType?: string;
  messageBody?: string;
}

export interface RedirectAction {
  type: "redirect";
  order?: number;
  protocol?: string;
  port?: string;
  host?: string;
  path?: string;
  query?: string;
  statusCode: "HTTP_301" | "HTTP_302";
}

export interface ForwardAction {
  type: "forward";
  order?: number;
  targetGroupArn: string;
}

export interface AuthenticateOidcAction {
  type: "authenticate-oidc";
  order?: number;
  config: AuthenticateOidcConfig;
}

export type ListenerAction =
  | FixedResponseAction
  | RedirectAction
  | ForwardAction
  | AuthenticateOidcAction;

export interface ListenerInfo {
  arn: string;
  loadBalancerArn: string;
  port: number;
  protocol?: string;
  /** ARNs of the certificates bound to the listener, default first */
  certificateArns: string[];
  defaultActions: ListenerAction[];
}

export interface RuleCondition {
  /** Condition field, e.g. path-pattern or host-header */
  field: string;
  values: string[];
}

export interface ListenerRule {
  arn: string;
  /** Numeric priority, absent on the default rule */
  priority?: number;
  isDefault: boolean;
  conditions: RuleCondition[];
  actions: ListenerAction[];
}

export interface CreateRuleRequest {
  listenerArn: string;
  priority: number;
  conditions: RuleCondition[];
  actions: ListenerAction[];
}

export interface TargetGroupInfo {
  arn: string;
  name: string;
  port?: number;
  protocol?: string;
}
