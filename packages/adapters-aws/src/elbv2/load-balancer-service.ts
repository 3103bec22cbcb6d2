/**
 * Application Load Balancer service (ELBv2).
 *
 * Maps SDK listener, rule and action shapes onto the platform-neutral
 * types of @ebshield/adapters-common.
 */

import {
  ElasticLoadBalancingV2Client,
  DescribeLoadBalancersCommand,
  DescribeTagsCommand,
  DescribeListenersCommand,
  DescribeRulesCommand,
  CreateRuleCommand,
  DeleteRuleCommand,
  ModifyListenerCommand,
  DescribeTargetGroupsCommand,
  type Action,
  type Listener,
  type Rule,
  type RuleCondition as SdkRuleCondition,
  type LoadBalancer,
} from "@aws-sdk/client-elastic-load-balancing-v2";
import type {
  ILoadBalancerService,
  CreateRuleRequest,
  ListenerAction,
  ListenerInfo,
  ListenerRule,
  LoadBalancerInfo,
  RuleCondition,
  TargetGroupInfo,
} from "@ebshield/adapters-common";
import { callAws, findAws } from "../errors";

export class LoadBalancerService implements ILoadBalancerService {
  constructor(private readonly client: ElasticLoadBalancingV2Client) {}

  async listLoadBalancers(): Promise<LoadBalancerInfo[]> {
    const loadBalancers: LoadBalancer[] = [];
    let marker: string | undefined;

    do {
      const page = await callAws("DescribeLoadBalancers", () =>
        this.client.send(new DescribeLoadBalancersCommand({ Marker: marker }))
      );
      loadBalancers.push(...(page.LoadBalancers ?? []));
      marker = page.NextMarker;
    } while (marker);

    return loadBalancers.flatMap((lb) =>
      lb.LoadBalancerArn
        ? [
            {
              arn: lb.LoadBalancerArn,
              name: lb.LoadBalancerName ?? "",
              type: lb.Type ?? "",
              dnsName: lb.DNSName,
            },
          ]
        : []
    );
  }

  async getTags(loadBalancerArn: string): Promise<Record<string, string> | null> {
    return findAws("DescribeTags", async () => {
      const result = await this.client.send(
        new DescribeTagsCommand({ ResourceArns: [loadBalancerArn] })
      );
      const description = result.TagDescriptions?.[0];
      if (!description) {
        return null;
      }

      const tags: Record<string, string> = {};
      for (const tag of description.Tags ?? []) {
        if (tag.Key) {
          tags[tag.Key] = tag.Value ?? "";
        }
      }
      return tags;
    });
  }

  async listListeners(loadBalancerArn: string): Promise<ListenerInfo[] | null> {
    return findAws("DescribeListeners", async () => {
      const listeners: Listener[] = [];
      let marker: string | undefined;
      do {
        const page = await this.client.send(
          new DescribeListenersCommand({ LoadBalancerArn: loadBalancerArn, Marker: marker })
        );
        listeners.push(...(page.Listeners ?? []));
        marker = page.NextMarker;
      } while (marker);

      return listeners.flatMap((listener) => mapListener(listener));
    });
  }

  async getListener(listenerArn: string): Promise<ListenerInfo | null> {
    return findAws("DescribeListeners", async () => {
      const result = await this.client.send(
        new DescribeListenersCommand({ ListenerArns: [listenerArn] })
      );
      const listener = result.Listeners?.[0];
      return listener ? mapListener(listener)[0] ?? null : null;
    });
  }

  async listRules(listenerArn: string): Promise<ListenerRule[]> {
    return callAws("DescribeRules", async () => {
      const rules: Rule[] = [];
      let marker: string | undefined;
      do {
        const page = await this.client.send(
          new DescribeRulesCommand({ ListenerArn: listenerArn, Marker: marker })
        );
        rules.push(...(page.Rules ?? []));
        marker = page.NextMarker;
      } while (marker);

      return rules.flatMap((rule) => mapRule(rule));
    });
  }

  async createRule(request: CreateRuleRequest): Promise<ListenerRule> {
    return callAws("CreateRule", async () => {
      const result = await this.client.send(
        new CreateRuleCommand({
          ListenerArn: request.listenerArn,
          Priority: request.priority,
          Conditions: request.conditions.map((condition) => ({
            Field: condition.field,
            Values: condition.values,
          })),
          Actions: request.actions.map(toSdkAction),
        })
      );

      const created = result.Rules?.[0];
      const mapped = created ? mapRule(created)[0] : undefined;
      if (!mapped) {
        throw new Error(`No rule returned for listener ${request.listenerArn}`);
      }
      return mapped;
    });
  }

  async deleteRule(ruleArn: string): Promise<void> {
    await callAws("DeleteRule", () => this.client.send(new DeleteRuleCommand({ RuleArn: ruleArn })));
  }

  async setDefaultActions(listenerArn: string, actions: ListenerAction[]): Promise<void> {
    await callAws("ModifyListener", () =>
      this.client.send(
        new ModifyListenerCommand({
          ListenerArn: listenerArn,
          DefaultActions: actions.map(toSdkAction),
        })
      )
    );
  }

  async listTargetGroups(loadBalancerArn: string): Promise<TargetGroupInfo[]> {
    const result = await findAws("DescribeTargetGroups", () =>
      this.client.send(new DescribeTargetGroupsCommand({ LoadBalancerArn: loadBalancerArn }))
    );

    return (result?.TargetGroups ?? []).flatMap((group) =>
      group.TargetGroupArn
        ? [
            {
              arn: group.TargetGroupArn,
              name: group.TargetGroupName ?? "",
              port: group.Port,
              protocol: group.Protocol,
            },
          ]
        : []
    );
  }
}

function mapListener(listener: Listener): ListenerInfo[] {
  if (!listener.ListenerArn || !listener.LoadBalancerArn || listener.Port === undefined) {
    return [];
  }

  const certificates = [...(listener.Certificates ?? [])].sort(
    (a, b) => Number(Boolean(b.IsDefault)) - Number(Boolean(a.IsDefault))
  );

  return [
    {
      arn: listener.ListenerArn,
      loadBalancerArn: listener.LoadBalancerArn,
      port: listener.Port,
      protocol: listener.Protocol,
      certificateArns: certificates.flatMap((cert) => (cert.CertificateArn ? [cert.CertificateArn] : [])),
      defaultActions: (listener.DefaultActions ?? []).flatMap(fromSdkAction),
    },
  ];
}

function mapRule(rule: Rule): ListenerRule[] {
  if (!rule.RuleArn) {
    return [];
  }

  const priority = rule.Priority && rule.Priority !== "default" ? Number(rule.Priority) : undefined;

  return [
    {
      arn: rule.RuleArn,
      priority,
      isDefault: rule.IsDefault ?? rule.Priority === "default",
      conditions: (rule.Conditions ?? []).flatMap(fromSdkCondition),
      actions: (rule.Actions ?? []).flatMap(fromSdkAction),
    },
  ];
}

function fromSdkCondition(condition: SdkRuleCondition): RuleCondition[] {
  if (!condition.Field) {
    return [];
  }
  const values =
    condition.Values ??
    condition.PathPatternConfig?.Values ??
    condition.HostHeaderConfig?.Values ??
    [];
  return [{ field: condition.Field, values }];
}

/**
 * Map an SDK action. Cognito actions have no counterpart and are dropped.
 */
export function fromSdkAction(action: Action): ListenerAction[] {
  switch (action.Type) {
    case "forward": {
      const targetGroupArn =
        action.TargetGroupArn ?? action.ForwardConfig?.TargetGroups?.[0]?.TargetGroupArn;
      return targetGroupArn ? [{ type: "forward", order: action.Order, targetGroupArn }] : [];
    }
    case "fixed-response":
      return [
        {
          type: "fixed-response",
          order: action.Order,
          statusCode: action.FixedResponseConfig?.StatusCode ?? "",
          contentType: action.FixedResponseConfig?.ContentType,
          messageBody: action.FixedResponseConfig?.MessageBody,
        },
      ];
    case "redirect":
      return [
        {
          type: "redirect",
          order: action.Order,
          protocol: action.RedirectConfig?.Protocol,
          port: action.RedirectConfig?.Port,
          host: action.RedirectConfig?.Host,
          path: action.RedirectConfig?.Path,
          query: action.RedirectConfig?.Query,
          statusCode: action.RedirectConfig?.StatusCode ?? "HTTP_301",
        },
      ];
    case "authenticate-oidc": {
      const config = action.AuthenticateOidcConfig;
      if (!config) {
        return [];
      }
      // ClientSecret is never returned by the describe APIs
      return [
        {
          type: "authenticate-oidc",
          order: action.Order,
          config: {
            issuer: config.Issuer ?? "",
            authorizationEndpoint: config.AuthorizationEndpoint ?? "",
            tokenEndpoint: config.TokenEndpoint ?? "",
            userInfoEndpoint: config.UserInfoEndpoint ?? "",
            clientId: config.ClientId ?? "",
            sessionCookieName: config.SessionCookieName,
            sessionTimeout: config.SessionTimeout,
            scope: config.Scope,
            onUnauthenticatedRequest: config.OnUnauthenticatedRequest,
            authenticationRequestExtraParams: config.AuthenticationRequestExtraParams,
          },
        },
      ];
    }
    default:
      return [];
  }
}

export function toSdkAction(action: ListenerAction): Action {
  switch (action.type) {
    case "forward":
      return { Type: "forward", Order: action.order, TargetGroupArn: action.targetGroupArn };
    case "fixed-response":
      return {
        Type: "fixed-response",
        Order: action.order,
        FixedResponseConfig: {
          StatusCode: action.statusCode,
          ContentType: action.contentType,
          MessageBody: action.messageBody,
        },
      };
    case "redirect":
      return {
        Type: "redirect",
        Order: action.order,
        RedirectConfig: {
          Protocol: action.protocol,
          Port: action.port,
          Host: action.host,
          Path: action.path,
          Query: action.query,
          StatusCode: action.statusCode,
        },
      };
    case "authenticate-oidc":
      return {
        Type: "authenticate-oidc",
        Order: action.order,
        AuthenticateOidcConfig: {
          Issuer: action.config.issuer,
          AuthorizationEndpoint: action.config.authorizationEndpoint,
          TokenEndpoint: action.config.tokenEndpoint,
          UserInfoEndpoint: action.config.userInfoEndpoint,
          ClientId: action.config.clientId,
          ClientSecret: action.config.clientSecret,
          SessionCookieName: action.config.sessionCookieName,
          SessionTimeout: action.config.sessionTimeout,
          Scope: action.config.scope,
          OnUnauthenticatedRequest: action.config.onUnauthenticatedRequest,
          AuthenticationRequestExtraParams: action.config.authenticationRequestExtraParams,
        },
      };
  }
}
