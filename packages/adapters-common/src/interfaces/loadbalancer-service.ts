/**
 * Load Balancer Service Interface
 *
 * Read and write access to load balancers, listeners, rules and target groups.
 * All lookups are side-effect free; a missing resource is a null result,
 * every other failure is thrown.
 */

import type {
  CreateRuleRequest,
  ListenerAction,
  ListenerInfo,
  ListenerRule,
  LoadBalancerInfo,
  TargetGroupInfo,
} from "../types/loadbalancer";

export interface ILoadBalancerService {
  /**
   * List every load balancer in the region.
   */
  listLoadBalancers(): Promise<LoadBalancerInfo[]>;

  /**
   * Get the tags of a load balancer.
   *
   * @param loadBalancerArn - Load balancer ARN
   * @returns Tags as a key/value map, or null if the load balancer no longer exists
   */
  getTags(loadBalancerArn: string): Promise<Record<string, string> | null>;

  /**
   * @returns The listeners, or null if the load balancer does not exist
   */
  listListeners(loadBalancerArn: string): Promise<ListenerInfo[] | null>;

  /**
   * @returns The listener, or null if it does not exist
   */
  getListener(listenerArn: string): Promise<ListenerInfo | null>;

  listRules(listenerArn: string): Promise<ListenerRule[]>;

  createRule(request: CreateRuleRequest): Promise<ListenerRule>;

  deleteRule(ruleArn: string): Promise<void>;

  /**
   * Replace the default actions of a listener.
   */
  setDefaultActions(listenerArn: string, actions: ListenerAction[]): Promise<void>;

  /**
   * @returns Target groups attached to the load balancer (empty if none)
   */
  listTargetGroups(loadBalancerArn: string): Promise<TargetGroupInfo[]>;
}
