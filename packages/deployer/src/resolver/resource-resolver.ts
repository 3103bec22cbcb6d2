/**
 * Resource Resolver
 *
 * Read-only lookups of the remote resources that belong to an environment.
 * A missing resource is a null result; any failed lookup propagates.
 *
 * The load balancer is found through the environment-name tag the platform
 * puts on it, never through a stored ARN: the tag is the only link that
 * survives an environment update.
 */

import type {
  EnvironmentInfo,
  IEnvironmentService,
  ILoadBalancerService,
  ListenerInfo,
  LoadBalancerInfo,
  TargetGroupInfo,
} from "@ebshield/adapters-common";
import { ENVIRONMENT_NAME_TAG, HTTP_PORT, HTTPS_PORT } from "@ebshield/core";
import type { LogCallback } from "../types";

export interface EnvironmentListeners {
  https: ListenerInfo | null;
  http: ListenerInfo | null;
}

export class ResourceResolver {
  constructor(
    private readonly environments: IEnvironmentService,
    private readonly loadBalancers: ILoadBalancerService,
    private readonly log: LogCallback
  ) {}

  async findEnvironment(environmentName: string): Promise<EnvironmentInfo | null> {
    return this.environments.findEnvironment(environmentName);
  }

  /**
   * Find the application load balancer tagged with the environment name.
   *
   * @returns null if the environment or its load balancer does not exist
   */
  async findLoadBalancer(environmentName: string): Promise<LoadBalancerInfo | null> {
    const environment = await this.findEnvironment(environmentName);
    if (!environment) {
      this.log(`Environment ${environmentName} not found`);
      return null;
    }

    const candidates = (await this.loadBalancers.listLoadBalancers()).filter(
      (lb) => lb.type.toLowerCase() === "application"
    );

    for (const lb of candidates) {
      const tags = await this.loadBalancers.getTags(lb.arn);
      if (tags?.[ENVIRONMENT_NAME_TAG] === environmentName) {
        return lb;
      }
    }

    this.log(`No load balancer tagged for ${environmentName}`);
    return null;
  }

  /**
   * @returns HTTPS (443) and HTTP (80) listeners, or null if the load balancer is gone
   */
  async findListeners(loadBalancerArn: string): Promise<EnvironmentListeners | null> {
    const listeners = await this.loadBalancers.listListeners(loadBalancerArn);
    if (!listeners) {
      return null;
    }

    return {
      https: listeners.find((listener) => listener.port === HTTPS_PORT) ?? null,
      http: listeners.find((listener) => listener.port === HTTP_PORT) ?? null,
    };
  }

  /**
   * The target group traffic on a listener's load balancer is forwarded to.
   */
  async findTargetGroup(listener: ListenerInfo): Promise<TargetGroupInfo | null> {
    const groups = await this.loadBalancers.listTargetGroups(listener.loadBalancerArn);
    return groups[0] ?? null;
  }
}
