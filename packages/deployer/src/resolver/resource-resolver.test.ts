import { describe, it, expect, beforeEach } from "vitest";
import {
  LB_ARN,
  TG_ARN,
  createFakePlatform,
  seedEnvironment,
  type FakePlatform,
} from "../__tests__/fake-platform";
import { createLogCollector } from "../__tests__/fixtures";
import { ResourceResolver } from "./resource-resolver";

describe("ResourceResolver", () => {
  let platform: FakePlatform;
  let logs: ReturnType<typeof createLogCollector>;
  let resolver: ResourceResolver;

  beforeEach(() => {
    platform = createFakePlatform();
    logs = createLogCollector();
    resolver = new ResourceResolver(platform.environments, platform.loadBalancers, logs.log);
  });

  describe("findLoadBalancer", () => {
    it("finds the application load balancer by environment tag", async () => {
      platform.environments.addEnvironment("demo-env");
      platform.loadBalancers.addLoadBalancer("arn:lb/other", "other-env");
      platform.loadBalancers.addLoadBalancer("arn:lb/network", "demo-env", "network");
      platform.loadBalancers.addLoadBalancer(LB_ARN, "demo-env", "Application");

      const lb = await resolver.findLoadBalancer("demo-env");

      expect(lb?.arn).toBe(LB_ARN);
    });

    it("returns null when the environment does not exist", async () => {
      platform.loadBalancers.addLoadBalancer(LB_ARN, "demo-env");

      expect(await resolver.findLoadBalancer("demo-env")).toBeNull();
      expect(logs.lines).toEqual(["Environment demo-env not found"]);
    });

    it("returns null when no load balancer is tagged", async () => {
      platform.environments.addEnvironment("demo-env");

      expect(await resolver.findLoadBalancer("demo-env")).toBeNull();
      expect(logs.lines).toEqual(["No load balancer tagged for demo-env"]);
    });
  });

  describe("findListeners", () => {
    it("returns listeners by port", async () => {
      const { https, http } = seedEnvironment(platform, "demo-env");

      const listeners = await resolver.findListeners(LB_ARN);

      expect(listeners?.https?.arn).toBe(https.arn);
      expect(listeners?.http?.arn).toBe(http?.arn);
    });

    it("reports a missing HTTP listener as null", async () => {
      seedEnvironment(platform, "demo-env", { http: false });

      expect((await resolver.findListeners(LB_ARN))?.http).toBeNull();
    });

    it("returns null when the load balancer is gone", async () => {
      expect(await resolver.findListeners(LB_ARN)).toBeNull();
    });
  });

  describe("findTargetGroup", () => {
    it("returns the first target group of the listener's load balancer", async () => {
      const { https } = seedEnvironment(platform, "demo-env");
      platform.loadBalancers.addTargetGroup(LB_ARN, "tg-second");

      expect((await resolver.findTargetGroup(https))?.arn).toBe(TG_ARN);
    });
  });
});
