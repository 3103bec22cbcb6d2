import { describe, it, expect, beforeEach, vi, type Mock } from "vitest";
import {
  type IAMClient,
  GetRoleCommand,
  CreateRoleCommand,
  ListAttachedRolePoliciesCommand,
  GetInstanceProfileCommand,
} from "@aws-sdk/client-iam";
import { RemoteOperationError } from "@ebshield/core";
import { IAMService } from "./iam-service";

function noSuchEntity(): Error {
  return Object.assign(new Error("The role cannot be found"), { name: "NoSuchEntityException" });
}

describe("IAMService", () => {
  let mockSend: Mock;
  let service: IAMService;

  beforeEach(() => {
    mockSend = vi.fn();
    service = new IAMService({ send: mockSend } as unknown as IAMClient);
  });

  describe("getRole", () => {
    it("maps an existing role", async () => {
      mockSend.mockImplementation((cmd: unknown): Promise<unknown> => {
        if (cmd instanceof GetRoleCommand) {
          return Promise.resolve({
            Role: { RoleName: "demo-eb-role", Arn: "arn:aws:iam::123456789012:role/demo-eb-role", RoleId: "AROA1" },
          });
        }
        return Promise.resolve({});
      });

      await expect(service.getRole("demo-eb-role")).resolves.toEqual({
        roleName: "demo-eb-role",
        arn: "arn:aws:iam::123456789012:role/demo-eb-role",
        roleId: "AROA1",
      });
    });

    it("returns null for NoSuchEntity", async () => {
      mockSend.mockRejectedValue(noSuchEntity());

      await expect(service.getRole("missing")).resolves.toBeNull();
    });

    it("rethrows other failures as remote errors", async () => {
      mockSend.mockRejectedValue(Object.assign(new Error("slow down"), { name: "Throttling" }));

      await expect(service.getRole("demo-eb-role")).rejects.toBeInstanceOf(RemoteOperationError);
    });
  });

  it("creates a role with the trust document and tags", async () => {
    mockSend.mockImplementation((cmd: unknown): Promise<unknown> => {
      if (cmd instanceof CreateRoleCommand) {
        return Promise.resolve({ Role: { RoleName: "demo-eb-role", Arn: "arn:role" } });
      }
      return Promise.resolve({});
    });

    await service.createRole("demo-eb-role", '{"Version":"2012-10-17"}', {
      description: "Service role",
      tags: { app: "demo" },
    });

    const command: CreateRoleCommand = mockSend.mock.calls[0][0];
    expect(command.input.AssumeRolePolicyDocument).toBe('{"Version":"2012-10-17"}');
    expect(command.input.Tags).toEqual([{ Key: "app", Value: "demo" }]);
  });

  it("pages through attached policies", async () => {
    mockSend.mockImplementation((cmd: unknown): Promise<unknown> => {
      if (cmd instanceof ListAttachedRolePoliciesCommand) {
        return Promise.resolve(
          cmd.input.Marker
            ? { AttachedPolicies: [{ PolicyArn: "arn:policy/b" }], IsTruncated: false }
            : { AttachedPolicies: [{ PolicyArn: "arn:policy/a" }], IsTruncated: true, Marker: "m1" }
        );
      }
      return Promise.resolve({});
    });

    await expect(service.listAttachedPolicyArns("demo-eb-role")).resolves.toEqual([
      "arn:policy/a",
      "arn:policy/b",
    ]);
  });

  it("lists the roles of an instance profile", async () => {
    mockSend.mockImplementation((cmd: unknown): Promise<unknown> => {
      if (cmd instanceof GetInstanceProfileCommand) {
        return Promise.resolve({
          InstanceProfile: {
            InstanceProfileName: "demo-ec2-profile",
            Arn: "arn:profile",
            Roles: [{ RoleName: "old-role" }],
          },
        });
      }
      return Promise.resolve({});
    });

    await expect(service.getInstanceProfile("demo-ec2-profile")).resolves.toEqual({
      instanceProfileName: "demo-ec2-profile",
      arn: "arn:profile",
      roleNames: ["old-role"],
    });
  });
});
