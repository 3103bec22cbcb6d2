import { describe, it, expect, vi } from "vitest";
import { type ACMClient, DescribeCertificateCommand } from "@aws-sdk/client-acm";
import { CertificateService } from "./certificate-service";

describe("CertificateService", () => {
  it("returns the certificate domain name", async () => {
    const send = vi.fn((cmd: unknown): Promise<unknown> => {
      if (cmd instanceof DescribeCertificateCommand) {
        return Promise.resolve({ Certificate: { DomainName: "*.example.test" } });
      }
      return Promise.resolve({});
    });
    const service = new CertificateService({ send } as unknown as ACMClient);

    await expect(service.getDomainName("arn:cert")).resolves.toBe("*.example.test");
  });

  it("returns null for an unknown certificate", async () => {
    const send = vi.fn().mockRejectedValue(
      Object.assign(new Error("no cert"), { name: "ResourceNotFoundException" })
    );
    const service = new CertificateService({ send } as unknown as ACMClient);

    await expect(service.getDomainName("arn:missing")).resolves.toBeNull();
  });
});
