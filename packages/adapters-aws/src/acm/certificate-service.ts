import { ACMClient, DescribeCertificateCommand } from "@aws-sdk/client-acm";
import type { ICertificateService } from "@ebshield/adapters-common";
import { findAws } from "../errors";

export class CertificateService implements ICertificateService {
  constructor(private readonly client: ACMClient) {}

  async getDomainName(certificateArn: string): Promise<string | null> {
    return findAws("DescribeCertificate", async () => {
      const result = await this.client.send(
        new DescribeCertificateCommand({ CertificateArn: certificateArn })
      );
      return result.Certificate?.DomainName ?? null;
    });
  }
}
