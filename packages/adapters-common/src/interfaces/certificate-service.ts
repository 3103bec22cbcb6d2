/**
 * Interface for reading TLS certificates.
 */
export interface ICertificateService {
  /**
   * Get the primary domain name of a certificate.
   *
   * @param certificateArn - Certificate ARN
   * @returns The domain name, or null if the certificate does not exist
   */
  getDomainName(certificateArn: string): Promise<string | null>;
}
