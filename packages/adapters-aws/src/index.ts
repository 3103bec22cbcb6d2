// Elastic Beanstalk
export { ElasticBeanstalkService } from "./elastic-beanstalk/elastic-beanstalk-service";

// Elastic Load Balancing v2
export { LoadBalancerService, fromSdkAction, toSdkAction } from "./elbv2/load-balancer-service";

// ACM
export { CertificateService } from "./acm/certificate-service";

// IAM
export { IAMService } from "./iam/iam-service";

// S3
export { S3StorageService } from "./s3/s3-service";

// Errors
export { AwsErrorHandler, callAws, findAws } from "./errors";
export type { ClassifiedError } from "./errors";

export interface AWSConfig {
  region: string;
}
