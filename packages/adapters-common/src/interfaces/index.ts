export type { IEnvironmentService } from "./environment-service";
export type { ILoadBalancerService } from "./loadbalancer-service";
export type { ICertificateService } from "./certificate-service";
export type { IIdentityService } from "./identity-service";
export type { IObjectStorageService } from "./object-storage-service";
