export * from "./environment";
export * from "./loadbalancer";
export * from "./identity";
