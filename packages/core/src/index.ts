export * from "./errors";
export * from "./config";
export * from "./config-loader";
export * from "./environment";
export * from "./version";
export * from "./constants";

export const EBSHIELD_VERSION = "0.1.0";
