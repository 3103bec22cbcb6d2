/**
 * Constants module for @ebshield/core.
 *
 * Re-exports all constants from sub-modules for convenient access.
 */

export * from "./defaults";
export * from "./environment-variables";
