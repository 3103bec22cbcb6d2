/**
 * Shared types for the deployer managers.
 */

/** Receives one human-readable progress line */
export type LogCallback = (line: string) => void;

export type StepStatus = "pending" | "in_progress" | "complete" | "error";

export type ProgressCallback = (step: string, status: StepStatus, message?: string) => void;

/** Resolves after `ms`, or rejects when `signal` aborts */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Supplies the OIDC client secret on demand. Only called when a rule is
 * actually about to be written.
 */
export type ClientSecretProvider = () => Promise<string>;
