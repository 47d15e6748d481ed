/**
 * @module interface/types
 * @description The contract every video backend adapter implements, and the
 * per-model configuration adapters are built from.
 *
 * Adapters are independent classes implementing {@link VideoAdapter}; shared
 * behaviour lives in the free functions of `./helpers.ts` rather than in a
 * base class.
 */

import type { ErrorHandler, GenerationConfig, GenerationResult, Logger, ModelCapability } from "@clipmesh/core";
import type { FetchLike } from "../http/session.js";
import type { Sleep } from "./helpers.js";

/**
 * Connection settings for one backend.
 */
export interface ModelConfig {
  /** Registry name, e.g. `luma` */
  name: string;
  apiKey: string;
  /** Overrides the backend's default API root */
  baseUrl?: string;
  /** Per-request timeout in seconds (default 300) */
  timeout: number;
  /** Retries for rate-limited or failed transport calls (default 3) */
  maxRetries: number;
  /** Requests per minute the account allows; informational */
  rateLimit?: number;
  enabled: boolean;
  /** Backend-specific defaults */
  parameters: Record<string, unknown>;
}

export type ModelConfigInit = Pick<ModelConfig, "name" | "apiKey"> & Partial<Omit<ModelConfig, "name" | "apiKey">>;

export function createModelConfig(init: ModelConfigInit): ModelConfig {
  return {
    name: init.name,
    apiKey: init.apiKey,
    baseUrl: init.baseUrl,
    timeout: init.timeout ?? 300,
    maxRetries: init.maxRetries ?? 3,
    rateLimit: init.rateLimit,
    enabled: init.enabled ?? true,
    parameters: { ...(init.parameters ?? {}) },
  };
}

/** First rule the model configuration breaks, or `undefined` */
export function validateModelConfig(config: ModelConfig): string | undefined {
  if (config.name.trim() === "") return "Model name is required";
  if (config.enabled && config.apiKey.trim() === "") return `API key is required for enabled model '${config.name}'`;
  if (!(config.timeout > 0)) return "Timeout must be positive";
  if (!(Number.isInteger(config.maxRetries) && config.maxRetries >= 0)) return "Max retries must be a non-negative integer";
  return undefined;
}

/**
 * Collaborators an adapter takes besides its {@link ModelConfig}.
 */
export interface AdapterOptions {
  /** Replaces the global `fetch` */
  fetch?: FetchLike;
  /** Used for retry backoff and status polling */
  sleep?: Sleep;
  /** Clock in milliseconds, for estimated completion and wait deadlines */
  now?: () => number;
  /** Receives adapter failures as `model-adapter` errors */
  errorHandler?: ErrorHandler;
  logger?: Logger;
}

/** Outcome of checking a request against one adapter's limits */
export type ConfigCheck = { valid: true } | { valid: false; reason: string };

export interface WaitOptions {
  /** Give up after this many milliseconds; waits forever when omitted */
  timeoutMs?: number;
  /** Delay between status polls (default 5000) */
  pollIntervalMs?: number;
}

/**
 * Static description of an adapter, for listings and diagnostics.
 */
export interface ModelInfo {
  name: string;
  enabled: boolean;
  capabilities: ModelCapability[];
  supportedAspectRatios: string[];
  supportedQualities: string[];
  maxDuration: number;
  config: {
    timeout: number;
    maxRetries: number;
    rateLimit?: number;
  };
}

/**
 * Uniform surface over one video generation backend.
 *
 * The capability fields are fixed for the life of the instance.
 */
export interface VideoAdapter {
  readonly name: string;
  readonly enabled: boolean;
  readonly capabilities: readonly ModelCapability[];
  readonly supportedAspectRatios: readonly string[];
  readonly supportedQualities: readonly string[];
  /** Longest clip the backend produces, in seconds */
  readonly maxDuration: number;

  /**
   * Start a generation job.
   * @throws InvalidConfigError when the request fails {@link validateConfig}.
   */
  generate(config: GenerationConfig): Promise<GenerationResult>;

  /**
   * Fetch the current state of a job.
   * @throws JobNotFoundError when the backend does not know the id.
   */
  getStatus(jobId: string): Promise<GenerationResult>;

  /**
   * Cancel a running job. Resolves `false` when the job already finished or
   * the backend refused.
   * @throws UnsupportedOperationError when the backend cannot cancel at all.
   */
  cancelJob(jobId: string): Promise<boolean>;

  /** Check a request against the generic and backend limits; no network */
  validateConfig(config: GenerationConfig): ConfigCheck;

  /**
   * Poll {@link getStatus} until the job completes.
   * @throws GenerationError when the job fails.
   * @throws GenerationTimeoutError when `timeoutMs` elapses first.
   */
  waitForCompletion(jobId: string, options?: WaitOptions): Promise<GenerationResult>;

  getModelInfo(): ModelInfo;

  /** Release the network session; the next call opens a new one */
  close(): Promise<void>;
}
