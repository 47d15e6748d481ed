/**
 * Configuration schema for clipmesh
 * Stored at ~/.clipmesh/config.yaml
 */

import type { LogLevel } from "@clipmesh/core";
import type { LoadBalancingStrategy } from "../engine/load-balancer.js";

export const MODEL_NAMES = ["luma", "runway", "pika"] as const;

export type ModelName = (typeof MODEL_NAMES)[number];

export function isModelName(value: unknown): value is ModelName {
  return typeof value === "string" && (MODEL_NAMES as readonly string[]).includes(value);
}

/** One backend's settings as written in the file */
export interface ModelSettings {
  apiKey?: string;
  baseUrl?: string;
  /** Per-request timeout in seconds */
  timeout: number;
  maxRetries: number;
  /** Requests per minute, informational */
  rateLimit?: number;
  enabled: boolean;
  parameters?: Record<string, unknown>;
}

export interface ClipmeshConfig {
  /** Config file version */
  version: string;

  /** Threshold for log lines written to stderr */
  logLevel: LogLevel;

  /** Backend settings */
  models: Record<ModelName, ModelSettings>;

  workflow: {
    /** Default batch concurrency */
    maxConcurrentTasks: number;
  };

  engine: {
    loadBalancing: LoadBalancingStrategy;
    /** Fallback attempts on other models after a failure */
    maxRetries: number;
    fallbackDelayMs: number;
  };
}

/** Model display names */
export const MODEL_DISPLAY_NAMES: Record<ModelName, string> = {
  luma: "Luma Dream Machine",
  runway: "Runway Gen-2",
  pika: "Pika Labs",
};

/** Environment variable mappings */
export const MODEL_ENV_VARS: Record<ModelName, string> = {
  luma: "LUMA_API_KEY",
  runway: "RUNWAY_API_KEY",
  pika: "PIKA_API_KEY",
};

const defaultModel = (): ModelSettings => ({
  timeout: 300,
  maxRetries: 3,
  enabled: false,
});

/** Default configuration; models stay disabled until they have a key */
export function createDefaultConfig(): ClipmeshConfig {
  return {
    version: "1.0.0",
    logLevel: "warn",
    models: {
      luma: defaultModel(),
      runway: defaultModel(),
      pika: defaultModel(),
    },
    workflow: {
      maxConcurrentTasks: 5,
    },
    engine: {
      loadBalancing: "least-loaded",
      maxRetries: 3,
      fallbackDelayMs: 1000,
    },
  };
}
