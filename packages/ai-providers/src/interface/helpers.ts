import {
  GenerationError,
  GenerationTimeoutError,
  isCompleted,
  isFailed,
  type ErrorHandler,
  type GenerationConfig,
  type GenerationResult,
  type JobStatus,
} from "@clipmesh/core";
import type { ConfigCheck, ModelConfig, ModelInfo, VideoAdapter, WaitOptions } from "./types.js";

/** Progress reported for a status when the backend gives no figure */
export const PROGRESS_BY_STATUS: Readonly<Record<JobStatus, number>> = {
  pending: 0,
  queued: 0.1,
  processing: 0.5,
  completed: 1,
  failed: 0,
  cancelled: 0,
};

export const DEFAULT_POLL_INTERVAL_MS = 5000;

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Backend-reported progress (0-100) as a fraction, else the table value.
 * `processing` may be overridden for backends whose jobs spend longer there.
 */
export function progressFor(status: JobStatus, reported?: number, processing = PROGRESS_BY_STATUS.processing): number {
  if (reported !== undefined && Number.isFinite(reported)) {
    return Math.min(Math.max(reported / 100, 0), 1);
  }
  return status === "processing" ? processing : PROGRESS_BY_STATUS[status];
}

type AdapterLimits = Pick<VideoAdapter, "name" | "supportedAspectRatios" | "supportedQualities" | "maxDuration">;

/**
 * Generic request bounds, then the adapter's aspect ratios, qualities and
 * maximum duration, in that order.
 */
export function validateAdapterConfig(adapter: AdapterLimits, config: GenerationConfig): ConfigCheck {
  if (!config.validate()) {
    return { valid: false, reason: "Basic configuration validation failed" };
  }
  if (!adapter.supportedAspectRatios.includes(config.aspectRatio)) {
    return { valid: false, reason: `Aspect ratio '${config.aspectRatio}' not supported by ${adapter.name}` };
  }
  if (!adapter.supportedQualities.includes(config.quality)) {
    return { valid: false, reason: `Quality '${config.quality}' not supported by ${adapter.name}` };
  }
  if (config.duration > adapter.maxDuration) {
    return {
      valid: false,
      reason: `Duration ${config.duration}s exceeds maximum ${adapter.maxDuration}s for ${adapter.name}`,
    };
  }
  return { valid: true };
}

export interface PollDeps {
  sleep?: Sleep;
  now?: () => number;
}

/**
 * Poll `getStatus` until the job completes, fails or the deadline passes.
 */
export async function pollUntilDone(
  adapter: Pick<VideoAdapter, "getStatus">,
  jobId: string,
  options: WaitOptions = {},
  deps: PollDeps = {}
): Promise<GenerationResult> {
  const sleep = deps.sleep ?? defaultSleep;
  const now = deps.now ?? Date.now;
  const pollInterval = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const startedAt = now();

  for (;;) {
    const result = await adapter.getStatus(jobId);

    if (isCompleted(result)) return result;
    if (isFailed(result)) {
      throw new GenerationError(`Generation job ${jobId} failed: ${result.errorMessage ?? "Generation failed"}`, 0, {
        details: { jobId },
      });
    }
    if (options.timeoutMs !== undefined && now() - startedAt > options.timeoutMs) {
      throw new GenerationTimeoutError(`Generation job ${jobId} timed out after ${options.timeoutMs / 1000}s`, {
        details: { jobId },
      });
    }

    await sleep(pollInterval);
  }
}

export function describeAdapter(adapter: VideoAdapter, config: ModelConfig): ModelInfo {
  return {
    name: adapter.name,
    enabled: adapter.enabled,
    capabilities: [...adapter.capabilities],
    supportedAspectRatios: [...adapter.supportedAspectRatios],
    supportedQualities: [...adapter.supportedQualities],
    maxDuration: adapter.maxDuration,
    config: {
      timeout: config.timeout,
      maxRetries: config.maxRetries,
      rateLimit: config.rateLimit,
    },
  };
}

/**
 * Hand an adapter failure to the error handler as a `model-adapter` error and
 * wait for any automatic recovery it starts.
 */
export async function reportAdapterError(
  handler: ErrorHandler | undefined,
  error: unknown,
  modelName: string,
  context: Record<string, unknown> = {}
): Promise<void> {
  if (!handler) return;
  const { autoRecovery } = handler.handleError(error, "model-adapter", { modelName, ...context });
  if (autoRecovery) await autoRecovery;
}
