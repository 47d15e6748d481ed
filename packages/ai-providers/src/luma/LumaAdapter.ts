import {
  BackendError,
  InvalidConfigError,
  UnsupportedOperationError,
  createLogger,
  errorMessage,
  isTerminal,
  type ErrorHandler,
  type GenerationConfig,
  type GenerationResult,
  type JobStatus,
  type Logger,
  type ModelCapability,
} from "@clipmesh/core";
import { HttpSession } from "../http/session.js";
import { asObject, readString, type JsonObject } from "../http/json.js";
import {
  describeAdapter,
  pollUntilDone,
  progressFor,
  reportAdapterError,
  validateAdapterConfig,
} from "../interface/helpers.js";
import type {
  AdapterOptions,
  ConfigCheck,
  ModelConfig,
  ModelInfo,
  VideoAdapter,
  WaitOptions,
} from "../interface/types.js";

const DEFAULT_BASE_URL = "https://api.lumalabs.ai/dream-machine/v1";

/** Luma jobs usually take two to five minutes */
const ESTIMATED_DURATION_MS = 3 * 60 * 1000;

const STATUS_MAP: Record<string, JobStatus> = {
  pending: "pending",
  queued: "queued",
  dreaming: "processing",
  completed: "completed",
  failed: "failed",
  cancelled: "cancelled",
};

/** Luma takes camera direction as words in the prompt */
const CAMERA_PHRASES: Record<string, string> = {
  zoom_in: "zoom in",
  zoom_out: "zoom out",
  pan_left: "pan left",
  pan_right: "pan right",
  tilt_up: "tilt up",
  tilt_down: "tilt down",
  orbit_left: "orbit left",
  orbit_right: "orbit right",
};

export function mapLumaStatus(state: string | undefined): JobStatus {
  return STATUS_MAP[(state ?? "pending").toLowerCase()] ?? "pending";
}

export function buildLumaParams(config: GenerationConfig): JsonObject {
  const params: JsonObject = {
    prompt: config.prompt,
    aspect_ratio: config.aspectRatio,
    loop: false,
  };

  if (config.referenceImage) {
    params.keyframes = {
      frame0: { type: "image", url: config.referenceImage },
    };
  }

  const phrase = config.cameraMovement ? CAMERA_PHRASES[config.cameraMovement] : undefined;
  if (phrase) {
    params.prompt = `${config.prompt}, ${phrase}`;
  }

  return { ...params, ...config.customParameters };
}

/**
 * Luma Dream Machine: short image- or text-to-video clips with camera control.
 *
 * The API has no cancel endpoint, so {@link cancelJob} can only report jobs
 * that already finished.
 */
export class LumaAdapter implements VideoAdapter {
  readonly name: string;
  readonly capabilities: readonly ModelCapability[] = [
    "image-to-video",
    "text-to-video",
    "camera-control",
    "motion-control",
  ];
  readonly supportedAspectRatios: readonly string[] = ["16:9", "9:16", "1:1"];
  readonly supportedQualities: readonly string[] = ["720p", "1080p"];
  readonly maxDuration = 5;

  private readonly config: ModelConfig;
  private readonly options: AdapterOptions;
  private readonly logger: Logger;
  private readonly errorHandler?: ErrorHandler;
  private readonly now: () => number;
  private session?: HttpSession;

  constructor(config: ModelConfig, options: AdapterOptions = {}) {
    this.config = config;
    this.name = config.name;
    this.options = options;
    this.logger = options.logger ?? createLogger(config.name);
    this.errorHandler = options.errorHandler;
    this.now = options.now ?? Date.now;
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  validateConfig(config: GenerationConfig): ConfigCheck {
    return validateAdapterConfig(this, config);
  }

  async generate(config: GenerationConfig): Promise<GenerationResult> {
    const check = this.validateConfig(config);
    if (!check.valid) {
      throw new InvalidConfigError(`Invalid configuration: ${check.reason}`, { details: { model: this.name } });
    }

    const startedAt = this.now();
    try {
      const data = await this.getSession().request("POST", "/generations", buildLumaParams(config));
      const jobId = readString(data, "id");
      if (!jobId) {
        throw new BackendError("No job ID returned from Luma API");
      }

      this.logger.modelCall(this.name, "generate", { durationMs: this.now() - startedAt, success: true });
      return {
        jobId,
        status: mapLumaStatus(readString(data, "state")),
        progress: 0,
        estimatedCompletion: new Date(this.now() + ESTIMATED_DURATION_MS),
        metadata: {
          model: "luma-dream-machine",
          created_at: data.created_at,
          aspect_ratio: config.aspectRatio,
          prompt: config.prompt,
        },
      };
    } catch (error) {
      this.logger.modelCall(this.name, "generate", {
        durationMs: this.now() - startedAt,
        success: false,
        error: errorMessage(error),
      });
      await reportAdapterError(this.errorHandler, error, this.name, { config: config.toJSON() });
      throw error;
    }
  }

  async getStatus(jobId: string): Promise<GenerationResult> {
    try {
      const data = await this.getSession().request("GET", `/generations/${encodeURIComponent(jobId)}`);
      const status = mapLumaStatus(readString(data, "state"));
      const result: GenerationResult = {
        jobId,
        status,
        progress: progressFor(status),
        metadata: {
          model: "luma-dream-machine",
          state: data.state,
          created_at: data.created_at,
          updated_at: data.updated_at,
        },
      };

      if (status === "completed") {
        const assets = asObject(data.assets);
        result.videoUrl = readString(assets, "video");
        result.thumbnailUrl = readString(assets, "thumbnail");
      } else if (status === "failed") {
        result.errorMessage = readString(data, "failure_reason") ?? "Generation failed";
      }
      return result;
    } catch (error) {
      await reportAdapterError(this.errorHandler, error, this.name, { jobId });
      throw error;
    }
  }

  async cancelJob(jobId: string): Promise<boolean> {
    let status: JobStatus;
    try {
      status = (await this.getStatus(jobId)).status;
    } catch (error) {
      this.logger.warn("Could not check job before cancelling", { jobId, error: errorMessage(error) });
      return false;
    }

    if (isTerminal(status)) return false;
    throw new UnsupportedOperationError("Luma Dream Machine does not support cancelling jobs", {
      details: { model: this.name, jobId },
    });
  }

  waitForCompletion(jobId: string, options?: WaitOptions): Promise<GenerationResult> {
    return pollUntilDone(this, jobId, options, { sleep: this.options.sleep, now: this.now });
  }

  getModelInfo(): ModelInfo {
    return describeAdapter(this, this.config);
  }

  async close(): Promise<void> {
    if (this.session) {
      await this.session.close();
      this.session = undefined;
    }
  }

  private getSession(): HttpSession {
    if (!this.session || this.session.closed) {
      this.session = new HttpSession({
        baseUrl: this.config.baseUrl ?? DEFAULT_BASE_URL,
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          "Content-Type": "application/json",
          "User-Agent": "clipmesh/0.1",
        },
        timeoutSeconds: this.config.timeout,
        maxRetries: this.config.maxRetries,
        fetch: this.options.fetch,
        sleep: this.options.sleep,
        logger: this.logger,
      });
    }
    return this.session;
  }
}
