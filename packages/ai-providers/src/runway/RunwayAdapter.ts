import {
  BackendError,
  InvalidConfigError,
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
import { asObject, readNumber, readString, type JsonObject } from "../http/json.js";
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

const DEFAULT_BASE_URL = "https://api.runwayml.com/v1";
const API_VERSION = "2024-09-13";
const ESTIMATED_DURATION_MS = 2 * 60 * 1000;

const STATUS_MAP: Record<string, JobStatus> = {
  PENDING: "pending",
  THROTTLED: "queued",
  RUNNING: "processing",
  SUCCEEDED: "completed",
  FAILED: "failed",
  CANCELLED: "cancelled",
};

/** Output resolution per aspect ratio */
const RESOLUTIONS: Record<string, string> = {
  "16:9": "1920:1080",
  "9:16": "1080:1920",
  "1:1": "1080:1080",
  "4:3": "1440:1080",
  "3:4": "1080:1440",
};

const CAMERA_MOTION: Record<string, Record<string, number>> = {
  zoom_in: { zoom: 1.2 },
  zoom_out: { zoom: 0.8 },
  pan_left: { pan: -0.3 },
  pan_right: { pan: 0.3 },
  tilt_up: { tilt: 0.3 },
  tilt_down: { tilt: -0.3 },
};

export interface RunwayAccountInfo {
  creditsRemaining: number;
  creditsUsed: number;
  plan: string;
  usageLimit: number;
}

export function mapRunwayStatus(status: string | undefined): JobStatus {
  return STATUS_MAP[(status ?? "PENDING").toUpperCase()] ?? "pending";
}

export function buildRunwayParams(config: GenerationConfig, maxDuration: number): JsonObject {
  const params: JsonObject = {
    model: "gen2",
    promptText: config.prompt,
  };
  if (config.referenceImage) {
    params.init_image = config.referenceImage;
  }
  // Runway scores motion 0-10
  params.motion_score = Math.floor(config.motionStrength * 10);
  params.duration = Math.min(config.duration, maxDuration);
  params.resolution = RESOLUTIONS[config.aspectRatio] ?? "1920:1080";

  if (config.quality === "4k") {
    params.upscale = true;
  }

  const motion = config.cameraMovement ? CAMERA_MOTION[config.cameraMovement] : undefined;
  if (motion) {
    params.camera_motion = { ...motion };
  }
  if (config.seed) {
    params.seed = config.seed;
  }
  if (config.style) {
    params.style = config.style;
  }

  return { ...params, ...config.customParameters };
}

function failureReason(failure: unknown): string | undefined {
  if (typeof failure === "string" && failure !== "") return failure;
  return readString(asObject(failure), "reason");
}

/**
 * Runway ML (Gen-2): text- and image-to-video with camera and motion control.
 */
export class RunwayAdapter implements VideoAdapter {
  readonly name: string;
  readonly capabilities: readonly ModelCapability[] = [
    "image-to-video",
    "text-to-video",
    "video-extend",
    "style-transfer",
    "camera-control",
    "motion-control",
  ];
  readonly supportedAspectRatios: readonly string[] = ["16:9", "9:16", "1:1", "4:3", "3:4"];
  readonly supportedQualities: readonly string[] = ["720p", "1080p", "4k"];
  readonly maxDuration = 18;

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
      const data = await this.getSession().request(
        "POST",
        "/image-to-video",
        buildRunwayParams(config, this.maxDuration)
      );
      const jobId = readString(data, "id");
      if (!jobId) {
        throw new BackendError("No job ID returned from Runway API");
      }

      this.logger.modelCall(this.name, "generate", { durationMs: this.now() - startedAt, success: true });
      return {
        jobId,
        status: mapRunwayStatus(readString(data, "status")),
        progress: 0,
        estimatedCompletion: new Date(this.now() + ESTIMATED_DURATION_MS),
        metadata: {
          model: "runway-gen2",
          created_at: data.createdAt,
          aspect_ratio: config.aspectRatio,
          duration: config.duration,
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
      const data = await this.getSession().request("GET", `/tasks/${encodeURIComponent(jobId)}`);
      const status = mapRunwayStatus(readString(data, "status"));
      const result: GenerationResult = {
        jobId,
        status,
        progress: progressFor(status, readNumber(data, "progress")),
        metadata: {
          model: "runway-gen2",
          status: data.status,
          created_at: data.createdAt,
          updated_at: data.updatedAt,
          progress_detail: data.progressText,
        },
      };

      if (status === "completed") {
        const output = data.output;
        const first: unknown = Array.isArray(output) ? output[0] : output;
        result.videoUrl = typeof first === "string" && first !== "" ? first : undefined;
        result.thumbnailUrl = readString(data, "thumbnailUrl");
      } else if (status === "failed") {
        result.errorMessage = failureReason(data.failure) ?? "Generation failed";
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

    try {
      await this.getSession().request("POST", `/tasks/${encodeURIComponent(jobId)}/cancel`);
      return true;
    } catch (error) {
      await reportAdapterError(this.errorHandler, error, this.name, { jobId, operation: "cancel_job" });
      return false;
    }
  }

  /**
   * Credit balance and plan of the account behind the API key; an empty
   * object when the request fails.
   */
  async getAccountInfo(): Promise<Partial<RunwayAccountInfo>> {
    try {
      const data = await this.getSession().request("GET", "/account");
      return {
        creditsRemaining: readNumber(data, "creditsRemaining") ?? 0,
        creditsUsed: readNumber(data, "creditsUsed") ?? 0,
        plan: readString(data, "plan") ?? "unknown",
        usageLimit: readNumber(data, "usageLimit") ?? 0,
      };
    } catch (error) {
      await reportAdapterError(this.errorHandler, error, this.name, { operation: "get_account_info" });
      return {};
    }
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
          "X-Runway-Version": API_VERSION,
        },
        timeoutSeconds: this.config.timeout,
        maxRetries: this.config.maxRetries,
        honorRetryAfter: true,
        fetch: this.options.fetch,
        sleep: this.options.sleep,
        logger: this.logger,
      });
    }
    return this.session;
  }
}
