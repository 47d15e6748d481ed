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
import { asObject, isJsonObject, readNumber, readString, type JsonObject } from "../http/json.js";
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

const DEFAULT_BASE_URL = "https://api.pika.art/v1";
const ESTIMATED_DURATION_MS = 90 * 1000;

/** Pika jobs sit in `generating` for most of their run */
const PROCESSING_PROGRESS = 0.6;

const STATUS_MAP: Record<string, JobStatus> = {
  pending: "pending",
  queued: "queued",
  generating: "processing",
  completed: "completed",
  failed: "failed",
  error: "failed",
  cancelled: "cancelled",
};

const STYLES: Record<string, string> = {
  anime: "anime",
  realistic: "photorealistic",
  cartoon: "cartoon",
  artistic: "artistic",
  cinematic: "cinematic",
  vintage: "vintage",
  cyberpunk: "cyberpunk",
  fantasy: "fantasy",
};

const CAMERA_EFFECTS: Record<string, { camera: string; direction: string }> = {
  zoom_in: { camera: "zoom", direction: "in" },
  zoom_out: { camera: "zoom", direction: "out" },
  pan_left: { camera: "pan", direction: "left" },
  pan_right: { camera: "pan", direction: "right" },
  rotate_cw: { camera: "rotate", direction: "clockwise" },
  rotate_ccw: { camera: "rotate", direction: "counterclockwise" },
};

export interface PikaUsageStats {
  generationsUsed: number;
  generationsLimit: number;
  resetDate?: string;
  planType: string;
}

export function mapPikaStatus(status: string | undefined): JobStatus {
  return STATUS_MAP[(status ?? "pending").toLowerCase()] ?? "pending";
}

export function buildPikaParams(config: GenerationConfig): JsonObject {
  const options: JsonObject = {
    frameRate: 24,
    // Pika scores motion 0-4
    motion: Math.floor(config.motionStrength * 4),
    boomerang: false,
    loop: false,
  };
  const params: JsonObject = {
    prompt: config.prompt,
    aspectRatio: config.aspectRatio,
  };

  if (config.referenceImage) {
    params.image = config.referenceImage;
    params.promptStrength = 0.8;
  }

  const style = config.style ? STYLES[config.style.toLowerCase()] : undefined;
  if (style) {
    options.style = style;
  }
  const effect = config.cameraMovement ? CAMERA_EFFECTS[config.cameraMovement] : undefined;
  if (effect) {
    Object.assign(options, effect);
  }
  if (config.seed) {
    options.seed = config.seed;
  }
  if (config.quality === "1080p") {
    options.hd = true;
  }

  // Pika takes tuning knobs inside `options`, so custom parameters go there
  params.options = { ...options, ...config.customParameters };
  return params;
}

/**
 * Pika Labs: short stylised clips from text or an image.
 */
export class PikaAdapter implements VideoAdapter {
  readonly name: string;
  readonly capabilities: readonly ModelCapability[] = [
    "image-to-video",
    "text-to-video",
    "style-transfer",
    "motion-control",
  ];
  readonly supportedAspectRatios: readonly string[] = ["16:9", "9:16", "1:1"];
  readonly supportedQualities: readonly string[] = ["720p", "1080p"];
  readonly maxDuration = 3;

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
      const data = await this.getSession().request("POST", "/generate", buildPikaParams(config));
      const jobId = readString(data, "id") ?? readString(data, "jobId");
      if (!jobId) {
        throw new BackendError("No job ID returned from Pika API");
      }

      this.logger.modelCall(this.name, "generate", { durationMs: this.now() - startedAt, success: true });
      return {
        jobId,
        status: mapPikaStatus(readString(data, "status")),
        progress: 0,
        estimatedCompletion: new Date(this.now() + ESTIMATED_DURATION_MS),
        metadata: {
          model: "pika-labs",
          created_at: data.createdAt,
          aspect_ratio: config.aspectRatio,
          style: config.style,
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
      const data = await this.getSession().request("GET", `/jobs/${encodeURIComponent(jobId)}`);
      const status = mapPikaStatus(readString(data, "status"));
      const result: GenerationResult = {
        jobId,
        status,
        progress: progressFor(status, readNumber(data, "progress"), PROCESSING_PROGRESS),
        metadata: {
          model: "pika-labs",
          status: data.status,
          created_at: data.createdAt,
          updated_at: data.updatedAt,
          generation_time: data.generationTime,
        },
      };

      if (status === "completed") {
        const output = asObject(data.result);
        result.videoUrl = readString(output, "videoUrl") ?? readString(output, "url");
        result.thumbnailUrl = readString(output, "thumbnailUrl") ?? readString(output, "thumbnail");
      } else if (status === "failed") {
        result.errorMessage = readString(asObject(data.error), "message") ?? "Generation failed";
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
      await this.getSession().request("DELETE", `/jobs/${encodeURIComponent(jobId)}`);
      return true;
    } catch (error) {
      await reportAdapterError(this.errorHandler, error, this.name, { jobId, operation: "cancel_job" });
      return false;
    }
  }

  /** Styles the account can use; empty when the request fails */
  async getStyles(): Promise<JsonObject[]> {
    try {
      const data = await this.getSession().request("GET", "/styles");
      return Array.isArray(data.styles) ? data.styles.filter(isJsonObject) : [];
    } catch (error) {
      await reportAdapterError(this.errorHandler, error, this.name, { operation: "get_styles" });
      return [];
    }
  }

  async getUsageStats(): Promise<Partial<PikaUsageStats>> {
    try {
      const data = await this.getSession().request("GET", "/account/usage");
      return {
        generationsUsed: readNumber(data, "generationsUsed") ?? 0,
        generationsLimit: readNumber(data, "generationsLimit") ?? 0,
        resetDate: readString(data, "resetDate"),
        planType: readString(data, "planType") ?? "free",
      };
    } catch (error) {
      await reportAdapterError(this.errorHandler, error, this.name, { operation: "get_usage_stats" });
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
          "X-Pika-Client": "clipmesh/0.1",
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
