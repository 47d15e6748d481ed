/**
 * @module generation
 * @description Request and job-state types shared by every video backend.
 *
 * A {@link GenerationConfig} describes one generation request; a
 * {@link GenerationResult} is a snapshot of the backend job it started.
 */

/**
 * Lifecycle status of a backend generation job.
 *
 * Transitions: `pending` -> `queued` -> `processing` -> `completed` | `failed` | `cancelled`.
 */
export type JobStatus =
  | "pending"
  | "queued"
  | "processing"
  | "completed"
  | "failed"
  | "cancelled";

/** Statuses after which a job never changes again */
export const TERMINAL_STATUSES: readonly JobStatus[] = ["completed", "failed", "cancelled"];

/** Aspect ratios a request may ask for */
export const ASPECT_RATIOS = ["16:9", "9:16", "1:1"] as const;
export type AspectRatio = (typeof ASPECT_RATIOS)[number];

/** Output quality tiers */
export const QUALITIES = ["720p", "1080p", "4k"] as const;
export type Quality = (typeof QUALITIES)[number];

/** Longest video any request may ask for, in seconds */
export const MAX_GENERATION_DURATION = 300;

/**
 * Capabilities a video backend can declare support for.
 */
export type ModelCapability =
  | "image-to-video"
  | "text-to-video"
  | "video-extend"
  | "style-transfer"
  | "camera-control"
  | "motion-control";

/** Constructor input for {@link GenerationConfig}; everything but `prompt` has a default. */
export interface GenerationConfigInit {
  /** Prompt for generation */
  prompt: string;
  /** Reference image (URL or asset id) for image-to-video */
  referenceImage?: string;
  /** Duration in seconds (default 5) */
  duration?: number;
  /** Aspect ratio (default 16:9) */
  aspectRatio?: string;
  /** Quality tier (default 1080p) */
  quality?: string;
  /** Style tag */
  style?: string;
  /** Camera movement tag, e.g. `zoom_in` or `pan_left` */
  cameraMovement?: string;
  /** Motion strength 0-1 (default 0.5) */
  motionStrength?: number;
  /** Seed for reproducibility */
  seed?: number;
  /** Backend-specific parameters merged into the request last */
  customParameters?: Record<string, unknown>;
}

/**
 * One generation request.
 *
 * Fields are read-only; derive a changed request with {@link GenerationConfig.with}.
 * Aspect ratio and quality are plain strings so that out-of-range values can be
 * represented and rejected by {@link GenerationConfig.validate}.
 */
export class GenerationConfig {
  readonly prompt: string;
  readonly referenceImage?: string;
  readonly duration: number;
  readonly aspectRatio: string;
  readonly quality: string;
  readonly style?: string;
  readonly cameraMovement?: string;
  readonly motionStrength: number;
  readonly seed?: number;
  readonly customParameters: Readonly<Record<string, unknown>>;

  constructor(init: GenerationConfigInit) {
    this.prompt = init.prompt;
    this.referenceImage = init.referenceImage;
    this.duration = init.duration ?? 5;
    this.aspectRatio = init.aspectRatio ?? "16:9";
    this.quality = init.quality ?? "1080p";
    this.style = init.style;
    this.cameraMovement = init.cameraMovement;
    this.motionStrength = init.motionStrength ?? 0.5;
    this.seed = init.seed;
    this.customParameters = { ...(init.customParameters ?? {}) };
  }

  /** Whether the request is within the generic bounds every backend shares */
  validate(): boolean {
    return this.validationError() === undefined;
  }

  /** First generic bound the request violates, or `undefined` */
  validationError(): string | undefined {
    if (typeof this.prompt !== "string" || this.prompt.trim() === "") {
      return "Prompt must be a non-empty string";
    }
    if (!Number.isFinite(this.duration) || this.duration <= 0 || this.duration > MAX_GENERATION_DURATION) {
      return `Duration must be greater than 0 and at most ${MAX_GENERATION_DURATION}s`;
    }
    if (!(ASPECT_RATIOS as readonly string[]).includes(this.aspectRatio)) {
      return `Aspect ratio '${this.aspectRatio}' must be one of ${ASPECT_RATIOS.join(", ")}`;
    }
    if (!(QUALITIES as readonly string[]).includes(this.quality)) {
      return `Quality '${this.quality}' must be one of ${QUALITIES.join(", ")}`;
    }
    if (!(this.motionStrength >= 0 && this.motionStrength <= 1)) {
      return "Motion strength must be between 0.0 and 1.0";
    }
    if (this.seed !== undefined && !Number.isInteger(this.seed)) {
      return "Seed must be an integer";
    }
    return undefined;
  }

  /** Copy of this request with some fields replaced */
  with(overrides: Partial<GenerationConfigInit>): GenerationConfig {
    return new GenerationConfig({ ...this.toInit(), ...overrides });
  }

  toInit(): GenerationConfigInit {
    return {
      prompt: this.prompt,
      referenceImage: this.referenceImage,
      duration: this.duration,
      aspectRatio: this.aspectRatio,
      quality: this.quality,
      style: this.style,
      cameraMovement: this.cameraMovement,
      motionStrength: this.motionStrength,
      seed: this.seed,
      customParameters: { ...this.customParameters },
    };
  }

  /** Flat representation for logs and error context; custom parameters are spread last */
  toJSON(): Record<string, unknown> {
    return {
      prompt: this.prompt,
      reference_image: this.referenceImage ?? null,
      duration: this.duration,
      aspect_ratio: this.aspectRatio,
      quality: this.quality,
      style: this.style ?? null,
      camera_movement: this.cameraMovement ?? null,
      motion_strength: this.motionStrength,
      seed: this.seed ?? null,
      ...this.customParameters,
    };
  }
}

/**
 * Snapshot of a backend job.
 *
 * A `completed` result carries `videoUrl`; a `failed` one carries `errorMessage`.
 */
export interface GenerationResult {
  /** Backend-assigned job ID */
  jobId: string;
  /** Current status of the job */
  status: JobStatus;
  /** URL to the generated video */
  videoUrl?: string;
  /** Thumbnail URL */
  thumbnailUrl?: string;
  /** Progress fraction 0-1 */
  progress: number;
  /** Estimated time the job finishes */
  estimatedCompletion?: Date;
  /** Error message if failed */
  errorMessage?: string;
  /** Backend-specific details */
  metadata: Record<string, unknown>;
}

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/** Completed and has a video to show */
export function isCompleted(result: GenerationResult): boolean {
  return result.status === "completed" && result.videoUrl !== undefined;
}

export function isFailed(result: GenerationResult): boolean {
  return result.status === "failed";
}

export function isProcessing(result: GenerationResult): boolean {
  return result.status === "pending" || result.status === "queued" || result.status === "processing";
}

/** Build a `failed` result for a job that never produced backend state */
export function failedResult(jobId: string, errorMessage: string, metadata: Record<string, unknown> = {}): GenerationResult {
  return {
    jobId,
    status: "failed",
    progress: 0,
    errorMessage,
    metadata,
  };
}
