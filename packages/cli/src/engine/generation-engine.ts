/**
 * Generation engine
 *
 * Routes each request to one adapter in the registry, balancing load across
 * the adapters that accept it and falling back to a different adapter when a
 * backend fails. Owns the per-adapter metrics.
 */

import {
  ErrorHandler,
  GenerationError,
  JobNotFoundError,
  NoSuitableModelError,
  createLogger,
  err,
  errorMessage,
  failedResult,
  ok,
  type AnyStudioError,
  type GenerationConfig,
  type GenerationResult,
  type Logger,
  type Result,
  type Scene,
} from "@clipmesh/core";
import {
  AdapterRegistry,
  defaultSleep,
  type ModelInfo,
  type Sleep,
  type VideoAdapter,
  type WaitOptions,
} from "@clipmesh/ai-providers";
import { LoadBalancer, type LoadBalancingStrategy } from "./load-balancer.js";
import { ModelMetrics, type ModelMetricsSnapshot } from "./metrics.js";
import { Semaphore } from "./semaphore.js";

export interface GenerationEngineOptions {
  registry?: AdapterRegistry;
  errorHandler?: ErrorHandler;
  strategy?: LoadBalancingStrategy;
  /** Fallback attempts on other adapters after the first failure (default 3) */
  maxRetries?: number;
  /** Pause before each fallback attempt (default 1000) */
  fallbackDelayMs?: number;
  /** Batch concurrency when a call does not give its own (default 5) */
  maxConcurrentTasks?: number;
  sleep?: Sleep;
  random?: () => number;
  now?: () => number;
  logger?: Logger;
}

export interface GenerateOptions {
  preferredModel?: string;
  priority?: number;
}

export interface GenerationRequest {
  readonly requestId: string;
  readonly config: GenerationConfig;
  readonly preferredModel?: string;
  readonly priority: number;
  readonly createdAt: Date;
  readonly maxRetries: number;
  retryCount: number;
  /** Adapters already attempted in this request chain */
  readonly tried: Set<string>;
}

export interface EngineStats {
  totalGenerations: number;
  successfulGenerations: number;
  successRate: number;
  activeRequests: number;
  availableModels: number;
  loadBalancingStrategy: LoadBalancingStrategy;
  modelMetrics: Record<string, ModelMetricsSnapshot>;
}

export type EngineModelInfo = ModelInfo & { metrics: ModelMetricsSnapshot };

/**
 * Whether another adapter might succeed where this one failed.
 *
 * Bad requests, configuration problems and 4xx backend answers (auth, billing)
 * would fail the same way everywhere.
 */
export function isRetryable(error: AnyStudioError): boolean {
  switch (error.kind) {
    case "invalid-request":
    case "invalid-config":
    case "no-suitable-model":
      return false;
    case "backend":
      return error.status === undefined || error.status >= 500;
    default:
      return true;
  }
}

/** Request for one scene: the scene's own shot fields over the shared settings */
export function sceneConfig(scene: Scene, base: GenerationConfig): GenerationConfig {
  return base.with({
    prompt: scene.visualPrompt,
    referenceImage: scene.referenceImage,
    duration: scene.duration,
    cameraMovement: scene.cameraMovement,
  });
}

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

export class GenerationEngine {
  readonly registry: AdapterRegistry;
  readonly errorHandler: ErrorHandler;
  private readonly balancer: LoadBalancer;
  private readonly metrics: Map<string, ModelMetrics> = new Map();
  private readonly activeRequests: Map<string, GenerationRequest> = new Map();
  private readonly maxRetries: number;
  private readonly fallbackDelayMs: number;
  private readonly maxConcurrentTasks: number;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private totalGenerations = 0;
  private successfulGenerations = 0;

  constructor(options: GenerationEngineOptions = {}) {
    this.registry = options.registry ?? new AdapterRegistry();
    this.errorHandler = options.errorHandler ?? new ErrorHandler();
    this.random = options.random ?? Math.random;
    this.balancer = new LoadBalancer(options.strategy, this.random);
    this.maxRetries = options.maxRetries ?? 3;
    this.fallbackDelayMs = options.fallbackDelayMs ?? 1000;
    this.maxConcurrentTasks = options.maxConcurrentTasks ?? 5;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger("engine");

    for (const adapter of this.registry.getAll()) {
      this.metrics.set(adapter.name, new ModelMetrics());
    }
  }

  get loadBalancingStrategy(): LoadBalancingStrategy {
    return this.balancer.strategy;
  }

  setLoadBalancingStrategy(strategy: LoadBalancingStrategy): void {
    this.balancer.strategy = strategy;
    this.logger.info("Load balancing strategy changed", { strategy });
  }

  registerAdapter(adapter: VideoAdapter): void {
    this.registry.register(adapter);
    this.metrics.set(adapter.name, new ModelMetrics());
  }

  /** Hides the adapter from selection; calls already running on it carry on */
  unregisterAdapter(name: string): boolean {
    this.metrics.delete(name);
    return this.registry.unregister(name);
  }

  getAvailableModels(): string[] {
    return this.registry.list(true);
  }

  /**
   * Choose the adapter for a request.
   *
   * A usable preferred model wins outright; otherwise the load balancer picks
   * among enabled adapters that accept the request and are not in `exclude`.
   */
  selectModelForConfig(
    config: GenerationConfig,
    preferredModel?: string,
    exclude: ReadonlySet<string> = new Set()
  ): Result<VideoAdapter, NoSuitableModelError> {
    if (preferredModel !== undefined && !exclude.has(preferredModel)) {
      const preferred = this.registry.get(preferredModel);
      if (preferred?.enabled && preferred.validateConfig(config).valid) return ok(preferred);
    }

    const candidates: VideoAdapter[] = [];
    const rejections: Record<string, string> = {};
    for (const adapter of this.registry.getAll()) {
      if (!adapter.enabled || exclude.has(adapter.name)) continue;
      const check = adapter.validateConfig(config);
      if (check.valid) candidates.push(adapter);
      else rejections[adapter.name] = check.reason;
    }

    const chosen = this.balancer.select(candidates, this.metrics);
    if (chosen) return ok(chosen);

    const reason = config.validationError();
    const message = reason
      ? `No suitable model found for the request: ${reason}`
      : "No suitable model found for the request";
    return err(new NoSuitableModelError(message, rejections, { details: { config: config.toJSON() } }));
  }

  /**
   * Start one generation, falling back to other adapters on failure.
   *
   * @throws NoSuitableModelError when no adapter accepts the request
   * @throws GenerationError once every attempt has failed
   */
  async generateVideo(config: GenerationConfig, options: GenerateOptions = {}): Promise<GenerationResult> {
    const selection = this.selectModelForConfig(config, options.preferredModel);
    if (!selection.ok) {
      this.logger.warn(selection.error.message, { rejections: selection.error.rejections });
      throw selection.error;
    }

    const request: GenerationRequest = {
      requestId: this.createRequestId(),
      config,
      preferredModel: options.preferredModel,
      priority: options.priority ?? 0,
      createdAt: new Date(this.now()),
      maxRetries: this.maxRetries,
      retryCount: 0,
      tried: new Set(),
    };

    const started = this.now();
    this.activeRequests.set(request.requestId, request);
    this.logger.taskStart(request.requestId, "generation");
    try {
      const result = await this.execute(request, selection.value);
      this.logger.taskComplete(request.requestId, this.now() - started);
      return result;
    } catch (error) {
      this.logger.taskError(request.requestId, errorMessage(error));
      throw error;
    } finally {
      this.activeRequests.delete(request.requestId);
    }
  }

  /**
   * Generate every scene with at most `maxConcurrent` in flight.
   *
   * Always resolves to one result per scene in input order; a scene that
   * fails becomes a failed result with id `failed_{index}`.
   */
  async batchGenerate(
    scenes: readonly Scene[],
    baseConfig: GenerationConfig,
    maxConcurrent: number = this.maxConcurrentTasks
  ): Promise<GenerationResult[]> {
    if (scenes.length === 0) return [];

    const semaphore = new Semaphore(maxConcurrent);
    return Promise.all(
      scenes.map(async (scene, index) => {
        try {
          return await semaphore.runExclusive(() => this.generateVideo(sceneConfig(scene, baseConfig)));
        } catch (error) {
          this.logger.warn("Scene generation failed", { scene: scene.sceneId, error: errorMessage(error) });
          return failedResult(`failed_${index}`, errorMessage(error), { scene_id: scene.sceneId });
        }
      })
    );
  }

  /**
   * Look a job up on `modelName`, or on every adapter in registration order
   * when no registered model is named.
   */
  async getJobStatus(jobId: string, modelName?: string): Promise<GenerationResult> {
    const named = modelName !== undefined ? this.registry.get(modelName) : undefined;
    if (named) return named.getStatus(jobId);

    for (const adapter of this.registry.getAll()) {
      try {
        return await adapter.getStatus(jobId);
      } catch (error) {
        this.logger.debug("Job not found on model", { model: adapter.name, jobId, error: errorMessage(error) });
      }
    }
    throw new JobNotFoundError(`Job ${jobId} not found in any model`);
  }

  /**
   * Cancel a job on `modelName`, or on the first adapter that accepts the
   * cancellation. Resolves to false when none does.
   */
  async cancelJob(jobId: string, modelName?: string): Promise<boolean> {
    const named = modelName !== undefined ? this.registry.get(modelName) : undefined;
    if (named) return named.cancelJob(jobId);

    for (const adapter of this.registry.getAll()) {
      try {
        if (await adapter.cancelJob(jobId)) return true;
      } catch (error) {
        this.logger.debug("Cancel not accepted by model", { model: adapter.name, jobId, error: errorMessage(error) });
      }
    }
    return false;
  }

  /**
   * Poll a job until it completes, on `modelName` or on the first adapter
   * that knows the job.
   */
  async waitForCompletion(jobId: string, modelName?: string, options: WaitOptions = {}): Promise<GenerationResult> {
    const named = modelName !== undefined ? this.registry.get(modelName) : undefined;
    if (named) return named.waitForCompletion(jobId, options);

    for (const adapter of this.registry.getAll()) {
      try {
        await adapter.getStatus(jobId);
      } catch (error) {
        this.logger.debug("Job not found on model", { model: adapter.name, jobId, error: errorMessage(error) });
        continue;
      }
      return adapter.waitForCompletion(jobId, options);
    }
    throw new JobNotFoundError(`Job ${jobId} not found in any model`);
  }

  getEngineStats(): EngineStats {
    const modelMetrics: Record<string, ModelMetricsSnapshot> = {};
    for (const [name, metrics] of this.metrics) {
      modelMetrics[name] = metrics.snapshot();
    }
    return {
      totalGenerations: this.totalGenerations,
      successfulGenerations: this.successfulGenerations,
      successRate: this.totalGenerations === 0 ? 0 : this.successfulGenerations / this.totalGenerations,
      activeRequests: this.activeRequests.size,
      availableModels: this.registry.list(true).length,
      loadBalancingStrategy: this.balancer.strategy,
      modelMetrics,
    };
  }

  getModelInfo(name: string): EngineModelInfo | undefined {
    const adapter = this.registry.get(name);
    if (!adapter) return undefined;
    return { ...adapter.getModelInfo(), metrics: this.metricsFor(name).snapshot() };
  }

  /** Close every adapter session and forget all adapters */
  async shutdown(): Promise<void> {
    const adapters = this.registry.getAll();
    await Promise.all(adapters.map((adapter) => adapter.close()));
    for (const adapter of adapters) {
      this.registry.unregister(adapter.name);
    }
    this.metrics.clear();
    this.activeRequests.clear();
    this.logger.info("Generation engine shut down", { adapters: adapters.length });
  }

  private async execute(request: GenerationRequest, adapter: VideoAdapter): Promise<GenerationResult> {
    const metrics = this.metricsFor(adapter.name);
    request.tried.add(adapter.name);

    const outcome = await this.errorHandler.guard("generation", { modelName: adapter.name }, async () => {
      const started = this.now();
      metrics.begin(new Date(started));
      this.totalGenerations++;
      try {
        const result = await adapter.generate(request.config);
        metrics.recordSuccess((this.now() - started) / 1000);
        this.successfulGenerations++;
        return { ...result, metadata: { ...result.metadata, adapter: adapter.name } };
      } catch (error) {
        metrics.recordFailure();
        throw error;
      }
    });

    if (outcome.ok) return outcome.value;
    return this.handleFailure(request, adapter.name, outcome.error);
  }

  private async handleFailure(
    request: GenerationRequest,
    modelName: string,
    error: AnyStudioError
  ): Promise<GenerationResult> {
    if (isRetryable(error) && request.retryCount < request.maxRetries) {
      const fallback = this.selectModelForConfig(request.config, undefined, request.tried);
      if (fallback.ok) {
        request.retryCount++;
        this.logger.warn("Falling back to another model", {
          request: request.requestId,
          failed: modelName,
          next: fallback.value.name,
          error: error.message,
        });
        await this.sleep(this.fallbackDelayMs);
        return this.execute(request, fallback.value);
      }
    }

    const handled = this.errorHandler.handleError(error, "generation", {
      modelName,
      taskId: request.requestId,
      retryCount: request.retryCount,
    });
    if (handled.autoRecovery) await handled.autoRecovery;

    throw new GenerationError(
      `Generation failed after ${request.retryCount} retries: ${error.message}`,
      request.retryCount,
      { cause: error, details: { modelName, requestId: request.requestId } }
    );
  }

  private metricsFor(name: string): ModelMetrics {
    let metrics = this.metrics.get(name);
    if (!metrics) {
      metrics = new ModelMetrics();
      this.metrics.set(name, metrics);
    }
    return metrics;
  }

  /** `gen_YYYYmmdd_HHMMSS_NNNN` in UTC */
  private createRequestId(): string {
    const at = new Date(this.now());
    const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
    const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
    const suffix = 1000 + Math.floor(this.random() * 9000);
    return `gen_${date}_${time}_${suffix}`;
  }
}
