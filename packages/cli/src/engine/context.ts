/**
 * Studio context
 *
 * Owns the adapter registry, error handler and generation engine built from
 * one configuration. Commands receive a context instead of reaching for
 * module-level instances.
 */

import { ErrorHandler, createLogger, setLogLevel, type Logger } from "@clipmesh/core";
import {
  AdapterRegistry,
  LumaAdapter,
  PikaAdapter,
  RunwayAdapter,
  createModelConfig,
  validateModelConfig,
  type AdapterOptions,
  type ModelConfig,
  type Sleep,
  type VideoAdapter,
} from "@clipmesh/ai-providers";
import { MODEL_NAMES, type ClipmeshConfig, type ModelName, type ModelSettings } from "../config/schema.js";
import { GenerationEngine } from "./generation-engine.js";

type AdapterFactory = (config: ModelConfig, options: AdapterOptions) => VideoAdapter;

const ADAPTER_FACTORIES: Record<ModelName, AdapterFactory> = {
  luma: (config, options) => new LumaAdapter(config, options),
  runway: (config, options) => new RunwayAdapter(config, options),
  pika: (config, options) => new PikaAdapter(config, options),
};

export interface StudioContextOptions {
  /** Passed to every adapter (fetch, sleep, clock) */
  adapterOptions?: Pick<AdapterOptions, "fetch" | "sleep" | "now">;
  errorHandler?: ErrorHandler;
  /** Engine fallback delay */
  sleep?: Sleep;
  random?: () => number;
  logger?: Logger;
}

export function toModelConfig(name: ModelName, settings: ModelSettings): ModelConfig {
  return createModelConfig({
    name,
    apiKey: settings.apiKey ?? "",
    baseUrl: settings.baseUrl,
    timeout: settings.timeout,
    maxRetries: settings.maxRetries,
    rateLimit: settings.rateLimit,
    enabled: settings.enabled,
    parameters: settings.parameters,
  });
}

export class StudioContext {
  readonly registry = new AdapterRegistry();
  readonly errorHandler: ErrorHandler;
  private currentConfig: ClipmeshConfig;
  private currentEngine: GenerationEngine;
  private readonly options: StudioContextOptions;
  private readonly logger: Logger;

  constructor(config: ClipmeshConfig, options: StudioContextOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? createLogger("studio");
    this.errorHandler = options.errorHandler ?? new ErrorHandler();
    this.currentConfig = config;
    this.currentEngine = this.build(config);
  }

  get config(): ClipmeshConfig {
    return this.currentConfig;
  }

  get engine(): GenerationEngine {
    return this.currentEngine;
  }

  /** Close the current adapters and rebuild everything from `config` */
  async reload(config: ClipmeshConfig): Promise<void> {
    await this.currentEngine.shutdown();
    this.currentConfig = config;
    this.currentEngine = this.build(config);
    this.logger.info("Configuration reloaded", { models: this.registry.list() });
  }

  async close(): Promise<void> {
    await this.currentEngine.shutdown();
  }

  private build(config: ClipmeshConfig): GenerationEngine {
    setLogLevel(config.logLevel);

    const engine = new GenerationEngine({
      registry: this.registry,
      errorHandler: this.errorHandler,
      strategy: config.engine.loadBalancing,
      maxRetries: config.engine.maxRetries,
      fallbackDelayMs: config.engine.fallbackDelayMs,
      maxConcurrentTasks: config.workflow.maxConcurrentTasks,
      sleep: this.options.sleep,
      random: this.options.random,
    });

    for (const name of MODEL_NAMES) {
      const modelConfig = toModelConfig(name, config.models[name]);
      const problem = validateModelConfig(modelConfig);
      if (problem) {
        this.logger.warn(`Skipping model ${name}: ${problem}`);
        continue;
      }
      const adapter = ADAPTER_FACTORIES[name](modelConfig, {
        ...this.options.adapterOptions,
        errorHandler: this.errorHandler,
      });
      engine.registerAdapter(adapter);
    }

    return engine;
  }
}

export function createStudioContext(config: ClipmeshConfig, options: StudioContextOptions = {}): StudioContext {
  return new StudioContext(config, options);
}
