/**
 * Configuration loader/saver for clipmesh
 * Config stored at ~/.clipmesh/config.yaml
 */

import { resolve } from "node:path";
import { homedir } from "node:os";
import { readFile, writeFile, mkdir, access } from "node:fs/promises";
import { parse, stringify } from "yaml";
import { InvalidConfigError, createLogger, errorMessage, isLogLevel } from "@clipmesh/core";
import { asObject, isJsonObject, readNumber, readString, type JsonObject } from "@clipmesh/ai-providers";
import { isLoadBalancingStrategy } from "../engine/load-balancer.js";
import {
  MODEL_ENV_VARS,
  MODEL_NAMES,
  createDefaultConfig,
  type ClipmeshConfig,
  type ModelName,
  type ModelSettings,
} from "./schema.js";

const logger = createLogger("config");

/** Config directory path */
export const CONFIG_DIR = resolve(homedir(), ".clipmesh");

/** Config file path */
export const CONFIG_PATH = resolve(CONFIG_DIR, "config.yaml");

type Env = Record<string, string | undefined>;

function readBoolean(source: JsonObject, key: string): boolean | undefined {
  const value = source[key];
  return typeof value === "boolean" ? value : undefined;
}

function mergeModel(defaults: ModelSettings, raw: unknown): ModelSettings {
  const source = asObject(raw);
  const parameters = source.parameters;
  return {
    apiKey: readString(source, "apiKey") ?? defaults.apiKey,
    baseUrl: readString(source, "baseUrl") ?? defaults.baseUrl,
    timeout: readNumber(source, "timeout") ?? defaults.timeout,
    maxRetries: readNumber(source, "maxRetries") ?? defaults.maxRetries,
    rateLimit: readNumber(source, "rateLimit") ?? defaults.rateLimit,
    enabled: readBoolean(source, "enabled") ?? defaults.enabled,
    parameters: isJsonObject(parameters) ? { ...parameters } : defaults.parameters,
  };
}

/**
 * Lay a parsed YAML document over the defaults.
 * Fields of the wrong type keep their default.
 */
export function mergeConfig(raw: unknown): ClipmeshConfig {
  const defaults = createDefaultConfig();
  const source = asObject(raw);
  const models = asObject(source.models);
  const workflow = asObject(source.workflow);
  const engine = asObject(source.engine);
  const logLevel = source.logLevel;
  const loadBalancing = engine.loadBalancing;

  return {
    version: readString(source, "version") ?? defaults.version,
    logLevel: isLogLevel(logLevel) ? logLevel : defaults.logLevel,
    models: {
      luma: mergeModel(defaults.models.luma, models.luma),
      runway: mergeModel(defaults.models.runway, models.runway),
      pika: mergeModel(defaults.models.pika, models.pika),
    },
    workflow: {
      maxConcurrentTasks: readNumber(workflow, "maxConcurrentTasks") ?? defaults.workflow.maxConcurrentTasks,
    },
    engine: {
      loadBalancing: isLoadBalancingStrategy(loadBalancing) ? loadBalancing : defaults.engine.loadBalancing,
      maxRetries: readNumber(engine, "maxRetries") ?? defaults.engine.maxRetries,
      fallbackDelayMs: readNumber(engine, "fallbackDelayMs") ?? defaults.engine.fallbackDelayMs,
    },
  };
}

/**
 * Apply environment overrides. A model whose key variable is set is enabled.
 */
export function applyEnvOverrides(config: ClipmeshConfig, env: Env = process.env): ClipmeshConfig {
  const models = { ...config.models };
  for (const name of MODEL_NAMES) {
    const apiKey = env[MODEL_ENV_VARS[name]];
    if (apiKey) {
      models[name] = { ...models[name], apiKey, enabled: true };
    }
  }

  let { logLevel } = config;
  const envLevel = env.CLIPMESH_LOG_LEVEL;
  if (envLevel !== undefined) {
    if (isLogLevel(envLevel)) logLevel = envLevel;
    else logger.warn("Ignoring unknown log level", { value: envLevel });
  }

  let { maxConcurrentTasks } = config.workflow;
  const envTasks = env.CLIPMESH_MAX_CONCURRENT_TASKS;
  if (envTasks !== undefined) {
    const parsed = Number.parseInt(envTasks, 10);
    if (Number.isInteger(parsed) && parsed > 0) maxConcurrentTasks = parsed;
    else logger.warn("Ignoring invalid CLIPMESH_MAX_CONCURRENT_TASKS", { value: envTasks });
  }

  let { loadBalancing } = config.engine;
  const envStrategy = env.CLIPMESH_LOAD_BALANCING;
  if (envStrategy !== undefined) {
    if (isLoadBalancingStrategy(envStrategy)) loadBalancing = envStrategy;
    else logger.warn("Ignoring unknown load balancing strategy", { value: envStrategy });
  }

  return {
    ...config,
    logLevel,
    models,
    workflow: { ...config.workflow, maxConcurrentTasks },
    engine: { ...config.engine, loadBalancing },
  };
}

/**
 * Load configuration from ~/.clipmesh/config.yaml
 * Returns null if config doesn't exist
 */
export async function loadConfig(): Promise<ClipmeshConfig | null> {
  try {
    await access(CONFIG_PATH);
  } catch {
    return null;
  }

  const content = await readFile(CONFIG_PATH, "utf-8");
  try {
    return mergeConfig(parse(content));
  } catch (error) {
    throw new InvalidConfigError(`Could not parse ${CONFIG_PATH}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * File configuration (or defaults) with environment overrides applied
 */
export async function resolveConfig(env: Env = process.env): Promise<ClipmeshConfig> {
  const config = (await loadConfig()) ?? createDefaultConfig();
  return applyEnvOverrides(config, env);
}

/**
 * Save configuration to ~/.clipmesh/config.yaml
 */
export async function saveConfig(config: ClipmeshConfig): Promise<void> {
  await mkdir(CONFIG_DIR, { recursive: true });

  const content = stringify(config, {
    indent: 2,
    lineWidth: 0, // Don't wrap lines
  });

  await writeFile(CONFIG_PATH, content, "utf-8");
}

/**
 * Check if at least one model has an API key, in config or environment
 */
export async function isConfigured(env: Env = process.env): Promise<boolean> {
  const config = await loadConfig();
  return MODEL_NAMES.some((name) => Boolean(config?.models[name].apiKey || env[MODEL_ENV_VARS[name]]));
}

/**
 * Get API key from config, then environment
 */
export async function getApiKeyFromConfig(model: ModelName, env: Env = process.env): Promise<string | undefined> {
  const config = await loadConfig();
  return config?.models[model].apiKey ?? env[MODEL_ENV_VARS[model]];
}

/**
 * Store a model's API key in config and enable the model
 */
export async function updateModelKey(model: ModelName, apiKey: string): Promise<void> {
  const config = (await loadConfig()) ?? createDefaultConfig();
  config.models[model] = { ...config.models[model], apiKey, enabled: true };
  await saveConfig(config);
}

// Re-export types
export type { ClipmeshConfig, ModelName, ModelSettings } from "./schema.js";
export {
  createDefaultConfig,
  isModelName,
  MODEL_DISPLAY_NAMES,
  MODEL_ENV_VARS,
  MODEL_NAMES,
} from "./schema.js";
