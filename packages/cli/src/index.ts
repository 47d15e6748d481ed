/**
 * clipmesh CLI package
 *
 * Also usable as a library: build a {@link StudioContext} from a
 * configuration and drive its generation engine directly.
 */

export * from "./engine/index.js";
export {
  applyEnvOverrides,
  createDefaultConfig,
  getApiKeyFromConfig,
  isConfigured,
  loadConfig,
  mergeConfig,
  resolveConfig,
  saveConfig,
  updateModelKey,
  CONFIG_DIR,
  CONFIG_PATH,
  MODEL_DISPLAY_NAMES,
  MODEL_ENV_VARS,
  MODEL_NAMES,
  type ClipmeshConfig,
  type ModelName,
  type ModelSettings,
} from "./config/index.js";
export { createProgram } from "./program.js";
export { VERSION } from "./version.js";
