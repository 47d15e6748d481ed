/**
 * Default recovery actions per error category.
 *
 * Guidance actions print their checklist and succeed. Backoff actions wait the
 * next delay of the retry schedule and report whether another attempt is
 * allowed. Every other action needs a handler supplied by the host; without one
 * it reports failure.
 */

import { ERROR_CATEGORIES, type ErrorCategory } from "../errors.js";
import type { Logger } from "../logger.js";
import type { ErrorInfo, RecoveryAction, RecoveryActionName, RecoveryHandler } from "./types.js";

/** Backoff schedule in seconds; the last entry repeats */
export const RETRY_DELAYS_SECONDS: readonly number[] = [1, 2, 4, 8, 16];

export type RecoveryHooks = Partial<Record<RecoveryActionName, RecoveryHandler>>;

export interface RecoveryActionDeps {
  logger: Logger;
  sleep: (ms: number) => Promise<void>;
  hooks?: RecoveryHooks;
}

const GUIDANCE: Partial<Record<RecoveryActionName, readonly string[]>> = {
  switch_model: [
    "Try a different model with --model. A model may be:",
    "temporarily unavailable",
    "experiencing high load",
    "not compatible with the current request",
  ],
  check_model_config: [
    "Check that the API key for the selected model is set",
    "Verify the API key has the necessary permissions",
    "Ensure the API key hasn't expired",
    "Check model-specific parameter requirements",
    "Regenerate the API key if issues persist",
  ],
  adjust_parameters: [
    "Reduce the video duration",
    "Lower the output quality setting",
    "Simplify the visual prompt",
    "Reduce the number of scenes",
    "Check aspect ratio compatibility",
  ],
  check_storage_space: [
    "Ensure sufficient disk space for video processing",
    "Check file permissions for the working directory",
    "Verify network storage connectivity if applicable",
    "Clean up old temporary files",
  ],
  reduce_quality: ["Reduce from 4k to 1080p or 720p", "Shorten the clip", "Lower motion strength"],
  check_connection: [
    "Check your internet connection stability",
    "Disable VPN if you're using one",
    "Check if a firewall is blocking the connection",
    "Verify API endpoint accessibility",
    "Try again in a few minutes",
  ],
  validate_config: ["Run `clipmesh models` to see which models loaded", "Check ~/.clipmesh/config.yaml"],
};

interface ActionSpec {
  name: RecoveryActionName;
  description: string;
  requiresUserInput?: boolean;
  isAsync?: boolean;
  kind: "backoff" | "guidance" | "hook";
}

const CATEGORY_ACTIONS: Partial<Record<ErrorCategory, readonly ActionSpec[]>> = {
  "model-adapter": [
    { name: "retry_model_call", description: "Retry the model API call", isAsync: true, kind: "backoff" },
    { name: "switch_model", description: "Switch to a different AI model", requiresUserInput: true, kind: "guidance" },
    { name: "check_model_config", description: "Verify model configuration", requiresUserInput: true, kind: "guidance" },
  ],
  generation: [
    { name: "retry_generation", description: "Retry video generation", isAsync: true, kind: "hook" },
    { name: "adjust_parameters", description: "Adjust generation parameters", requiresUserInput: true, kind: "guidance" },
    { name: "fallback_model", description: "Use fallback model", isAsync: true, kind: "hook" },
  ],
  "asset-management": [
    { name: "retry_asset_operation", description: "Retry asset operation", isAsync: true, kind: "hook" },
    { name: "check_storage_space", description: "Check available storage space", kind: "guidance" },
    { name: "cleanup_temp_files", description: "Clean up temporary files", isAsync: true, kind: "hook" },
  ],
  workflow: [
    { name: "restart_workflow", description: "Restart the workflow", isAsync: true, kind: "hook" },
    { name: "resume_from_checkpoint", description: "Resume from last checkpoint", isAsync: true, kind: "hook" },
  ],
  configuration: [
    { name: "validate_config", description: "Validate configuration", kind: "guidance" },
    { name: "reset_to_defaults", description: "Reset to default configuration", requiresUserInput: true, kind: "hook" },
  ],
  rendering: [
    { name: "retry_rendering", description: "Retry video rendering", isAsync: true, kind: "hook" },
    { name: "reduce_quality", description: "Reduce output quality", requiresUserInput: true, kind: "guidance" },
  ],
  network: [
    { name: "retry_connection", description: "Retry network connection", isAsync: true, kind: "backoff" },
    { name: "check_connection", description: "Check internet connection", requiresUserInput: true, kind: "guidance" },
  ],
};

/** Delay before retry number `attempt` (1-based), in ms */
export function backoffDelayMs(attempt: number): number {
  const index = Math.min(Math.max(attempt, 1) - 1, RETRY_DELAYS_SECONDS.length - 1);
  return RETRY_DELAYS_SECONDS[index] * 1000;
}

function defaultHandler(definition: ActionSpec, deps: RecoveryActionDeps): RecoveryHandler {
  const { logger, sleep } = deps;
  switch (definition.kind) {
    case "backoff":
      return async (info?: ErrorInfo) => {
        const retryCount = info?.retryCount ?? 0;
        const maxRetries = info?.maxRetries ?? RETRY_DELAYS_SECONDS.length;
        if (retryCount >= maxRetries) {
          logger.warn("Maximum retry attempts reached", { action: definition.name, retryCount, maxRetries });
          return false;
        }
        const attempt = retryCount + 1;
        const delayMs = backoffDelayMs(attempt);
        logger.info("Waiting before retry", { action: definition.name, attempt, maxRetries, delayMs });
        await sleep(delayMs);
        return true;
      };
    case "guidance":
      return () => {
        const lines = GUIDANCE[definition.name] ?? [];
        logger.info(definition.description, { guidance: lines.join("; ") });
        return true;
      };
    case "hook":
      return () => {
        logger.warn("No handler registered for recovery action", { action: definition.name });
        return false;
      };
  }
}

/**
 * Build the recovery action table. A hook replaces the default behaviour of
 * the action with the same name.
 */
export function createRecoveryActions(deps: RecoveryActionDeps): Map<ErrorCategory, RecoveryAction[]> {
  const table = new Map<ErrorCategory, RecoveryAction[]>();
  for (const category of ERROR_CATEGORIES) {
    const definitions = CATEGORY_ACTIONS[category];
    if (!definitions) continue;
    table.set(
      category,
      definitions.map((definition) => ({
        name: definition.name,
        description: definition.description,
        requiresUserInput: definition.requiresUserInput ?? false,
        isAsync: definition.isAsync ?? false,
        run: deps.hooks?.[definition.name] ?? defaultHandler(definition, deps),
      }))
    );
  }
  return table;
}
