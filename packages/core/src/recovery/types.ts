import type { ErrorCategory } from "../errors.js";
import type { ErrorSeverity } from "./severity.js";

/**
 * Context attached to a handled failure. `modelName` and `taskId` also scope
 * the circuit breaker key.
 */
export interface ErrorContext {
  modelName?: string;
  taskId?: string;
  [key: string]: unknown;
}

/**
 * Immutable record of one handled failure.
 */
export interface ErrorInfo {
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly message: string;
  /** Stack trace, kept for high and critical failures */
  readonly details?: string;
  readonly userMessage: string;
  readonly timestamp: Date;
  readonly taskId?: string;
  readonly modelName?: string;
  /** Names of the category's recovery actions, in order */
  readonly recoveryOptions: readonly string[];
  readonly retryCount: number;
  readonly maxRetries: number;
  readonly context: Readonly<ErrorContext>;
}

export type RecoveryActionName =
  | "retry_model_call"
  | "switch_model"
  | "check_model_config"
  | "retry_generation"
  | "adjust_parameters"
  | "fallback_model"
  | "retry_asset_operation"
  | "check_storage_space"
  | "cleanup_temp_files"
  | "restart_workflow"
  | "resume_from_checkpoint"
  | "validate_config"
  | "reset_to_defaults"
  | "retry_rendering"
  | "reduce_quality"
  | "retry_connection"
  | "check_connection";

/** Resolves to whether the action succeeded */
export type RecoveryHandler = (info?: ErrorInfo) => boolean | Promise<boolean>;

export interface RecoveryAction {
  readonly name: RecoveryActionName;
  readonly description: string;
  /** Must be confirmed by a person before it runs; never run automatically */
  readonly requiresUserInput: boolean;
  readonly isAsync: boolean;
  run: RecoveryHandler;
}
