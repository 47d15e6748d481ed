/**
 * @module error-handler
 * @description Classifies, records and surfaces failures, and gates repeated
 * failures through a circuit breaker.
 *
 * One occurrence goes classify -> record -> trip breaker -> surface -> maybe
 * auto-recover. Auto-recovery is returned as a promise the caller may await;
 * nothing is left running unobserved.
 */

import {
  BackendError,
  CircuitOpenError,
  GenerationError,
  GenerationTimeoutError,
  InvalidConfigError,
  InvalidRequestError,
  NetworkError,
  RateLimitError,
  err,
  errorMessage,
  isStudioError,
  ok,
  type AnyStudioError,
  type ErrorCategory,
  type Result,
} from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import { createRecoveryActions, type RecoveryHooks } from "./actions.js";
import { CircuitBreaker, breakerKey, type CircuitBreakerOptions } from "./circuit-breaker.js";
import {
  CIRCUIT_OPEN_MESSAGE,
  CIRCUIT_OPEN_USER_MESSAGE,
  determineSeverity,
  generateUserMessage,
  type ErrorSeverity,
} from "./severity.js";
import type { ErrorContext, ErrorInfo, RecoveryAction } from "./types.js";

export const DEFAULT_HISTORY_LIMIT = 100;
const DEFAULT_MAX_RETRIES = 3;

export interface ErrorHandlerOptions {
  /** Records kept in history; oldest are evicted first (default 100) */
  historyLimit?: number;
  breaker?: CircuitBreaker | CircuitBreakerOptions;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  /** Replace default recovery behaviour per action name */
  hooks?: RecoveryHooks;
}

export interface HandledError {
  info: ErrorInfo;
  /** Present for low-severity failures; resolves to whether recovery succeeded */
  autoRecovery?: Promise<boolean>;
}

export interface ErrorStatistics {
  total: number;
  byCategory: Partial<Record<ErrorCategory, number>>;
  bySeverity: Partial<Record<ErrorSeverity, number>>;
  recent: ErrorInfo[];
}

function scopeOf(context: ErrorContext): { modelName?: string; taskId?: string } {
  return { modelName: context.modelName, taskId: context.taskId };
}

/**
 * Convert a thrown value into the studio error that best matches `category`.
 */
export function toStudioError(error: unknown, category: ErrorCategory): AnyStudioError {
  if (isStudioError(error)) return error;
  const message = errorMessage(error);
  const options = { cause: error };
  switch (category) {
    case "network":
      return new NetworkError(message, options);
    case "timeout":
      return new GenerationTimeoutError(message, options);
    case "rate-limit":
      return new RateLimitError(message, options);
    case "configuration":
      return new InvalidConfigError(message, options);
    case "validation":
      return new InvalidRequestError(message, options);
    case "model-adapter":
      return new BackendError(message, undefined, options);
    default:
      return new GenerationError(message, 0, options);
  }
}

export class ErrorHandler {
  readonly breaker: CircuitBreaker;
  private readonly historyLimit: number;
  private readonly logger: Logger;
  private readonly actions: Map<ErrorCategory, RecoveryAction[]>;
  private history: ErrorInfo[] = [];

  constructor(options: ErrorHandlerOptions = {}) {
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.breaker = options.breaker instanceof CircuitBreaker ? options.breaker : new CircuitBreaker(options.breaker);
    this.logger = options.logger ?? createLogger("errors");
    this.actions = createRecoveryActions({
      logger: this.logger,
      sleep: options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms))),
      hooks: options.hooks,
    });
  }

  /**
   * Record a failure and decide how to surface it.
   *
   * While the breaker for the failure's key is open, the returned record is the
   * high-severity "temporarily unavailable" notice and the breaker is not
   * advanced further.
   */
  handleError(error: unknown, category: ErrorCategory, context: ErrorContext = {}): HandledError {
    const key = breakerKey(category, scopeOf(context));

    if (this.breaker.isOpen(key)) {
      const info = this.record({
        category,
        severity: "high",
        message: CIRCUIT_OPEN_MESSAGE,
        userMessage: CIRCUIT_OPEN_USER_MESSAGE,
        timestamp: new Date(),
        taskId: context.taskId,
        modelName: context.modelName,
        recoveryOptions: ["wait_and_retry"],
        retryCount: 0,
        maxRetries: DEFAULT_MAX_RETRIES,
        context: { ...context },
      });
      this.surface(info);
      return { info };
    }

    const severity = determineSeverity(error, category);
    const info = this.record({
      category,
      severity,
      message: errorMessage(error),
      details: (severity === "high" || severity === "critical") && error instanceof Error ? error.stack : undefined,
      userMessage: generateUserMessage(error, category),
      timestamp: new Date(),
      taskId: context.taskId,
      modelName: context.modelName,
      recoveryOptions: this.getRecoveryActions(category).map((action) => action.name),
      retryCount: typeof context.retryCount === "number" ? context.retryCount : 0,
      maxRetries: DEFAULT_MAX_RETRIES,
      context: { ...context },
    });

    this.breaker.recordFailure(key);
    this.surface(info);

    if (severity === "low" && info.recoveryOptions.length > 0) {
      return { info, autoRecovery: this.attemptAutoRecovery(info) };
    }
    return { info };
  }

  /** Reset the breaker for the success's key */
  recordSuccess(category: ErrorCategory, context: ErrorContext = {}): void {
    this.breaker.recordSuccess(breakerKey(category, scopeOf(context)));
  }

  isCircuitOpen(category: ErrorCategory, context: ErrorContext = {}): boolean {
    return this.breaker.isOpen(breakerKey(category, scopeOf(context)));
  }

  /**
   * Run `operation` behind the breaker for (category, context).
   *
   * An open breaker short-circuits with a {@link CircuitOpenError} without
   * calling `operation`. A success resets the key; a failure advances it.
   * Failures come back as values, never thrown.
   */
  async guard<T>(
    category: ErrorCategory,
    context: ErrorContext,
    operation: () => Promise<T>
  ): Promise<Result<T, AnyStudioError>> {
    const key = breakerKey(category, scopeOf(context));
    if (this.breaker.isOpen(key)) {
      return err(new CircuitOpenError(CIRCUIT_OPEN_MESSAGE, category, { details: { ...context } }));
    }

    try {
      const value = await operation();
      this.breaker.recordSuccess(key);
      return ok(value);
    } catch (error) {
      this.breaker.recordFailure(key);
      return err(toStudioError(error, category));
    }
  }

  getRecoveryActions(category: ErrorCategory): readonly RecoveryAction[] {
    return this.actions.get(category) ?? [];
  }

  /**
   * Run a named recovery action. Resolves to `false` when the action is unknown
   * for the category or fails.
   */
  async executeRecoveryAction(category: ErrorCategory, name: string, info?: ErrorInfo): Promise<boolean> {
    const action = this.getRecoveryActions(category).find((candidate) => candidate.name === name);
    if (!action) {
      this.logger.warn("Unknown recovery action", { category, action: name });
      return false;
    }

    try {
      const succeeded = await action.run(info);
      if (succeeded) this.logger.info("Recovery action completed", { action: name });
      else this.logger.warn("Recovery action completed with warnings", { action: name });
      return succeeded;
    } catch (error) {
      this.logger.error("Recovery action failed", { action: name, error: errorMessage(error) });
      return false;
    }
  }

  getErrorStatistics(): ErrorStatistics {
    const byCategory: Partial<Record<ErrorCategory, number>> = {};
    const bySeverity: Partial<Record<ErrorSeverity, number>> = {};
    for (const info of this.history) {
      byCategory[info.category] = (byCategory[info.category] ?? 0) + 1;
      bySeverity[info.severity] = (bySeverity[info.severity] ?? 0) + 1;
    }
    return { total: this.history.length, byCategory, bySeverity, recent: this.getRecentErrors(10) };
  }

  /** Most recent records, oldest first */
  getRecentErrors(limit = 10): ErrorInfo[] {
    return limit <= 0 ? [] : this.history.slice(-limit);
  }

  clearHistory(): void {
    this.history = [];
  }

  private record(info: ErrorInfo): ErrorInfo {
    const frozen = Object.freeze(info);
    this.history.push(frozen);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }
    return frozen;
  }

  private surface(info: ErrorInfo): void {
    const context = { category: info.category, model: info.modelName, task: info.taskId, message: info.message };
    switch (info.severity) {
      case "critical":
      case "high":
        this.logger.error(info.userMessage, context);
        break;
      case "medium":
        this.logger.warn(info.userMessage, context);
        break;
      case "low":
        this.logger.info(info.userMessage, context);
        break;
    }
  }

  private async attemptAutoRecovery(info: ErrorInfo): Promise<boolean> {
    const first = this.getRecoveryActions(info.category).find((action) => action.name === info.recoveryOptions[0]);
    if (!first || first.requiresUserInput) return false;

    try {
      const succeeded = await first.run(info);
      if (succeeded) this.logger.info("Automatically recovered", { action: first.description });
      return succeeded;
    } catch (error) {
      this.logger.warn("Auto-recovery failed", { action: first.name, error: errorMessage(error) });
      return false;
    }
  }
}
