/**
 * @module errors
 * @description Typed failures and the `Result` value used by wrappers that
 * report errors instead of throwing.
 *
 * Every failure raised by the orchestration layer is a {@link StudioError}
 * with a `kind` discriminant, so callers can `switch (error.kind)` rather
 * than catching broad exception hierarchies.
 */

/**
 * Error taxonomy used by the error handler, circuit breaker and recovery actions.
 */
export type ErrorCategory =
  | "model-adapter"
  | "generation"
  | "asset-management"
  | "workflow"
  | "configuration"
  | "rendering"
  | "template"
  | "scene-processing"
  | "network"
  | "timeout"
  | "rate-limit"
  | "validation";

export const ERROR_CATEGORIES: readonly ErrorCategory[] = [
  "model-adapter",
  "generation",
  "asset-management",
  "workflow",
  "configuration",
  "rendering",
  "template",
  "scene-processing",
  "network",
  "timeout",
  "rate-limit",
  "validation",
];

export type StudioErrorKind =
  | "invalid-config"
  | "no-suitable-model"
  | "generation-failed"
  | "invalid-request"
  | "backend"
  | "rate-limited"
  | "network"
  | "timeout"
  | "job-not-found"
  | "unsupported-operation"
  | "circuit-open";

export interface StudioErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

/**
 * Base class of every failure the orchestration layer raises.
 */
export abstract class StudioError extends Error {
  abstract readonly kind: StudioErrorKind;
  abstract readonly category: ErrorCategory;
  readonly details: Record<string, unknown>;

  constructor(message: string, options: StudioErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.details = options.details ?? {};
  }
}

/** A request is outside the bounds of the generic or model-specific limits */
export class InvalidConfigError extends StudioError {
  readonly kind = "invalid-config" as const;
  readonly category = "configuration" as const;
}

/** No enabled adapter accepts the request */
export class NoSuitableModelError extends StudioError {
  readonly kind = "no-suitable-model" as const;
  readonly category = "configuration" as const;

  /** Why each enabled adapter turned the request down */
  readonly rejections: Record<string, string>;

  constructor(message: string, rejections: Record<string, string> = {}, options: StudioErrorOptions = {}) {
    super(message, options);
    this.rejections = rejections;
  }
}

/** A generation could not be started or completed */
export class GenerationError extends StudioError {
  readonly kind = "generation-failed" as const;
  readonly category = "generation" as const;

  /** Fallback attempts made before giving up */
  readonly retryCount: number;

  constructor(message: string, retryCount = 0, options: StudioErrorOptions = {}) {
    super(message, options);
    this.retryCount = retryCount;
  }
}

/** The backend rejected the request as malformed (HTTP 400); never retried */
export class InvalidRequestError extends StudioError {
  readonly kind = "invalid-request" as const;
  readonly category = "validation" as const;
}

/** Non-transient backend failure: auth (401), billing (402) or an unexpected status */
export class BackendError extends StudioError {
  readonly kind = "backend" as const;
  readonly category = "model-adapter" as const;
  readonly status?: number;

  constructor(message: string, status?: number, options: StudioErrorOptions = {}) {
    super(message, options);
    this.status = status;
  }
}

/** Rate limit still in force after every backoff attempt */
export class RateLimitError extends StudioError {
  readonly kind = "rate-limited" as const;
  readonly category = "rate-limit" as const;
}

/** Transport failure still occurring after every backoff attempt */
export class NetworkError extends StudioError {
  readonly kind = "network" as const;
  readonly category = "network" as const;
}

/** A wait deadline elapsed before the job reached a terminal status */
export class GenerationTimeoutError extends StudioError {
  readonly kind = "timeout" as const;
  readonly category = "timeout" as const;
}

/** No backend recognizes the job id */
export class JobNotFoundError extends StudioError {
  readonly kind = "job-not-found" as const;
  readonly category = "generation" as const;
}

/** The backend has no endpoint for the requested operation */
export class UnsupportedOperationError extends StudioError {
  readonly kind = "unsupported-operation" as const;
  readonly category = "model-adapter" as const;
}

/** Short-circuited by an open circuit breaker; the operation was not attempted */
export class CircuitOpenError extends StudioError {
  readonly kind = "circuit-open" as const;
  readonly category: ErrorCategory;

  constructor(message: string, category: ErrorCategory, options: StudioErrorOptions = {}) {
    super(message, options);
    this.category = category;
  }
}

export type AnyStudioError =
  | InvalidConfigError
  | NoSuitableModelError
  | GenerationError
  | InvalidRequestError
  | BackendError
  | RateLimitError
  | NetworkError
  | GenerationTimeoutError
  | JobNotFoundError
  | UnsupportedOperationError
  | CircuitOpenError;

type ErrorOfKind<K extends StudioErrorKind> = Extract<AnyStudioError, { kind: K }>;

/**
 * Narrow an unknown value to a studio error, optionally of a specific kind.
 */
export function isStudioError(error: unknown): error is AnyStudioError;
export function isStudioError<K extends StudioErrorKind>(error: unknown, kind: K): error is ErrorOfKind<K>;
export function isStudioError(error: unknown, kind?: StudioErrorKind): boolean {
  if (!(error instanceof StudioError)) return false;
  return kind === undefined || error.kind === kind;
}

/** Message of any thrown value */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "Unknown error";
}

/**
 * Outcome of an operation that reports failure as a value.
 */
export type Result<T, E = AnyStudioError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
