import type { ErrorCategory } from "../errors.js";

/** Resource identifiers a breaker key is derived from */
export interface BreakerScope {
  modelName?: string;
  taskId?: string;
}

export interface BreakerState {
  failureCount: number;
  lastFailureAt?: number;
}

export interface CircuitBreakerOptions {
  /** Failures that open the breaker (default 5) */
  threshold?: number;
  /** How long an open breaker stays open after the last failure, in ms (default 5 minutes) */
  cooldownMs?: number;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

export const DEFAULT_BREAKER_THRESHOLD = 5;
export const DEFAULT_BREAKER_COOLDOWN_MS = 5 * 60 * 1000;

/** `category[_model][_task]` */
export function breakerKey(category: ErrorCategory, scope: BreakerScope = {}): string {
  let key: string = category;
  if (scope.modelName !== undefined) key += `_${scope.modelName}`;
  if (scope.taskId !== undefined) key += `_${scope.taskId}`;
  return key;
}

/**
 * Failure counters per (category, resource) key.
 *
 * A key opens once it has `threshold` failures and the latest is younger than
 * the cooldown; the first check after the cooldown clears the counter.
 */
export class CircuitBreaker {
  readonly threshold: number;
  readonly cooldownMs: number;
  private readonly now: () => number;
  private states: Map<string, BreakerState> = new Map();

  constructor(options: CircuitBreakerOptions = {}) {
    this.threshold = options.threshold ?? DEFAULT_BREAKER_THRESHOLD;
    this.cooldownMs = options.cooldownMs ?? DEFAULT_BREAKER_COOLDOWN_MS;
    this.now = options.now ?? Date.now;
  }

  isOpen(key: string): boolean {
    const state = this.states.get(key);
    if (!state || state.failureCount < this.threshold) return false;

    if (state.lastFailureAt !== undefined && this.now() - state.lastFailureAt < this.cooldownMs) {
      return true;
    }
    this.states.set(key, { failureCount: 0 });
    return false;
  }

  recordFailure(key: string): BreakerState {
    const previous = this.states.get(key);
    const next: BreakerState = {
      failureCount: (previous?.failureCount ?? 0) + 1,
      lastFailureAt: this.now(),
    };
    this.states.set(key, next);
    return next;
  }

  recordSuccess(key: string): void {
    if (this.states.has(key)) {
      this.states.set(key, { failureCount: 0 });
    }
  }

  getState(key: string): BreakerState | undefined {
    const state = this.states.get(key);
    return state ? { ...state } : undefined;
  }

  reset(): void {
    this.states.clear();
  }
}
