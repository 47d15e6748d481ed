/**
 * @module logger
 * @description Scoped, levelled logging to stderr.
 *
 * Lines read `[scope] message key=value ...` and are coloured by level with
 * chalk. The threshold comes from `CLIPMESH_LOG_LEVEL` (default `warn`) or
 * {@link setLogLevel}.
 */

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogContext = Record<string, unknown>;

/** Receives every line that passes the level threshold */
export type LogSink = (level: Exclude<LogLevel, "silent">, line: string) => void;

export interface Logger {
  readonly scope: string;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** One backend call: operation name, duration and outcome */
  modelCall(model: string, operation: string, outcome: { durationMs: number; success: boolean; error?: string }): void;
  taskStart(taskId: string, type: string): void;
  taskComplete(taskId: string, durationMs: number): void;
  taskError(taskId: string, error: string): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

function levelFromEnv(): LogLevel {
  const fromEnv = process.env.CLIPMESH_LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : "warn";
}

let currentLevel: LogLevel = levelFromEnv();

const consoleSink: LogSink = (level, line) => {
  const paint =
    level === "error" ? chalk.red : level === "warn" ? chalk.yellow : level === "info" ? chalk.cyan : chalk.dim;
  console.error(paint(line));
};

let currentSink: LogSink = consoleSink;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Route log lines somewhere other than stderr. Pass nothing to restore the default.
 */
export function setLogSink(sink?: LogSink): void {
  currentSink = sink ?? consoleSink;
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return /\s/.test(value) ? JSON.stringify(value) : value;
  if (value instanceof Date) return value.toISOString();
  if (value === undefined) return "undefined";
  return JSON.stringify(value) ?? String(value);
}

/** Render one log line without colour */
export function formatLine(scope: string, message: string, context?: LogContext): string {
  const pairs = context
    ? Object.entries(context)
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => `${key}=${formatValue(value)}`)
    : [];
  return [`[${scope}]`, message, ...pairs].join(" ");
}

/**
 * Create a logger whose lines are prefixed with `scope`.
 */
export function createLogger(scope: string): Logger {
  const emit = (level: Exclude<LogLevel, "silent">, message: string, context?: LogContext): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
    currentSink(level, formatLine(scope, message, context));
  };

  return {
    scope,
    debug: (message, context) => emit("debug", message, context),
    info: (message, context) => emit("info", message, context),
    warn: (message, context) => emit("warn", message, context),
    error: (message, context) => emit("error", message, context),
    modelCall(model, operation, outcome) {
      const context = { model, operation, durationMs: Math.round(outcome.durationMs), error: outcome.error };
      if (outcome.success) emit("info", "Model call succeeded", context);
      else emit("error", "Model call failed", context);
    },
    taskStart: (taskId, type) => emit("info", "Task started", { taskId, type }),
    taskComplete: (taskId, durationMs) => emit("info", "Task completed", { taskId, durationMs: Math.round(durationMs) }),
    taskError: (taskId, error) => emit("error", "Task failed", { taskId, error }),
  };
}
