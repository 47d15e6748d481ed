/**
 * Shared plumbing for commands that talk to the generation engine
 */

import chalk from "chalk";
import { InvalidRequestError, errorMessage, isStudioError, type GenerationResult } from "@clipmesh/core";
import { isModelName, resolveConfig } from "../config/index.js";
import { createStudioContext, type StudioContext } from "../engine/context.js";
import { getApiKey, loadEnv } from "../utils/api-key.js";
import { closeTTYStream } from "../utils/tty.js";

export interface StudioRequest {
  /** Model the command asked for by name */
  model?: string;
  /** Key given on the command line for that model */
  apiKey?: string;
}

/**
 * Build a context from ~/.clipmesh/config.yaml, .env and the environment.
 * A requested model without a key gets one from the option or a prompt.
 */
export async function openStudio(request: StudioRequest = {}): Promise<StudioContext> {
  loadEnv();
  const config = await resolveConfig();

  const { model } = request;
  if (model !== undefined && isModelName(model)) {
    const settings = config.models[model];
    if (request.apiKey || !settings.apiKey) {
      const apiKey = await getApiKey(model, request.apiKey);
      if (apiKey) config.models[model] = { ...settings, apiKey, enabled: true };
    }
  }

  return createStudioContext(config);
}

/**
 * Run `fn` against a fresh context, closing it afterwards. Failures are
 * printed and turn into a non-zero exit code.
 */
export async function withStudio(
  fn: (studio: StudioContext) => Promise<void>,
  request: StudioRequest = {}
): Promise<void> {
  let studio: StudioContext | undefined;
  try {
    studio = await openStudio(request);
    await fn(studio);
  } catch (error) {
    reportFailure(error);
  } finally {
    closeTTYStream();
    await studio?.close();
  }
}

export function reportFailure(error: unknown): void {
  const kind = isStudioError(error) ? chalk.dim(` [${error.kind}]`) : "";
  console.error(chalk.red(`Error: ${errorMessage(error)}`) + kind);
  process.exitCode = 1;
}

/**
 * Parse a numeric option, failing with the option's name
 */
export function parseNumber(value: string | undefined, option: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidRequestError(`Option ${option} expects a number, got '${value}'`);
  }
  return parsed;
}

export function parseInteger(value: string | undefined, option: string): number | undefined {
  const parsed = parseNumber(value, option);
  if (parsed !== undefined && !Number.isInteger(parsed)) {
    throw new InvalidRequestError(`Option ${option} expects an integer, got '${value}'`);
  }
  return parsed;
}

const STATUS_COLORS: Record<GenerationResult["status"], (text: string) => string> = {
  pending: chalk.dim,
  queued: chalk.cyan,
  processing: chalk.yellow,
  completed: chalk.green,
  failed: chalk.red,
  cancelled: chalk.gray,
};

/** One-line summary of a job */
export function formatResult(result: GenerationResult): string {
  const status = STATUS_COLORS[result.status](result.status.padEnd(10));
  const progress = `${Math.round(result.progress * 100)}%`.padStart(4);
  const detail = result.videoUrl ?? result.errorMessage ?? "";
  return `${status} ${progress}  ${result.jobId}${detail ? `  ${detail}` : ""}`;
}

/** JSON form of a job, dates as ISO strings */
export function resultToJSON(result: GenerationResult): Record<string, unknown> {
  return {
    ...result,
    estimatedCompletion: result.estimatedCompletion?.toISOString(),
  };
}
