/**
 * @module scene-validator
 * @description Parses multi-shot generation scripts into validated scenes.
 *
 * A script is `{ "scenes": [ { scene_id, visual_prompt, duration, ... } ] }`.
 * Each scene is checked on its own; scenes without errors are returned even
 * when others fail, so callers must check `isValid` before treating the
 * result as complete.
 */

import { readFile, stat } from "node:fs/promises";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import type { Scene } from "../types/scene.js";

const logger = createLogger("script");

export const MAX_SCENE_ID_LENGTH = 100;
export const MAX_VISUAL_PROMPT_LENGTH = 1000;
export const RECOMMENDED_SCENE_DURATION = 60;
export const RECOMMENDED_SCRIPT_DURATION = 300;
export const RECOMMENDED_SCENE_COUNT = 50;

/** One field-level problem; `field` is a dotted path such as `scenes[2].duration` */
export interface ValidationIssue {
  field: string;
  message: string;
  value?: unknown;
}

export interface ScriptValidationResult {
  isValid: boolean;
  errors: ValidationIssue[];
  warnings: string[];
  /** Scenes that passed every check, in script order */
  scenes: Scene[];
}

type FieldType = "string" | "number";

const REQUIRED_FIELDS: ReadonlyArray<[string, FieldType]> = [
  ["scene_id", "string"],
  ["visual_prompt", "string"],
  ["duration", "number"],
];

const OPTIONAL_FIELDS: readonly string[] = ["camera_movement", "lighting", "reference_image"];

const KNOWN_FIELDS = new Set<string>([...REQUIRED_FIELDS.map(([name]) => name), ...OPTIONAL_FIELDS]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasType(value: unknown, type: FieldType): boolean {
  return type === "string" ? typeof value === "string" : typeof value === "number" && Number.isFinite(value);
}

function failure(field: string, message: string): ScriptValidationResult {
  return { isValid: false, errors: [{ field, message }], warnings: [], scenes: [] };
}

interface SceneCheck {
  errors: ValidationIssue[];
  warnings: string[];
  scene?: Scene;
}

function validateScene(data: unknown, index: number): SceneCheck {
  const errors: ValidationIssue[] = [];
  const warnings: string[] = [];
  const path = `scenes[${index}]`;

  if (!isRecord(data)) {
    return { errors: [{ field: path, message: "Scene must be an object" }], warnings };
  }

  for (const [name, type] of REQUIRED_FIELDS) {
    const field = `${path}.${name}`;
    if (!(name in data)) {
      errors.push({ field, message: `Required field '${name}' is missing` });
      continue;
    }
    const value = data[name];
    if (!hasType(value, type)) {
      errors.push({ field, message: `Field '${name}' must be of type ${type}`, value });
      continue;
    }

    if (name === "scene_id" && typeof value === "string") {
      if (value.trim() === "") errors.push({ field, message: "Scene ID cannot be empty" });
      else if (value.length > MAX_SCENE_ID_LENGTH) {
        errors.push({ field, message: `Scene ID cannot exceed ${MAX_SCENE_ID_LENGTH} characters`, value });
      }
    } else if (name === "visual_prompt" && typeof value === "string") {
      if (value.trim() === "") errors.push({ field, message: "Visual prompt cannot be empty" });
      else if (value.length > MAX_VISUAL_PROMPT_LENGTH) {
        errors.push({
          field,
          message: `Visual prompt cannot exceed ${MAX_VISUAL_PROMPT_LENGTH} characters (got ${value.length})`,
        });
      }
    } else if (name === "duration" && typeof value === "number") {
      if (value <= 0) errors.push({ field, message: "Duration must be positive", value });
      else if (value > RECOMMENDED_SCENE_DURATION) {
        warnings.push(
          `Scene ${index}: Duration (${value}s) exceeds recommended maximum (${RECOMMENDED_SCENE_DURATION}s)`
        );
      }
    }
  }

  for (const name of OPTIONAL_FIELDS) {
    const value = data[name];
    if (value !== undefined && value !== null && typeof value !== "string") {
      errors.push({ field: `${path}.${name}`, message: `Field '${name}' must be of type string`, value });
    }
  }

  const unknown = Object.keys(data).filter((key) => !KNOWN_FIELDS.has(key));
  if (unknown.length > 0) {
    warnings.push(`Scene ${index}: Unknown fields ignored: ${unknown.join(", ")}`);
  }

  if (errors.length > 0) return { errors, warnings };

  const optional = (name: string): string | undefined => {
    const value = data[name];
    return typeof value === "string" ? value : undefined;
  };
  const sceneId = data.scene_id;
  const visualPrompt = data.visual_prompt;
  const duration = data.duration;
  if (typeof sceneId !== "string" || typeof visualPrompt !== "string" || typeof duration !== "number") {
    return { errors, warnings };
  }

  return {
    errors,
    warnings,
    scene: {
      sceneId,
      visualPrompt,
      duration,
      cameraMovement: optional("camera_movement"),
      lighting: optional("lighting"),
      referenceImage: optional("reference_image"),
    },
  };
}

/**
 * Validate a script given as JSON text or as an already-parsed value.
 */
export function parseScript(input: unknown): ScriptValidationResult {
  let data: unknown = input;
  if (typeof input === "string") {
    try {
      data = JSON.parse(input);
    } catch (error) {
      return failure("json_format", `Invalid JSON format: ${errorMessage(error)}`);
    }
  }

  if (!isRecord(data)) return failure("root", "Script must be a JSON object");
  if (!("scenes" in data)) return failure("scenes", "Script must contain a 'scenes' array");

  const entries = data.scenes;
  if (!Array.isArray(entries)) return failure("scenes", "'scenes' must be an array");
  if (entries.length === 0) {
    return { isValid: true, errors: [], warnings: ["Script contains no scenes"], scenes: [] };
  }

  const errors: ValidationIssue[] = [];
  const warnings: string[] = [];
  const scenes: Scene[] = [];
  const seen = new Set<string>();

  entries.forEach((entry: unknown, index: number) => {
    const check = validateScene(entry, index);
    errors.push(...check.errors);
    warnings.push(...check.warnings);
    if (!check.scene) return;

    if (seen.has(check.scene.sceneId)) {
      errors.push({
        field: `scenes[${index}].scene_id`,
        message: `Duplicate scene ID: ${check.scene.sceneId}`,
        value: check.scene.sceneId,
      });
      return;
    }
    seen.add(check.scene.sceneId);
    scenes.push(check.scene);
  });

  if (scenes.length > 0) {
    const totalDuration = scenes.reduce((sum, scene) => sum + scene.duration, 0);
    if (totalDuration > RECOMMENDED_SCRIPT_DURATION) {
      warnings.push(
        `Total script duration (${totalDuration}s) exceeds recommended maximum (${RECOMMENDED_SCRIPT_DURATION}s)`
      );
    }
    if (scenes.length > RECOMMENDED_SCENE_COUNT) {
      warnings.push(
        `Script contains ${scenes.length} scenes, which exceeds recommended maximum (${RECOMMENDED_SCENE_COUNT})`
      );
    }
  }

  return { isValid: errors.length === 0, errors, warnings, scenes };
}

/**
 * Read and validate a script file. Problems reaching the file are reported as
 * a `file` error rather than thrown.
 */
export async function validateScriptFile(path: string): Promise<ScriptValidationResult> {
  try {
    const info = await stat(path).catch(() => undefined);
    if (!info) return failure("file", `Script file not found: ${path}`);
    if (!info.isFile()) return failure("file", `Path is not a file: ${path}`);

    const content = await readFile(path, "utf-8");
    return parseScript(content);
  } catch (error) {
    logger.error("Error reading script file", { path, error: errorMessage(error) });
    return failure("file", `Error reading file: ${errorMessage(error)}`);
  }
}

/**
 * Numbered list of errors followed by warnings, for display.
 */
export function summarizeValidation(result: ScriptValidationResult): string {
  if (result.errors.length === 0) return "No errors found";

  const lines = [`Found ${result.errors.length} validation error(s):`];
  result.errors.forEach((issue, i) => lines.push(`${i + 1}. ${issue.field}: ${issue.message}`));

  if (result.warnings.length > 0) {
    lines.push("", `Warnings (${result.warnings.length}):`);
    result.warnings.forEach((warning, i) => lines.push(`${i + 1}. ${warning}`));
  }
  return lines.join("\n");
}
