import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { parseScript, summarizeValidation, validateScriptFile } from "./scene-validator.js";
import { createSampleScript, getValidationSchema } from "./sample.js";
import { scriptToJSON, type Scene } from "../types/scene.js";

const scene = (overrides: Record<string, unknown> = {}) => ({
  scene_id: "intro",
  visual_prompt: "A sunrise over the bay",
  duration: 5,
  ...overrides,
});

describe("parseScript", () => {
  it("parses a valid script", () => {
    const result = parseScript({
      scenes: [scene(), scene({ scene_id: "outro", camera_movement: "pan_left", lighting: "golden hour" })],
    });

    expect(result.isValid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect(result.scenes).toEqual([
      {
        sceneId: "intro",
        visualPrompt: "A sunrise over the bay",
        duration: 5,
        cameraMovement: undefined,
        lighting: undefined,
        referenceImage: undefined,
      },
      {
        sceneId: "outro",
        visualPrompt: "A sunrise over the bay",
        duration: 5,
        cameraMovement: "pan_left",
        lighting: "golden hour",
        referenceImage: undefined,
      },
    ]);
  });

  it("accepts JSON text", () => {
    const result = parseScript(JSON.stringify({ scenes: [scene()] }));
    expect(result.isValid).toBe(true);
    expect(result.scenes).toHaveLength(1);
  });

  it("reports malformed JSON", () => {
    const result = parseScript("{ not json");
    expect(result.isValid).toBe(false);
    expect(result.errors[0].field).toBe("json_format");
    expect(result.errors[0].message).toMatch(/^Invalid JSON format: /);
  });

  it.each([
    [[], "root", "Script must be a JSON object"],
    ["[1, 2]", "root", "Script must be a JSON object"],
    [{ title: "x" }, "scenes", "Script must contain a 'scenes' array"],
    [{ scenes: "nope" }, "scenes", "'scenes' must be an array"],
  ])("rejects the root %j", (input, field, message) => {
    const result = parseScript(input);
    expect(result).toEqual({ isValid: false, errors: [{ field, message }], warnings: [], scenes: [] });
  });

  it("treats an empty scene list as valid with a warning", () => {
    expect(parseScript({ scenes: [] })).toEqual({
      isValid: true,
      errors: [],
      warnings: ["Script contains no scenes"],
      scenes: [],
    });
  });

  it("reports field errors with dotted paths", () => {
    const result = parseScript({
      scenes: [
        "not an object",
        { visual_prompt: "p", duration: 5 },
        scene({ scene_id: 7 }),
        scene({ scene_id: "  " }),
        scene({ scene_id: "x".repeat(101) }),
        scene({ scene_id: "a", visual_prompt: "" }),
        scene({ scene_id: "b", duration: 0 }),
        scene({ scene_id: "c", lighting: 3 }),
      ],
    });

    expect(result.isValid).toBe(false);
    expect(result.errors.map((issue) => `${issue.field}: ${issue.message}`)).toEqual([
      "scenes[0]: Scene must be an object",
      "scenes[1].scene_id: Required field 'scene_id' is missing",
      "scenes[2].scene_id: Field 'scene_id' must be of type string",
      "scenes[3].scene_id: Scene ID cannot be empty",
      "scenes[4].scene_id: Scene ID cannot exceed 100 characters",
      "scenes[5].visual_prompt: Visual prompt cannot be empty",
      "scenes[6].duration: Duration must be positive",
      "scenes[7].lighting: Field 'lighting' must be of type string",
    ]);
    expect(result.scenes).toEqual([]);
  });

  it("rejects an over-long visual prompt", () => {
    const result = parseScript({ scenes: [scene({ visual_prompt: "v".repeat(1001) })] });

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual([
      {
        field: "scenes[0].visual_prompt",
        message: "Visual prompt cannot exceed 1000 characters (got 1001)",
      },
    ]);
  });

  it("attributes a duplicate id to the later scene and keeps the first", () => {
    const result = parseScript({
      scenes: [scene(), scene({ visual_prompt: "other" }), scene({ scene_id: "next" })],
    });

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual([
      { field: "scenes[1].scene_id", message: "Duplicate scene ID: intro", value: "intro" },
    ]);
    expect(result.scenes.map((s) => s.sceneId)).toEqual(["intro", "next"]);
  });

  it("returns the valid scenes of an invalid script", () => {
    const result = parseScript({ scenes: [scene(), { scene_id: "broken" }] });

    expect(result.isValid).toBe(false);
    expect(result.scenes.map((s) => s.sceneId)).toEqual(["intro"]);
  });

  it("accepts null optional fields as absent", () => {
    const result = parseScript({ scenes: [scene({ reference_image: null })] });

    expect(result.isValid).toBe(true);
    expect(result.scenes[0].referenceImage).toBeUndefined();
  });

  it("warns about long scenes and unknown fields", () => {
    const result = parseScript({ scenes: [scene({ duration: 61, mood: "calm", tempo: 2 })] });

    expect(result.isValid).toBe(true);
    expect(result.warnings).toEqual([
      "Scene 0: Duration (61s) exceeds recommended maximum (60s)",
      "Scene 0: Unknown fields ignored: mood, tempo",
    ]);
  });

  it("warns about long scripts and many scenes", () => {
    const scenes = Array.from({ length: 51 }, (_, i) => scene({ scene_id: `s${i}`, duration: 6 }));
    const result = parseScript({ scenes });

    expect(result.isValid).toBe(true);
    expect(result.warnings).toEqual([
      "Total script duration (306s) exceeds recommended maximum (300s)",
      "Script contains 51 scenes, which exceeds recommended maximum (50)",
    ]);
  });

  it("parses what scriptToJSON writes back to the same scenes", () => {
    const scenes: Scene[] = [
      { sceneId: "a", visualPrompt: "first", duration: 2.5, cameraMovement: "zoom_in" },
      { sceneId: "b", visualPrompt: "second", duration: 4, lighting: "neon", referenceImage: "asset_9" },
    ];

    const reparsed = parseScript(JSON.stringify(scriptToJSON(scenes))).scenes;

    expect(reparsed.map((s) => [s.sceneId, s.visualPrompt, s.duration, s.cameraMovement, s.lighting, s.referenceImage]))
      .toEqual([
        ["a", "first", 2.5, "zoom_in", undefined, undefined],
        ["b", "second", 4, undefined, "neon", "asset_9"],
      ]);
  });
});

describe("summarizeValidation", () => {
  it("numbers errors and warnings", () => {
    const result = parseScript({ scenes: [scene({ duration: 90 }), { scene_id: "x" }] });

    expect(summarizeValidation(result)).toBe(
      [
        "Found 2 validation error(s):",
        "1. scenes[1].visual_prompt: Required field 'visual_prompt' is missing",
        "2. scenes[1].duration: Required field 'duration' is missing",
        "",
        "Warnings (1):",
        "1. Scene 0: Duration (90s) exceeds recommended maximum (60s)",
      ].join("\n")
    );
  });

  it("says so when there are no errors", () => {
    expect(summarizeValidation(parseScript({ scenes: [scene()] }))).toBe("No errors found");
  });
});

describe("sample script and schema", () => {
  it("creates a script that validates", () => {
    const sample = createSampleScript(3, new Date("2026-01-02T03:04:05.000Z"));

    expect(sample.created_at).toBe("2026-01-02T03:04:05.000Z");
    expect(sample.scenes.map((s) => s.reference_image)).toEqual(["asset_id_1", "asset_id_2", null]);

    const result = parseScript(sample);
    expect(result.isValid).toBe(true);
    expect(result.warnings).toEqual([]);
    expect(result.scenes).toHaveLength(3);
  });

  it("describes the required scene fields", () => {
    const schema = getValidationSchema();
    expect(schema.required).toEqual(["scenes"]);
  });
});

describe("validateScriptFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "clipmesh-script-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("validates a file on disk", async () => {
    const path = join(dir, "script.json");
    await writeFile(path, JSON.stringify({ scenes: [scene()] }), "utf-8");

    const result = await validateScriptFile(path);
    expect(result.isValid).toBe(true);
    expect(result.scenes).toHaveLength(1);
  });

  it("reports a missing file", async () => {
    const path = join(dir, "missing.json");
    const result = await validateScriptFile(path);

    expect(result.errors).toEqual([{ field: "file", message: `Script file not found: ${path}` }]);
  });

  it("reports a directory", async () => {
    const path = join(dir, "nested");
    await mkdir(path);

    const result = await validateScriptFile(path);
    expect(result.errors).toEqual([{ field: "file", message: `Path is not a file: ${path}` }]);
  });
});
