import { MAX_SCENE_ID_LENGTH, MAX_VISUAL_PROMPT_LENGTH, RECOMMENDED_SCENE_DURATION } from "./scene-validator.js";

export interface SampleScript {
  title: string;
  description: string;
  created_at: string;
  scenes: Array<{
    scene_id: string;
    visual_prompt: string;
    duration: number;
    camera_movement: string;
    lighting: string;
    reference_image: string | null;
  }>;
}

/**
 * A valid script with `count` scenes, for demos and as a starting template.
 */
export function createSampleScript(count = 3, now: Date = new Date()): SampleScript {
  return {
    title: "Sample Video Script",
    description: "A sample script for product video generation",
    created_at: now.toISOString(),
    scenes: Array.from({ length: Math.max(0, count) }, (_, i) => ({
      scene_id: `scene_${i + 1}`,
      visual_prompt: `A beautiful product showcase scene ${i + 1} with professional lighting`,
      duration: 5,
      camera_movement: i % 2 === 0 ? "zoom_in" : "pan_left",
      lighting: "soft_studio_lighting",
      reference_image: i < 2 ? `asset_id_${i + 1}` : null,
    })),
  };
}

/** JSON schema of the script format */
export function getValidationSchema(): Record<string, unknown> {
  return {
    type: "object",
    required: ["scenes"],
    properties: {
      title: { type: "string" },
      description: { type: "string" },
      created_at: { type: "string" },
      scenes: {
        type: "array",
        items: {
          type: "object",
          required: ["scene_id", "visual_prompt", "duration"],
          properties: {
            scene_id: { type: "string", minLength: 1, maxLength: MAX_SCENE_ID_LENGTH },
            visual_prompt: { type: "string", minLength: 1, maxLength: MAX_VISUAL_PROMPT_LENGTH },
            duration: { type: "number", exclusiveMinimum: 0, maximum: RECOMMENDED_SCENE_DURATION },
            camera_movement: { type: ["string", "null"] },
            lighting: { type: ["string", "null"] },
            reference_image: { type: ["string", "null"] },
          },
          additionalProperties: false,
        },
      },
    },
    additionalProperties: true,
  };
}
