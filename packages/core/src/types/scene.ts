/**
 * One shot of a multi-shot generation script.
 *
 * Built by the script validator from `scenes[]` entries and consumed by
 * batch generation.
 */
export interface Scene {
  /** Unique identifier within the script (1-100 characters) */
  readonly sceneId: string;
  /** Prompt describing the shot (1-1000 characters) */
  readonly visualPrompt: string;
  /** Duration in seconds */
  readonly duration: number;
  /** Camera movement tag */
  readonly cameraMovement?: string;
  /** Lighting description */
  readonly lighting?: string;
  /** Reference image (URL or asset id) */
  readonly referenceImage?: string;
}

/** Script JSON form of a {@link Scene} */
export interface SceneJSON {
  scene_id: string;
  visual_prompt: string;
  duration: number;
  camera_movement?: string;
  lighting?: string;
  reference_image?: string;
}

/** Serialize a scene to its script JSON form, leaving out absent optional fields */
export function sceneToJSON(scene: Scene): SceneJSON {
  const json: SceneJSON = {
    scene_id: scene.sceneId,
    visual_prompt: scene.visualPrompt,
    duration: scene.duration,
  };
  if (scene.cameraMovement !== undefined) json.camera_movement = scene.cameraMovement;
  if (scene.lighting !== undefined) json.lighting = scene.lighting;
  if (scene.referenceImage !== undefined) json.reference_image = scene.referenceImage;
  return json;
}

/** Wrap scenes in a script root object */
export function scriptToJSON(scenes: readonly Scene[]): { scenes: SceneJSON[] } {
  return { scenes: scenes.map(sceneToJSON) };
}
