/**
 * ECS component definitions (bitECS v0.4 API).
 *
 * Components are plain objects, created per scene world. Tags carry no
 * data; `Visible` keeps a 0/1 flag per eid so renderers can read it
 * without touching the entity records.
 */

export interface SceneComponents {
  /** Tag: entity is a visual. */
  IsVisual: Record<string, never>;
  /** Tag: entity is a light. */
  IsLight: Record<string, never>;
  /** Tag: entity is the current interaction target (at most one). */
  Selected: Record<string, never>;
  /** Visibility flag indexed by eid, 1 = shown. */
  Visible: { value: number[] };
}

export function createSceneComponents(): SceneComponents {
  return {
    IsVisual: {},
    IsLight: {},
    Selected: {},
    Visible: { value: [] },
  };
}
