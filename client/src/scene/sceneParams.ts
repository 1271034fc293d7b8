/**
 * Scene-wide presentation parameters (ambient, background, fog, shadows).
 *
 * Held as data for the renderer collaborator; nothing here draws.
 */

import { Color } from 'three';
import type { ColorTuple } from '../types';

export type FogType = 'none' | 'linear' | 'exp' | 'exp2';

export interface FogParams {
  type: FogType;
  color: Color;
  density: number;
  start: number;
  end: number;
}

export interface SceneParams {
  ambient: Color;
  background: Color;
  shadows: boolean;
  fog: FogParams;
  skyMaterial: string | null;
}

export interface SceneParamsInput {
  ambient?: ColorTuple;
  background?: ColorTuple;
  shadows?: boolean;
  fog?: { type: FogType; color: ColorTuple; density: number; start: number; end: number };
  skyMaterial?: string | null;
}

const FOG_TYPES: readonly FogType[] = ['none', 'linear', 'exp', 'exp2'];

export function defaultSceneParams(): SceneParams {
  return {
    ambient: new Color(0, 0, 0),
    background: new Color(0.7, 0.7, 0.7),
    shadows: true,
    fog: { type: 'none', color: new Color(1, 1, 1), density: 1, start: 1, end: 100 },
    skyMaterial: null,
  };
}

export function toColor([r, g, b]: ColorTuple): Color {
  return new Color(r, g, b);
}

export function validateColor(value: ColorTuple, field: string, errors: string[]): void {
  if (value.length !== 3 || value.some((c) => !Number.isFinite(c) || c < 0 || c > 1)) {
    errors.push(`${field} must be [r, g, b] with components in [0, 1]`);
  }
}

/** Collect every problem with a fog definition. */
export function validateFog(
  type: FogType,
  color: ColorTuple,
  density: number,
  start: number,
  end: number,
): string[] {
  const errors: string[] = [];
  if (!FOG_TYPES.includes(type)) errors.push(`fog type must be one of ${FOG_TYPES.join(', ')}`);
  validateColor(color, 'fog color', errors);
  if (!Number.isFinite(density) || density < 0) errors.push('fog density must be a non-negative number');
  if (!Number.isFinite(start) || start < 0) errors.push('fog start must be a non-negative number');
  if (!Number.isFinite(end) || end < start) errors.push(`fog end (${end}) must not be smaller than fog start (${start})`);
  return errors;
}

/** Merge `input` over the defaults; throws listing every invalid field. */
export function createSceneParams(input: SceneParamsInput = {}): SceneParams {
  const params = defaultSceneParams();
  const errors: string[] = [];

  if (input.ambient) {
    validateColor(input.ambient, 'ambient', errors);
    params.ambient = toColor(input.ambient);
  }
  if (input.background) {
    validateColor(input.background, 'background', errors);
    params.background = toColor(input.background);
  }
  if (input.shadows !== undefined) params.shadows = input.shadows;
  if (input.skyMaterial !== undefined) params.skyMaterial = input.skyMaterial;
  if (input.fog) {
    const { type, color, density, start, end } = input.fog;
    errors.push(...validateFog(type, color, density, start, end));
    params.fog = { type, color: toColor(color), density, start, end };
  }

  if (errors.length > 0) {
    throw new Error(`Invalid scene params: ${errors.join('; ')}`);
  }
  return params;
}
