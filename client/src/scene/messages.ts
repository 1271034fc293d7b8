/**
 * Validation of inbound topic payloads.
 *
 * The transport hands over decoded but untyped values. Each validator
 * returns a typed message or the first problem found; callers drop the
 * message and report the reason.
 */

import { Color, Quaternion, Vector3 } from 'three';
import {
  err,
  ok,
  type ColorTuple,
  type LightAttenuation,
  type LightMessage,
  type LightParams,
  type LightType,
  type Pose,
  type PoseMessage,
  type Result,
  type SceneMessage,
  type SelectionMessage,
  type Vec3Tuple,
  type QuatTuple,
  type VisualAttributes,
  type VisualMessage,
} from '../types';

const LIGHT_TYPES: readonly LightType[] = ['point', 'spot', 'directional'];

const DEFAULT_ATTENUATION: LightAttenuation = { range: 10, constant: 1, linear: 0, quadratic: 0 };

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isTuple(value: unknown, length: number): value is number[] {
  return Array.isArray(value) && value.length === length && value.every(isFiniteNumber);
}

function isLightType(value: unknown): value is LightType {
  return LIGHT_TYPES.some((type) => type === value);
}

function isId(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

function optionalString(fields: Fields, key: string, errors: string[]): string | undefined {
  const value = fields[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') errors.push(`${key} must be a string`);
  return typeof value === 'string' ? value : undefined;
}

function optionalBoolean(fields: Fields, key: string, errors: string[]): boolean | undefined {
  const value = fields[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') errors.push(`${key} must be a boolean`);
  return typeof value === 'boolean' ? value : undefined;
}

function optionalVec3(fields: Fields, key: string, errors: string[]): Vec3Tuple | undefined {
  const value = fields[key];
  if (value === undefined) return undefined;
  if (!isTuple(value, 3)) {
    errors.push(`${key} must be [x, y, z]`);
    return undefined;
  }
  return [value[0], value[1], value[2]];
}

function optionalColor(fields: Fields, key: string, errors: string[]): ColorTuple | undefined {
  const value = fields[key];
  if (value === undefined) return undefined;
  if (!isTuple(value, 3) || value.some((c) => c < 0 || c > 1)) {
    errors.push(`${key} must be [r, g, b] with components in [0, 1]`);
    return undefined;
  }
  return [value[0], value[1], value[2]];
}

function firstError<T>(errors: string[], value: T): Result<T, string> {
  return errors.length > 0 ? err(errors[0] ?? 'invalid message') : ok(value);
}

// ── Visual ───────────────────────────────────────────────────────

function validateAttributes(raw: unknown, errors: string[]): VisualAttributes {
  if (raw === undefined) return {};
  if (!isRecord(raw)) {
    errors.push('attributes must be an object');
    return {};
  }
  const attributes: VisualAttributes = {};
  const mesh = optionalString(raw, 'mesh', errors);
  const material = optionalString(raw, 'material', errors);
  const visible = optionalBoolean(raw, 'visible', errors);
  const castShadows = optionalBoolean(raw, 'castShadows', errors);
  const scale = optionalVec3(raw, 'scale', errors);
  if (mesh !== undefined) attributes.mesh = mesh;
  if (material !== undefined) attributes.material = material;
  if (visible !== undefined) attributes.visible = visible;
  if (castShadows !== undefined) attributes.castShadows = castShadows;
  if (scale !== undefined) attributes.scale = scale;

  const transparency = raw['transparency'];
  if (transparency !== undefined) {
    if (!isFiniteNumber(transparency) || transparency < 0 || transparency > 1) {
      errors.push('transparency must be a number in [0, 1]');
    } else {
      attributes.transparency = transparency;
    }
  }
  return attributes;
}

export function validateVisualMessage(raw: unknown): Result<VisualMessage, string> {
  if (!isRecord(raw)) return err('visual message must be an object');
  const id = raw['id'];
  if (!isId(id)) return err('id must be a non-empty string');

  const errors: string[] = [];
  const message: VisualMessage = { id };

  const parentId = raw['parentId'];
  if (parentId !== undefined && parentId !== null) {
    if (!isId(parentId)) errors.push('parentId must be a non-empty string');
    else if (parentId === message.id) errors.push('visual cannot be its own parent');
    else message.parentId = parentId;
  }

  const action = raw['action'];
  if (action !== undefined) {
    if (action !== 'update' && action !== 'delete') errors.push(`unknown action: ${String(action)}`);
    else message.action = action;
  }

  // Delete messages carry no payload worth checking.
  if (message.action !== 'delete') {
    message.attributes = validateAttributes(raw['attributes'], errors);
  }
  return firstError(errors, message);
}

// ── Light ────────────────────────────────────────────────────────

function validateAttenuation(raw: unknown, errors: string[]): LightAttenuation | undefined {
  if (raw === undefined) return undefined;
  if (!isRecord(raw)) {
    errors.push('attenuation must be an object');
    return undefined;
  }
  const attenuation = { ...DEFAULT_ATTENUATION };
  for (const key of ['range', 'constant', 'linear', 'quadratic'] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (!isFiniteNumber(value) || value < 0) errors.push(`attenuation.${key} must be a non-negative number`);
    else attenuation[key] = value;
  }
  return attenuation;
}

export function validateLightMessage(raw: unknown): Result<LightMessage, string> {
  if (!isRecord(raw)) return err('light message must be an object');
  const id = raw['id'];
  if (!isId(id)) return err('id must be a non-empty string');

  const type = raw['type'];
  if (!isLightType(type)) {
    return err(`type must be one of ${LIGHT_TYPES.join(', ')}`);
  }

  const errors: string[] = [];
  const message: LightMessage = { id, type };
  const diffuse = optionalColor(raw, 'diffuse', errors);
  const specular = optionalColor(raw, 'specular', errors);
  const direction = optionalVec3(raw, 'direction', errors);
  const castShadows = optionalBoolean(raw, 'castShadows', errors);
  const attenuation = validateAttenuation(raw['attenuation'], errors);
  if (diffuse) message.diffuse = diffuse;
  if (specular) message.specular = specular;
  if (direction) message.direction = direction;
  if (castShadows !== undefined) message.castShadows = castShadows;
  if (attenuation) message.attenuation = attenuation;
  return firstError(errors, message);
}

/**
 * Light parameters for `message`. Omitted fields keep their value from
 * `base` (the light already registered) or fall back to defaults.
 */
export function toLightParams(message: LightMessage, base?: LightParams): LightParams {
  const color = (tuple: ColorTuple | undefined, previous: Color | undefined, fallback: number) =>
    tuple ? new Color(tuple[0], tuple[1], tuple[2]) : previous?.clone() ?? new Color(fallback, fallback, fallback);
  const direction = message.direction
    ? new Vector3(message.direction[0], message.direction[1], message.direction[2])
    : base?.direction.clone() ?? new Vector3(0, 0, -1);

  return {
    type: message.type,
    diffuse: color(message.diffuse, base?.diffuse, 1),
    specular: color(message.specular, base?.specular, 0.1),
    attenuation: message.attenuation ?? (base ? { ...base.attenuation } : { ...DEFAULT_ATTENUATION }),
    direction,
    castShadows: message.castShadows ?? base?.castShadows ?? message.type === 'directional',
  };
}

// ── Pose ─────────────────────────────────────────────────────────

export function validatePoseMessage(raw: unknown): Result<PoseMessage, string> {
  if (!isRecord(raw)) return err('pose message must be an object');
  const id = raw['id'];
  if (!isId(id)) return err('id must be a non-empty string');

  const position = raw['position'];
  if (!isTuple(position, 3)) return err('position must be [x, y, z]');

  const orientation = raw['orientation'];
  if (!isTuple(orientation, 4)) return err('orientation must be [x, y, z, w]');
  if (orientation.every((c) => c === 0)) return err('orientation must not be a zero quaternion');

  const quat: QuatTuple = [orientation[0], orientation[1], orientation[2], orientation[3]];
  return ok({ id, position: [position[0], position[1], position[2]], orientation: quat });
}

export function toPose(message: PoseMessage): Pose {
  const [px, py, pz] = message.position;
  const [qx, qy, qz, qw] = message.orientation;
  return {
    position: new Vector3(px, py, pz),
    orientation: new Quaternion(qx, qy, qz, qw).normalize(),
  };
}

// ── Selection ────────────────────────────────────────────────────

export function validateSelectionMessage(raw: unknown): Result<SelectionMessage, string> {
  if (!isRecord(raw)) return err('selection message must be an object');
  const id = raw['id'];
  if (id === null || id === undefined || id === '') return ok({ id: null });
  if (typeof id !== 'string') return err('id must be a string or null');
  return ok({ id });
}

// ── Scene bundle ─────────────────────────────────────────────────

export function validateSceneMessage(raw: unknown): Result<SceneMessage, string> {
  if (!isRecord(raw)) return err('scene message must be an object');
  const message: SceneMessage = {};
  for (const key of ['visuals', 'lights', 'poses'] as const) {
    const list = raw[key];
    if (list === undefined) continue;
    if (!Array.isArray(list)) return err(`${key} must be an array`);
    message[key] = list;
  }
  const errors: string[] = [];
  const ambient = optionalColor(raw, 'ambient', errors);
  if (ambient) message.ambient = ambient;
  return firstError(errors, message);
}
