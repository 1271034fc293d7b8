/**
 * Core type definitions for the scene replica.
 *
 * Wire shapes (`*Message`) are plain data as decoded by the transport.
 * Entity shapes carry three.js math types once a message has been applied.
 */

import type { Color, Quaternion, Vector3 } from 'three';

// ── Identifiers ─────────────────────────────────────────────────

/** Opaque, globally unique identifier assigned by the remote authority. */
export type EntityId = string;

// ── Tuples ──────────────────────────────────────────────────────

export type Vec3Tuple = [number, number, number];
export type QuatTuple = [number, number, number, number];
export type ColorTuple = [number, number, number];

// ── Pose ────────────────────────────────────────────────────────

export interface Pose {
  position: Vector3;
  orientation: Quaternion;
}

// ── Visuals ─────────────────────────────────────────────────────

export interface VisualAttributes {
  mesh?: string;
  material?: string;
  visible?: boolean;
  castShadows?: boolean;
  transparency?: number;
  scale?: Vec3Tuple;
}

export type VisualAction = 'update' | 'delete';

export interface VisualMessage {
  id: EntityId;
  parentId?: EntityId;
  action?: VisualAction;
  attributes?: VisualAttributes;
}

export interface VisualEntity {
  readonly id: EntityId;
  /** bitECS entity id in the owning scene's world. */
  readonly eid: number;
  parentId: EntityId | null;
  readonly children: Set<EntityId>;
  pose: Pose;
  attributes: VisualAttributes;
}

// ── Lights ──────────────────────────────────────────────────────

export type LightType = 'point' | 'spot' | 'directional';

export interface LightAttenuation {
  range: number;
  constant: number;
  linear: number;
  quadratic: number;
}

export interface LightMessage {
  id: EntityId;
  type: LightType;
  diffuse?: ColorTuple;
  specular?: ColorTuple;
  attenuation?: LightAttenuation;
  direction?: Vec3Tuple;
  castShadows?: boolean;
}

export interface LightParams {
  type: LightType;
  diffuse: Color;
  specular: Color;
  attenuation: LightAttenuation;
  direction: Vector3;
  castShadows: boolean;
}

export interface LightEntity {
  readonly id: EntityId;
  readonly eid: number;
  light: LightParams;
}

// ── Poses & Selection ───────────────────────────────────────────

export interface PoseMessage {
  id: EntityId;
  position: Vec3Tuple;
  orientation: QuatTuple;
}

export interface SelectionMessage {
  id: EntityId | null;
}

/** Full-state bundle sent by the authority in answer to a publish request. */
export interface SceneMessage {
  visuals?: unknown[];
  lights?: unknown[];
  poses?: unknown[];
  ambient?: ColorTuple;
}

export interface PublishRequest {
  request: 'publish';
  scene: string;
}

// ── Result Type ─────────────────────────────────────────────────

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T, E = Error>(value: T): Result<T, E> {
  return { ok: true, value };
}

export function err<T, E = Error>(error: E): Result<T, E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok;
}

/** Return the value or throw the error (wrapped in an Error when it is not one). */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  if (result.error instanceof Error) throw result.error;
  throw new Error(String(result.error));
}
