/**
 * Entity registry: single source of truth for a scene's visuals and lights.
 *
 * Visuals and lights are keyed by the authority's string identifiers in two
 * separate namespaces. The hierarchy is stored as identifiers only: a
 * visual's `children` set is a lookup relation, never ownership, so removing
 * a visual cannot leave a dangling object reference behind.
 *
 * Each entity also gets an eid in the scene's bitECS world, tagged
 * IsVisual / IsLight, with `Visible` and `Selected` kept in step.
 */

import { addComponent, hasComponent, query, removeComponent, removeEntity } from 'bitecs';
import { Quaternion, Vector3 } from 'three';
import { createLightEntity, createVisualEntity } from '../ecs/archetypes';
import { createSceneWorld, type SceneWorld } from '../ecs/world';
import type {
  EntityId,
  LightEntity,
  LightParams,
  Pose,
  VisualAttributes,
  VisualEntity,
} from '../types';
import type { PoseReconciler, PoseTarget } from './poseReconciler';

export type UpsertOutcome = 'created' | 'updated';

export function identityPose(): Pose {
  return { position: new Vector3(), orientation: new Quaternion() };
}

function mergeAttributes(target: VisualAttributes, incoming: VisualAttributes): void {
  const { mesh, material, visible, castShadows, transparency, scale } = incoming;
  if (mesh !== undefined) target.mesh = mesh;
  if (material !== undefined) target.material = material;
  if (visible !== undefined) target.visible = visible;
  if (castShadows !== undefined) target.castShadows = castShadows;
  if (transparency !== undefined) target.transparency = transparency;
  if (scale !== undefined) target.scale = scale;
}

export class EntityRegistry implements PoseTarget {
  readonly ecs: SceneWorld = createSceneWorld();

  private readonly visuals = new Map<EntityId, VisualEntity>();
  private readonly lights = new Map<EntityId, LightEntity>();

  /** Cycle number stamped on poses staged through `applyPose`. */
  currentCycle = 0;

  constructor(private readonly pending: PoseReconciler) {}

  // ── Visuals ──────────────────────────────────────────────────

  /**
   * Create the visual or merge attributes into it. An update never touches
   * the pose (poses have their own topic) nor the parent.
   */
  upsertVisual(id: EntityId, parentId: EntityId | null, attributes: VisualAttributes): UpsertOutcome {
    const existing = this.visuals.get(id);
    if (existing) {
      mergeAttributes(existing.attributes, attributes);
      if (attributes.visible !== undefined) {
        this.ecs.components.Visible.value[existing.eid] = attributes.visible ? 1 : 0;
      }
      return 'updated';
    }

    const parent = parentId !== null ? this.visuals.get(parentId) : undefined;
    const entity: VisualEntity = {
      id,
      eid: createVisualEntity(this.ecs, attributes.visible ?? true),
      parentId: parent ? parent.id : null,
      children: new Set(),
      pose: identityPose(),
      attributes: { ...attributes },
    };
    parent?.children.add(id);
    // Children left behind by an earlier visual with this id rejoin it.
    for (const orphan of this.visuals.values()) {
      if (orphan.parentId === id) entity.children.add(orphan.id);
    }
    this.visuals.set(id, entity);
    return 'created';
  }

  /**
   * Remove a visual. Its children stay registered with their `parentId`
   * unchanged; they are reported by `enumerateRoots` until a visual with
   * the parent's id is created again and adopts them. Unknown identifiers
   * are a no-op.
   */
  removeVisual(id: EntityId): boolean {
    const entity = this.visuals.get(id);
    if (!entity) return false;

    if (entity.parentId !== null) {
      this.visuals.get(entity.parentId)?.children.delete(id);
    }
    removeEntity(this.ecs.world, entity.eid);
    delete this.ecs.components.Visible.value[entity.eid];
    this.visuals.delete(id);
    return true;
  }

  lookupVisual(id: EntityId): VisualEntity | undefined {
    return this.visuals.get(id);
  }

  hasVisual(id: EntityId): boolean {
    return this.visuals.has(id);
  }

  /** Visuals attached to the scene root, or whose parent is gone. */
  enumerateRoots(): VisualEntity[] {
    const roots: VisualEntity[] = [];
    for (const entity of this.visuals.values()) {
      if (entity.parentId === null || !this.visuals.has(entity.parentId)) {
        roots.push(entity);
      }
    }
    return roots;
  }

  /** Show or hide a visual. Returns false when the visual is unknown. */
  setVisible(id: EntityId, visible: boolean): boolean {
    const entity = this.visuals.get(id);
    if (!entity) return false;
    entity.attributes.visible = visible;
    this.ecs.components.Visible.value[entity.eid] = visible ? 1 : 0;
    return true;
  }

  get visualCount(): number {
    return this.visuals.size;
  }

  // ── Poses ────────────────────────────────────────────────────

  /**
   * Set the pose of a registered visual, or stage it until the visual
   * arrives. A direct application supersedes any older staged pose.
   */
  applyPose(id: EntityId, pose: Pose): 'applied' | 'staged' {
    const entity = this.visuals.get(id);
    if (!entity) {
      this.pending.stage(id, pose, this.currentCycle);
      return 'staged';
    }
    entity.pose = pose;
    this.pending.discard(id);
    return 'applied';
  }

  // ── Lights ───────────────────────────────────────────────────

  upsertLight(id: EntityId, light: LightParams): UpsertOutcome {
    const existing = this.lights.get(id);
    if (existing) {
      existing.light = light;
      return 'updated';
    }
    this.lights.set(id, { id, eid: createLightEntity(this.ecs), light });
    return 'created';
  }

  lookupLight(id: EntityId): LightEntity | undefined {
    return this.lights.get(id);
  }

  get lightCount(): number {
    return this.lights.size;
  }

  // ── Selection tag ────────────────────────────────────────────

  /** Move the `Selected` tag to `id` (or nowhere). Returns false if `id` is unknown. */
  markSelected(id: EntityId | null): boolean {
    const { world, components } = this.ecs;
    const tagged = query(world, [components.Selected]);
    for (const eid of Array.from(tagged)) {
      removeComponent(world, eid, components.Selected);
    }
    if (id === null) return true;

    const entity = this.visuals.get(id);
    if (!entity) return false;
    addComponent(world, entity.eid, components.Selected);
    return true;
  }

  isSelected(id: EntityId): boolean {
    const entity = this.visuals.get(id);
    return entity !== undefined && hasComponent(this.ecs.world, entity.eid, this.ecs.components.Selected);
  }

  // ── Teardown ─────────────────────────────────────────────────

  /** Release every entity in both namespaces. */
  clear(): void {
    for (const entity of this.visuals.values()) removeEntity(this.ecs.world, entity.eid);
    for (const entity of this.lights.values()) removeEntity(this.ecs.world, entity.eid);
    this.ecs.components.Visible.value.length = 0;
    this.visuals.clear();
    this.lights.clear();
  }
}
