/**
 * Entity archetype factory functions.
 *
 * Each archetype adds the required set of components to a new entity.
 * These functions are the canonical way to create scene entities in the ECS.
 */

import { addComponent, addEntity } from 'bitecs';
import type { SceneWorld } from './world';

// ── Visual ───────────────────────────────────────────────────────

export function addVisualArchetype({ world, components }: SceneWorld, eid: number, visible: boolean): void {
  addComponent(world, eid, components.IsVisual);
  addComponent(world, eid, components.Visible);

  components.Visible.value[eid] = visible ? 1 : 0;
}

export function createVisualEntity(scene: SceneWorld, visible = true): number {
  const eid = addEntity(scene.world);
  addVisualArchetype(scene, eid, visible);
  return eid;
}

// ── Light ────────────────────────────────────────────────────────

export function addLightArchetype({ world, components }: SceneWorld, eid: number): void {
  addComponent(world, eid, components.IsLight);
}

export function createLightEntity(scene: SceneWorld): number {
  const eid = addEntity(scene.world);
  addLightArchetype(scene, eid);
  return eid;
}
