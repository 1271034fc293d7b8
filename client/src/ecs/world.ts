/**
 * Per-scene ECS world.
 *
 * Every scene replica owns its own bitECS world and component stores, so
 * two scenes never share entity ids or component slots.
 */

import { createWorld, type World } from 'bitecs';
import { createSceneComponents, type SceneComponents } from './components';

export interface SceneWorld {
  readonly world: World;
  readonly components: SceneComponents;
}

export function createSceneWorld(): SceneWorld {
  return {
    world: createWorld(),
    components: createSceneComponents(),
  };
}
