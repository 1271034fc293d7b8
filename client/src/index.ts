/**
 * Public API.
 *
 * Re-exports what hosts need to run scene replicas and what renderers need
 * to read them.
 */

export { Engine } from './engine/Engine';
export type { EngineOptions } from './engine/Engine';

// Scene
export { SceneReplica, SceneBusyError } from './scene/sceneReplica';
export type { SceneReplicaOptions } from './scene/sceneReplica';
export { EntityRegistry, identityPose } from './scene/entityRegistry';
export type { UpsertOutcome } from './scene/entityRegistry';
export { PoseReconciler } from './scene/poseReconciler';
export type { PoseTarget, StagedPose } from './scene/poseReconciler';
export { SelectionState } from './scene/selectionState';
export type { SelectionTarget } from './scene/selectionState';
export { Mailbox } from './scene/mailbox';
export {
  validateVisualMessage,
  validateLightMessage,
  validatePoseMessage,
  validateSelectionMessage,
  validateSceneMessage,
  toPose,
  toLightParams,
} from './scene/messages';
export { createSceneParams, defaultSceneParams, validateFog } from './scene/sceneParams';
export type { FogParams, FogType, SceneParams, SceneParamsInput } from './scene/sceneParams';

// Transport
export { LocalTransport, sceneTopics } from './transport/transport';
export type { MessageHandler, SceneTopics, SceneTransport } from './transport/transport';

// ECS
export { createSceneWorld } from './ecs/world';
export type { SceneWorld } from './ecs/world';
export type { SceneComponents } from './ecs/components';

// Core
export { EventBus } from './core/eventBus';
export type {
  CycleReport,
  MessageRejection,
  SceneEventMap,
  SelectionChange,
} from './core/eventBus';
export { createLogger, setLogLevel, getLogLevel } from './core/logger';
export type { Logger, LogLevel } from './core/logger';
export { validateAndLoadConfig, loadConfigOrThrow } from './config';
export type { SceneConfig, SceneRuntimeConfig, ConfigValidationResult } from './config';
export * from './types';
