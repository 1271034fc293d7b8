/**
 * SceneReplica: the client-side copy of a remotely authoritative scene.
 *
 * Transport callbacks only append raw payloads to per-topic mailboxes.
 * Once per tick `runCycle()` drains them in a fixed order and folds them
 * into the entity registry:
 *
 *   0. ambient   from the latest scene bundle, if it carried one
 *   1. visuals   create / merge / delete, in arrival order
 *   2. lights    insert-or-merge
 *   3. poses     applied, or staged when the visual is not there yet
 *   4. staged    poses replayed against visuals created in step 1
 *   5. selection latest request resolved, or cleared when unresolvable
 *
 * Poses must come after visuals: a pose and the visual it targets often
 * arrive in the same batch. Read accessors throw `SceneBusyError` while a
 * cycle is applying; events raised during a cycle are delivered after it.
 */

import type { Color } from 'three';
import { loadConfigOrThrow, type SceneConfig } from '../config';
import {
  EventBus,
  type CycleReport,
  type RejectedTopic,
  type SceneEventMap,
} from '../core/eventBus';
import { createLogger, type Logger } from '../core/logger';
import type { SceneWorld } from '../ecs/world';
import { sceneTopics, type SceneTopics, type SceneTransport } from '../transport/transport';
import {
  err,
  ok,
  type ColorTuple,
  type EntityId,
  type LightEntity,
  type PublishRequest,
  type Result,
  type VisualEntity,
} from '../types';
import { EntityRegistry } from './entityRegistry';
import { Mailbox } from './mailbox';
import {
  toLightParams,
  toPose,
  validateLightMessage,
  validatePoseMessage,
  validateSceneMessage,
  validateSelectionMessage,
  validateVisualMessage,
} from './messages';
import { PoseReconciler } from './poseReconciler';
import {
  createSceneParams,
  toColor,
  validateColor,
  validateFog,
  type FogParams,
  type FogType,
  type SceneParams,
  type SceneParamsInput,
} from './sceneParams';
import { SelectionState } from './selectionState';

export class SceneBusyError extends Error {
  constructor(scene: string, operation: string) {
    super(`Cannot ${operation} while scene "${scene}" is applying a cycle`);
    this.name = 'SceneBusyError';
  }
}

export interface SceneReplicaOptions {
  name: string;
  transport: SceneTransport;
  config?: Partial<SceneConfig>;
  params?: SceneParamsInput;
}

type Phase = 'created' | 'ready' | 'applying' | 'shut_down';

function emptyReport(cycle: number): CycleReport {
  return {
    cycle,
    visualsCreated: 0,
    visualsUpdated: 0,
    visualsRemoved: 0,
    lightsCreated: 0,
    lightsUpdated: 0,
    posesApplied: 0,
    posesStaged: 0,
    posesResolved: 0,
    posesExpired: 0,
    rejected: 0,
    selectionChanged: false,
    pendingPoses: 0,
    durationMs: 0,
  };
}

export class SceneReplica {
  readonly name: string;
  readonly config: SceneConfig;
  readonly topics: SceneTopics;
  readonly events: EventBus<SceneEventMap>;

  private readonly log: Logger;
  private readonly transport: SceneTransport;
  private readonly poses = new PoseReconciler();
  private readonly registry = new EntityRegistry(this.poses);
  private readonly selection = new SelectionState();
  private readonly inbox: {
    visual: Mailbox<unknown>;
    light: Mailbox<unknown>;
    pose: Mailbox<unknown>;
    selection: Mailbox<unknown>;
  };

  private params: SceneParams;
  private phase: Phase = 'created';
  private cycle = 0;
  private unsubscribers: (() => void)[] = [];
  private deferred: (() => void)[] = [];
  private pendingAmbient: ColorTuple | null = null;

  constructor(options: SceneReplicaOptions) {
    if (options.name.trim().length === 0) {
      throw new Error('Scene name must be a non-empty string');
    }
    this.name = options.name;
    const { namespace, mailboxCapacity, maxPendingPoseCycles } = loadConfigOrThrow(options.config);
    this.config = { namespace, mailboxCapacity, maxPendingPoseCycles };
    this.params = createSceneParams(options.params);
    this.transport = options.transport;
    this.topics = sceneTopics(this.config.namespace);
    this.log = createLogger(`Scene:${this.name}`);
    this.events = new EventBus<SceneEventMap>((error, event) => {
      this.log.error(`Listener for ${String(event)} threw`, error);
    });

    const capacity = this.config.mailboxCapacity;
    this.inbox = {
      visual: new Mailbox(this.topics.visual, capacity),
      light: new Mailbox(this.topics.light, capacity),
      pose: new Mailbox(this.topics.pose, capacity),
      // Every request is validated; the latest valid one wins.
      selection: new Mailbox(this.topics.selection, capacity),
    };
  }

  // ── Lifecycle ─────────────────────────────────────────────────

  /**
   * Subscribe to the inbound topics and ask the authority to publish its
   * current state. Subsequent calls are ignored.
   */
  initialize(): void {
    if (this.phase !== 'created') {
      this.log.warn(`initialize() ignored in phase ${this.phase}`);
      return;
    }

    const { transport, topics } = this;
    this.unsubscribers = [
      transport.subscribe(topics.scene, (message) => this.receiveScene(message)),
      transport.subscribe(topics.visual, (message) => this.receiveVisual(message)),
      transport.subscribe(topics.light, (message) => this.receiveLight(message)),
      transport.subscribe(topics.pose, (message) => this.receivePose(message)),
      transport.subscribe(topics.selection, (message) => this.receiveSelection(message)),
    ];
    this.phase = 'ready';

    const request: PublishRequest = { request: 'publish', scene: this.name };
    transport.publish(topics.publishScene, request);
    this.log.info(`Initialized on /${this.config.namespace}, requested current state`);
  }

  /** Unsubscribe and release every entity, pending message and staged pose. */
  shutdown(): void {
    if (this.phase === 'applying') throw new SceneBusyError(this.name, 'shut down');
    if (this.phase === 'shut_down') return;

    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
    for (const mailbox of Object.values(this.inbox)) mailbox.clear();
    this.registry.clear();
    this.poses.clear();
    this.selection.clear();
    this.deferred = [];
    this.pendingAmbient = null;
    this.events.clear();
    this.phase = 'shut_down';
    this.log.info('Shut down');
  }

  get isShutDown(): boolean {
    return this.phase === 'shut_down';
  }

  get cycleCount(): number {
    return this.cycle;
  }

  // ── Producers ─────────────────────────────────────────────────

  receiveVisual(message: unknown): void {
    if (this.phase !== 'shut_down') this.inbox.visual.enqueue(message);
  }

  receiveLight(message: unknown): void {
    if (this.phase !== 'shut_down') this.inbox.light.enqueue(message);
  }

  receivePose(message: unknown): void {
    if (this.phase !== 'shut_down') this.inbox.pose.enqueue(message);
  }

  receiveSelection(message: unknown): void {
    if (this.phase !== 'shut_down') this.inbox.selection.enqueue(message);
  }

  /** Fan a full-state bundle out into the per-topic mailboxes. */
  receiveScene(message: unknown): void {
    if (this.phase === 'shut_down') return;
    const parsed = validateSceneMessage(message);
    if (!parsed.ok) {
      this.reject('scene', message, parsed.error);
      return;
    }
    for (const visual of parsed.value.visuals ?? []) this.inbox.visual.enqueue(visual);
    for (const light of parsed.value.lights ?? []) this.inbox.light.enqueue(light);
    for (const pose of parsed.value.poses ?? []) this.inbox.pose.enqueue(pose);
    if (parsed.value.ambient) this.pendingAmbient = parsed.value.ambient;
  }

  /** Messages waiting for the next cycle, across all topics. */
  get pendingMessageCount(): number {
    return Object.values(this.inbox).reduce((sum, mailbox) => sum + mailbox.size, 0);
  }

  // ── Cycle ─────────────────────────────────────────────────────

  /** Drain every mailbox and apply it. Never throws for bad messages. */
  runCycle(): CycleReport {
    if (this.phase === 'applying') throw new SceneBusyError(this.name, 'run a nested cycle');
    if (this.phase === 'shut_down') return emptyReport(this.cycle);

    const started = performance.now();
    const resume = this.phase;
    const report = emptyReport(++this.cycle);
    this.registry.currentCycle = this.cycle;
    this.phase = 'applying';
    try {
      if (this.pendingAmbient) {
        this.params = { ...this.params, ambient: toColor(this.pendingAmbient) };
        this.pendingAmbient = null;
      }
      this.applyBatch('visual', this.inbox.visual.drain(), report, (raw) => this.applyVisual(raw, report));
      this.applyBatch('light', this.inbox.light.drain(), report, (raw) => this.applyLight(raw, report));
      this.applyBatch('pose', this.inbox.pose.drain(), report, (raw) => this.applyPose(raw, report));

      report.posesResolved = this.poses.tryResolve(this.registry);
      const expired = this.poses.expire(this.cycle, this.config.maxPendingPoseCycles);
      report.posesExpired = expired.length;
      if (expired.length > 0) {
        this.log.debug(`Evicted ${expired.length} staged pose(s): ${expired.join(', ')}`);
      }

      this.applyBatch('selection', this.inbox.selection.drain(), report, (raw) => this.requestSelection(raw, report));
      this.resolveSelection(report);
    } finally {
      this.phase = resume;
    }

    report.pendingPoses = this.poses.size;
    report.durationMs = performance.now() - started;
    this.flushDeferred();
    this.events.emit('cycle_complete', report);
    return report;
  }

  private applyBatch(
    topic: RejectedTopic,
    batch: unknown[],
    report: CycleReport,
    apply: (raw: unknown) => void,
  ): void {
    for (const raw of batch) {
      try {
        apply(raw);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.log.error(`Failed to apply ${topic} message`, error);
        this.reject(topic, raw, reason, report);
      }
    }
  }

  private applyVisual(raw: unknown, report: CycleReport): void {
    const parsed = validateVisualMessage(raw);
    if (!parsed.ok) {
      this.reject('visual', raw, parsed.error, report);
      return;
    }
    const { id, parentId, action, attributes } = parsed.value;

    if (action === 'delete') {
      if (!this.registry.removeVisual(id)) return;
      report.visualsRemoved++;
      this.defer(() => this.events.emit('visual_removed', id));
      const change = this.selection.forget(id);
      if (change) {
        report.selectionChanged = true;
        this.defer(() => this.events.emit('selection_changed', change));
      }
      return;
    }

    const outcome = this.registry.upsertVisual(id, parentId ?? null, attributes ?? {});
    if (outcome === 'updated') {
      report.visualsUpdated++;
      return;
    }
    report.visualsCreated++;
    const entity = this.registry.lookupVisual(id);
    if (entity) {
      this.log.debug(`New visual[${id}]`);
      this.defer(() => this.events.emit('visual_added', entity));
    }
  }

  private applyLight(raw: unknown, report: CycleReport): void {
    const parsed = validateLightMessage(raw);
    if (!parsed.ok) {
      this.reject('light', raw, parsed.error, report);
      return;
    }
    const { id } = parsed.value;
    const existing = this.registry.lookupLight(id);
    const outcome = this.registry.upsertLight(id, toLightParams(parsed.value, existing?.light));
    if (outcome === 'updated') {
      report.lightsUpdated++;
      return;
    }
    report.lightsCreated++;
    const entity = this.registry.lookupLight(id);
    if (entity) this.defer(() => this.events.emit('light_added', entity));
  }

  private applyPose(raw: unknown, report: CycleReport): void {
    const parsed = validatePoseMessage(raw);
    if (!parsed.ok) {
      this.reject('pose', raw, parsed.error, report);
      return;
    }
    const outcome = this.registry.applyPose(parsed.value.id, toPose(parsed.value));
    if (outcome === 'applied') report.posesApplied++;
    else report.posesStaged++;
  }

  private requestSelection(raw: unknown, report: CycleReport): void {
    const parsed = validateSelectionMessage(raw);
    if (!parsed.ok) {
      this.reject('selection', raw, parsed.error, report);
      return;
    }
    this.selection.request(parsed.value.id);
  }

  private resolveSelection(report: CycleReport): void {
    if (!this.selection.hasPending) return;
    const change = this.selection.resolve(this.registry);
    if (!change) return;
    report.selectionChanged = true;
    this.defer(() => this.events.emit('selection_changed', change));
  }

  private reject(topic: RejectedTopic, message: unknown, reason: string, report?: CycleReport): void {
    this.log.warn(`Dropped ${topic} message: ${reason}`);
    if (report) report.rejected++;
    this.defer(() => this.events.emit('message_rejected', { topic, reason, message }));
  }

  private defer(emit: () => void): void {
    if (this.phase === 'applying') this.deferred.push(emit);
    else emit();
  }

  private flushDeferred(): void {
    const pending = this.deferred;
    this.deferred = [];
    for (const emit of pending) emit();
  }

  // ── Read interface (valid between cycles only) ───────────────

  private assertReadable(operation: string): void {
    if (this.phase === 'applying') throw new SceneBusyError(this.name, operation);
  }

  lookupVisual(id: EntityId): VisualEntity | undefined {
    this.assertReadable('look up a visual');
    return this.registry.lookupVisual(id);
  }

  lookupLight(id: EntityId): LightEntity | undefined {
    this.assertReadable('look up a light');
    return this.registry.lookupLight(id);
  }

  /** The selected visual, or null when nothing is selected. */
  currentSelection(): VisualEntity | null {
    this.assertReadable('read the selection');
    const id = this.selection.selectedId;
    return id !== null ? this.registry.lookupVisual(id) ?? null : null;
  }

  /** Visuals with no resolved parent. */
  enumerateRoots(): VisualEntity[] {
    this.assertReadable('enumerate roots');
    return this.registry.enumerateRoots();
  }

  /** The scene's ECS world, for collaborators that query tags. */
  get ecs(): SceneWorld {
    this.assertReadable('read the ECS world');
    return this.registry.ecs;
  }

  get visualCount(): number {
    this.assertReadable('count visuals');
    return this.registry.visualCount;
  }

  get lightCount(): number {
    this.assertReadable('count lights');
    return this.registry.lightCount;
  }

  get pendingPoseCount(): number {
    return this.poses.size;
  }

  // ── Scene mutations from the local side ──────────────────────

  /** Show or hide a visual. Returns false when the visual is unknown. */
  setVisible(id: EntityId, visible: boolean): boolean {
    this.assertReadable('change visibility');
    return this.registry.setVisible(id, visible);
  }

  getParams(): SceneParams {
    return this.params;
  }

  setAmbientColor(color: ColorTuple): Result<Color, string[]> {
    const errors: string[] = [];
    validateColor(color, 'ambient', errors);
    if (errors.length > 0) return err(errors);
    const ambient = toColor(color);
    this.params = { ...this.params, ambient };
    return ok(ambient);
  }

  setBackgroundColor(color: ColorTuple): Result<Color, string[]> {
    const errors: string[] = [];
    validateColor(color, 'background', errors);
    if (errors.length > 0) return err(errors);
    const background = toColor(color);
    this.params = { ...this.params, background };
    return ok(background);
  }

  setFog(
    type: FogType,
    color: ColorTuple,
    density: number,
    start: number,
    end: number,
  ): Result<FogParams, string[]> {
    const errors = validateFog(type, color, density, start, end);
    if (errors.length > 0) return err(errors);
    const fog: FogParams = { type, color: toColor(color), density, start, end };
    this.params = { ...this.params, fog };
    return ok(fog);
  }
}
