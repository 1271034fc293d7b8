/**
 * Engine: owns the scene replicas of a process and drives their cycles.
 *
 * Each tick runs `runCycle()` on every scene, in registration order,
 * before anything downstream (renderer, picking) reads them. The engine
 * can tick itself at `tickHz` or be ticked by a host loop via `tick()`.
 */

import { APP_NAME, loadConfigOrThrow } from '../config';
import type { CycleReport } from '../core/eventBus';
import { createLogger } from '../core/logger';
import { SceneReplica, type SceneReplicaOptions } from '../scene/sceneReplica';

const log = createLogger('Engine');

export interface EngineOptions {
  tickHz?: number;
}

// ── Engine ────────────────────────────────────────────────────────

export class Engine {
  readonly tickHz: number;

  private readonly scenes = new Map<string, SceneReplica>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private ticks = 0;
  private disposeCallbacks: (() => void)[] = [];

  constructor(options: EngineOptions = {}) {
    this.tickHz = loadConfigOrThrow(options.tickHz !== undefined ? { tickHz: options.tickHz } : {}).tickHz;
    log.info(`${APP_NAME} engine created (${this.tickHz} Hz)`);
  }

  // ── Scenes ──────────────────────────────────────────────────────

  /** Create, initialize and register a scene. */
  createScene(options: SceneReplicaOptions): SceneReplica {
    const scene = new SceneReplica(options);
    this.addScene(scene);
    scene.initialize();
    return scene;
  }

  addScene(scene: SceneReplica): void {
    if (this.scenes.has(scene.name)) {
      throw new Error(`Scene "${scene.name}" is already registered`);
    }
    this.scenes.set(scene.name, scene);
  }

  /** Shut a scene down and forget it. Returns false for unknown names. */
  removeScene(name: string): boolean {
    const scene = this.scenes.get(name);
    if (!scene) return false;
    scene.shutdown();
    this.scenes.delete(name);
    return true;
  }

  getScene(name: string): SceneReplica | undefined {
    return this.scenes.get(name);
  }

  get sceneNames(): string[] {
    return [...this.scenes.keys()];
  }

  // ── Ticking ─────────────────────────────────────────────────────

  /** Run one cycle on every scene. */
  tick(): CycleReport[] {
    this.ticks++;
    const reports: CycleReport[] = [];
    for (const scene of this.scenes.values()) {
      reports.push(scene.runCycle());
    }
    return reports;
  }

  get tickCount(): number {
    return this.ticks;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  // ── Lifecycle Callbacks ─────────────────────────────────────────

  /** Register a callback to run on engine dispose. */
  onDispose(fn: () => void): void {
    this.disposeCallbacks.push(fn);
  }

  // ── Lifecycle ─────────────────────────────────────────────────

  /** Start ticking at `tickHz`. */
  start(): void {
    if (this.timer !== null) return;
    this.timer = setInterval(() => this.tick(), 1000 / this.tickHz);
    log.info('Tick loop started');
  }

  /** Stop ticking; scenes keep their state. */
  stop(): void {
    if (this.timer === null) return;
    clearInterval(this.timer);
    this.timer = null;
    log.info('Tick loop stopped');
  }

  /** Stop, shut every scene down and run dispose callbacks. */
  dispose(): void {
    this.stop();
    for (const name of this.sceneNames) this.removeScene(name);
    for (const fn of this.disposeCallbacks) fn();
    this.disposeCallbacks = [];
    log.info('Engine disposed');
  }
}
