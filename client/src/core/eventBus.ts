/**
 * Typed event bus for scene diagnostics and in-process transport.
 * Zero-dependency pub/sub with type safety.
 */

import type { EntityId, LightEntity, VisualEntity } from '../types';

type Listener<T> = (payload: T) => void;

/** Receives errors thrown by listeners; without one they propagate to the emitter. */
export type ListenerErrorHandler = (error: unknown, event: PropertyKey) => void;

export class EventBus<EventMap extends { [K in keyof EventMap]: unknown }> {
  private listeners = new Map<keyof EventMap, Set<Listener<never>>>();

  constructor(private readonly onListenerError?: ListenerErrorHandler) {}

  on<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): () => void {
    let set = this.listeners.get(event);
    if (!set) {
      set = new Set();
      this.listeners.set(event, set);
    }
    const registered = set;
    registered.add(listener as Listener<never>);

    return () => {
      registered.delete(listener as Listener<never>);
      if (registered.size === 0 && this.listeners.get(event) === registered) {
        this.listeners.delete(event);
      }
    };
  }

  once<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): () => void {
    const unsub = this.on(event, (payload) => {
      unsub();
      listener(payload);
    });
    return unsub;
  }

  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const set = this.listeners.get(event);
    if (!set) return;
    // Snapshot so listeners may unsubscribe while being notified.
    for (const listener of [...set]) {
      try {
        (listener as Listener<EventMap[K]>)(payload);
      } catch (error) {
        if (!this.onListenerError) throw error;
        this.onListenerError(error, event);
      }
    }
  }

  listenerCount<K extends keyof EventMap>(event: K): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  off<K extends keyof EventMap>(event: K): void {
    this.listeners.delete(event);
  }

  clear(): void {
    this.listeners.clear();
  }
}

// ── Scene Event Map ─────────────────────────────────────────────

export type RejectedTopic = 'scene' | 'visual' | 'light' | 'pose' | 'selection';

export interface MessageRejection {
  topic: RejectedTopic;
  reason: string;
  message: unknown;
}

export interface SelectionChange {
  previous: EntityId | null;
  current: EntityId | null;
}

export interface CycleReport {
  cycle: number;
  visualsCreated: number;
  visualsUpdated: number;
  visualsRemoved: number;
  lightsCreated: number;
  lightsUpdated: number;
  posesApplied: number;
  posesStaged: number;
  posesResolved: number;
  posesExpired: number;
  rejected: number;
  selectionChanged: boolean;
  pendingPoses: number;
  durationMs: number;
}

export interface SceneEventMap {
  visual_added: VisualEntity;
  visual_removed: EntityId;
  light_added: LightEntity;
  selection_changed: SelectionChange;
  message_rejected: MessageRejection;
  cycle_complete: CycleReport;
}
