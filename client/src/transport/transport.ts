/**
 * Pub/sub transport seam.
 *
 * The scene replica only needs to subscribe to its inbound topics and
 * publish a single state request. Network transports implement
 * `SceneTransport`; `LocalTransport` delivers in-process for tests, tools
 * and single-process setups.
 */

import { TOPIC_NAMES } from '../config';
import { createLogger } from '../core/logger';
import { EventBus } from '../core/eventBus';

const log = createLogger('Transport');

export type MessageHandler = (message: unknown) => void;

export interface SceneTransport {
  /** Register `handler` for `topic`; the returned function unsubscribes. */
  subscribe(topic: string, handler: MessageHandler): () => void;
  publish(topic: string, message: unknown): void;
}

export type TopicKey = keyof typeof TOPIC_NAMES;

export type SceneTopics = Record<TopicKey, string>;

/** Fully qualified topic names for a namespace, e.g. `/default/pose`. */
export function sceneTopics(namespace: string): SceneTopics {
  const qualify = (name: string) => `/${namespace}/${name}`;
  return {
    scene: qualify(TOPIC_NAMES.scene),
    visual: qualify(TOPIC_NAMES.visual),
    light: qualify(TOPIC_NAMES.light),
    pose: qualify(TOPIC_NAMES.pose),
    selection: qualify(TOPIC_NAMES.selection),
    publishScene: qualify(TOPIC_NAMES.publishScene),
  };
}

// ── LocalTransport ───────────────────────────────────────────────

export class LocalTransport implements SceneTransport {
  private readonly bus = new EventBus<Record<string, unknown>>((error, topic) => {
    log.error(`Subscriber on ${String(topic)} threw`, error);
  });
  private readonly published: { topic: string; message: unknown }[] = [];

  subscribe(topic: string, handler: MessageHandler): () => void {
    return this.bus.on(topic, handler);
  }

  publish(topic: string, message: unknown): void {
    this.published.push({ topic, message });
    this.bus.emit(topic, message);
  }

  subscriberCount(topic: string): number {
    return this.bus.listenerCount(topic);
  }

  /** Every message published so far, oldest first. */
  history(topic?: string): unknown[] {
    return this.published
      .filter((entry) => topic === undefined || entry.topic === topic)
      .map((entry) => entry.message);
  }
}
