/**
 * Holds poses whose visual has not arrived yet.
 *
 * Pose updates travel on their own topic and routinely overtake the visual
 * they refer to. Staging keeps only the newest pose per identifier and
 * replays it as soon as the visual is registered.
 */

import type { EntityId, Pose } from '../types';

export interface StagedPose {
  pose: Pose;
  /** Cycle during which the pose was (re)staged. */
  stagedAt: number;
}

/** What the reconciler needs from the registry when replaying poses. */
export interface PoseTarget {
  hasVisual(id: EntityId): boolean;
  applyPose(id: EntityId, pose: Pose): 'applied' | 'staged';
}

export class PoseReconciler {
  private readonly staged = new Map<EntityId, StagedPose>();

  /** Stage `pose` for `id`, superseding any pose already staged for it. */
  stage(id: EntityId, pose: Pose, cycle: number): void {
    // Re-insert so iteration order follows recency.
    this.staged.delete(id);
    this.staged.set(id, { pose, stagedAt: cycle });
  }

  /** Drop the staged pose for `id`. Returns whether one was staged. */
  discard(id: EntityId): boolean {
    return this.staged.delete(id);
  }

  /**
   * Apply every staged pose whose visual now exists.
   * Returns the number of poses applied; the rest stay staged.
   */
  tryResolve(target: PoseTarget): number {
    let applied = 0;
    for (const [id, entry] of this.staged) {
      if (!target.hasVisual(id)) continue;
      this.staged.delete(id);
      target.applyPose(id, entry.pose);
      applied++;
    }
    return applied;
  }

  /**
   * Evict poses staged for more than `maxAge` cycles.
   * With `maxAge = Infinity` nothing is ever evicted.
   */
  expire(cycle: number, maxAge: number): EntityId[] {
    if (maxAge === Infinity) return [];
    const evicted: EntityId[] = [];
    for (const [id, entry] of this.staged) {
      if (cycle - entry.stagedAt > maxAge) {
        this.staged.delete(id);
        evicted.push(id);
      }
    }
    return evicted;
  }

  has(id: EntityId): boolean {
    return this.staged.has(id);
  }

  peek(id: EntityId): Pose | undefined {
    return this.staged.get(id)?.pose;
  }

  get size(): number {
    return this.staged.size;
  }

  clear(): void {
    this.staged.clear();
  }
}
