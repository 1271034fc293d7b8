/**
 * Tracks the single visual currently targeted for interaction.
 *
 * Selection requests are not queued: the latest one since the previous
 * cycle wins. A request is resolved against the registry during the cycle;
 * an identifier that does not resolve deselects instead of keeping a stale
 * target.
 */

import type { SelectionChange } from '../core/eventBus';
import type { EntityId } from '../types';

/** What selection resolution needs from the registry. */
export interface SelectionTarget {
  hasVisual(id: EntityId): boolean;
  markSelected(id: EntityId | null): boolean;
}

export class SelectionState {
  private pending: { id: EntityId | null } | null = null;
  private current: EntityId | null = null;

  /** Record a selection request, replacing any unresolved one. */
  request(id: EntityId | null): void {
    this.pending = { id };
  }

  get hasPending(): boolean {
    return this.pending !== null;
  }

  get selectedId(): EntityId | null {
    return this.current;
  }

  /**
   * Resolve the pending request, if any. Returns the change when the
   * selected identifier differs from before, otherwise null.
   */
  resolve(target: SelectionTarget): SelectionChange | null {
    if (!this.pending) return null;
    const requested = this.pending.id;
    this.pending = null;

    const next = requested !== null && target.hasVisual(requested) ? requested : null;
    target.markSelected(next);
    return this.set(next);
  }

  /** Deselect if `id` is the current selection (its visual went away). */
  forget(id: EntityId): SelectionChange | null {
    return this.current === id ? this.set(null) : null;
  }

  clear(): void {
    this.pending = null;
    this.current = null;
  }

  private set(next: EntityId | null): SelectionChange | null {
    const previous = this.current;
    this.current = next;
    return previous === next ? null : { previous, current: next };
  }
}
