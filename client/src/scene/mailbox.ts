/**
 * Per-topic inbound buffer between transport callbacks and the scene cycle.
 *
 * Producers append; the single consumer swaps the whole buffer out in
 * `drain()`, so the work done per message never delays a producer.
 */

import { DEFAULT_MAILBOX_CAPACITY } from '../config';

export class Mailbox<T> {
  private buffer: T[] = [];
  private dropped = 0;

  constructor(
    readonly topic: string,
    private readonly capacity: number = DEFAULT_MAILBOX_CAPACITY,
  ) {}

  /** Append a message; at capacity the oldest pending message is dropped. */
  enqueue(message: T): void {
    if (this.buffer.length >= this.capacity) {
      this.buffer.shift();
      this.dropped++;
    }
    this.buffer.push(message);
  }

  /** Detach every message received since the previous drain, oldest first. */
  drain(): T[] {
    const batch = this.buffer;
    this.buffer = [];
    return batch;
  }

  /** Messages waiting for the next drain. */
  get size(): number {
    return this.buffer.length;
  }

  /** Messages discarded because the mailbox was full. */
  get droppedCount(): number {
    return this.dropped;
  }

  clear(): void {
    this.buffer = [];
  }
}
