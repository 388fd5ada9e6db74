import type { StallEvent } from "../types.js";

/**
 * Newest-first bounded event log. Events are frozen on insertion and only ever
 * leave by aging out past `capacity`.
 */
export class EventHistory implements Iterable<StallEvent> {
  readonly capacity: number;
  private readonly events: StallEvent[] = [];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(
        `EventHistory capacity must be a positive integer (got ${String(capacity)})`,
      );
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.events.length;
  }

  insert(event: StallEvent): void {
    this.events.unshift(Object.isFrozen(event) ? event : Object.freeze({ ...event }));
    if (this.events.length > this.capacity) {
      this.events.length = this.capacity;
    }
  }

  /**
   * Insert one tick's detections so that they end up newest-first ahead of
   * older ticks while keeping their given order among themselves.
   */
  insertBatch(events: readonly StallEvent[]): void {
    for (let i = events.length - 1; i >= 0; i--) {
      const event = events[i];
      if (event) this.insert(event);
    }
  }

  [Symbol.iterator](): Iterator<StallEvent> {
    return this.events[Symbol.iterator]();
  }

  toArray(): readonly StallEvent[] {
    return this.events.slice();
  }
}
