import type { CounterSnapshot, Reading, SampleBatch, SeriesKey } from "../types.js";
import { RESOURCE_TAGS, STALL_KINDS, seriesKey } from "../types.js";

/**
 * Newest-first bounded sequence of sample batches.
 *
 * A series missing from a snapshot keeps the reading it had in the previous
 * batch, including that reading's original sequence number.
 */
export class SampleRing {
  readonly capacity: number;
  private readonly batches: SampleBatch[] = [];
  private nextSequence = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`SampleRing capacity must be a positive integer (got ${String(capacity)})`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.batches.length;
  }

  push(snapshot: CounterSnapshot, monoMs: number, wallMs: number): SampleBatch {
    const sequence = this.nextSequence++;
    const previous = this.batches[0];
    const readings = new Map<SeriesKey, Reading>();

    for (const tag of RESOURCE_TAGS) {
      for (const kind of STALL_KINDS) {
        const key = seriesKey(tag, kind);
        const fresh = snapshot.series.get(key);
        if (fresh) {
          readings.set(
            key,
            Object.freeze({
              tag,
              kind,
              totalMicros: fresh.totalMicros,
              averages: fresh.averages,
              sequence,
            }),
          );
          continue;
        }
        const carried = previous?.readings.get(key);
        if (carried) readings.set(key, carried);
      }
    }

    const batch: SampleBatch = Object.freeze({ sequence, monoMs, wallMs, readings });
    this.batches.unshift(batch);
    if (this.batches.length > this.capacity) {
      this.batches.length = this.capacity;
    }
    return batch;
  }

  /** Batch `lag` positions back from the newest, or undefined. */
  at(lag: number): SampleBatch | undefined {
    return this.batches[lag];
  }

  newest(): SampleBatch | undefined {
    return this.batches[0];
  }

  toArray(): readonly SampleBatch[] {
    return this.batches.slice();
  }
}

