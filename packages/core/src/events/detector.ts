import { computeRate } from "../sampling/rate.js";
import type { SampleRing } from "../sampling/ring.js";
import type { EventWindow, SeriesKey, StallEvent } from "../types.js";
import { RESOURCE_TAGS, STALL_KINDS, seriesKey } from "../types.js";

export type DetectionContext = Readonly<{
  threshold: number;
  window: EventWindow;
  monoMs: number;
  wallMs: number;
}>;

export function roundPercent(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function windowValue(ring: SampleRing, key: SeriesKey, window: EventWindow): number | undefined {
  if (window.kind === "lag") return computeRate(ring, key, window.lag);
  return ring.newest()?.readings.get(key)?.averages[window.field];
}

/**
 * One event per series whose value over `window` meets the threshold this
 * tick. Lag windows use the computed rate, average windows the kernel's own
 * figure from the newest reading. No cooldown: a sustained stall yields an
 * event on every tick.
 */
export function detectEvents(ring: SampleRing, ctx: DetectionContext): readonly StallEvent[] {
  const newest = ring.newest();
  if (!newest) return [];

  const events: StallEvent[] = [];
  for (const tag of RESOURCE_TAGS) {
    for (const kind of STALL_KINDS) {
      const value = windowValue(ring, seriesKey(tag, kind), ctx.window);
      if (value === undefined) continue;
      const percent = roundPercent(value);
      if (percent < ctx.threshold) continue;
      events.push(
        Object.freeze({
          monoMs: ctx.monoMs,
          sequence: newest.sequence,
          tag,
          kind,
          percent,
          threshold: ctx.threshold,
          window: ctx.window,
          wallMs: ctx.wallMs,
        }),
      );
    }
  }
  return events;
}
