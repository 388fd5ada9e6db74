import type { SeriesKey } from "../types.js";
import type { SampleRing } from "./ring.js";

/**
 * Percent of wall time stalled between two cumulative readings.
 *
 *   pct = 100 * (deltaMicros / 1000) / deltaMs
 *
 * Not clamped to 100: a value above it points at a counter reset or overlapping
 * measurement and is reported as-is. A counter that went backwards yields 0,
 * and so does a zero or negative elapsed time.
 */
export function stallPercent(deltaMicros: number, deltaMs: number): number {
  if (deltaMs <= 0 || deltaMicros <= 0) return 0;
  return (100 * (deltaMicros / 1000)) / deltaMs;
}

/**
 * Rate for `series` over `lag` sample steps, or undefined when the ring holds
 * fewer than `lag + 1` batches or either end has no reading for the series.
 */
export function computeRate(ring: SampleRing, series: SeriesKey, lag: number): number | undefined {
  if (!Number.isInteger(lag) || lag <= 0 || ring.size < lag + 1) return undefined;
  const newest = ring.at(0);
  const older = ring.at(lag);
  const a = newest?.readings.get(series);
  const b = older?.readings.get(series);
  if (!newest || !older || !a || !b) return undefined;
  return stallPercent(a.totalMicros - b.totalMicros, newest.monoMs - older.monoMs);
}

export type SeriesRates = ReadonlyMap<number, number | undefined>;

/** Rates for every lag, keyed and ordered by lag; nothing is cached between ticks. */
export function computeRates(
  ring: SampleRing,
  series: SeriesKey,
  lags: readonly number[],
): SeriesRates {
  const rates = new Map<number, number | undefined>();
  for (const lag of lags) {
    rates.set(lag, computeRate(ring, series, lag));
  }
  return rates;
}
