export const THRESHOLD_MIN = 5;
export const THRESHOLD_MAX = 95;
export const THRESHOLD_STEP = 5;

function clampThreshold(value: number): number {
  return Math.max(THRESHOLD_MIN, Math.min(THRESHOLD_MAX, value));
}

/**
 * Round an arbitrary percent to the nearest multiple of 5 (halves up) and
 * clamp it to [5, 95].
 */
export function normalizeThreshold(value: number): number {
  if (!Number.isFinite(value)) return THRESHOLD_MIN;
  return clampThreshold(Math.round(value / THRESHOLD_STEP) * THRESHOLD_STEP);
}

/** Move the threshold by whole steps; requests past either bound are clamped. */
export function adjustThreshold(current: number, steps: number): number {
  return normalizeThreshold(normalizeThreshold(current) + steps * THRESHOLD_STEP);
}
